import axios from 'axios';
import { parseOperationResult } from '../parsers/ResponseParser';
import { OperationResult } from '../types/Post';
import {
  API_KEY_DOES_NOT_EXIST,
  SERVICE_UNAVAILABLE,
  UNAUTHORIZED_API_KEY,
} from '../utils/constants';
import {
  BlogSearchError,
  DeserializationFailureError,
  EmptyResponseError,
  GenericRequestError,
  RequestTimeoutError,
  ServiceUnavailableError,
  UnauthorizedApiKeyError,
  UnknownApiError,
  UnknownApiKeyError,
} from './BlogSearchError';

const TIMEOUT_ERROR_CODES = ['ECONNABORTED', 'ETIMEDOUT'];
const TIMEOUT_ERROR_NAMES = ['AbortError', 'TimeoutError', 'CanceledError'];

export function isTimeoutFailure(failure: unknown): boolean {
  if (axios.isCancel(failure)) {
    return true;
  }
  if (axios.isAxiosError(failure)) {
    return TIMEOUT_ERROR_CODES.includes(failure.code ?? '');
  }
  return failure instanceof Error && TIMEOUT_ERROR_NAMES.includes(failure.name);
}

/**
 * 失敗したリクエストを型付きエラー1つに変換する。
 * 入力 (レスポンス本文と発生した例外) のみに依存し、通信やログ出力は行わない。
 *
 * @param responseBody 例外発生前に取得できたレスポンス本文 (取得できなければ空文字)
 * @param failure リクエスト中に発生した例外
 */
export async function mapResponseToError(
  responseBody: string,
  failure: unknown
): Promise<BlogSearchError> {
  if (isTimeoutFailure(failure)) {
    return new RequestTimeoutError(failure);
  }

  if (!responseBody || responseBody.trim().length === 0) {
    return new EmptyResponseError(failure);
  }

  let errorResponse: OperationResult | null;
  try {
    errorResponse = await parseOperationResult(responseBody);
  } catch (parseError) {
    return new DeserializationFailureError(parseError);
  }

  if (!errorResponse) {
    return new GenericRequestError(failure);
  }

  switch (errorResponse.text.trim().toLowerCase()) {
    case SERVICE_UNAVAILABLE:
      return new ServiceUnavailableError(failure);
    case API_KEY_DOES_NOT_EXIST:
      return new UnknownApiKeyError(failure);
    case UNAUTHORIZED_API_KEY:
      return new UnauthorizedApiKeyError(failure);
    default:
      // 本文はエラースキーマとして解析済み (小さく、機密情報を含まない)
      return new UnknownApiError(responseBody, failure);
  }
}
