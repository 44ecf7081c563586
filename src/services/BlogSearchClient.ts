import axios, { AxiosRequestConfig, AxiosResponse } from 'axios';
import {
  BlogSearchError,
  GenericRequestError,
  InvalidArgumentError,
  isBlogSearchError,
} from '../errors/BlogSearchError';
import { mapResponseToError } from '../errors/ErrorMapper';
import { parseQueryResult } from '../parsers/ResponseParser';
import { Query } from '../query/Query';
import { buildRequestUri } from '../query/RequestBuilder';
import { Config } from '../types/Config';
import { ContentType, QueryResult } from '../types/Post';
import {
  CLIENT_PLATFORM,
  CLIENT_VERSION,
  DEFAULT_USER_AGENT_PRODUCT,
} from '../utils/constants';
import { logger } from '../utils/logger';

/**
 * GETでレスポンス本文を返すHTTPトランスポート。既定は axios インスタンス。
 * タイムアウト・キャンセル時は axios と同じ形の例外を投げること。
 */
export interface HttpTransport {
  get(
    url: string,
    config?: AxiosRequestConfig
  ): Promise<AxiosResponse<string>>;
}

export type QueryOutcome =
  | { ok: true; result: QueryResult }
  | { ok: false; error: BlogSearchError };

export function formatUserAgent(product: string): string {
  return `${product}/${CLIENT_PLATFORM} v.${CLIENT_VERSION}`;
}

export class BlogSearchClient {
  private readonly config: Config;
  private readonly transport: HttpTransport;
  private userAgent: string;

  constructor(config: Config, transport: HttpTransport = axios.create()) {
    this.config = { ...config };
    this.transport = transport;
    this.userAgent = formatUserAgent(DEFAULT_USER_AGENT_PRODUCT);
    if (config.userAgent) {
      this.setUserAgent(config.userAgent);
    }
    logger.debug('BlogSearchClient初期化完了', {
      baseUrl: this.config.baseUrl,
      timeoutMs: this.config.timeoutMs,
      userAgent: this.userAgent,
    });
  }

  /**
   * クエリを実行し、ブログ記事のみを含む結果を返す。
   *
   * @throws InvalidArgumentError クエリが null の場合
   * @throws InvalidQueryError 検索パターンが空の場合 (通信は行わない)
   * @throws ServiceUnavailableError / UnknownApiKeyError / UnauthorizedApiKeyError APIがエラーを返した場合
   * @throws BlogSearchError その他の失敗 (kind で判別)
   */
  public async query(query: Query): Promise<QueryResult> {
    if (query === null || query === undefined) {
      throw new InvalidArgumentError('query');
    }
    query.validate();

    const requestUri = `${this.config.searchPath}${buildRequestUri(
      query,
      this.config.apiKey
    )}`;
    let responseBody = '';

    try {
      logger.debug(`Twingly Search API呼び出し: ${requestUri}`);

      const requestStartedAt = Date.now();
      const response = await this.transport.get(requestUri, {
        baseURL: this.config.baseUrl,
        timeout: this.config.timeoutMs,
        responseType: 'text',
        headers: {
          'User-Agent': this.userAgent,
        },
      });
      logger.debug(`サーバー応答受信: ${Date.now() - requestStartedAt}ms`);

      responseBody = this.bodyOf(response.data);

      const parseStartedAt = Date.now();
      const result = await parseQueryResult(responseBody);
      const posts = result.posts.filter(
        post => post.contentType === ContentType.Blog
      );

      logger.debug(
        `レスポンス解析完了: ${Date.now() - parseStartedAt}ms ` +
          `(${result.posts.length} 件 → ブログ ${posts.length} 件)`
      );

      return { ...result, posts };
    } catch (error) {
      // 2xx以外のステータスでもエラー本文 (operationResult) は受け取れる
      if (axios.isAxiosError(error) && error.response) {
        responseBody = this.bodyOf(error.response.data);
      }
      throw await mapResponseToError(responseBody, error);
    }
  }

  /**
   * query() と同じ処理を行い、例外を投げずに結果またはエラーを返す。
   * error は query() が投げるものと同一のインスタンス。
   */
  public async querySafe(query: Query): Promise<QueryOutcome> {
    try {
      const result = await this.query(query);
      return { ok: true, result };
    } catch (error) {
      return {
        ok: false,
        error: isBlogSearchError(error) ? error : new GenericRequestError(error),
      };
    }
  }

  public getUserAgent(): string {
    return this.userAgent;
  }

  /**
   * User-Agent の製品名を設定する。空白のみの値は無視する。
   */
  public setUserAgent(product: string): void {
    if (!product || product.trim().length === 0) {
      return;
    }
    this.userAgent = formatUserAgent(product);
  }

  private bodyOf(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === null || data === undefined) return '';
    return Buffer.isBuffer(data) ? data.toString('utf8') : String(data);
  }
}
