import {
  API_KEY,
  DOCUMENT_LANGUAGE,
  END_TIME,
  SEARCH_PATTERN,
  START_TIME,
  XML_OUTPUT_VERSION,
  XML_OUTPUT_VERSION_VALUE,
} from '../utils/constants';
import { Query } from './Query';

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * API_DATE_FORMAT (yyyy-MM-dd HH:mm:ss, UTC) で日時を整形する
 */
export function formatApiDate(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

/**
 * 検証済みのクエリからリクエストURIのクエリ文字列を組み立てる。
 * 値のない任意パラメータは空文字でも送らずに省略する。
 */
export function buildRequestUri(query: Query, apiKey: string): string {
  const segments: string[] = [
    `${API_KEY}=${encodeURIComponent(apiKey)}`,
    `${SEARCH_PATTERN}=${encodeURIComponent(query.searchPattern)}`,
    `${XML_OUTPUT_VERSION}=${XML_OUTPUT_VERSION_VALUE}`,
  ];

  if (query.language && query.language.trim().length > 0) {
    segments.push(`${DOCUMENT_LANGUAGE}=${encodeURIComponent(query.language)}`);
  }

  if (query.startTime) {
    segments.push(
      `${START_TIME}=${encodeURIComponent(formatApiDate(query.startTime))}`
    );
  }

  if (query.endTime) {
    segments.push(
      `${END_TIME}=${encodeURIComponent(formatApiDate(query.endTime))}`
    );
  }

  return `?${segments.join('&')}`;
}
