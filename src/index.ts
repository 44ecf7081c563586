export { Query, QueryOptions } from './query/Query';
export { buildRequestUri, formatApiDate } from './query/RequestBuilder';
export { parseOperationResult, parseQueryResult } from './parsers/ResponseParser';
export { mapResponseToError, isTimeoutFailure } from './errors/ErrorMapper';
export * from './errors/BlogSearchError';
export {
  BlogSearchClient,
  HttpTransport,
  QueryOutcome,
  formatUserAgent,
} from './services/BlogSearchClient';
export { ConfigLoader } from './utils/config';
export { Config } from './types/Config';
export { ContentType, Post, QueryResult, OperationResult } from './types/Post';
export { DEFAULT_USER_AGENT_PRODUCT, API_DATE_FORMAT } from './utils/constants';
