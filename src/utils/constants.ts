import { version } from '../../package.json';

export const API_BASE_ADDRESS = 'https://api.twingly.com/';
export const API_SEARCH_PATH = 'analytics/Analytics.ashx';
export const DEFAULT_TIMEOUT_MS = 10000;

// クエリパラメータ名
export const API_KEY = 'key';
export const SEARCH_PATTERN = 'searchpattern';
export const DOCUMENT_LANGUAGE = 'language';
export const START_TIME = 'ts';
export const END_TIME = 'tsTo';
export const XML_OUTPUT_VERSION = 'xmloutputversion';
export const XML_OUTPUT_VERSION_VALUE = '2';

// サーバー側のパーサーが受け付ける形式 (UTC)
export const API_DATE_FORMAT = 'yyyy-MM-dd HH:mm:ss';

// operationResult のテキストで返される既知のエラーコード
export const SERVICE_UNAVAILABLE = 'service unavailable';
export const API_KEY_DOES_NOT_EXIST = 'api key does not exist';
export const UNAUTHORIZED_API_KEY = 'unauthorized api key';

export const DEFAULT_USER_AGENT_PRODUCT = 'Twingly Search API Client';
export const CLIENT_VERSION = version;
export const CLIENT_PLATFORM = 'Node.js';
