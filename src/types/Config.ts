export interface Config {
  apiKey: string;
  baseUrl: string;
  searchPath: string;
  timeoutMs: number;
  userAgent?: string;
}

export interface LoggerConfig {
  level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
  maskSensitiveData: boolean;
}
