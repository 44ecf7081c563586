import { readFileSync } from 'fs';
import { join } from 'path';
import { Config } from '../types/Config';
import {
  API_BASE_ADDRESS,
  API_SEARCH_PATH,
  DEFAULT_TIMEOUT_MS,
} from './constants';
import { logger } from './logger';

interface ConfigFile {
  baseUrl?: string;
  searchPath?: string;
  timeoutMs?: number;
  userAgent?: string;
}

export class ConfigLoader {
  private static readonly CONFIG_FILE_PATH = join(
    process.cwd(),
    'config',
    'blog-search.json'
  );

  public static loadConfig(
    configFilePath: string = ConfigLoader.CONFIG_FILE_PATH
  ): Config {
    try {
      logger.info('設定読み込み開始');

      // ファイルから設定を読み込み (任意)
      const configFile = this.loadConfigFile(configFilePath);

      // 環境変数と統合
      const config = this.mergeWithEnvironmentVariables(configFile);

      // バリデーション
      this.validateConfig(config);

      logger.info('設定読み込み完了', {
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
      });

      return config;
    } catch (error) {
      logger.error('設定読み込みでエラー', error);
      throw new Error(
        `Config loading failed: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  private static loadConfigFile(path: string): ConfigFile {
    let fileContent: string;
    try {
      fileContent = readFileSync(path, 'utf8');
    } catch (error) {
      if (
        error instanceof Error &&
        'code' in error &&
        error.code === 'ENOENT'
      ) {
        logger.debug('設定ファイルなし、既定値を使用', { path });
        return {};
      }
      throw error;
    }

    try {
      const configFile: ConfigFile = JSON.parse(fileContent);
      logger.debug('設定ファイル解析完了', { path });
      return configFile;
    } catch (error) {
      throw new Error(`Config file parsing failed: ${String(error)}`);
    }
  }

  private static mergeWithEnvironmentVariables(configFile: ConfigFile): Config {
    const timeoutFromEnv = process.env.TWINGLY_SEARCH_TIMEOUT_MS;

    return {
      apiKey: this.getRequiredEnvironmentVariable('TWINGLY_SEARCH_KEY'),
      baseUrl:
        process.env.TWINGLY_SEARCH_BASE_URL ||
        configFile.baseUrl ||
        API_BASE_ADDRESS,
      searchPath: configFile.searchPath || API_SEARCH_PATH,
      timeoutMs: timeoutFromEnv
        ? Number(timeoutFromEnv)
        : configFile.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      ...(configFile.userAgent ? { userAgent: configFile.userAgent } : {}),
    };
  }

  private static getRequiredEnvironmentVariable(name: string): string {
    const value = process.env[name];
    if (!value) {
      throw new Error(`Required environment variable ${name} is not set`);
    }
    return value;
  }

  private static validateConfig(config: Config): void {
    if (!config.apiKey.trim()) {
      throw new Error('API key cannot be empty');
    }

    if (!Number.isInteger(config.timeoutMs) || config.timeoutMs <= 0) {
      throw new Error('timeoutMs must be a positive integer');
    }

    if (!this.isValidBaseUrl(config.baseUrl)) {
      throw new Error(`Invalid base URL: ${config.baseUrl}`);
    }

    logger.debug('設定バリデーション完了');
  }

  private static isValidBaseUrl(url: string): boolean {
    try {
      const parsedUrl = new URL(url);
      return parsedUrl.protocol === 'https:' || parsedUrl.protocol === 'http:';
    } catch {
      return false;
    }
  }

  // 環境変数の一覧表示 (値は伏せる)
  public static getEnvironmentVariables(): Record<string, string | undefined> {
    return {
      TWINGLY_SEARCH_KEY: process.env.TWINGLY_SEARCH_KEY ? '[SET]' : undefined,
      TWINGLY_SEARCH_TIMEOUT_MS: process.env.TWINGLY_SEARCH_TIMEOUT_MS,
      TWINGLY_SEARCH_BASE_URL: process.env.TWINGLY_SEARCH_BASE_URL,
      LOG_LEVEL: process.env.LOG_LEVEL,
    };
  }
}
