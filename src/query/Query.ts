import { InvalidQueryError } from '../errors/BlogSearchError';

export interface QueryOptions {
  searchPattern: string;
  language?: string;
  startTime?: Date;
  endTime?: Date;
}

/**
 * ブログ検索クエリ。生成後は変更できない。
 * `searchPattern` にはAPIが解釈する演算子 (AND / OR など) を含めてよい。
 */
export class Query {
  public readonly searchPattern: string;
  public readonly language?: string;
  public readonly startTime?: Date;
  public readonly endTime?: Date;

  constructor(options: QueryOptions) {
    this.searchPattern = options.searchPattern;
    this.language = options.language;
    // 呼び出し元が Date を書き換えても影響しないようコピーを保持
    this.startTime = options.startTime && new Date(options.startTime);
    this.endTime = options.endTime && new Date(options.endTime);
    Object.freeze(this);
  }

  public validate(): void {
    if (!this.searchPattern || this.searchPattern.trim().length === 0) {
      throw new InvalidQueryError('Search pattern cannot be empty');
    }

    if (this.startTime && Number.isNaN(this.startTime.getTime())) {
      throw new InvalidQueryError('startTime is not a valid date');
    }

    if (this.endTime && Number.isNaN(this.endTime.getTime())) {
      throw new InvalidQueryError('endTime is not a valid date');
    }
  }
}
