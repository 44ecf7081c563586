export const ContentType = {
  Blog: 'blog',
} as const;

export interface Post {
  contentType: string;
  url: string;
  title: string;
  author: string;
  summary: string;
  published?: Date;
  indexed?: Date;
  languageCode: string;
  authority: number;
  blogRank: number;
  blogName: string;
  blogUrl: string;
  tags: string[];
  links: string[];
}

export interface QueryResult {
  posts: Post[];
  numberOfAuthors: number;
  numberOfMatchesReturned: number;
  numberOfMatchesTotal: number;
  secondsElapsed: number;
}

// APIのエラー応答 (<operationResult>)
export interface OperationResult {
  resultType: string;
  text: string;
}
