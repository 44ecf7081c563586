#!/usr/bin/env node

import { Query } from './query/Query';
import { BlogSearchClient } from './services/BlogSearchClient';
import { Post } from './types/Post';
import { ConfigLoader } from './utils/config';
import { logger } from './utils/logger';

interface CommandLineArgs {
  searchPattern?: string;
  language?: string;
  since?: Date;
  until?: Date;
  verbose: boolean;
  help: boolean;
}

// 実行時引数の処理
export function parseCommandLineArgs(args: string[]): CommandLineArgs {
  const valueOf = (flag: string): string | undefined => {
    const index = args.indexOf(flag);
    return index !== -1 && index + 1 < args.length
      ? args[index + 1]
      : undefined;
  };
  const flagsWithValue = ['--lang', '--since', '--until'];
  const positional = args.filter(
    (arg, index) =>
      !arg.startsWith('-') &&
      !flagsWithValue.includes(args[index - 1] ?? '')
  );

  const language = valueOf('--lang');
  const since = valueOf('--since');
  const until = valueOf('--until');

  return {
    help: args.includes('--help') || args.includes('-h'),
    verbose: args.includes('--verbose'),
    ...(positional.length > 0 ? { searchPattern: positional.join(' ') } : {}),
    ...(language ? { language } : {}),
    ...(since ? { since: new Date(since) } : {}),
    ...(until ? { until: new Date(until) } : {}),
  };
}

// ヘルプメッセージを表示
function showHelp(): void {
  console.log(`
Twingly ブログ検索クライアント

使用方法:
  blog-search <検索パターン> [オプション]

オプション:
  --lang <code>       記事の言語コードで絞り込み (例: sv, en)
  --since <date>      指定日時以降に公開された記事のみ
  --until <date>      指定日時以前に公開された記事のみ
  --verbose           デバッグログを出力
  --help, -h          このヘルプを表示

環境変数:
  TWINGLY_SEARCH_KEY          APIキー (必須)
  TWINGLY_SEARCH_TIMEOUT_MS   タイムアウト (ms)
  LOG_LEVEL                   DEBUG | INFO | WARN | ERROR

例:
  blog-search "typescript OR javascript" --lang en --since 2024-01-01
`);
}

function formatPost(post: Post, index: number): string {
  const published = post.published ? post.published.toISOString() : '-';
  return `${index + 1}. ${post.title} (${post.blogName}) ${published} ${post.url}`;
}

async function main(args: CommandLineArgs): Promise<void> {
  if (args.verbose) {
    logger.setLevel('DEBUG');
    logger.debug('環境変数確認', ConfigLoader.getEnvironmentVariables());
  }

  const config = ConfigLoader.loadConfig();
  const client = new BlogSearchClient(config);

  const query = new Query({
    searchPattern: args.searchPattern ?? '',
    language: args.language,
    startTime: args.since,
    endTime: args.until,
  });

  const outcome = await client.querySafe(query);
  if (!outcome.ok) {
    logger.error(`検索失敗 [${outcome.error.kind}]`, outcome.error);
    process.exit(1);
  }

  const { result } = outcome;
  logger.info('検索完了', {
    returned: result.numberOfMatchesReturned,
    total: result.numberOfMatchesTotal,
    blogPosts: result.posts.length,
    seconds: result.secondsElapsed,
  });

  result.posts.forEach((post, index) => {
    logger.info(formatPost(post, index));
  });
}

// メイン実行
if (require.main === module) {
  const args = parseCommandLineArgs(process.argv.slice(2));

  if (args.help) {
    showHelp();
    process.exit(0);
  } else {
    main(args).catch(error => {
      logger.error('メイン処理でキャッチされていないエラー', error);
      process.exit(1);
    });
  }
}

export { main };
