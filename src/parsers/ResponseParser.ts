import { parseStringPromise } from 'xml2js';
import { DeserializationError } from '../errors/BlogSearchError';
import { OperationResult, Post, QueryResult } from '../types/Post';

// xml2js (explicitArray: true) の出力形式
type XmlText = string | { _?: string };

interface XmlList {
  tag?: XmlText[];
  link?: XmlText[];
}

interface TwinglyPostXml {
  $?: { contentType?: string };
  url?: XmlText[];
  title?: XmlText[];
  author?: XmlText[];
  summary?: XmlText[];
  languageCode?: XmlText[];
  published?: XmlText[];
  indexed?: XmlText[];
  blogUrl?: XmlText[];
  blogName?: XmlText[];
  authority?: XmlText[];
  blogRank?: XmlText[];
  tags?: Array<XmlList | string>;
  links?: Array<XmlList | string>;
}

interface TwinglyDataXml {
  $?: {
    numberOfAuthors?: string;
    numberOfMatchesReturned?: string;
    numberOfMatchesTotal?: string;
    secondsElapsed?: string;
  };
  post?: TwinglyPostXml[];
}

interface OperationResultXml {
  $?: { resultType?: string };
  _?: string;
}

interface BlogStreamXml {
  operationResult?: Array<OperationResultXml | string>;
}

interface ParsedResponseXml {
  twinglydata?: TwinglyDataXml | string;
  operationResult?: OperationResultXml | string;
  blogstream?: BlogStreamXml | string;
}

/**
 * 空白のみの本文は null。宣言やコメントだけでルート要素がない本文は整形式ではない
 */
async function parseXml(xml: string): Promise<ParsedResponseXml | null> {
  let parsed: ParsedResponseXml | null;
  try {
    parsed = await parseStringPromise(xml);
  } catch (error) {
    throw new DeserializationError(
      `Response is not well-formed XML: ${
        error instanceof Error ? error.message : String(error)
      }`,
      error
    );
  }

  if (!parsed) {
    if (xml.trim().length > 0) {
      throw new DeserializationError('Response has no root element');
    }
    return null;
  }
  return parsed;
}

function rootNameOf(parsed: ParsedResponseXml | null): string {
  return (parsed && Object.keys(parsed)[0]) ?? '(empty)';
}

function textOf(values: XmlText[] | undefined): string {
  const value = values?.[0];
  if (typeof value === 'string') {
    return value.trim();
  }
  return value?._?.trim() ?? '';
}

function numberOf(value: string | undefined): number {
  const parsed = value === undefined ? NaN : parseFloat(value);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function dateOf(values: XmlText[] | undefined): Date | undefined {
  const text = textOf(values);
  if (!text) return undefined;

  // "2013-01-29 15:21:56Z" 形式をISO-8601に寄せる
  const date = new Date(text.replace(' ', 'T'));
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function listOf(
  lists: Array<XmlList | string> | undefined,
  key: keyof XmlList
): string[] {
  const list = lists?.[0];
  if (!list || typeof list === 'string') return [];

  return (list[key] ?? [])
    .map(item => textOf([item]))
    .filter(item => item.length > 0);
}

function transformToPost(item: TwinglyPostXml): Post {
  return {
    contentType: item.$?.contentType ?? '',
    url: textOf(item.url),
    title: textOf(item.title),
    author: textOf(item.author),
    summary: textOf(item.summary),
    published: dateOf(item.published),
    indexed: dateOf(item.indexed),
    languageCode: textOf(item.languageCode),
    authority: numberOf(textOf(item.authority)),
    blogRank: numberOf(textOf(item.blogRank)),
    blogName: textOf(item.blogName),
    blogUrl: textOf(item.blogUrl),
    tags: listOf(item.tags, 'tag'),
    links: listOf(item.links, 'link'),
  };
}

/**
 * 成功時のレスポンス (<twinglydata>) を QueryResult に変換する。
 * コンテンツ種別による絞り込みは行わない。
 */
export async function parseQueryResult(xml: string): Promise<QueryResult> {
  const parsed = await parseXml(xml);
  if (parsed?.twinglydata === undefined) {
    throw new DeserializationError(
      `Expected <twinglydata> root element but got <${rootNameOf(parsed)}>`
    );
  }

  // 属性も子要素もない場合、xml2js は空文字列を返す
  const data: TwinglyDataXml =
    typeof parsed.twinglydata === 'string' ? {} : parsed.twinglydata;

  return {
    posts: (data.post ?? []).map(item => transformToPost(item)),
    numberOfAuthors: numberOf(data.$?.numberOfAuthors),
    numberOfMatchesReturned: numberOf(data.$?.numberOfMatchesReturned),
    numberOfMatchesTotal: numberOf(data.$?.numberOfMatchesTotal),
    secondsElapsed: numberOf(data.$?.secondsElapsed),
  };
}

function toOperationResult(
  node: OperationResultXml | string | undefined
): OperationResult {
  if (typeof node === 'string') {
    return { resultType: '', text: node };
  }
  return {
    resultType: node?.$?.resultType ?? '',
    text: node?._ ?? '',
  };
}

/**
 * エラー時のレスポンス (<operationResult>) を解析する。
 * ルート直下、または <blogstream> に包まれた形式のどちらも受け付ける。
 * 本文が空白のみの場合は null。
 */
export async function parseOperationResult(
  xml: string
): Promise<OperationResult | null> {
  const parsed = await parseXml(xml);
  if (!parsed) {
    return null;
  }

  if (parsed.operationResult !== undefined) {
    return toOperationResult(parsed.operationResult);
  }

  const stream = parsed.blogstream;
  if (
    stream !== undefined &&
    typeof stream !== 'string' &&
    stream.operationResult
  ) {
    return toOperationResult(stream.operationResult[0]);
  }

  throw new DeserializationError(
    `Expected <operationResult> element but got <${rootNameOf(parsed)}>`
  );
}
