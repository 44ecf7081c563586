import {
  parseOperationResult,
  parseQueryResult,
} from '../../../src/parsers/ResponseParser';
import { DeserializationError } from '../../../src/errors/BlogSearchError';
import {
  EMPTY_QUERY_RESULT_XML,
  QUERY_RESULT_XML,
  operationResultXml,
} from '../../fixtures/responses';

describe('ResponseParser', () => {
  describe('parseQueryResult', () => {
    it('メタデータと全ての記事を変換する', async () => {
      const result = await parseQueryResult(QUERY_RESULT_XML);

      expect(result.numberOfMatchesReturned).toBe(3);
      expect(result.numberOfMatchesTotal).toBe(120);
      expect(result.numberOfAuthors).toBe(2);
      expect(result.secondsElapsed).toBe(0.148);
      expect(result.posts.map(post => post.contentType)).toEqual([
        'blog',
        'news',
        'blog',
      ]);
    });

    it('記事の各フィールドを変換する', async () => {
      const result = await parseQueryResult(QUERY_RESULT_XML);

      expect(result.posts[0]).toEqual({
        contentType: 'blog',
        url: 'http://example.com/blog/first-post',
        title: 'First post',
        author: 'Alice',
        summary: 'Summary of the first post',
        published: new Date('2024-01-15T10:00:00Z'),
        indexed: new Date('2024-01-15T10:05:00Z'),
        languageCode: 'sv',
        authority: 12,
        blogRank: 3,
        blogName: 'Example blog',
        blogUrl: 'http://example.com/blog',
        tags: ['typescript', 'node'],
        links: ['http://example.com/other'],
      });
    });

    it('空要素や欠けた要素は空の値になる', async () => {
      const result = await parseQueryResult(QUERY_RESULT_XML);
      const post = result.posts[2];

      expect(post?.summary).toBe('');
      expect(post?.published).toBeUndefined();
      expect(post?.tags).toEqual([]);
      expect(post?.links).toEqual([]);
    });

    it('記事がない場合は空配列を返す', async () => {
      const result = await parseQueryResult(EMPTY_QUERY_RESULT_XML);

      expect(result.posts).toEqual([]);
      expect(result.numberOfMatchesTotal).toBe(0);
      expect(result.numberOfAuthors).toBe(0);
    });

    it('エラー形式の本文は DeserializationError になる', async () => {
      await expect(
        parseQueryResult(operationResultXml('service unavailable'))
      ).rejects.toThrow(
        'Expected <twinglydata> root element but got <operationResult>'
      );
    });

    it('整形式でないXMLは DeserializationError になる', async () => {
      await expect(parseQueryResult('this is not xml')).rejects.toBeInstanceOf(
        DeserializationError
      );
    });
  });

  describe('parseOperationResult', () => {
    it('ルート要素の operationResult を解析する', async () => {
      const result = await parseOperationResult(
        '<operationResult resultType="failure">api key does not exist</operationResult>'
      );

      expect(result).toEqual({
        resultType: 'failure',
        text: 'api key does not exist',
      });
    });

    it('blogstream に包まれた operationResult を解析する', async () => {
      const result = await parseOperationResult(
        '<blogstream xmlns="http://www.twingly.com">' +
          '<operationResult resultType="failure">service unavailable</operationResult>' +
          '</blogstream>'
      );

      expect(result).toEqual({
        resultType: 'failure',
        text: 'service unavailable',
      });
    });

    it('属性のない operationResult も解析する', async () => {
      const result = await parseOperationResult(
        '<operationResult>unauthorized api key</operationResult>'
      );

      expect(result).toEqual({ resultType: '', text: 'unauthorized api key' });
    });

    it('成功形式の本文は DeserializationError になる', async () => {
      await expect(parseOperationResult(QUERY_RESULT_XML)).rejects.toThrow(
        'Expected <operationResult> element but got <twinglydata>'
      );
    });

    it('閉じられていないXMLは DeserializationError になる', async () => {
      await expect(
        parseOperationResult('<operationResult resultType="error">')
      ).rejects.toBeInstanceOf(DeserializationError);
    });

    it.each([
      '<?xml version="1.0" encoding="utf-8"?>',
      '<!-- maintenance -->',
    ])('ルート要素のない本文 "%s" は DeserializationError になる', async body => {
      await expect(parseOperationResult(body)).rejects.toThrow(
        new DeserializationError('Response has no root element')
      );
      await expect(parseQueryResult(body)).rejects.toThrow(
        'Response has no root element'
      );
    });

    it('空の本文からは null を返す', async () => {
      await expect(parseOperationResult('')).resolves.toBeNull();
    });
  });
});
