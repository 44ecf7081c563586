import { Query } from '../../../src/query/Query';
import {
  buildRequestUri,
  formatApiDate,
} from '../../../src/query/RequestBuilder';

describe('RequestBuilder', () => {
  describe('buildRequestUri', () => {
    it('必須パラメータのみのクエリ文字列を組み立てる', () => {
      const query = new Query({ searchPattern: 'typescript' });

      expect(buildRequestUri(query, 'test-key')).toBe(
        '?key=test-key&searchpattern=typescript&xmloutputversion=2'
      );
    });

    it('任意パラメータを指定順に追加する', () => {
      const query = new Query({
        searchPattern: 'typescript OR "node js"',
        language: 'en',
        startTime: new Date(Date.UTC(2024, 0, 15, 9, 5, 3)),
        endTime: new Date(Date.UTC(2024, 1, 1, 0, 0, 0)),
      });

      expect(buildRequestUri(query, 'test-key')).toBe(
        '?key=test-key' +
          '&searchpattern=typescript%20OR%20%22node%20js%22' +
          '&xmloutputversion=2' +
          '&language=en' +
          '&ts=2024-01-15%2009%3A05%3A03' +
          '&tsTo=2024-02-01%2000%3A00%3A00'
      );
    });

    it('空白のみの言語コードは送らない', () => {
      const query = new Query({ searchPattern: 'typescript', language: '  ' });

      expect(buildRequestUri(query, 'test-key')).not.toContain('language=');
    });

    it('終了日時のみ指定した場合は tsTo だけを追加する', () => {
      const query = new Query({
        searchPattern: 'typescript',
        endTime: new Date(Date.UTC(2023, 11, 31, 23, 59, 59)),
      });

      expect(buildRequestUri(query, 'test-key')).toBe(
        '?key=test-key&searchpattern=typescript&xmloutputversion=2' +
          '&tsTo=2023-12-31%2023%3A59%3A59'
      );
    });

    it.each([
      'a & b',
      'x=y#fragment',
      'c++ OR c#',
      'ブログ 検索',
      '"exact phrase" -excluded',
      '100% sure?',
    ])('検索パターン "%s" はURLデコードで元に戻る', searchPattern => {
      const query = new Query({ searchPattern, language: 'sv' });
      const params = new URLSearchParams(
        buildRequestUri(query, 'test-key').slice(1)
      );

      expect(params.get('searchpattern')).toBe(searchPattern);
      expect([...params.keys()]).toEqual([
        'key',
        'searchpattern',
        'xmloutputversion',
        'language',
      ]);
    });

    it('同じ入力からは同じ結果を返す', () => {
      const options = {
        searchPattern: 'deterministic',
        startTime: new Date(Date.UTC(2024, 5, 1)),
      };

      expect(buildRequestUri(new Query(options), 'test-key')).toBe(
        buildRequestUri(new Query(options), 'test-key')
      );
    });
  });

  describe('formatApiDate', () => {
    it('UTC の yyyy-MM-dd HH:mm:ss 形式で整形する', () => {
      expect(formatApiDate(new Date('2024-03-09T04:07:08.999Z'))).toBe(
        '2024-03-09 04:07:08'
      );
    });
  });
});
