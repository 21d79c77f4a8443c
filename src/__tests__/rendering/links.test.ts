/**
 * Unit tests for file naming, pagination and link helpers
 */

import {
  buildPageLinks,
  findFileNameConflicts,
  groupBy,
  isCollectionPageName,
  pageFileName,
  paginate,
  safeFileName
} from '../../rendering/links.js';

describe('Link helpers', () => {
  describe('safeFileName', () => {
    test('should keep plain ids', () => {
      expect(safeFileName('license')).toBe('license');
    });

    test('should keep the last segment of URL ids', () => {
      expect(safeFileName('https://w3id.org/everse/i/indicators/license')).toBe('license');
      expect(safeFileName('https://w3id.org/everse/i/tools/howfairis/')).toBe('howfairis');
    });
  });

  describe('findFileNameConflicts', () => {
    test('should recognise collection page names', () => {
      expect(isCollectionPageName('index')).toBe(true);
      expect(isCollectionPageName('index_p12')).toBe(true);
      expect(isCollectionPageName('indexing')).toBe(false);
    });

    test('should report reserved and shared file names in input order', () => {
      expect(findFileNameConflicts('tools', [
        'https://example.test/tools/index_p2',
        'howfairis',
        'https://example.test/tools/howfairis',
        'howfairis'
      ])).toEqual([
        'Reserved file name tools/index_p2.json for id https://example.test/tools/index_p2',
        'File name tools/howfairis.json shared by ids howfairis and https://example.test/tools/howfairis'
      ]);
    });

    test('should accept distinct names', () => {
      expect(findFileNameConflicts('dimensions', ['legal', 'indexing'])).toEqual([]);
    });
  });

  describe('paginate', () => {
    test('should split items into pages of the given size', () => {
      const pages = paginate([1, 2, 3, 4, 5], 2);

      expect(pages).toEqual([
        { page: 1, totalPages: 3, items: [1, 2] },
        { page: 2, totalPages: 3, items: [3, 4] },
        { page: 3, totalPages: 3, items: [5] }
      ]);
    });

    test('should return one empty page for no items', () => {
      expect(paginate([], 50)).toEqual([{ page: 1, totalPages: 1, items: [] }]);
    });
  });

  test('should name page files', () => {
    expect(pageFileName(1)).toBe('index.json');
    expect(pageFileName(3)).toBe('index_p3.json');
  });

  describe('buildPageLinks', () => {
    const base = 'https://api.test/v1/tools';

    test('should only link self on a single page', () => {
      expect(buildPageLinks(base, 1, 1)).toEqual({ self: `${base}/index.json` });
    });

    test('should link next and last from the first page', () => {
      expect(buildPageLinks(base, 1, 3)).toEqual({
        self: `${base}/index.json`,
        next: `${base}/index_p2.json`,
        last: `${base}/index_p3.json`
      });
    });

    test('should link every direction from a middle page', () => {
      expect(buildPageLinks(base, 2, 3)).toEqual({
        self: `${base}/index_p2.json`,
        first: `${base}/index.json`,
        prev: `${base}/index.json`,
        next: `${base}/index_p3.json`,
        last: `${base}/index_p3.json`
      });
    });

    test('should link first and prev from the last page', () => {
      expect(buildPageLinks(base, 3, 3)).toEqual({
        self: `${base}/index_p3.json`,
        first: `${base}/index.json`,
        prev: `${base}/index_p2.json`
      });
    });
  });

  test('should group items under each of their keys in first-seen order', () => {
    const groups = groupBy(['adopt:a', 'trial:b', 'adopt:c'], item => [item.split(':')[0] ?? '']);

    expect(Array.from(groups.keys())).toEqual(['adopt', 'trial']);
    expect(groups.get('adopt')).toEqual(['adopt:a', 'adopt:c']);
  });
});
