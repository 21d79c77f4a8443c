/**
 * File naming and link helpers shared by the endpoint generators
 */

export type LinkMap = Record<string, string>;

/**
 * File-safe name for an entity id
 * URL ids keep only their last path segment.
 */
export function safeFileName(id: string): string {
  if (!id.includes('/')) {
    return id;
  }
  const segments = id.split('/').filter(segment => segment.length > 0);
  return segments[segments.length - 1] ?? id;
}

const COLLECTION_PAGE = /^index(_p\d+)?$/;

/**
 * True for `index` and `index_p<n>`, the names collection pages use
 */
export function isCollectionPageName(name: string): boolean {
  return COLLECTION_PAGE.test(name);
}

/**
 * Ids whose documents would land on a collection page or on each other
 * @param segment - Directory the documents are written to, e.g. `tools`
 * @returns One message per conflicting id, in input order
 */
export function findFileNameConflicts(segment: string, ids: string[]): string[] {
  const conflicts: string[] = [];
  const claimed = new Map<string, string>();

  for (const id of ids) {
    const fileName = safeFileName(id);
    const path = `${segment}/${fileName}.json`;
    if (isCollectionPageName(fileName)) {
      conflicts.push(`Reserved file name ${path} for id ${id}`);
      continue;
    }

    const owner = claimed.get(fileName);
    if (owner === undefined) {
      claimed.set(fileName, id);
    } else if (owner !== id) {
      conflicts.push(`File name ${path} shared by ids ${owner} and ${id}`);
    }
  }
  return conflicts;
}

/**
 * One page of a paged collection
 */
export interface Page<T> {
  /** 1-based */
  page: number;
  totalPages: number;
  items: T[];
}

/**
 * Split items into pages
 * An empty list still yields one empty page so the collection index exists.
 */
export function paginate<T>(items: T[], pageSize: number): Array<Page<T>> {
  const totalPages = Math.max(1, Math.ceil(items.length / pageSize));
  const pages: Array<Page<T>> = [];
  for (let page = 1; page <= totalPages; page++) {
    pages.push({
      page,
      totalPages,
      items: items.slice((page - 1) * pageSize, page * pageSize)
    });
  }
  return pages;
}

/**
 * Relative file path of a collection page
 * Page 1 is `index.json`, page n is `index_p<n>.json`.
 */
export function pageFileName(page: number): string {
  return page > 1 ? `index_p${page}.json` : 'index.json';
}

/**
 * self/first/prev/next/last links for a collection page
 */
export function buildPageLinks(collectionUrl: string, page: number, totalPages: number): LinkMap {
  const links: LinkMap = {
    self: `${collectionUrl}/${pageFileName(page)}`
  };
  if (page > 1) {
    links.first = `${collectionUrl}/${pageFileName(1)}`;
    links.prev = `${collectionUrl}/${pageFileName(page - 1)}`;
  }
  if (page < totalPages) {
    links.next = `${collectionUrl}/${pageFileName(page + 1)}`;
    links.last = `${collectionUrl}/${pageFileName(totalPages)}`;
  }
  return links;
}

/**
 * Group items under the keys returned for each one, keeping first-seen order
 */
export function groupBy<T>(items: T[], keysOf: (item: T) => string[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    for (const key of keysOf(item)) {
      const group = groups.get(key);
      if (group) {
        group.push(item);
      } else {
        groups.set(key, [item]);
      }
    }
  }
  return groups;
}
