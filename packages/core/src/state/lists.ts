/**
 * PaginatedList helpers
 *
 * Lists only grow at the cursor. A page for any other offset (a duplicate or
 * a page from before the list was reset) is ignored, so items are never
 * duplicated or skipped.
 */

import type { Page } from '../types/library';
import type { PaginatedList } from '../types/state';

/**
 * A fresh list for a view instance, with its first page already requested
 */
export function createList<T>(generation: number): PaginatedList<T> {
  return {
    items: [],
    cursor: 0,
    total: null,
    loading: true,
    generation,
  };
}

/**
 * Whether "load more" may issue a fetch: nothing in flight and pages remain
 */
export function canLoadMore<T>(list: PaginatedList<T> | null): list is PaginatedList<T> {
  return list !== null && !list.loading && list.cursor !== null;
}

/**
 * Set the in-flight flag before a fetch is enqueued
 */
export function beginFetch<T>(list: PaginatedList<T>): PaginatedList<T> {
  return { ...list, loading: true };
}

/**
 * Append a fetched page and clear the in-flight flag
 */
export function appendPage<T>(list: PaginatedList<T>, page: Page<T>): PaginatedList<T> {
  if (page.offset !== list.cursor) {
    return { ...list, loading: false };
  }
  return {
    ...list,
    items: [...list.items, ...page.items],
    cursor: page.next,
    total: page.total,
    loading: false,
  };
}

/**
 * Clear the in-flight flag after a failed fetch; the cursor stays so it can be retried
 */
export function failFetch<T>(list: PaginatedList<T>): PaginatedList<T> {
  return { ...list, loading: false };
}
