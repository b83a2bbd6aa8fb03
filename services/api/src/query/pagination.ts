// src/query/pagination.ts
import { ValidationError } from '../errors';
import type { ValidationIssue } from '../errors';

export interface PaginationLimits {
  defaultSize: number;
  maxSize: number;
}

export const DEFAULT_PAGINATION: PaginationLimits = {
  defaultSize: 10,
  maxSize: 100,
};

/** A validated list request: optional name filter plus a 1-based page. */
export interface ListQuery {
  search?: string;
  page: number;
  size: number;
}

export interface PageResult<T> {
  items: T[];
  total_count: number;
  page: number;
  size: number;
  total_pages: number;
}

/**
 * Checks page bounds and normalizes the search term. An empty search string
 * means "no filter".
 */
export function validateListQuery(query: ListQuery, limits: PaginationLimits = DEFAULT_PAGINATION): ListQuery {
  const issues: ValidationIssue[] = [];
  if (!Number.isInteger(query.page) || query.page < 1) {
    issues.push({ path: 'page', message: 'page must be an integer >= 1' });
  }
  if (!Number.isInteger(query.size) || query.size < 1 || query.size > limits.maxSize) {
    issues.push({ path: 'size', message: `size must be an integer between 1 and ${limits.maxSize}` });
  }
  if (issues.length > 0) {
    throw new ValidationError('invalid list query', issues);
  }

  const search = query.search === undefined || query.search === '' ? undefined : query.search;
  return { search, page: query.page, size: query.size };
}

export function pageOffset(query: ListQuery): number {
  return (query.page - 1) * query.size;
}

export function matchesSearch(name: string, search: string | undefined): boolean {
  if (search === undefined) return true;
  return name.toLowerCase().includes(search.toLowerCase());
}

export function buildPageResult<T>(items: T[], totalCount: number, query: ListQuery): PageResult<T> {
  return {
    items,
    total_count: totalCount,
    page: query.page,
    size: query.size,
    total_pages: Math.ceil(totalCount / query.size),
  };
}

/** Slices an already ordered, already filtered sequence. */
export function paginate<T>(records: T[], query: ListQuery): PageResult<T> {
  const start = pageOffset(query);
  return buildPageResult(records.slice(start, start + query.size), records.length, query);
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
