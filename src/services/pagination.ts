/**
 * Offset pagination over an ordered sequence.
 *
 * Pages are 1-based and half-open: page p with limit L covers
 * [(p - 1) * L, (p - 1) * L + L).
 */

import { ValidationError } from "../errors.js";

export interface PagedList<T> {
  total: number;
  page: number;
  limit: number;
  data: T[];
}

export function pageBounds(page: number, limit: number): { start: number; end: number } {
  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError(`page must be a positive integer, got ${page}`);
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}`);
  }
  const start = (page - 1) * limit;
  return { start, end: start + limit };
}

export function paginate<T>(items: readonly T[], page: number, limit: number): PagedList<T> {
  const { start, end } = pageBounds(page, limit);
  return { total: items.length, page, limit, data: items.slice(start, end) };
}

export function emptyPage<T>(page: number, limit: number): PagedList<T> {
  return { total: 0, page, limit, data: [] };
}
