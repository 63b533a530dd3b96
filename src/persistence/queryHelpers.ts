/**
 * Small query-building helpers shared by repositories
 */

import { sql, type SQL } from 'drizzle-orm';
import type { SQLiteColumn } from 'drizzle-orm/sqlite-core';

/**
 * Case-insensitive substring match. LIKE wildcards in the term are matched literally.
 */
export function containsInsensitive(column: SQLiteColumn, term: string): SQL {
  const escaped = term.toLowerCase().replace(/[\\%_]/g, match => `\\${match}`);
  return sql`lower(${column}) LIKE ${`%${escaped}%`} ESCAPE '\\'`;
}

export function equalsInsensitive(column: SQLiteColumn, value: string): SQL {
  return sql`lower(${column}) = ${value.toLowerCase()}`;
}

/**
 * A SQLite UNIQUE constraint failure, optionally limited to one table
 */
export function isUniqueViolation(error: unknown, table?: string): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'SQLITE_CONSTRAINT_UNIQUE' &&
    (table === undefined || error.message.includes(`${table}.`))
  );
}

export interface Page<T> {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
}

export function pageOffset(page: number, pageSize: number): number {
  return (Math.max(1, page) - 1) * pageSize;
}

export function toPage<T>(items: T[], page: number, pageSize: number, total: number): Page<T> {
  return {
    items,
    page,
    pageSize,
    total,
    totalPages: Math.max(1, Math.ceil(total / pageSize)),
  };
}
