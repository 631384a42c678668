/**
 * Transaction Helpers
 */

import type { ResultSet } from '@libsql/client';
import type { LibSQLDatabase } from 'drizzle-orm/libsql';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { logger } from '../utils/logger';

/**
 * Either the database itself or an open transaction on it
 */
export type SQLiteExecutor = BaseSQLiteDatabase<'async', ResultSet>;

/**
 * Run `operation` inside a write transaction; any rejection rolls the whole
 * unit back and is rethrown to the caller.
 */
export async function executeTransaction<T>(
  db: LibSQLDatabase,
  operation: (tx: SQLiteExecutor) => Promise<T>,
  options?: { operationName?: string }
): Promise<T> {
  const { operationName = 'operation' } = options ?? {};

  try {
    return await db.transaction((tx) => operation(tx));
  } catch (error) {
    logger.debug(`${operationName} transaction rolled back`, {
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

/**
 * SQLite reports unique violations as "UNIQUE constraint failed: ..."
 * (libSQL prefixes the message with SQLITE_CONSTRAINT); drizzle may wrap the driver error.
 */
export function isUniqueConstraintError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.message.includes('UNIQUE constraint')) return true;
  return error.cause !== undefined && isUniqueConstraintError(error.cause);
}

/**
 * SQLite CURRENT_TIMESTAMP is "YYYY-MM-DD HH:MM:SS" in UTC
 */
export function parseSqliteTimestamp(value: string | null): Date {
  if (!value) return new Date();
  const iso = value.includes('T') ? value : `${value.replace(' ', 'T')}Z`;
  const parsed = new Date(iso);
  return Number.isNaN(parsed.getTime()) ? new Date() : parsed;
}
