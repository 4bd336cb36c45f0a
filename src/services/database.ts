import { Pool, QueryResult, QueryResultRow } from 'pg';
import { logger } from '../utils/logger.js';
import { storeConnectivityError } from '../utils/errors.js';

// SQLSTATE classes and socket codes that mean the database itself is unreachable
const CONNECTIVITY_SQLSTATE_PREFIXES = ['08', '53', '57P'];
const CONNECTIVITY_ERRNO = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE']);

export const UNIQUE_VIOLATION = '23505';

export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isConnectivityError(error: unknown): boolean {
  const code = pgErrorCode(error);
  if (code) {
    return CONNECTIVITY_ERRNO.has(code)
      || CONNECTIVITY_SQLSTATE_PREFIXES.some((prefix) => code.startsWith(prefix));
  }
  return error instanceof Error && /connection terminated|timeout exceeded when trying to connect/i.test(error.message);
}

/**
 * Database service providing query methods with logging and error handling
 */
export class DatabaseService {
  constructor(private pool: Pool) {}

  /**
   * Execute a query with parameters.
   * Connectivity failures are rethrown as STORE_UNAVAILABLE; everything else
   * (constraint violations included) is rethrown untouched.
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      const duration = Date.now() - start;

      logger.debug(
        { query: text, duration, rows: result.rowCount },
        'Database query executed'
      );

      return result;
    } catch (error) {
      if (isConnectivityError(error)) {
        logger.error({ error, query: text }, 'Database unreachable');
        throw storeConnectivityError(error);
      }
      if (pgErrorCode(error) !== UNIQUE_VIOLATION) {
        logger.error({ error, query: text }, 'Database query failed');
      }
      throw error;
    }
  }

  /**
   * Execute a query and return first row or null
   */
  async queryOne<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<T | null> {
    const result = await this.query<T>(text, params);
    return result.rows[0] ?? null;
  }

  /**
   * Execute a query and return all rows
   */
  async queryMany<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<T[]> {
    const result = await this.query<T>(text, params);
    return result.rows;
  }

  /**
   * Check database health
   */
  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.queryOne<{ now: Date }>('SELECT NOW() AS now');
      return result !== null;
    } catch (error) {
      logger.warn({ error }, 'Database health check failed');
      return false;
    }
  }
}
