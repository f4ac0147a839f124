import type { Pool, QueryResult, QueryResultRow } from 'pg';
import { pool } from '../config/database.js';
import { logger } from '../utils/logger.js';

/**
 * Database service providing query methods with logging and error handling
 */
export class DatabaseService {
  private pool: Pool;

  constructor(connectionPool: Pool = pool) {
    this.pool = connectionPool;
  }

  /**
   * Execute a query with parameters
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
      logger.error({ error, query: text }, 'Database query failed');
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
}

export const db = new DatabaseService();
