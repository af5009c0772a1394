import { Pool, type QueryResultRow } from 'pg';
import type { ConnectionConfig } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface IDbConnection {
  query(text: string, params?: unknown[]): Promise<QueryResultRow[]>;
  close(): Promise<void>;
}

export class DbConnection implements IDbConnection {
  private pool: Pool;

  constructor(config: ConnectionConfig) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.pool.on('error', (err) => {
      logger.error(err, 'Unexpected error on idle client');
    });
  }

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]> {
    const start = Date.now();
    try {
      const res = await this.pool.query<T>(text, params);
      const duration = Date.now() - start;
      logger.debug({ query: text, duration, rows: res.rowCount }, 'Executed query');
      return res.rows;
    } catch (error) {
      logger.error({ query: text, error }, 'Query execution failed');
      throw error;
    }
  }

  async close() {
    await this.pool.end();
    logger.info('Database connection pool closed');
  }
}
