import { Pool, PoolClient, QueryResultRow } from 'pg';
import { Config } from '../config/config';
import { logger } from '../utils/logger';

/**
 * The part of the database the registry and migrations need; a transaction
 * hands the callback one of these bound to a single pooled connection.
 */
export interface QueryRunner {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
}

export interface Database extends QueryRunner {
  transaction<T>(callback: (tx: QueryRunner) => Promise<T>): Promise<T>;
}

export class PostgreSQLDatabase implements Database {
  private pool: Pool;
  private client: PoolClient | null = null;

  constructor(settings: Config['database']) {
    this.pool = new Pool({
      host: settings.host,
      port: settings.port,
      database: settings.database,
      user: settings.user,
      password: settings.password || undefined, // Allow empty password for trust auth
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    this.pool.on('error', (err) => {
      logger.error('Unexpected error on idle PostgreSQL client', { error: err });
    });
  }

  async connect(): Promise<void> {
    try {
      this.client = await this.pool.connect();
      logger.info('PostgreSQL connected successfully');
    } catch (error) {
      logger.error('Failed to connect to PostgreSQL', { error });
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      this.client.release();
      this.client = null;
    }
    await this.pool.end();
    logger.info('PostgreSQL disconnected');
  }

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      const duration = Date.now() - start;
      logger.debug('Executed query', { text, duration, rows: result.rowCount });
      return result.rows;
    } catch (error) {
      logger.error('Query error', { text, error });
      throw error;
    }
  }

  async transaction<T>(callback: (tx: QueryRunner) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const tx: QueryRunner = {
      query: async <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) => {
        const result = await client.query<R>(text, params);
        return result.rows;
      },
    };
    try {
      await client.query('BEGIN');
      const result = await callback(tx);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
