import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  Pool,
  PoolClient,
  QueryConfig,
  QueryResult,
  QueryResultRow,
} from 'pg';
import { APP_CONFIG } from '../config/app.constants';
import type { AppConfig } from '../config/app.config';

type QueryText = string | QueryConfig<unknown[]>;

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool?: Pool;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    if (!config.database) {
      this.logger.warn(
        'Database connection is not configured. Set DATABASE_URL or DB_HOST/DB_NAME/DB_USER; customers are kept in memory until then.',
      );
      return;
    }

    this.pool = new Pool(config.database);
    this.pool.on('error', (error) => {
      this.logger.error('Unexpected PostgreSQL error', error.stack ?? error);
    });
  }

  get enabled(): boolean {
    return !!this.pool;
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    text: QueryText,
    values?: unknown[],
  ): Promise<QueryResult<T>> {
    return this.assertPool().query<T>(text, values);
  }

  async withClient<T>(
    callback: (client: PoolClient) => Promise<T>,
  ): Promise<T> {
    const client = await this.assertPool().connect();
    try {
      return await callback(client);
    } finally {
      client.release();
    }
  }

  async onModuleDestroy() {
    await this.pool?.end();
  }

  private assertPool(): Pool {
    if (!this.pool) {
      throw new Error(
        'Database connection is not available. Did you set DATABASE_URL or DB_HOST/DB_NAME/DB_USER?',
      );
    }
    return this.pool;
  }
}
