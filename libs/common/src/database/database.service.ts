import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, PoolConfig, QueryResultRow, types } from 'pg';

const PG_DATE_OID = 1082;
const PG_TIMESTAMP_OID = 1114;

// DATE and TIMESTAMP columns stay text so no process time zone leaks into them
types.setTypeParser(PG_DATE_OID, (value: string) => value);
types.setTypeParser(PG_TIMESTAMP_OID, (value: string) => value);

/**
 * One checked-out connection. Every handler runs its statements through a
 * session, serially, and never shares it with another request.
 */
export interface SqlSession {
  rows<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<R[]>;
  /** Runs a write and returns the number of affected rows. */
  execute(text: string, values?: unknown[]): Promise<number>;
}

class PoolSession implements SqlSession {
  constructor(private readonly client: PoolClient) {}

  async rows<R extends QueryResultRow>(text: string, values: unknown[] = []): Promise<R[]> {
    const result = await this.client.query<R>(text, values);
    return result.rows;
  }

  async execute(text: string, values: unknown[] = []): Promise<number> {
    const result = await this.client.query(text, values);
    return result.rowCount ?? 0;
  }
}

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;

  constructor(private readonly configService: ConfigService) {
    const statementTimeout = this.configService.get<number>('database.statementTimeoutMs', 30000);

    const poolConfig: PoolConfig = {
      host: this.configService.get<string>('database.host'),
      port: this.configService.get<number>('database.port', 5432),
      user: this.configService.get<string>('database.user'),
      password: this.configService.get<string>('database.password'),
      database: this.configService.get<string>('database.database'),
      max: this.configService.get<number>('database.poolMax', 10),
      connectionTimeoutMillis: this.configService.get<number>('database.connectionTimeoutMs', 5000),
      statement_timeout: statementTimeout,
      query_timeout: statementTimeout,
    };

    this.pool = new Pool(poolConfig);
    this.pool.on('error', (error) => {
      this.logger.error(`Idle PostgreSQL client error: ${error.message}`, error.stack);
    });
  }

  /**
   * Checks out a connection for the duration of `work` and always releases it.
   */
  async withConnection<T>(work: (session: SqlSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(new PoolSession(client));
    } finally {
      client.release();
    }
  }

  async onModuleDestroy() {
    await this.pool.end();
    this.logger.log('PostgreSQL pool closed');
  }
}
