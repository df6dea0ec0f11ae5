import { Pool, type PoolClient } from 'pg';
import { registerType } from 'pgvector/pg';
import type { Logger } from 'pino';
import { describeError } from '@tr/common';

import type { PgVectorConfig } from './config';
import type { CallOptions, CandidateQuery, CandidateRow, CandidateStore } from './types';

export interface PgVectorHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  totalCandidates: number;
  poolSize: number;
  message?: string;
}

export class PgVectorClient implements CandidateStore {
  private readonly pool: Pool;
  private initialized = false;

  constructor(private readonly config: PgVectorConfig, private readonly logger: Logger) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.poolMax,
      min: config.poolMin,
      idleTimeoutMillis: config.idleTimeoutMs,
      connectionTimeoutMillis: config.connectionTimeoutMs,
      statement_timeout: config.statementTimeoutMs
    });

    this.pool.on('connect', (client) => {
      registerType(client).catch((error: unknown) => {
        this.logger.error({ error: describeError(error) }, 'Failed to register the pgvector type on a new connection.');
      });
    });

    this.pool.on('error', (error) => {
      this.logger.error({ error: describeError(error) }, 'Idle pgvector connection failed.');
    });
  }

  get candidatesTable(): string {
    return `${this.config.schema}.${this.config.candidatesTable}`;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.withClient((client) => this.verifyInfrastructure(client));
    this.initialized = true;
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.initialized = false;
  }

  /**
   * Runs a candidate query. If the signal aborts mid-query the checked-out
   * connection is destroyed rather than returned to the pool.
   */
  async queryCandidates(query: CandidateQuery, options: CallOptions = {}): Promise<CandidateRow[]> {
    options.signal?.throwIfAborted();

    const client = await this.pool.connect();
    let destroyConnection = false;
    try {
      return await this.runAbortable(client, query, options.signal);
    } catch (error) {
      destroyConnection = options.signal?.aborted === true;
      throw error;
    } finally {
      client.release(destroyConnection);
    }
  }

  async healthCheck(): Promise<PgVectorHealth> {
    try {
      await this.initialize();

      const total = await this.withClient(async (client) => {
        const result = await client.query(`SELECT COUNT(*) AS total FROM ${this.candidatesTable}`);
        return Number(result.rows[0]?.total ?? 0);
      });

      return {
        status: 'healthy',
        totalCandidates: total,
        poolSize: this.pool.totalCount
      } satisfies PgVectorHealth;
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'pgvector health check failed.');
      return {
        status: 'unhealthy',
        totalCandidates: 0,
        poolSize: this.pool.totalCount,
        message: describeError(error)
      } satisfies PgVectorHealth;
    }
  }

  private runAbortable(client: PoolClient, query: CandidateQuery, signal?: AbortSignal): Promise<CandidateRow[]> {
    const pending = client.query<CandidateRow>({ text: query.text, values: query.values });

    if (!signal) {
      return pending.then((result) => result.rows);
    }

    return new Promise<CandidateRow[]>((resolve, reject) => {
      const onAbort = () => {
        void pending.catch((error: unknown) => {
          this.logger.debug({ error: describeError(error) }, 'Abandoned candidate query settled after abort.');
        });
        reject(signal.reason instanceof Error ? signal.reason : new Error('Candidate query aborted.'));
      };

      if (signal.aborted) {
        onAbort();
        return;
      }

      signal.addEventListener('abort', onAbort, { once: true });

      void pending.then(
        (result) => {
          signal.removeEventListener('abort', onAbort);
          resolve(result.rows);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private async verifyInfrastructure(client: PoolClient): Promise<void> {
    const extension = await client.query(`SELECT extname FROM pg_extension WHERE extname = 'vector'`);
    if (extension.rowCount === 0) {
      throw new Error('The pgvector extension is not installed.');
    }

    const tableCheck = await client.query(
      `SELECT table_name FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2`,
      [this.config.schema, this.config.candidatesTable]
    );

    if (tableCheck.rowCount === 0) {
      throw new Error(`Candidates table ${this.candidatesTable} is missing.`);
    }
  }

  private async withClient<T>(handler: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await handler(client);
    } finally {
      client.release();
    }
  }
}
