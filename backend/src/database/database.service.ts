import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, QueryResult, QueryResultRow } from 'pg';
import { setTimeout as delay } from 'timers/promises';

// admin_shutdown, crash_shutdown, cannot_connect_now, too_many_connections, idle_session_timeout
const RECOVERABLE_CODES = ['57P01', '57P02', '57P03', '53300', '57P05'];
const MAX_ATTEMPTS = 3;
const QUERY_TIMEOUT_MS = 30000;

export function isRecoverableDatabaseError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  // Check for specific error codes
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && RECOVERABLE_CODES.includes(code)) {
    return true;
  }

  // Check for shutdown/termination messages
  return /shutdown|termination|terminating connection|connection reset/i.test(error.message);
}

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;

  constructor(private readonly configService: ConfigService) {}

  private getPool(): Pool {
    if (this.pool) {
      return this.pool;
    }

    const connectionString = this.configService.get<string>('DATABASE_URL');
    if (!connectionString) {
      throw new Error('DATABASE_URL is not configured');
    }

    const pool = new Pool({
      connectionString,
      max: 10,
      idleTimeoutMillis: 10000, // Close idle clients after 10 seconds
      connectionTimeoutMillis: 5000,
      // Don't let the pool hang on shutdown
      allowExitOnIdle: true,
    });

    // An idle client died; drop the pool so the next query builds a fresh one.
    pool.on('error', (error) => {
      this.logger.warn(`Database pool error, pool will be recreated: ${error.message}`);
      if (this.pool === pool) {
        this.pool = null;
      }
    });

    this.pool = pool;
    return pool;
  }

  private async resetPool(): Promise<void> {
    const broken = this.pool;
    this.pool = null;
    if (broken) {
      await broken.end().catch((error: Error) => {
        this.logger.debug(`Ignoring error while closing broken pool: ${error.message}`);
      });
    }
  }

  private async withRetry<T>(operation: () => Promise<T>, attempt = 1): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      // Not recoverable or out of attempts: throw the original error
      if (!isRecoverableDatabaseError(error) || attempt >= MAX_ATTEMPTS) {
        throw error;
      }

      // Reset pool on recoverable errors
      await this.resetPool();
      const delayMs = Math.min(200 * attempt, 1000);
      this.logger.debug(
        `Database operation failed (attempt ${attempt}/${MAX_ATTEMPTS}). Retrying in ${delayMs}ms...`,
      );
      await delay(delayMs);
      return this.withRetry(operation, attempt + 1);
    }
  }

  async runQuery<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    // Timeout wrapper so a stuck connection cannot hang the request
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Database query timeout after ${QUERY_TIMEOUT_MS / 1000} seconds`));
      }, QUERY_TIMEOUT_MS);
    });

    try {
      return await Promise.race([
        this.withRetry(() => this.getPool().query<T>(text, params)),
        timeout,
      ]);
    } finally {
      // Cleared either way; a pending timer would keep the process alive
      clearTimeout(timer);
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.pool) {
      return;
    }

    try {
      await this.pool.end();
    } catch (error) {
      // Pool might already be closed
      this.logger.debug(
        `Pool shutdown warning: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    this.pool = null;
  }
}
