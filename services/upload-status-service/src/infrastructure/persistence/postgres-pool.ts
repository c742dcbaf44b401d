import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { createJsonLogEntry } from '@upload-reconciler/shared';
import { Pool } from 'pg';
import { TransientStoreError } from '../../application/uploads/ports/upload-record-store.port';
import { UploadStatusServiceConfigService } from '../config/upload-status-service-config.service';

// Connection loss, serialization failures, shutdown, cancelled statements, too many connections.
const TRANSIENT_SQLSTATE_CODES = new Set(['40001', '40P01', '57P01', '57014', '53300']);
const TRANSIENT_NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

export function createUploadStatusPool(config: UploadStatusServiceConfigService, logger: Logger): Pool {
  const pool = new Pool({
    connectionString: config.databaseUrl,
    max: 10,
    idleTimeoutMillis: 10_000,
    statement_timeout: config.storeQueryTimeoutMs,
    query_timeout: config.storeQueryTimeoutMs,
  });

  pool.on('error', (error: unknown) => {
    logger.error(JSON.stringify(createJsonLogEntry({
      level: 'error',
      service: 'upload-status-service',
      message: 'Postgres pool error.',
      correlationId: 'system',
      error,
    })));
  });

  return pool;
}

/**
 * The one pg pool shared by every Postgres adapter. It is opened on first use,
 * so selecting the memory driver never reads the database URL.
 */
@Injectable()
export class UploadStatusPostgresPool implements OnModuleDestroy {
  private readonly logger = new Logger(UploadStatusPostgresPool.name);
  private pool?: Pool;

  constructor(
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  get client(): Pool {
    if (!this.pool) {
      this.pool = createUploadStatusPool(this.config, this.logger);
    }
    return this.pool;
  }

  async onModuleDestroy(): Promise<void> {
    const pool = this.pool;
    this.pool = undefined;
    if (pool) {
      await pool.end();
    }
  }
}

export function isTransientPostgresError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (/timeout/i.test(error.message) || /Connection terminated/i.test(error.message)) {
    return true;
  }

  const code = Reflect.get(error, 'code');
  if (typeof code !== 'string') {
    return false;
  }

  return code.startsWith('08') || TRANSIENT_SQLSTATE_CODES.has(code) || TRANSIENT_NETWORK_CODES.has(code);
}

/** Rethrows `error`, wrapped in a TransientStoreError when a retry may succeed. */
export function rethrowAsStoreError(error: unknown, operation: string): never {
  if (error instanceof TransientStoreError || !isTransientPostgresError(error)) {
    throw error;
  }

  const reason = error instanceof Error ? error.message : String(error);
  throw new TransientStoreError(`Postgres ${operation} failed: ${reason}`, { cause: error });
}
