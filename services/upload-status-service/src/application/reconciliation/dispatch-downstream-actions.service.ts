import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry, generateId } from '@upload-reconciler/shared';
import {
  DOWNSTREAM_DISPATCHER_PORT,
  type DownstreamActionMessage,
  type DownstreamDispatcherPort,
} from './ports/downstream-dispatcher.port';
import {
  UPLOAD_RECORD_STORE_PORT,
  type UploadRecordStorePort,
} from '../uploads/ports/upload-record-store.port';
import {
  missingDownstreamActions,
  type DispatchLease,
  type DownstreamAction,
  type UploadRecord,
} from '../../domain/uploads/upload-record';
import { UploadStatusServiceConfigService } from '../../infrastructure/config/upload-status-service-config.service';

export class DispatchTimeoutError extends Error {
  readonly code = 'DISPATCH_TIMEOUT';

  constructor(
    readonly action: DownstreamAction,
    readonly timeoutMs: number,
  ) {
    super(`Dispatch of "${action}" was not acknowledged within ${timeoutMs}ms.`);
    this.name = 'DispatchTimeoutError';
  }
}

export interface DispatchResult {
  dispatched: DownstreamAction[];
  failed: DownstreamAction[];
}

/**
 * Triggers every configured action an uploaded record has not seen yet.
 * Dispatching happens only under the record's dispatch lease, so at most one
 * caller publishes a given record's actions at a time. An action is recorded
 * only after the dispatcher acknowledged it; failed actions stay missing and
 * are picked up by the retry poller once the lease is released or lapses.
 */
@Injectable()
export class DispatchDownstreamActionsService {
  private readonly logger = new Logger(DispatchDownstreamActionsService.name);

  constructor(
    @Inject(DOWNSTREAM_DISPATCHER_PORT)
    private readonly dispatcher: DownstreamDispatcherPort,
    @Inject(UPLOAD_RECORD_STORE_PORT)
    private readonly store: UploadRecordStorePort,
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  /** Long enough for every missing action to time out once, plus one slot of slack. */
  createLease(record: Pick<UploadRecord, 'dispatchedActions'>, now: Date): DispatchLease {
    const slots = missingDownstreamActions(record, this.config.downstreamActions).length + 1;
    return {
      token: generateId(),
      expiresAt: new Date(now.getTime() + this.config.dispatchTimeoutMs * slots).toISOString(),
    };
  }

  /** Returns undefined when another caller holds an active lease on the record. */
  async claimAndDispatch(record: UploadRecord, now: Date = new Date()): Promise<DispatchResult | undefined> {
    const lease = this.createLease(record, now);
    const claimed = await this.store.claimDispatchLease({
      recordId: record.recordId,
      lease,
      now: now.toISOString(),
    });

    if (!claimed) {
      return undefined;
    }

    return this.dispatchUnderLease(claimed, lease.token);
  }

  /** The caller must own the lease identified by `leaseToken`; it is released on return. */
  async dispatchUnderLease(record: UploadRecord, leaseToken: string): Promise<DispatchResult> {
    try {
      return await this.dispatchMissing(record);
    } finally {
      await this.releaseLease(record, leaseToken);
    }
  }

  private async dispatchMissing(record: UploadRecord): Promise<DispatchResult> {
    const result: DispatchResult = { dispatched: [], failed: [] };
    if (record.status !== 'uploaded') {
      return result;
    }

    const message = toActionMessage(record);

    for (const action of missingDownstreamActions(record, this.config.downstreamActions)) {
      try {
        await withTimeout(this.dispatcher.dispatch(action, message), this.config.dispatchTimeoutMs, action);
      } catch (error) {
        result.failed.push(action);
        this.logger.error(JSON.stringify(createJsonLogEntry({
          level: 'error',
          service: 'upload-status-service',
          message: 'Downstream action dispatch failed; left for the retry poller.',
          correlationId: record.correlationId,
          recordId: record.recordId,
          objectKey: record.objectKey,
          metadata: {
            action,
          },
          error,
        })));
        continue;
      }

      await this.store.markActionDispatched({
        recordId: record.recordId,
        action,
        occurredAt: new Date().toISOString(),
      });
      result.dispatched.push(action);

      this.logger.log(JSON.stringify(createJsonLogEntry({
        level: 'info',
        service: 'upload-status-service',
        message: 'Downstream action dispatched.',
        correlationId: record.correlationId,
        recordId: record.recordId,
        objectKey: record.objectKey,
        metadata: {
          action,
        },
      })));
    }

    return result;
  }

  private async releaseLease(record: UploadRecord, token: string): Promise<void> {
    try {
      await this.store.releaseDispatchLease({ recordId: record.recordId, token });
    } catch (error) {
      this.logger.warn(JSON.stringify(createJsonLogEntry({
        level: 'warn',
        service: 'upload-status-service',
        message: 'Dispatch lease release failed; the lease lapses at its expiry.',
        correlationId: record.correlationId,
        recordId: record.recordId,
        objectKey: record.objectKey,
        metadata: {
          leaseExpiresAt: record.dispatchLease?.expiresAt,
        },
        error,
      })));
    }
  }
}

function toActionMessage(record: UploadRecord): DownstreamActionMessage {
  return {
    recordId: record.recordId,
    objectKey: record.objectKey,
    bucket: record.bucket,
    uploadedAt: record.uploadedAt ?? record.updatedAt,
    correlationId: record.correlationId,
    ...(record.objectSizeBytes === undefined ? {} : { sizeBytes: record.objectSizeBytes }),
    ...(record.objectETag === undefined ? {} : { eTag: record.objectETag }),
  };
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, action: DownstreamAction): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DispatchTimeoutError(action, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
