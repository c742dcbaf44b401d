import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry } from '@upload-reconciler/shared';
import {
  normalizeStorageNotification,
  parseStorageNotificationBody,
  type NormalizedStorageEvent,
  type StorageNotificationNormalization,
} from '../../domain/reconciliation/storage-notification';
import type { ReconcileOutcome } from '../../domain/reconciliation/reconcile-outcome';
import { UploadStatusServiceConfigService } from '../../infrastructure/config/upload-status-service-config.service';
import { ReconcileStorageEventUseCase } from './reconcile-storage-event.use-case';

export interface HandledStorageNotification {
  normalization: StorageNotificationNormalization;
  outcomes: Array<{ event: NormalizedStorageEvent; outcome: ReconcileOutcome }>;
}

/**
 * One queue message in, every contained event reconciled in order.
 * Throws MalformedEventError for bodies that will never parse; store errors
 * propagate untouched so the caller can retry the whole message.
 */
@Injectable()
export class HandleStorageNotificationUseCase {
  private readonly logger = new Logger(HandleStorageNotificationUseCase.name);

  constructor(
    @Inject(ReconcileStorageEventUseCase)
    private readonly reconcileStorageEvent: ReconcileStorageEventUseCase,
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  async execute(content: Buffer | string): Promise<HandledStorageNotification> {
    const normalization = normalizeStorageNotification(parseStorageNotificationBody(content), {
      bucket: this.config.minioUploadsBucket,
      objectKeyPrefix: this.config.objectKeyPrefix,
      trackRemovals: this.config.trackRemovals,
    });

    for (const discarded of normalization.discarded) {
      this.logger.debug(JSON.stringify(createJsonLogEntry({
        level: 'debug',
        service: 'upload-status-service',
        message: 'Storage notification record discarded.',
        correlationId: 'system',
        objectKey: discarded.objectKey,
        metadata: { ...discarded },
      })));
    }

    const outcomes: HandledStorageNotification['outcomes'] = [];
    for (const event of normalization.events) {
      const outcome = await this.reconcileStorageEvent.execute(event);
      outcomes.push({ event, outcome });
    }

    return { normalization, outcomes };
  }
}
