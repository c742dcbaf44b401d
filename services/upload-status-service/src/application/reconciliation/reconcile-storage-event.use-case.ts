import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry } from '@upload-reconciler/shared';
import type { NormalizedStorageEvent } from '../../domain/reconciliation/storage-notification';
import type { ReconcileOutcome } from '../../domain/reconciliation/reconcile-outcome';
import type { UploadRecord } from '../../domain/uploads/upload-record';
import { UploadStatusServiceConfigService } from '../../infrastructure/config/upload-status-service-config.service';
import {
  UPLOAD_RECORD_STORE_PORT,
  type UploadRecordStorePort,
} from '../uploads/ports/upload-record-store.port';
import { DispatchDownstreamActionsService } from './dispatch-downstream-actions.service';
import {
  PROCESSED_NOTIFICATIONS_PORT,
  type ProcessedNotificationsPort,
} from './ports/processed-notifications.port';

export const OBJECT_TOO_LARGE_REASON = 'object-too-large';
export const OBJECT_REMOVED_REASON = 'object-removed-before-confirmation';

@Injectable()
export class ReconcileStorageEventUseCase {
  private readonly logger = new Logger(ReconcileStorageEventUseCase.name);

  constructor(
    @Inject(UPLOAD_RECORD_STORE_PORT)
    private readonly store: UploadRecordStorePort,
    @Inject(PROCESSED_NOTIFICATIONS_PORT)
    private readonly processedNotifications: ProcessedNotificationsPort,
    @Inject(DispatchDownstreamActionsService)
    private readonly dispatchService: DispatchDownstreamActionsService,
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  async execute(event: NormalizedStorageEvent): Promise<ReconcileOutcome> {
    const record = await this.store.findByObjectKey(event.objectKey);
    if (!record) {
      return this.ignored(event, { kind: 'ignored', reason: 'no-matching-record' });
    }

    switch (record.status) {
      case 'expired':
        return this.ignored(event, { kind: 'ignored', reason: 'record-expired', recordId: record.recordId }, record);
      case 'failed':
        return this.ignored(event, { kind: 'ignored', reason: 'record-failed', recordId: record.recordId }, record);
      case 'uploaded':
        return this.handleUploaded(record, event);
      case 'pending':
        return this.handlePending(record, event);
    }
  }

  private async handleUploaded(record: UploadRecord, event: NormalizedStorageEvent): Promise<ReconcileOutcome> {
    if (event.eventType === 'removed') {
      this.logger.warn(JSON.stringify(createJsonLogEntry({
        level: 'warn',
        service: 'upload-status-service',
        message: 'Object removed from storage after its upload was confirmed.',
        correlationId: record.correlationId,
        recordId: record.recordId,
        objectKey: record.objectKey,
        metadata: {
          notificationId: event.notificationId,
          providerEventName: event.providerEventName,
        },
      })));
      return { kind: 'ignored', reason: 'removed-after-upload', recordId: record.recordId };
    }

    const now = new Date().toISOString();
    const alreadyProcessed =
      record.reconciledByNotificationId === event.notificationId ||
      (await this.processedNotifications.hasProcessed(event.notificationId, now));

    if (alreadyProcessed) {
      return this.ignored(
        event,
        { kind: 'duplicate-ignored', reason: 'already-processed', recordId: record.recordId },
        record,
      );
    }

    // Missing actions are healed by the retry poller under the dispatch lease.
    await this.processedNotifications.markProcessed({
      notificationId: event.notificationId,
      recordId: record.recordId,
      correlationId: record.correlationId,
      processedAt: now,
      windowSeconds: this.config.dedupWindowSeconds,
    });

    return this.ignored(event, { kind: 'ignored', reason: 'already-uploaded', recordId: record.recordId }, record);
  }

  private async handlePending(record: UploadRecord, event: NormalizedStorageEvent): Promise<ReconcileOutcome> {
    if (event.eventType === 'removed') {
      return this.markFailed(record, event, OBJECT_REMOVED_REASON);
    }

    if (event.eventType !== 'created') {
      return this.ignored(
        event,
        { kind: 'ignored', reason: 'unsupported-event-type', recordId: record.recordId },
        record,
      );
    }

    if (event.sizeBytes !== undefined && event.sizeBytes > this.config.maxObjectSizeBytes) {
      return this.markFailed(record, event, OBJECT_TOO_LARGE_REASON);
    }

    const now = new Date();
    const lease = this.dispatchService.createLease(record, now);
    const uploaded = await this.store.transitionStatus({
      recordId: record.recordId,
      expectedStatus: 'pending',
      nextStatus: 'uploaded',
      occurredAt: now.toISOString(),
      uploadedAt: event.providerTimestamp ?? now.toISOString(),
      notificationId: event.notificationId,
      objectSizeBytes: event.sizeBytes,
      objectETag: event.eTag,
      dispatchLease: lease,
    });

    if (!uploaded) {
      return this.ignored(
        event,
        { kind: 'duplicate-ignored', reason: 'concurrent-transition', recordId: record.recordId },
        record,
      );
    }

    await this.processedNotifications.markProcessed({
      notificationId: event.notificationId,
      recordId: uploaded.recordId,
      correlationId: uploaded.correlationId,
      processedAt: now.toISOString(),
      windowSeconds: this.config.dedupWindowSeconds,
    });

    const dispatch = await this.dispatchService.dispatchUnderLease(uploaded, lease.token);

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'upload-status-service',
      message: 'Upload confirmed by storage notification.',
      correlationId: uploaded.correlationId,
      recordId: uploaded.recordId,
      objectKey: uploaded.objectKey,
      metadata: {
        notificationId: event.notificationId,
        uploadedAt: uploaded.uploadedAt,
        dispatched: dispatch.dispatched,
        failedDispatches: dispatch.failed,
      },
    })));

    return {
      kind: 'reconciled',
      recordId: uploaded.recordId,
      dispatched: dispatch.dispatched,
      failedDispatches: dispatch.failed,
    };
  }

  private async markFailed(
    record: UploadRecord,
    event: NormalizedStorageEvent,
    failureReason: string,
  ): Promise<ReconcileOutcome> {
    const failed = await this.store.transitionStatus({
      recordId: record.recordId,
      expectedStatus: 'pending',
      nextStatus: 'failed',
      occurredAt: new Date().toISOString(),
      failureReason,
    });

    if (!failed) {
      return this.ignored(
        event,
        { kind: 'duplicate-ignored', reason: 'concurrent-transition', recordId: record.recordId },
        record,
      );
    }

    this.logger.warn(JSON.stringify(createJsonLogEntry({
      level: 'warn',
      service: 'upload-status-service',
      message: 'Upload marked as failed.',
      correlationId: failed.correlationId,
      recordId: failed.recordId,
      objectKey: failed.objectKey,
      metadata: {
        failureReason,
        notificationId: event.notificationId,
        sizeBytes: event.sizeBytes,
        maxObjectSizeBytes: this.config.maxObjectSizeBytes,
      },
    })));

    return { kind: 'marked-failed', recordId: failed.recordId, failureReason };
  }

  private ignored(
    event: NormalizedStorageEvent,
    outcome: ReconcileOutcome,
    record?: UploadRecord,
  ): ReconcileOutcome {
    this.logger.debug(JSON.stringify(createJsonLogEntry({
      level: 'debug',
      service: 'upload-status-service',
      message: 'Storage event did not change any upload record.',
      correlationId: record?.correlationId ?? 'system',
      recordId: record?.recordId,
      objectKey: event.objectKey,
      metadata: {
        outcome: outcome.kind,
        reason: outcome.kind === 'ignored' || outcome.kind === 'duplicate-ignored' ? outcome.reason : undefined,
        notificationId: event.notificationId,
        eventType: event.eventType,
      },
    })));

    return outcome;
  }
}
