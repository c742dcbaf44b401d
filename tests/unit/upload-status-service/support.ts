import { ConfigService } from '@nestjs/config';
import { DispatchDownstreamActionsService } from '../../../services/upload-status-service/src/application/reconciliation/dispatch-downstream-actions.service';
import type {
  DownstreamActionMessage,
  DownstreamDispatcherPort,
} from '../../../services/upload-status-service/src/application/reconciliation/ports/downstream-dispatcher.port';
import { ReconcileStorageEventUseCase } from '../../../services/upload-status-service/src/application/reconciliation/reconcile-storage-event.use-case';
import { RetryPendingDispatchesService } from '../../../services/upload-status-service/src/application/reconciliation/retry-pending-dispatches.service';
import type { NormalizedStorageEvent } from '../../../services/upload-status-service/src/domain/reconciliation/storage-notification';
import type { UploadRecord } from '../../../services/upload-status-service/src/domain/uploads/upload-record';
import {
  UploadStatusServiceConfigService,
  validateUploadStatusServiceEnvironment,
} from '../../../services/upload-status-service/src/infrastructure/config/upload-status-service-config.service';
import { InMemoryProcessedNotificationsAdapter } from '../../../services/upload-status-service/src/infrastructure/persistence/in-memory-processed-notifications.adapter';
import { InMemoryUploadRecordStore } from '../../../services/upload-status-service/src/infrastructure/persistence/in-memory-upload-record.store';

export function createTestConfig(overrides: Record<string, unknown> = {}): UploadStatusServiceConfigService {
  const env = validateUploadStatusServiceEnvironment({
    UPLOAD_STATUS_STORE_DRIVER: 'memory',
    UPLOAD_DOWNSTREAM_ACTIONS: 'scan,audit',
    ...overrides,
  });

  return new UploadStatusServiceConfigService(new ConfigService(env));
}

export function createPendingRecord(overrides: Partial<UploadRecord> = {}): UploadRecord {
  return {
    recordId: 'rec-42',
    bucket: 'uploads',
    objectKey: 'uploads/42',
    status: 'pending',
    correlationId: 'corr-42',
    credentialExpiresAt: '2099-01-01T00:00:00.000Z',
    createdAt: '2026-03-01T10:00:00.000Z',
    updatedAt: '2026-03-01T10:00:00.000Z',
    dispatchedActions: [],
    ...overrides,
  };
}

export function createStorageEvent(overrides: Partial<NormalizedStorageEvent> = {}): NormalizedStorageEvent {
  return {
    notificationId: 'created:uploads/uploads/42@seq-1',
    bucket: 'uploads',
    objectKey: 'uploads/42',
    eventType: 'created',
    providerEventName: 's3:ObjectCreated:Put',
    providerTimestamp: '2026-03-01T10:00:01.000Z',
    sizeBytes: 2048,
    eTag: 'etag-42',
    ...overrides,
  };
}

export class RecordingDispatcher implements DownstreamDispatcherPort {
  readonly calls: Array<{ action: string; message: DownstreamActionMessage }> = [];
  readonly failing = new Set<string>();
  hang = false;
  private heldAck?: Promise<void>;

  /** Holds every dispatch ack until the returned function is called. */
  holdAcks(): () => void {
    let release: () => void = () => undefined;
    this.heldAck = new Promise<void>((resolve) => {
      release = resolve;
    });

    return () => {
      this.heldAck = undefined;
      release();
    };
  }

  async dispatch(action: string, message: DownstreamActionMessage): Promise<void> {
    this.calls.push({ action, message });

    if (this.hang) {
      return new Promise<void>(() => {});
    }

    if (this.heldAck) {
      await this.heldAck;
    }

    if (this.failing.has(action)) {
      throw new Error(`${action} target unavailable`);
    }
  }
}

export function createReconcileHarness(configOverrides: Record<string, unknown> = {}) {
  const config = createTestConfig(configOverrides);
  const store = new InMemoryUploadRecordStore();
  const processedNotifications = new InMemoryProcessedNotificationsAdapter();
  const dispatcher = new RecordingDispatcher();
  const dispatchService = new DispatchDownstreamActionsService(dispatcher, store, config);
  const reconciler = new ReconcileStorageEventUseCase(store, processedNotifications, dispatchService, config);
  const retry = new RetryPendingDispatchesService(store, dispatchService, config);

  return { config, store, processedNotifications, dispatcher, dispatchService, reconciler, retry };
}

export async function waitUntil(condition: () => boolean, attempts = 100): Promise<void> {
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    if (condition()) {
      return;
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  throw new Error('Condition not met in time.');
}
