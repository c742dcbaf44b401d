import { Injectable } from '@nestjs/common';
import type {
  ClaimDispatchLeaseInput,
  CreateIfAbsentResult,
  MarkActionDispatchedInput,
  ReleaseDispatchLeaseInput,
  TransitionStatusInput,
  UploadRecordStorePort,
} from '../../application/uploads/ports/upload-record-store.port';
import {
  canTransition,
  hasActiveDispatchLease,
  missingDownstreamActions,
  type DownstreamAction,
  type UploadRecord,
} from '../../domain/uploads/upload-record';

/**
 * Process-local record store. Every method body runs without awaiting, so
 * each read-check-write is atomic with respect to other callers.
 */
@Injectable()
export class InMemoryUploadRecordStore implements UploadRecordStorePort {
  private readonly records = new Map<string, UploadRecord>();

  async createIfAbsent(record: UploadRecord): Promise<CreateIfAbsentResult> {
    const holder = this.findHolder(record.objectKey);
    if (holder) {
      return { created: false, existing: cloneRecord(holder) };
    }

    if (this.records.has(record.recordId)) {
      throw new Error(`Upload record ${record.recordId} already exists.`);
    }

    this.records.set(record.recordId, cloneRecord(record));
    return { created: true, record: cloneRecord(record) };
  }

  async findById(recordId: string): Promise<UploadRecord | undefined> {
    const record = this.records.get(recordId);
    return record ? cloneRecord(record) : undefined;
  }

  async findByObjectKey(objectKey: string): Promise<UploadRecord | undefined> {
    const holder = this.findHolder(objectKey);
    if (holder) {
      return cloneRecord(holder);
    }

    let latest: UploadRecord | undefined;
    for (const record of this.records.values()) {
      if (record.objectKey !== objectKey) {
        continue;
      }
      if (!latest || record.createdAt >= latest.createdAt) {
        latest = record;
      }
    }

    return latest ? cloneRecord(latest) : undefined;
  }

  async transitionStatus(input: TransitionStatusInput): Promise<UploadRecord | undefined> {
    const current = this.records.get(input.recordId);
    if (!current || current.status !== input.expectedStatus) {
      return undefined;
    }

    if (!canTransition(current.status, input.nextStatus)) {
      return undefined;
    }

    const next: UploadRecord = {
      ...current,
      status: input.nextStatus,
      updatedAt: input.occurredAt,
      dispatchedActions: [...current.dispatchedActions],
    };

    if (input.nextStatus === 'uploaded') {
      next.uploadedAt = input.uploadedAt ?? input.occurredAt;
      next.reconciledByNotificationId = input.notificationId;
      next.objectSizeBytes = input.objectSizeBytes;
      next.objectETag = input.objectETag;
      if (input.dispatchLease !== undefined) {
        next.dispatchLease = { ...input.dispatchLease };
      }
    }

    if (input.failureReason !== undefined) {
      next.failureReason = input.failureReason;
    }

    this.records.set(next.recordId, next);
    return cloneRecord(next);
  }

  async markActionDispatched(input: MarkActionDispatchedInput): Promise<UploadRecord | undefined> {
    const current = this.records.get(input.recordId);
    if (!current) {
      return undefined;
    }

    if (current.dispatchedActions.includes(input.action)) {
      return cloneRecord(current);
    }

    const next: UploadRecord = {
      ...current,
      updatedAt: input.occurredAt,
      dispatchedActions: [...current.dispatchedActions, input.action],
    };

    this.records.set(next.recordId, next);
    return cloneRecord(next);
  }

  async claimDispatchLease(input: ClaimDispatchLeaseInput): Promise<UploadRecord | undefined> {
    const current = this.records.get(input.recordId);
    if (!current || current.status !== 'uploaded' || hasActiveDispatchLease(current, new Date(input.now))) {
      return undefined;
    }

    const next: UploadRecord = { ...current, dispatchLease: { ...input.lease } };
    this.records.set(next.recordId, next);
    return cloneRecord(next);
  }

  async releaseDispatchLease(input: ReleaseDispatchLeaseInput): Promise<void> {
    const current = this.records.get(input.recordId);
    if (!current || current.dispatchLease?.token !== input.token) {
      return;
    }

    const next: UploadRecord = { ...current };
    delete next.dispatchLease;
    this.records.set(next.recordId, next);
  }

  async findExpirablePending(cutoff: string, limit: number): Promise<UploadRecord[]> {
    const cutoffMs = Date.parse(cutoff);

    return Array.from(this.records.values())
      .filter((record) => record.status === 'pending' && Date.parse(record.credentialExpiresAt) <= cutoffMs)
      .sort((a, b) => a.credentialExpiresAt.localeCompare(b.credentialExpiresAt))
      .slice(0, limit)
      .map(cloneRecord);
  }

  async findUploadedWithMissingActions(
    actions: readonly DownstreamAction[],
    limit: number,
    now: string,
  ): Promise<UploadRecord[]> {
    const at = new Date(now);

    return Array.from(this.records.values())
      .filter(
        (record) =>
          record.status === 'uploaded' &&
          !hasActiveDispatchLease(record, at) &&
          missingDownstreamActions(record, actions).length > 0,
      )
      .sort((a, b) => (a.uploadedAt ?? a.updatedAt).localeCompare(b.uploadedAt ?? b.updatedAt))
      .slice(0, limit)
      .map(cloneRecord);
  }

  private findHolder(objectKey: string): UploadRecord | undefined {
    for (const record of this.records.values()) {
      if (record.objectKey === objectKey && record.status !== 'expired') {
        return record;
      }
    }
    return undefined;
  }
}

function cloneRecord(record: UploadRecord): UploadRecord {
  const clone: UploadRecord = { ...record, dispatchedActions: [...record.dispatchedActions] };
  if (record.dispatchLease) {
    clone.dispatchLease = { ...record.dispatchLease };
  }
  return clone;
}
