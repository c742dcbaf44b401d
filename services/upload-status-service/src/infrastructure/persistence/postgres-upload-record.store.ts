import { Inject, Injectable } from '@nestjs/common';
import {
  TransientStoreError,
  type ClaimDispatchLeaseInput,
  type CreateIfAbsentResult,
  type MarkActionDispatchedInput,
  type ReleaseDispatchLeaseInput,
  type TransitionStatusInput,
  type UploadRecordStorePort,
} from '../../application/uploads/ports/upload-record-store.port';
import type { DownstreamAction, UploadRecord, UploadStatus } from '../../domain/uploads/upload-record';
import { rethrowAsStoreError, UploadStatusPostgresPool } from './postgres-pool';

interface UploadRecordRow {
  record_id: string;
  bucket: string;
  object_key: string;
  status: UploadStatus;
  correlation_id: string;
  content_type: string | null;
  credential_expires_at: Date;
  created_at: Date;
  updated_at: Date;
  uploaded_at: Date | null;
  reconciled_by_notification_id: string | null;
  object_size_bytes: string | number | null;
  object_etag: string | null;
  failure_reason: string | null;
  dispatched_actions: string[] | null;
  dispatch_lease_token: string | null;
  dispatch_lease_expires_at: Date | null;
}

@Injectable()
export class PostgresUploadRecordStore implements UploadRecordStorePort {
  constructor(
    @Inject(UploadStatusPostgresPool)
    private readonly database: UploadStatusPostgresPool,
  ) {}

  async createIfAbsent(record: UploadRecord): Promise<CreateIfAbsentResult> {
    try {
      const inserted = await this.database.client.query<UploadRecordRow>(
        `
          insert into upload_status.upload_records (
            record_id,
            bucket,
            object_key,
            status,
            correlation_id,
            content_type,
            credential_expires_at,
            created_at,
            updated_at,
            dispatched_actions
          )
          values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
          on conflict (object_key) where status <> 'expired' do nothing
          returning *
        `,
        [
          record.recordId,
          record.bucket,
          record.objectKey,
          record.status,
          record.correlationId,
          record.contentType ?? null,
          record.credentialExpiresAt,
          record.createdAt,
          record.updatedAt,
          record.dispatchedActions,
        ],
      );

      const created = inserted.rows[0];
      if (created) {
        return { created: true, record: mapRowToRecord(created) };
      }

      const holder = await this.database.client.query<UploadRecordRow>(
        `
          select *
          from upload_status.upload_records
          where object_key = $1
            and status <> 'expired'
          limit 1
        `,
        [record.objectKey],
      );

      const existing = holder.rows[0];
      if (!existing) {
        // The holder expired between the insert and the lookup.
        throw new TransientStoreError(`Object key ${record.objectKey} changed hands during creation.`);
      }

      return { created: false, existing: mapRowToRecord(existing) };
    } catch (error) {
      rethrowAsStoreError(error, 'createIfAbsent');
    }
  }

  async findById(recordId: string): Promise<UploadRecord | undefined> {
    try {
      const result = await this.database.client.query<UploadRecordRow>(
        'select * from upload_status.upload_records where record_id = $1',
        [recordId],
      );
      const row = result.rows[0];
      return row ? mapRowToRecord(row) : undefined;
    } catch (error) {
      rethrowAsStoreError(error, 'findById');
    }
  }

  async findByObjectKey(objectKey: string): Promise<UploadRecord | undefined> {
    try {
      const result = await this.database.client.query<UploadRecordRow>(
        `
          select *
          from upload_status.upload_records
          where object_key = $1
          order by (status <> 'expired') desc, created_at desc
          limit 1
        `,
        [objectKey],
      );
      const row = result.rows[0];
      return row ? mapRowToRecord(row) : undefined;
    } catch (error) {
      rethrowAsStoreError(error, 'findByObjectKey');
    }
  }

  async transitionStatus(input: TransitionStatusInput): Promise<UploadRecord | undefined> {
    try {
      const result = await this.database.client.query<UploadRecordRow>(
        `
          update upload_status.upload_records
          set status = $3::text,
              updated_at = $4::timestamptz,
              uploaded_at = case
                when $3::text = 'uploaded' then coalesce($5::timestamptz, $4::timestamptz)
                else uploaded_at
              end,
              reconciled_by_notification_id = case
                when $3::text = 'uploaded' then $6::text
                else reconciled_by_notification_id
              end,
              object_size_bytes = case
                when $3::text = 'uploaded' then $7::bigint
                else object_size_bytes
              end,
              object_etag = case
                when $3::text = 'uploaded' then $8::text
                else object_etag
              end,
              failure_reason = coalesce($9::text, failure_reason),
              dispatch_lease_token = case
                when $3::text = 'uploaded' then $10::text
                else dispatch_lease_token
              end,
              dispatch_lease_expires_at = case
                when $3::text = 'uploaded' then $11::timestamptz
                else dispatch_lease_expires_at
              end
          where record_id = $1
            and status = $2::text
            and status = 'pending'
          returning *
        `,
        [
          input.recordId,
          input.expectedStatus,
          input.nextStatus,
          input.occurredAt,
          input.uploadedAt ?? null,
          input.notificationId ?? null,
          input.objectSizeBytes ?? null,
          input.objectETag ?? null,
          input.failureReason ?? null,
          input.dispatchLease?.token ?? null,
          input.dispatchLease?.expiresAt ?? null,
        ],
      );
      const row = result.rows[0];
      return row ? mapRowToRecord(row) : undefined;
    } catch (error) {
      rethrowAsStoreError(error, 'transitionStatus');
    }
  }

  async markActionDispatched(input: MarkActionDispatchedInput): Promise<UploadRecord | undefined> {
    try {
      const result = await this.database.client.query<UploadRecordRow>(
        `
          update upload_status.upload_records
          set dispatched_actions = case
                when $2::text = any(dispatched_actions) then dispatched_actions
                else array_append(dispatched_actions, $2::text)
              end,
              updated_at = case
                when $2::text = any(dispatched_actions) then updated_at
                else $3::timestamptz
              end
          where record_id = $1
          returning *
        `,
        [input.recordId, input.action, input.occurredAt],
      );
      const row = result.rows[0];
      return row ? mapRowToRecord(row) : undefined;
    } catch (error) {
      rethrowAsStoreError(error, 'markActionDispatched');
    }
  }

  async claimDispatchLease(input: ClaimDispatchLeaseInput): Promise<UploadRecord | undefined> {
    try {
      const result = await this.database.client.query<UploadRecordRow>(
        `
          update upload_status.upload_records
          set dispatch_lease_token = $2,
              dispatch_lease_expires_at = $3::timestamptz
          where record_id = $1
            and status = 'uploaded'
            and (dispatch_lease_expires_at is null or dispatch_lease_expires_at <= $4::timestamptz)
          returning *
        `,
        [input.recordId, input.lease.token, input.lease.expiresAt, input.now],
      );
      const row = result.rows[0];
      return row ? mapRowToRecord(row) : undefined;
    } catch (error) {
      rethrowAsStoreError(error, 'claimDispatchLease');
    }
  }

  async releaseDispatchLease(input: ReleaseDispatchLeaseInput): Promise<void> {
    try {
      await this.database.client.query(
        `
          update upload_status.upload_records
          set dispatch_lease_token = null,
              dispatch_lease_expires_at = null
          where record_id = $1
            and dispatch_lease_token = $2
        `,
        [input.recordId, input.token],
      );
    } catch (error) {
      rethrowAsStoreError(error, 'releaseDispatchLease');
    }
  }

  async findExpirablePending(cutoff: string, limit: number): Promise<UploadRecord[]> {
    try {
      const result = await this.database.client.query<UploadRecordRow>(
        `
          select *
          from upload_status.upload_records
          where status = 'pending'
            and credential_expires_at <= $1::timestamptz
          order by credential_expires_at asc
          limit $2
        `,
        [cutoff, limit],
      );
      return result.rows.map(mapRowToRecord);
    } catch (error) {
      rethrowAsStoreError(error, 'findExpirablePending');
    }
  }

  async findUploadedWithMissingActions(
    actions: readonly DownstreamAction[],
    limit: number,
    now: string,
  ): Promise<UploadRecord[]> {
    try {
      const result = await this.database.client.query<UploadRecordRow>(
        `
          select *
          from upload_status.upload_records
          where status = 'uploaded'
            and not (dispatched_actions @> $1::text[])
            and (dispatch_lease_expires_at is null or dispatch_lease_expires_at <= $3::timestamptz)
          order by uploaded_at asc
          limit $2
        `,
        [[...actions], limit, now],
      );
      return result.rows.map(mapRowToRecord);
    } catch (error) {
      rethrowAsStoreError(error, 'findUploadedWithMissingActions');
    }
  }
}

function mapRowToRecord(row: UploadRecordRow): UploadRecord {
  const record: UploadRecord = {
    recordId: row.record_id,
    bucket: row.bucket,
    objectKey: row.object_key,
    status: row.status,
    correlationId: row.correlation_id,
    credentialExpiresAt: toIsoString(row.credential_expires_at),
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at),
    dispatchedActions: row.dispatched_actions ?? [],
  };

  if (row.content_type !== null) record.contentType = row.content_type;
  if (row.uploaded_at !== null) record.uploadedAt = toIsoString(row.uploaded_at);
  if (row.reconciled_by_notification_id !== null) {
    record.reconciledByNotificationId = row.reconciled_by_notification_id;
  }
  if (row.object_size_bytes !== null) record.objectSizeBytes = Number(row.object_size_bytes);
  if (row.object_etag !== null) record.objectETag = row.object_etag;
  if (row.failure_reason !== null) record.failureReason = row.failure_reason;
  if (row.dispatch_lease_token !== null && row.dispatch_lease_expires_at !== null) {
    record.dispatchLease = {
      token: row.dispatch_lease_token,
      expiresAt: toIsoString(row.dispatch_lease_expires_at),
    };
  }

  return record;
}

function toIsoString(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}
