import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry, ensureCorrelationId, generateId } from '@upload-reconciler/shared';
import { buildObjectKey, normalizeDesiredObjectKey } from '../../domain/uploads/object-key';
import {
  isCredentialExpired,
  toUploadStatusView,
  type UploadRecord,
  type UploadStatus,
  type UploadStatusView,
} from '../../domain/uploads/upload-record';
import { UploadStatusServiceConfigService } from '../../infrastructure/config/upload-status-service-config.service';
import {
  UPLOAD_AUTHORIZATION_ISSUER_PORT,
  type UploadAuthorizationIssuerPort,
  type UploadCredential,
} from './ports/upload-authorization-issuer.port';
import {
  UPLOAD_RECORD_STORE_PORT,
  type UploadRecordStorePort,
} from './ports/upload-record-store.port';
import { invalidUploadRequest, UploadConflictError, uploadNotFound } from './upload-intake.errors';

export interface RequestUploadInput {
  objectKey?: unknown;
  fileName?: unknown;
  contentType?: unknown;
  correlationId?: string;
}

export interface RequestUploadResult {
  recordId: string;
  objectKey: string;
  status: UploadStatus;
  expiresAt: string;
  correlationId: string;
  credential: UploadCredential;
}

@Injectable()
export class RequestUploadUseCase {
  private readonly logger = new Logger(RequestUploadUseCase.name);

  constructor(
    @Inject(UPLOAD_RECORD_STORE_PORT)
    private readonly store: UploadRecordStorePort,
    @Inject(UPLOAD_AUTHORIZATION_ISSUER_PORT)
    private readonly issuer: UploadAuthorizationIssuerPort,
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  async execute(input: RequestUploadInput): Promise<RequestUploadResult> {
    const correlationId = ensureCorrelationId(input.correlationId);
    const desiredKey = optionalString(input.objectKey, 'objectKey');
    const fileName = optionalString(input.fileName, 'fileName');
    const contentType = optionalString(input.contentType, 'contentType');
    const recordId = generateId();

    const objectKey = this.resolveObjectKey(recordId, desiredKey, fileName);
    const bucket = this.config.minioUploadsBucket;

    const credential = await this.issuer.issueCredential({
      bucket,
      objectKey,
      operation: 'put',
      ttlSeconds: this.config.credentialTtlSeconds,
      contentType,
    });

    const now = new Date().toISOString();
    const record: UploadRecord = {
      recordId,
      bucket,
      objectKey,
      status: 'pending',
      correlationId,
      ...(contentType === undefined ? {} : { contentType }),
      credentialExpiresAt: credential.expiresAt,
      createdAt: now,
      updatedAt: now,
      dispatchedActions: [],
    };

    const created = await this.createWithStaleHolderRelease(record);

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'upload-status-service',
      message: 'Upload credential issued and pending record created.',
      correlationId,
      recordId: created.recordId,
      objectKey: created.objectKey,
      metadata: {
        bucket,
        expiresAt: credential.expiresAt,
        generatedKey: desiredKey === undefined,
      },
    })));

    return {
      recordId: created.recordId,
      objectKey: created.objectKey,
      status: created.status,
      expiresAt: credential.expiresAt,
      correlationId,
      credential,
    };
  }

  async getUploadStatus(recordId: string): Promise<UploadStatusView> {
    const record = await this.store.findById(recordId);
    if (!record) {
      throw uploadNotFound(recordId);
    }

    return toUploadStatusView(record);
  }

  private resolveObjectKey(recordId: string, desiredKey?: string, fileName?: string): string {
    if (desiredKey === undefined) {
      return buildObjectKey(this.config.objectKeyPrefix, recordId, fileName);
    }

    const normalized = normalizeDesiredObjectKey(desiredKey, this.config.objectKeyPrefix);
    if (!normalized.ok) {
      throw invalidUploadRequest(normalized.reason);
    }

    return normalized.objectKey;
  }

  private async createWithStaleHolderRelease(record: UploadRecord): Promise<UploadRecord> {
    const first = await this.store.createIfAbsent(record);
    if (first.created) {
      return first.record;
    }

    // A holder inside its expiry grace may still receive a late completion.
    const holder = first.existing;
    if (holder.status !== 'pending' || !isCredentialExpired(holder, new Date(), this.config.expiryGraceMs)) {
      throw new UploadConflictError(record.objectKey, holder.recordId);
    }

    await this.store.transitionStatus({
      recordId: holder.recordId,
      expectedStatus: 'pending',
      nextStatus: 'expired',
      occurredAt: new Date().toISOString(),
    });

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'upload-status-service',
      message: 'Released object key held by an upload past its expiry grace.',
      correlationId: record.correlationId,
      recordId: holder.recordId,
      objectKey: holder.objectKey,
      metadata: {
        nextRecordId: record.recordId,
        credentialExpiresAt: holder.credentialExpiresAt,
      },
    })));

    const second = await this.store.createIfAbsent(record);
    if (!second.created) {
      throw new UploadConflictError(record.objectKey, second.existing.recordId);
    }

    return second.record;
  }
}

function optionalString(value: unknown, fieldName: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw invalidUploadRequest(`Field "${fieldName}" must be a string.`);
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}
