export type UploadStatus = 'pending' | 'uploaded' | 'failed' | 'expired';

export type TerminalUploadStatus = Exclude<UploadStatus, 'pending'>;

export type DownstreamAction = string;

/** Exclusive right to dispatch a record's missing actions until `expiresAt`. */
export interface DispatchLease {
  token: string;
  expiresAt: string;
}

export interface UploadRecord {
  recordId: string;
  bucket: string;
  objectKey: string;
  status: UploadStatus;
  correlationId: string;
  contentType?: string;
  credentialExpiresAt: string;
  createdAt: string;
  updatedAt: string;
  uploadedAt?: string;
  reconciledByNotificationId?: string;
  objectSizeBytes?: number;
  objectETag?: string;
  failureReason?: string;
  dispatchedActions: DownstreamAction[];
  dispatchLease?: DispatchLease;
}

export interface UploadStatusView {
  recordId: string;
  objectKey: string;
  status: UploadStatus;
  expiresAt: string;
  createdAt: string;
  updatedAt: string;
  uploadedAt?: string;
  failureReason?: string;
}

export function isTerminalStatus(status: UploadStatus): status is TerminalUploadStatus {
  return status !== 'pending';
}

/**
 * pending -> uploaded | failed | expired. Every other edge is rejected,
 * including self-transitions.
 */
export function canTransition(from: UploadStatus, to: UploadStatus): boolean {
  return from === 'pending' && to !== 'pending';
}

export function isCredentialExpired(
  record: Pick<UploadRecord, 'credentialExpiresAt'>,
  now: Date,
  graceMs = 0,
): boolean {
  const expiresAt = Date.parse(record.credentialExpiresAt);
  return Number.isFinite(expiresAt) && expiresAt + graceMs <= now.getTime();
}

export function hasActiveDispatchLease(record: Pick<UploadRecord, 'dispatchLease'>, now: Date): boolean {
  return record.dispatchLease !== undefined && Date.parse(record.dispatchLease.expiresAt) > now.getTime();
}

export function missingDownstreamActions(
  record: Pick<UploadRecord, 'dispatchedActions'>,
  configuredActions: readonly DownstreamAction[],
): DownstreamAction[] {
  const dispatched = new Set(record.dispatchedActions);
  return configuredActions.filter((action) => !dispatched.has(action));
}

export function toUploadStatusView(record: UploadRecord): UploadStatusView {
  return {
    recordId: record.recordId,
    objectKey: record.objectKey,
    status: record.status,
    expiresAt: record.credentialExpiresAt,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    ...(record.uploadedAt === undefined ? {} : { uploadedAt: record.uploadedAt }),
    ...(record.failureReason === undefined ? {} : { failureReason: record.failureReason }),
  };
}
