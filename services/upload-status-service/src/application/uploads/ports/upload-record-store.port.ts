import type {
  DispatchLease,
  DownstreamAction,
  TerminalUploadStatus,
  UploadRecord,
  UploadStatus,
} from '../../../domain/uploads/upload-record';

export const UPLOAD_RECORD_STORE_PORT = Symbol('UPLOAD_RECORD_STORE_PORT');

export type CreateIfAbsentResult =
  | { created: true; record: UploadRecord }
  | { created: false; existing: UploadRecord };

export interface TransitionStatusInput {
  recordId: string;
  expectedStatus: UploadStatus;
  nextStatus: TerminalUploadStatus;
  occurredAt: string;
  uploadedAt?: string;
  notificationId?: string;
  objectSizeBytes?: number;
  objectETag?: string;
  failureReason?: string;
  /** Taken together with the move to `uploaded`, so the winning notification owns the first dispatch. */
  dispatchLease?: DispatchLease;
}

export interface MarkActionDispatchedInput {
  recordId: string;
  action: DownstreamAction;
  occurredAt: string;
}

export interface ClaimDispatchLeaseInput {
  recordId: string;
  lease: DispatchLease;
  now: string;
}

export interface ReleaseDispatchLeaseInput {
  recordId: string;
  token: string;
}

/**
 * Keyed storage for upload records. `createIfAbsent` enforces one
 * non-expired record per object key; `transitionStatus` only applies when the
 * stored status still equals `expectedStatus` and returns undefined otherwise.
 * `claimDispatchLease` succeeds only on an uploaded record whose lease is
 * absent or expired at `now`.
 */
export interface UploadRecordStorePort {
  createIfAbsent(record: UploadRecord): Promise<CreateIfAbsentResult>;
  findById(recordId: string): Promise<UploadRecord | undefined>;
  /** The non-expired holder of the key, else the most recently created record. */
  findByObjectKey(objectKey: string): Promise<UploadRecord | undefined>;
  transitionStatus(input: TransitionStatusInput): Promise<UploadRecord | undefined>;
  markActionDispatched(input: MarkActionDispatchedInput): Promise<UploadRecord | undefined>;
  claimDispatchLease(input: ClaimDispatchLeaseInput): Promise<UploadRecord | undefined>;
  /** Clears the lease only while `token` still owns it. */
  releaseDispatchLease(input: ReleaseDispatchLeaseInput): Promise<void>;
  findExpirablePending(cutoff: string, limit: number): Promise<UploadRecord[]>;
  /** Leaves out records whose dispatch lease is still active at `now`. */
  findUploadedWithMissingActions(
    actions: readonly DownstreamAction[],
    limit: number,
    now: string,
  ): Promise<UploadRecord[]>;
}

export class TransientStoreError extends Error {
  readonly code = 'TRANSIENT_STORE_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientStoreError';
  }
}
