import type { DownstreamAction } from '../../../domain/uploads/upload-record';

export const DOWNSTREAM_DISPATCHER_PORT = Symbol('DOWNSTREAM_DISPATCHER_PORT');

export interface DownstreamActionMessage {
  recordId: string;
  objectKey: string;
  uploadedAt: string;
  bucket: string;
  correlationId: string;
  sizeBytes?: number;
  eTag?: string;
}

/**
 * Resolves once the target acknowledged the action and rejects otherwise.
 * Delivery is at-least-once; targets deduplicate on (recordId, action).
 */
export interface DownstreamDispatcherPort {
  dispatch(action: DownstreamAction, message: DownstreamActionMessage): Promise<void>;
}
