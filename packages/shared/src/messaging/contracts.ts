import { MESSAGE_EXCHANGES } from '../standards.js';
import type { EventEnvelope } from './envelope.js';
import { buildRoutingKey, formatVersionTag } from './naming.js';

export type EventTypeV1 = 'UploadActionRequested.v1';

export type DownstreamActionName = string;

export interface UploadActionRequestedPayload {
  recordId: string;
  objectKey: string;
  uploadedAt: string;
  action: DownstreamActionName;
  bucket?: string;
  sizeBytes?: number;
  eTag?: string;
}

export interface EventPayloadMapV1 {
  'UploadActionRequested.v1': UploadActionRequestedPayload;
}

export interface MessageCatalogEntryV1 {
  kind: 'event';
  type: EventTypeV1;
  exchange: typeof MESSAGE_EXCHANGES.events;
  routingKeyPattern: string;
  producer: string;
  consumers: string[];
}

export const MESSAGE_CATALOG_V1: Record<EventTypeV1, MessageCatalogEntryV1> = {
  'UploadActionRequested.v1': {
    kind: 'event',
    type: 'UploadActionRequested.v1',
    exchange: MESSAGE_EXCHANGES.events,
    routingKeyPattern: 'uploads.actions.{action}.v1',
    producer: 'upload-status-service',
    consumers: ['scan-worker', 'audit-worker', 'quota-worker'],
  },
};

export function uploadActionRoutingKey(action: DownstreamActionName, version = 1): string {
  return buildRoutingKey('uploads', 'actions', action, formatVersionTag(version));
}

/**
 * Deterministic per (recordId, action), so subscribers can deduplicate
 * redelivered dispatches on the message id alone.
 */
export function uploadActionMessageId(recordId: string, action: DownstreamActionName): string {
  return `${recordId}:${action}`;
}

export type DomainEventV1<TType extends keyof EventPayloadMapV1 = keyof EventPayloadMapV1> =
  EventEnvelope<EventPayloadMapV1[TType], TType>;
