import { isUnderPrefix } from '../uploads/object-key';

export type StorageEventType = 'created' | 'removed' | 'unknown';

export interface NormalizedStorageEvent {
  notificationId: string;
  bucket: string;
  objectKey: string;
  eventType: StorageEventType;
  providerEventName: string;
  providerTimestamp?: string;
  sizeBytes?: number;
  eTag?: string;
}

export type StorageNotificationDiscardReason =
  | 'test-event'
  | 'empty-batch'
  | 'bucket-mismatch'
  | 'outside-prefix'
  | 'unsupported-event-type'
  | 'removal-not-tracked';

export interface DiscardedStorageRecord {
  reason: StorageNotificationDiscardReason;
  providerEventName?: string;
  bucket?: string;
  objectKey?: string;
}

export interface StorageNotificationNormalization {
  events: NormalizedStorageEvent[];
  discarded: DiscardedStorageRecord[];
}

export interface NormalizeStorageNotificationOptions {
  bucket: string;
  objectKeyPrefix: string;
  trackRemovals: boolean;
}

export class MalformedEventError extends Error {
  readonly code = 'MALFORMED_STORAGE_EVENT';

  constructor(
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'MalformedEventError';
  }
}

const TEST_EVENT_NAME = 's3:TestEvent';

export function parseStorageNotificationBody(content: Buffer | string): unknown {
  const text = typeof content === 'string' ? content : content.toString('utf-8');

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedEventError('Storage notification body is not valid JSON.', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Turns one S3-style bucket notification (MinIO and AWS share the shape) into
 * zero or more canonical events. Holds no state between calls.
 */
export function normalizeStorageNotification(
  raw: unknown,
  options: NormalizeStorageNotificationOptions,
): StorageNotificationNormalization {
  if (!isRecord(raw)) {
    throw new MalformedEventError('Storage notification must be a JSON object.');
  }

  if (raw.Event === TEST_EVENT_NAME || raw.EventName === TEST_EVENT_NAME) {
    return { events: [], discarded: [{ reason: 'test-event', providerEventName: TEST_EVENT_NAME }] };
  }

  if (!Array.isArray(raw.Records)) {
    throw new MalformedEventError('Storage notification is missing a "Records" array.');
  }

  if (raw.Records.length === 0) {
    return { events: [], discarded: [{ reason: 'empty-batch' }] };
  }

  const parsed = raw.Records.map((record: unknown, index: number) => parseNotificationRecord(record, index));
  const result: StorageNotificationNormalization = { events: [], discarded: [] };

  for (const event of parsed) {
    const reason = discardReasonFor(event, options);
    if (reason) {
      result.discarded.push({
        reason,
        providerEventName: event.providerEventName,
        bucket: event.bucket,
        objectKey: event.objectKey,
      });
      continue;
    }

    result.events.push(event);
  }

  return result;
}

export function classifyStorageEventName(eventName: string): StorageEventType {
  const name = eventName.startsWith('s3:') ? eventName.slice(3) : eventName;

  if (name.startsWith('ObjectCreated:')) {
    return 'created';
  }

  if (name.startsWith('ObjectRemoved:')) {
    return 'removed';
  }

  return 'unknown';
}

function discardReasonFor(
  event: NormalizedStorageEvent,
  options: NormalizeStorageNotificationOptions,
): StorageNotificationDiscardReason | undefined {
  if (event.eventType === 'unknown') {
    return 'unsupported-event-type';
  }

  if (event.eventType === 'removed' && !options.trackRemovals) {
    return 'removal-not-tracked';
  }

  if (event.bucket !== options.bucket) {
    return 'bucket-mismatch';
  }

  if (!isUnderPrefix(event.objectKey, options.objectKeyPrefix)) {
    return 'outside-prefix';
  }

  return undefined;
}

function parseNotificationRecord(value: unknown, index: number): NormalizedStorageEvent {
  if (!isRecord(value)) {
    throw new MalformedEventError(`Notification record #${index} must be an object.`, { index });
  }

  const providerEventName = requiredString(value.eventName, `Records[${index}].eventName`, index);
  const s3 = asRecord(value.s3);
  const bucketRef = asRecord(s3?.bucket);
  const objectRef = asRecord(s3?.object);

  const bucket = requiredString(bucketRef?.name, `Records[${index}].s3.bucket.name`, index);
  const encodedKey = requiredString(objectRef?.key, `Records[${index}].s3.object.key`, index);
  const objectKey = decodeObjectKey(encodedKey, index);
  const providerTimestamp = parseEventTime(value.eventTime, index);
  const eventType = classifyStorageEventName(providerEventName);
  const eTag = normalizeEtag(objectRef?.eTag);
  const rawSequencer = objectRef?.sequencer;
  const sequencer = typeof rawSequencer === 'string' && rawSequencer.trim() ? rawSequencer.trim() : undefined;
  const rawSize = objectRef?.size;
  const sizeBytes = typeof rawSize === 'number' && Number.isFinite(rawSize) && rawSize >= 0
    ? Math.trunc(rawSize)
    : undefined;

  return {
    notificationId: deriveNotificationId({ eventType, bucket, objectKey, sequencer, eTag, providerTimestamp }),
    bucket,
    objectKey,
    eventType,
    providerEventName,
    ...(providerTimestamp === undefined ? {} : { providerTimestamp }),
    ...(sizeBytes === undefined ? {} : { sizeBytes }),
    ...(eTag === undefined ? {} : { eTag }),
  };
}

export function deriveNotificationId(input: {
  eventType: StorageEventType;
  bucket: string;
  objectKey: string;
  sequencer?: string;
  eTag?: string;
  providerTimestamp?: string;
}): string {
  const location = `${input.eventType}:${input.bucket}/${input.objectKey}`;

  if (input.sequencer) {
    return `${location}@${input.sequencer}`;
  }

  return `${location}@${input.eTag ?? 'no-etag'}:${input.providerTimestamp ?? 'no-time'}`;
}

function decodeObjectKey(encodedKey: string, index: number): string {
  try {
    return decodeURIComponent(encodedKey.replace(/\+/g, ' '));
  } catch {
    throw new MalformedEventError(`Records[${index}].s3.object.key is not a valid URL-encoded key.`, {
      index,
      key: encodedKey,
    });
  }
}

function parseEventTime(value: unknown, index: number): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  const parsed = typeof value === 'string' ? Date.parse(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new MalformedEventError(`Records[${index}].eventTime is not a valid timestamp.`, {
      index,
      eventTime: value,
    });
  }

  return new Date(parsed).toISOString();
}

function requiredString(value: unknown, field: string, index: number): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new MalformedEventError(`${field} is required.`, { index, field });
  }

  return value;
}

function normalizeEtag(value: unknown): string | undefined {
  if (typeof value !== 'string' || !value.trim()) {
    return undefined;
  }

  return value.trim().replace(/^"|"$/g, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}
