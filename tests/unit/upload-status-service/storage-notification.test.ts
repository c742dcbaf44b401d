import test from 'node:test';
import assert from 'node:assert/strict';
import {
  MalformedEventError,
  classifyStorageEventName,
  deriveNotificationId,
  normalizeStorageNotification,
  parseStorageNotificationBody,
} from '../../../services/upload-status-service/src/domain/reconciliation/storage-notification';

const OPTIONS = { bucket: 'uploads', objectKeyPrefix: 'uploads', trackRemovals: true };

function createRecord(overrides: {
  eventName?: string;
  bucket?: string;
  key?: string;
  eventTime?: string;
  object?: Record<string, unknown>;
} = {}) {
  return {
    eventName: overrides.eventName ?? 's3:ObjectCreated:Put',
    eventTime: overrides.eventTime ?? '2026-03-01T10:00:01Z',
    s3: {
      bucket: { name: overrides.bucket ?? 'uploads' },
      object: {
        key: overrides.key ?? 'uploads%2F42',
        size: 2048,
        eTag: '"etag-42"',
        sequencer: '1827A5E0C1D2B3A4',
        ...overrides.object,
      },
    },
  };
}

test('normalizeStorageNotification turns a MinIO put notification into one created event', () => {
  const result = normalizeStorageNotification(
    { EventName: 's3:ObjectCreated:Put', Key: 'uploads/uploads/42', Records: [createRecord()] },
    OPTIONS,
  );

  assert.deepEqual(result.discarded, []);
  assert.deepEqual(result.events, [
    {
      notificationId: 'created:uploads/uploads/42@1827A5E0C1D2B3A4',
      bucket: 'uploads',
      objectKey: 'uploads/42',
      eventType: 'created',
      providerEventName: 's3:ObjectCreated:Put',
      providerTimestamp: '2026-03-01T10:00:01.000Z',
      sizeBytes: 2048,
      eTag: 'etag-42',
    },
  ]);
});

test('normalizeStorageNotification discards test events and empty batches', () => {
  assert.deepEqual(normalizeStorageNotification({ Event: 's3:TestEvent', Bucket: 'uploads' }, OPTIONS), {
    events: [],
    discarded: [{ reason: 'test-event', providerEventName: 's3:TestEvent' }],
  });
  assert.deepEqual(normalizeStorageNotification({ Records: [] }, OPTIONS), {
    events: [],
    discarded: [{ reason: 'empty-batch' }],
  });
});

test('normalizeStorageNotification filters foreign buckets, foreign prefixes and unsupported event types', () => {
  const result = normalizeStorageNotification(
    {
      Records: [
        createRecord({ bucket: 'thumbnails' }),
        createRecord({ key: 'raw%2F42' }),
        createRecord({ eventName: 's3:ObjectAccessed:Get' }),
        createRecord({ key: 'uploads%2F43' }),
      ],
    },
    OPTIONS,
  );

  assert.deepEqual(result.discarded.map((item) => item.reason), [
    'bucket-mismatch',
    'outside-prefix',
    'unsupported-event-type',
  ]);
  assert.deepEqual(result.events.map((event) => event.objectKey), ['uploads/43']);
});

test('normalizeStorageNotification forwards removals only while removal tracking is enabled', () => {
  const raw = { Records: [createRecord({ eventName: 's3:ObjectRemoved:Delete' })] };

  const tracked = normalizeStorageNotification(raw, OPTIONS);
  assert.equal(tracked.events[0]?.eventType, 'removed');
  assert.equal(tracked.events[0]?.notificationId, 'removed:uploads/uploads/42@1827A5E0C1D2B3A4');

  const untracked = normalizeStorageNotification(raw, { ...OPTIONS, trackRemovals: false });
  assert.deepEqual(untracked.events, []);
  assert.equal(untracked.discarded[0]?.reason, 'removal-not-tracked');
});

test('normalizeStorageNotification decodes URL-encoded keys with plus signs for spaces', () => {
  const result = normalizeStorageNotification(
    { Records: [createRecord({ key: 'uploads/7f0c/annual+report%281%29.pdf' })] },
    OPTIONS,
  );

  assert.equal(result.events[0]?.objectKey, 'uploads/7f0c/annual report(1).pdf');
});

test('normalizeStorageNotification derives a notification id from eTag and time without a sequencer', () => {
  const result = normalizeStorageNotification(
    { Records: [createRecord({ object: { sequencer: undefined } })] },
    OPTIONS,
  );

  assert.equal(result.events[0]?.notificationId, 'created:uploads/uploads/42@etag-42:2026-03-01T10:00:01.000Z');
  assert.equal(
    deriveNotificationId({ eventType: 'created', bucket: 'b', objectKey: 'k' }),
    'created:b/k@no-etag:no-time',
  );
});

test('normalizeStorageNotification rejects the whole message when one record is malformed', () => {
  const raw = {
    Records: [
      createRecord(),
      { eventName: 's3:ObjectCreated:Put', s3: { bucket: { name: 'uploads' }, object: {} } },
    ],
  };

  assert.throws(
    () => normalizeStorageNotification(raw, OPTIONS),
    (error: unknown) =>
      error instanceof MalformedEventError && error.message === 'Records[1].s3.object.key is required.',
  );
});

test('normalizeStorageNotification rejects payloads that can never be parsed', () => {
  assert.throws(() => parseStorageNotificationBody('{not json'), MalformedEventError);
  assert.throws(() => normalizeStorageNotification('text', OPTIONS), MalformedEventError);
  assert.throws(() => normalizeStorageNotification({ EventName: 's3:ObjectCreated:Put' }, OPTIONS), MalformedEventError);
  assert.throws(
    () => normalizeStorageNotification({ Records: [createRecord({ key: 'uploads%2F%E0%A4%A' })] }, OPTIONS),
    MalformedEventError,
  );
  assert.throws(
    () => normalizeStorageNotification({ Records: [createRecord({ eventTime: 'yesterday' })] }, OPTIONS),
    MalformedEventError,
  );
});

test('parseStorageNotificationBody reads buffers as UTF-8 JSON', () => {
  assert.deepEqual(parseStorageNotificationBody(Buffer.from('{"Records":[]}')), { Records: [] });
});

test('classifyStorageEventName maps provider names with and without the s3 prefix', () => {
  assert.equal(classifyStorageEventName('s3:ObjectCreated:Put'), 'created');
  assert.equal(classifyStorageEventName('ObjectCreated:CompleteMultipartUpload'), 'created');
  assert.equal(classifyStorageEventName('s3:ObjectRemoved:DeleteMarkerCreated'), 'removed');
  assert.equal(classifyStorageEventName('s3:ObjectAccessed:Head'), 'unknown');
});
