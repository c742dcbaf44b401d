import test from 'node:test';
import assert from 'node:assert/strict';
import { ReconcileStorageEventUseCase } from '../../../services/upload-status-service/src/application/reconciliation/reconcile-storage-event.use-case';
import { DispatchDownstreamActionsService } from '../../../services/upload-status-service/src/application/reconciliation/dispatch-downstream-actions.service';
import { TransientStoreError } from '../../../services/upload-status-service/src/application/uploads/ports/upload-record-store.port';
import { InMemoryProcessedNotificationsAdapter } from '../../../services/upload-status-service/src/infrastructure/persistence/in-memory-processed-notifications.adapter';
import { InMemoryUploadRecordStore } from '../../../services/upload-status-service/src/infrastructure/persistence/in-memory-upload-record.store';
import {
  RecordingDispatcher,
  createPendingRecord,
  createReconcileHarness,
  createStorageEvent,
  createTestConfig,
  waitUntil,
} from './support';

test('ReconcileStorageEventUseCase confirms a pending upload and dispatches every configured action', async () => {
  const { store, dispatcher, reconciler } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord());

  const outcome = await reconciler.execute(createStorageEvent());

  assert.deepEqual(outcome, {
    kind: 'reconciled',
    recordId: 'rec-42',
    dispatched: ['scan', 'audit'],
    failedDispatches: [],
  });

  const record = await store.findById('rec-42');
  assert.equal(record?.status, 'uploaded');
  assert.equal(record?.uploadedAt, '2026-03-01T10:00:01.000Z');
  assert.equal(record?.reconciledByNotificationId, 'created:uploads/uploads/42@seq-1');
  assert.equal(record?.objectSizeBytes, 2048);
  assert.equal(record?.objectETag, 'etag-42');
  assert.deepEqual(record?.dispatchedActions, ['scan', 'audit']);

  assert.deepEqual(dispatcher.calls.map((call) => call.action), ['scan', 'audit']);
  assert.deepEqual(dispatcher.calls[0]?.message, {
    recordId: 'rec-42',
    objectKey: 'uploads/42',
    bucket: 'uploads',
    uploadedAt: '2026-03-01T10:00:01.000Z',
    correlationId: 'corr-42',
    sizeBytes: 2048,
    eTag: 'etag-42',
  });
});

test('ReconcileStorageEventUseCase ignores notifications for keys it never issued', async () => {
  const { store, dispatcher, reconciler } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord());

  const outcome = await reconciler.execute(createStorageEvent({
    notificationId: 'created:uploads/uploads/99@seq-9',
    objectKey: 'uploads/99',
  }));

  assert.deepEqual(outcome, { kind: 'ignored', reason: 'no-matching-record' });
  assert.equal(await store.findByObjectKey('uploads/99'), undefined);
  assert.equal((await store.findById('rec-42'))?.status, 'pending');
  assert.equal(dispatcher.calls.length, 0);
});

test('ReconcileStorageEventUseCase reports redelivered notifications as duplicates without re-dispatching', async () => {
  const { store, dispatcher, reconciler } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord());
  const event = createStorageEvent();

  const first = await reconciler.execute(event);
  const second = await reconciler.execute(event);
  const third = await reconciler.execute(event);

  assert.equal(first.kind, 'reconciled');
  assert.deepEqual(second, { kind: 'duplicate-ignored', reason: 'already-processed', recordId: 'rec-42' });
  assert.deepEqual(third, { kind: 'duplicate-ignored', reason: 'already-processed', recordId: 'rec-42' });
  assert.equal(dispatcher.calls.length, 2);
  assert.equal((await store.findById('rec-42'))?.status, 'uploaded');
});

test('ReconcileStorageEventUseCase ignores a fresh re-notification and reports its redelivery as a duplicate', async () => {
  const { store, processedNotifications, dispatcher, reconciler } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord());
  await reconciler.execute(createStorageEvent());
  const renotification = createStorageEvent({ notificationId: 'created:uploads/uploads/42@seq-2' });

  const outcome = await reconciler.execute(renotification);
  const redelivery = await reconciler.execute(renotification);

  assert.deepEqual(outcome, { kind: 'ignored', reason: 'already-uploaded', recordId: 'rec-42' });
  assert.deepEqual(redelivery, { kind: 'duplicate-ignored', reason: 'already-processed', recordId: 'rec-42' });
  assert.equal(
    await processedNotifications.hasProcessed('created:uploads/uploads/42@seq-2', new Date().toISOString()),
    true,
  );
  assert.equal(dispatcher.calls.length, 2);
});

test('ReconcileStorageEventUseCase lets exactly one of two concurrent deliveries win', async () => {
  const { store, dispatcher, reconciler } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord());
  const event = createStorageEvent();

  const [first, second] = await Promise.all([reconciler.execute(event), reconciler.execute(event)]);

  assert.equal(first.kind, 'reconciled');
  assert.deepEqual(second, { kind: 'duplicate-ignored', reason: 'concurrent-transition', recordId: 'rec-42' });
  assert.deepEqual(dispatcher.calls.map((call) => call.action), ['scan', 'audit']);
});

test('ReconcileStorageEventUseCase honors a late completion after the credential expired', async () => {
  const { store, reconciler } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord({ credentialExpiresAt: '2026-03-01T09:00:00.000Z' }));

  const outcome = await reconciler.execute(createStorageEvent());

  assert.equal(outcome.kind, 'reconciled');
  assert.equal((await store.findById('rec-42'))?.status, 'uploaded');
});

test('ReconcileStorageEventUseCase ignores events for expired and failed records', async () => {
  const { store, dispatcher, reconciler } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord({ status: 'expired' }));
  await store.createIfAbsent(createPendingRecord({
    recordId: 'rec-7',
    objectKey: 'uploads/7',
    status: 'failed',
    failureReason: 'object-too-large',
  }));

  const expired = await reconciler.execute(createStorageEvent());
  const failed = await reconciler.execute(createStorageEvent({
    notificationId: 'created:uploads/uploads/7@seq-1',
    objectKey: 'uploads/7',
  }));

  assert.deepEqual(expired, { kind: 'ignored', reason: 'record-expired', recordId: 'rec-42' });
  assert.deepEqual(failed, { kind: 'ignored', reason: 'record-failed', recordId: 'rec-7' });
  assert.equal(dispatcher.calls.length, 0);
});

test('ReconcileStorageEventUseCase marks oversized objects as failed without dispatching', async () => {
  const { store, dispatcher, reconciler } = createReconcileHarness({ UPLOAD_MAX_SIZE_BYTES: '1024' });
  await store.createIfAbsent(createPendingRecord());

  const outcome = await reconciler.execute(createStorageEvent({ sizeBytes: 2048 }));

  assert.deepEqual(outcome, { kind: 'marked-failed', recordId: 'rec-42', failureReason: 'object-too-large' });
  const record = await store.findById('rec-42');
  assert.equal(record?.status, 'failed');
  assert.equal(record?.failureReason, 'object-too-large');
  assert.equal(dispatcher.calls.length, 0);
});

test('ReconcileStorageEventUseCase fails a pending upload whose object was removed', async () => {
  const { store, reconciler } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord());

  const outcome = await reconciler.execute(createStorageEvent({
    notificationId: 'removed:uploads/uploads/42@seq-3',
    eventType: 'removed',
    providerEventName: 's3:ObjectRemoved:Delete',
  }));

  assert.deepEqual(outcome, {
    kind: 'marked-failed',
    recordId: 'rec-42',
    failureReason: 'object-removed-before-confirmation',
  });
  assert.equal((await store.findById('rec-42'))?.status, 'failed');
});

test('ReconcileStorageEventUseCase leaves an uploaded record untouched when its object is removed', async () => {
  const { store, dispatcher, reconciler } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord());
  await reconciler.execute(createStorageEvent());

  const outcome = await reconciler.execute(createStorageEvent({
    notificationId: 'removed:uploads/uploads/42@seq-3',
    eventType: 'removed',
    providerEventName: 's3:ObjectRemoved:Delete',
  }));

  assert.deepEqual(outcome, { kind: 'ignored', reason: 'removed-after-upload', recordId: 'rec-42' });
  assert.equal((await store.findById('rec-42'))?.status, 'uploaded');
  assert.equal(dispatcher.calls.length, 2);
});

test('ReconcileStorageEventUseCase keeps the transition when a dispatch fails and the poller completes it', async () => {
  const { store, dispatcher, reconciler, retry } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord());
  dispatcher.failing.add('audit');

  const outcome = await reconciler.execute(createStorageEvent());

  assert.deepEqual(outcome, {
    kind: 'reconciled',
    recordId: 'rec-42',
    dispatched: ['scan'],
    failedDispatches: ['audit'],
  });
  assert.equal((await store.findById('rec-42'))?.status, 'uploaded');
  assert.deepEqual((await store.findById('rec-42'))?.dispatchedActions, ['scan']);

  assert.equal((await store.findById('rec-42'))?.dispatchLease, undefined);

  dispatcher.failing.clear();
  const result = await retry.retryPendingBatch();

  assert.deepEqual(result, { scanned: 1, leasedElsewhere: 0, dispatched: 1, failed: 0 });
  assert.deepEqual((await store.findById('rec-42'))?.dispatchedActions, ['scan', 'audit']);
  assert.deepEqual(dispatcher.calls.map((call) => call.action), ['scan', 'audit', 'audit']);
});

test('ReconcileStorageEventUseCase leaves missing dispatches of a redelivered notification to the poller', async () => {
  const { store, dispatcher, reconciler, retry } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord({
    status: 'uploaded',
    uploadedAt: '2026-03-01T10:00:01.000Z',
    reconciledByNotificationId: 'created:uploads/uploads/42@seq-1',
    dispatchedActions: ['scan'],
  }));

  const outcome = await reconciler.execute(createStorageEvent());

  assert.deepEqual(outcome, { kind: 'duplicate-ignored', reason: 'already-processed', recordId: 'rec-42' });
  assert.equal(dispatcher.calls.length, 0);

  const result = await retry.retryPendingBatch();

  assert.deepEqual(result, { scanned: 1, leasedElsewhere: 0, dispatched: 1, failed: 0 });
  assert.deepEqual(dispatcher.calls.map((call) => call.action), ['audit']);
  assert.deepEqual((await store.findById('rec-42'))?.dispatchedActions, ['scan', 'audit']);
});

test('ReconcileStorageEventUseCase dispatches once when a duplicate arrives while acks are held', async () => {
  const { store, dispatcher, reconciler } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord());
  const releaseAcks = dispatcher.holdAcks();
  const event = createStorageEvent();

  const winner = reconciler.execute(event);
  await waitUntil(() => dispatcher.calls.length === 1);
  const duplicate = await reconciler.execute(event);
  releaseAcks();

  assert.deepEqual(duplicate, { kind: 'duplicate-ignored', reason: 'already-processed', recordId: 'rec-42' });
  assert.deepEqual(await winner, {
    kind: 'reconciled',
    recordId: 'rec-42',
    dispatched: ['scan', 'audit'],
    failedDispatches: [],
  });
  assert.deepEqual(dispatcher.calls.map((call) => call.action), ['scan', 'audit']);
});

test('RetryPendingDispatchesService skips a record whose dispatch lease is held', async () => {
  const { store, dispatcher, dispatchService, reconciler, retry } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord());
  const releaseAcks = dispatcher.holdAcks();

  const winner = reconciler.execute(createStorageEvent());
  await waitUntil(() => dispatcher.calls.length === 1);
  const leased = await store.findById('rec-42');
  const batch = await retry.retryPendingBatch();
  const directClaim = leased ? await dispatchService.claimAndDispatch(leased) : 'missing';
  releaseAcks();
  await winner;

  assert.deepEqual(batch, { scanned: 0, leasedElsewhere: 0, dispatched: 0, failed: 0 });
  assert.equal(directClaim, undefined);
  assert.deepEqual(dispatcher.calls.map((call) => call.action), ['scan', 'audit']);
  assert.equal((await store.findById('rec-42'))?.dispatchLease, undefined);
});

test('RetryPendingDispatchesService takes over a record whose dispatch lease lapsed', async () => {
  const { store, dispatcher, retry } = createReconcileHarness();
  await store.createIfAbsent(createPendingRecord({
    status: 'uploaded',
    uploadedAt: '2026-03-01T10:00:01.000Z',
    dispatchLease: { token: 'crashed-worker', expiresAt: '2026-03-01T10:00:11.000Z' },
  }));

  const result = await retry.retryPendingBatch();

  assert.deepEqual(result, { scanned: 1, leasedElsewhere: 0, dispatched: 2, failed: 0 });
  assert.deepEqual(dispatcher.calls.map((call) => call.action), ['scan', 'audit']);
  assert.equal((await store.findById('rec-42'))?.dispatchLease, undefined);
});

test('ReconcileStorageEventUseCase treats unacknowledged dispatches as failed after the timeout', async () => {
  const { store, dispatcher, reconciler } = createReconcileHarness({ UPLOAD_STATUS_DISPATCH_TIMEOUT_MS: '20' });
  await store.createIfAbsent(createPendingRecord());
  dispatcher.hang = true;

  const outcome = await reconciler.execute(createStorageEvent());

  assert.deepEqual(outcome, {
    kind: 'reconciled',
    recordId: 'rec-42',
    dispatched: [],
    failedDispatches: ['scan', 'audit'],
  });
  assert.deepEqual((await store.findById('rec-42'))?.dispatchedActions, []);
});

test('ReconcileStorageEventUseCase propagates transient store errors', async () => {
  const config = createTestConfig();
  const store = new InMemoryUploadRecordStore();
  store.findByObjectKey = async () => {
    throw new TransientStoreError('connection reset');
  };
  const dispatchService = new DispatchDownstreamActionsService(new RecordingDispatcher(), store, config);
  const reconciler = new ReconcileStorageEventUseCase(
    store,
    new InMemoryProcessedNotificationsAdapter(),
    dispatchService,
    config,
  );

  await assert.rejects(reconciler.execute(createStorageEvent()), TransientStoreError);
});
