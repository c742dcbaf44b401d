import type { DownstreamAction } from '../uploads/upload-record';

export type IgnoredReason =
  | 'no-matching-record'
  | 'record-expired'
  | 'record-failed'
  | 'already-uploaded'
  | 'removed-after-upload'
  | 'unsupported-event-type';

export type DuplicateReason = 'already-processed' | 'concurrent-transition';

export type ReconcileOutcome =
  | {
      kind: 'reconciled';
      recordId: string;
      dispatched: DownstreamAction[];
      failedDispatches: DownstreamAction[];
    }
  | {
      kind: 'marked-failed';
      recordId: string;
      failureReason: string;
    }
  | {
      kind: 'ignored';
      reason: IgnoredReason;
      recordId?: string;
    }
  | {
      kind: 'duplicate-ignored';
      reason: DuplicateReason;
      recordId: string;
    };

export type ReconcileOutcomeKind = ReconcileOutcome['kind'];
