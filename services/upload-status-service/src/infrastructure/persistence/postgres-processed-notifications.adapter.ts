import { Inject, Injectable } from '@nestjs/common';
import type {
  MarkNotificationProcessedInput,
  ProcessedNotificationsPort,
} from '../../application/reconciliation/ports/processed-notifications.port';
import { rethrowAsStoreError, UploadStatusPostgresPool } from './postgres-pool';

@Injectable()
export class PostgresProcessedNotificationsAdapter implements ProcessedNotificationsPort {
  constructor(
    @Inject(UploadStatusPostgresPool)
    private readonly database: UploadStatusPostgresPool,
  ) {}

  async hasProcessed(notificationId: string, now: string): Promise<boolean> {
    try {
      const result = await this.database.client.query(
        `
          select 1
          from upload_status.processed_notifications
          where notification_id = $1
            and expires_at > $2::timestamptz
        `,
        [notificationId, now],
      );
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      rethrowAsStoreError(error, 'hasProcessed');
    }
  }

  async markProcessed(input: MarkNotificationProcessedInput): Promise<void> {
    try {
      await this.database.client.query(
        `
          insert into upload_status.processed_notifications (
            notification_id,
            record_id,
            correlation_id,
            processed_at,
            expires_at
          )
          values ($1, $2, $3, $4::timestamptz, $4::timestamptz + make_interval(secs => $5))
          on conflict (notification_id)
          do update set
            record_id = excluded.record_id,
            correlation_id = excluded.correlation_id,
            processed_at = excluded.processed_at,
            expires_at = excluded.expires_at
        `,
        [
          input.notificationId,
          input.recordId,
          input.correlationId ?? null,
          input.processedAt,
          input.windowSeconds,
        ],
      );

      await this.database.client.query(
        'delete from upload_status.processed_notifications where expires_at <= $1::timestamptz',
        [input.processedAt],
      );
    } catch (error) {
      rethrowAsStoreError(error, 'markProcessed');
    }
  }
}
