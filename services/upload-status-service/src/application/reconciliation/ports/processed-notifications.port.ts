export const PROCESSED_NOTIFICATIONS_PORT = Symbol('PROCESSED_NOTIFICATIONS_PORT');

export interface MarkNotificationProcessedInput {
  notificationId: string;
  recordId: string;
  correlationId?: string;
  processedAt: string;
  windowSeconds: number;
}

/** Short-lived memory of notification ids already applied to a record. */
export interface ProcessedNotificationsPort {
  hasProcessed(notificationId: string, now: string): Promise<boolean>;
  markProcessed(input: MarkNotificationProcessedInput): Promise<void>;
}
