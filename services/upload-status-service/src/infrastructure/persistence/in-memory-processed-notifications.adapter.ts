import { Injectable } from '@nestjs/common';
import type {
  MarkNotificationProcessedInput,
  ProcessedNotificationsPort,
} from '../../application/reconciliation/ports/processed-notifications.port';

@Injectable()
export class InMemoryProcessedNotificationsAdapter implements ProcessedNotificationsPort {
  private readonly expiresAtByNotificationId = new Map<string, number>();

  async hasProcessed(notificationId: string, now: string): Promise<boolean> {
    const expiresAt = this.expiresAtByNotificationId.get(notificationId);
    if (expiresAt === undefined) {
      return false;
    }

    if (expiresAt <= Date.parse(now)) {
      this.expiresAtByNotificationId.delete(notificationId);
      return false;
    }

    return true;
  }

  async markProcessed(input: MarkNotificationProcessedInput): Promise<void> {
    const expiresAt = Date.parse(input.processedAt) + input.windowSeconds * 1000;
    this.expiresAtByNotificationId.set(input.notificationId, expiresAt);
    this.evictExpired(Date.parse(input.processedAt));
  }

  private evictExpired(nowMs: number): void {
    for (const [notificationId, expiresAt] of this.expiresAtByNotificationId) {
      if (expiresAt <= nowMs) {
        this.expiresAtByNotificationId.delete(notificationId);
      }
    }
  }
}
