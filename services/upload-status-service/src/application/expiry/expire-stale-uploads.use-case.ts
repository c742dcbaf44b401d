import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry } from '@upload-reconciler/shared';
import { UploadStatusServiceConfigService } from '../../infrastructure/config/upload-status-service-config.service';
import {
  UPLOAD_RECORD_STORE_PORT,
  type UploadRecordStorePort,
} from '../uploads/ports/upload-record-store.port';

@Injectable()
export class ExpireStaleUploadsUseCase {
  private readonly logger = new Logger(ExpireStaleUploadsUseCase.name);

  constructor(
    @Inject(UPLOAD_RECORD_STORE_PORT)
    private readonly store: UploadRecordStorePort,
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  /** Expires pending records whose credential lapsed more than the grace period before `now`. */
  async execute(now: string): Promise<{ expired: number }> {
    const cutoff = new Date(Date.parse(now) - this.config.expiryGraceMs).toISOString();
    const candidates = await this.store.findExpirablePending(cutoff, this.config.expirySweepBatchSize);

    let expired = 0;
    for (const candidate of candidates) {
      const updated = await this.store.transitionStatus({
        recordId: candidate.recordId,
        expectedStatus: 'pending',
        nextStatus: 'expired',
        occurredAt: now,
      });

      // A notification won the race.
      if (!updated) {
        continue;
      }

      expired += 1;
      this.logger.log(JSON.stringify(createJsonLogEntry({
        level: 'info',
        service: 'upload-status-service',
        message: 'Pending upload expired without a storage notification.',
        correlationId: updated.correlationId,
        recordId: updated.recordId,
        objectKey: updated.objectKey,
        metadata: {
          credentialExpiresAt: updated.credentialExpiresAt,
        },
      })));
    }

    return { expired };
  }
}
