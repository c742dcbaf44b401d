import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry } from '@upload-reconciler/shared';
import { UploadStatusServiceConfigService } from '../../infrastructure/config/upload-status-service-config.service';
import {
  UPLOAD_RECORD_STORE_PORT,
  type UploadRecordStorePort,
} from '../uploads/ports/upload-record-store.port';
import { DispatchDownstreamActionsService } from './dispatch-downstream-actions.service';

export interface RetryPendingDispatchesResult {
  scanned: number;
  leasedElsewhere: number;
  dispatched: number;
  failed: number;
}

@Injectable()
export class RetryPendingDispatchesService {
  private readonly logger = new Logger(RetryPendingDispatchesService.name);
  private isRetrying = false;

  constructor(
    @Inject(UPLOAD_RECORD_STORE_PORT)
    private readonly store: UploadRecordStorePort,
    @Inject(DispatchDownstreamActionsService)
    private readonly dispatchService: DispatchDownstreamActionsService,
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  async retryPendingBatch(): Promise<RetryPendingDispatchesResult> {
    const result: RetryPendingDispatchesResult = { scanned: 0, leasedElsewhere: 0, dispatched: 0, failed: 0 };
    if (this.isRetrying) {
      return result;
    }

    this.isRetrying = true;
    try {
      const records = await this.store.findUploadedWithMissingActions(
        this.config.downstreamActions,
        this.config.dispatchRetryBatchSize,
        new Date().toISOString(),
      );

      for (const record of records) {
        result.scanned += 1;
        const dispatch = await this.dispatchService.claimAndDispatch(record);
        if (!dispatch) {
          result.leasedElsewhere += 1;
          continue;
        }
        result.dispatched += dispatch.dispatched.length;
        result.failed += dispatch.failed.length;
      }

      if (result.scanned > 0) {
        this.logger.log(JSON.stringify(createJsonLogEntry({
          level: result.failed > 0 ? 'warn' : 'info',
          service: 'upload-status-service',
          message: 'Dispatch retry batch finished.',
          correlationId: 'system',
          metadata: { ...result },
        })));
      }

      return result;
    } finally {
      this.isRetrying = false;
    }
  }
}
