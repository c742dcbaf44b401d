import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { createJsonLogEntry } from '@upload-reconciler/shared';
import { RetryPendingDispatchesService } from '../../application/reconciliation/retry-pending-dispatches.service';
import { UploadStatusServiceConfigService } from '../../infrastructure/config/upload-status-service-config.service';

@Injectable()
export class PendingDispatchPollerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PendingDispatchPollerService.name);
  private timer?: NodeJS.Timeout;

  constructor(
    @Inject(RetryPendingDispatchesService)
    private readonly retryPendingDispatchesService: RetryPendingDispatchesService,
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  onModuleInit(): void {
    const intervalMs = this.config.dispatchRetryIntervalMs;
    this.timer = setInterval(() => {
      void this.safeRetryPendingBatch();
    }, intervalMs);
    this.timer.unref();

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'upload-status-service',
      message: 'Pending dispatch poller started.',
      correlationId: 'system',
      metadata: {
        intervalMs,
        batchSize: this.config.dispatchRetryBatchSize,
      },
    })));
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private async safeRetryPendingBatch(): Promise<void> {
    try {
      await this.retryPendingDispatchesService.retryPendingBatch();
    } catch (error) {
      this.logger.error(JSON.stringify(createJsonLogEntry({
        level: 'error',
        service: 'upload-status-service',
        message: 'Pending dispatch polling loop error.',
        correlationId: 'system',
        error,
      })));
    }
  }
}
