import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { createJsonLogEntry } from '@upload-reconciler/shared';
import { ExpireStaleUploadsUseCase } from '../../application/expiry/expire-stale-uploads.use-case';
import { UploadStatusServiceConfigService } from '../../infrastructure/config/upload-status-service-config.service';

@Injectable()
export class UploadExpirySweeperService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(UploadExpirySweeperService.name);
  private timer?: NodeJS.Timeout;
  private isSweeping = false;

  constructor(
    @Inject(ExpireStaleUploadsUseCase)
    private readonly expireStaleUploadsUseCase: ExpireStaleUploadsUseCase,
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  onModuleInit(): void {
    const intervalMs = this.config.expirySweepIntervalMs;
    this.timer = setInterval(() => {
      void this.runSweep();
    }, intervalMs);
    this.timer.unref();

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'upload-status-service',
      message: 'Upload expiry sweeper started.',
      correlationId: 'system',
      metadata: {
        intervalMs,
        graceMs: this.config.expiryGraceMs,
      },
    })));
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private async runSweep(): Promise<void> {
    if (this.isSweeping) {
      return;
    }

    this.isSweeping = true;
    try {
      const result = await this.expireStaleUploadsUseCase.execute(new Date().toISOString());
      if (result.expired > 0) {
        this.logger.log(JSON.stringify(createJsonLogEntry({
          level: 'info',
          service: 'upload-status-service',
          message: 'Upload expiry sweep expired pending uploads.',
          correlationId: 'system',
          metadata: {
            expired: result.expired,
          },
        })));
      }
    } catch (error) {
      this.logger.error(JSON.stringify(createJsonLogEntry({
        level: 'error',
        service: 'upload-status-service',
        message: 'Upload expiry sweep failed.',
        correlationId: 'system',
        error,
      })));
    } finally {
      this.isSweeping = false;
    }
  }
}
