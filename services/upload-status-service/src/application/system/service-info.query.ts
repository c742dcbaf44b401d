import { Inject, Injectable } from '@nestjs/common';
import { UploadStatusServiceConfigService } from '../../infrastructure/config/upload-status-service-config.service';

@Injectable()
export class ServiceInfoQuery {
  constructor(
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  getInfo() {
    return {
      service: 'upload-status-service',
      kind: 'reconciliation-service',
      status: 'ok',
      store: this.config.storeDriver,
      timestamp: new Date().toISOString(),
    };
  }
}
