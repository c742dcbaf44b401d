import { Inject, Injectable } from '@nestjs/common';
import { Client } from 'minio';
import type {
  IssueUploadCredentialInput,
  UploadAuthorizationIssuerPort,
  UploadCredential,
} from '../../application/uploads/ports/upload-authorization-issuer.port';
import { UploadStatusServiceConfigService } from '../config/upload-status-service-config.service';

/** Signs PUT URLs locally; no request reaches the object store. */
@Injectable()
export class MinioUploadAuthorizationIssuerAdapter implements UploadAuthorizationIssuerPort {
  private readonly client: Client;

  constructor(@Inject(UploadStatusServiceConfigService) config: UploadStatusServiceConfigService) {
    this.client = new Client({
      endPoint: config.minioEndpoint,
      port: config.minioApiPort,
      useSSL: config.minioUseSsl,
      accessKey: config.minioRootUser,
      secretKey: config.minioRootPassword,
      region: config.s3Region,
    });
  }

  async issueCredential(input: IssueUploadCredentialInput): Promise<UploadCredential> {
    const issuedAt = Date.now();
    const url = await this.client.presignedPutObject(input.bucket, input.objectKey, input.ttlSeconds);

    return {
      method: 'PUT',
      url,
      expiresAt: new Date(issuedAt + input.ttlSeconds * 1000).toISOString(),
      requiredHeaders: input.contentType ? { 'content-type': input.contentType } : {},
    };
  }
}
