export const UPLOAD_AUTHORIZATION_ISSUER_PORT = Symbol('UPLOAD_AUTHORIZATION_ISSUER_PORT');

export type UploadOperation = 'put';

export interface IssueUploadCredentialInput {
  bucket: string;
  objectKey: string;
  operation: UploadOperation;
  ttlSeconds: number;
  contentType?: string;
}

export interface UploadCredential {
  method: 'PUT';
  url: string;
  expiresAt: string;
  requiredHeaders: Record<string, string>;
}

export interface UploadAuthorizationIssuerPort {
  issueCredential(input: IssueUploadCredentialInput): Promise<UploadCredential>;
}
