export interface CreateUploadRequestBody {
  objectKey?: string;
  fileName?: string;
  contentType?: string;
}
