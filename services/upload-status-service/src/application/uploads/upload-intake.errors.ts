import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';

export class UploadConflictError extends ConflictException {
  constructor(
    readonly objectKey: string,
    readonly holderRecordId: string,
  ) {
    super({
      message: `Object key "${objectKey}" is already held by upload ${holderRecordId}.`,
      errorCode: 'UPLOAD_KEY_CONFLICT',
      details: { objectKey, recordId: holderRecordId },
    });
  }
}

export function invalidUploadRequest(message: string): BadRequestException {
  return new BadRequestException({ message, errorCode: 'INVALID_UPLOAD_REQUEST' });
}

export function uploadNotFound(recordId: string): NotFoundException {
  return new NotFoundException({ message: `Upload "${recordId}" not found.`, errorCode: 'UPLOAD_NOT_FOUND' });
}
