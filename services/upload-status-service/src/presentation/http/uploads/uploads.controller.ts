import { Body, Controller, Get, Headers, Inject, Param, Post } from '@nestjs/common';
import { RequestUploadUseCase } from '../../../application/uploads/request-upload.use-case';
import type { CreateUploadRequestBody } from './uploads.http-types';

@Controller()
export class UploadsController {
  constructor(
    @Inject(RequestUploadUseCase)
    private readonly requestUploadUseCase: RequestUploadUseCase,
  ) {}

  @Post('uploads')
  async createUpload(
    @Body() body: CreateUploadRequestBody | undefined,
    @Headers('x-correlation-id') correlationId?: string,
  ) {
    return this.requestUploadUseCase.execute({
      objectKey: body?.objectKey,
      fileName: body?.fileName,
      contentType: body?.contentType,
      correlationId,
    });
  }

  @Get('uploads/:recordId')
  async getUploadStatus(@Param('recordId') recordId: string) {
    return this.requestUploadUseCase.getUploadStatus(recordId);
  }
}
