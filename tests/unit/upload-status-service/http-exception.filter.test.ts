import test from 'node:test';
import assert from 'node:assert/strict';
import { BadRequestException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { UploadConflictError } from '../../../services/upload-status-service/src/application/uploads/upload-intake.errors';
import {
  HttpExceptionFilter,
  type ErrorResponseBody,
} from '../../../services/upload-status-service/src/presentation/http/common/http-exception.filter';

class FakeResponse {
  readonly headers = new Map<string, string>();
  statusCode?: number;
  body?: unknown;

  setHeader(name: string, value: string): void {
    this.headers.set(name, value);
  }

  status(code: number): FakeResponse {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): void {
    this.body = body;
  }
}

function runFilter(exception: unknown, headers: Record<string, string> = {}) {
  const request = { headers, originalUrl: '/uploads', method: 'POST' };
  const response = new FakeResponse();
  new HttpExceptionFilter().catch(exception, new ExecutionContextHost([request, response]));
  return response;
}

function errorOf(response: FakeResponse): ErrorResponseBody['error'] | undefined {
  const body = response.body;
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const error: unknown = Reflect.get(body, 'error');
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const code: unknown = Reflect.get(error, 'code');
  const message: unknown = Reflect.get(error, 'message');
  return {
    code: typeof code === 'string' ? code : '',
    message: typeof message === 'string' ? message : '',
    details: Reflect.get(error, 'details'),
  };
}

test('HttpExceptionFilter renders upload conflicts with their error code and details', () => {
  const response = runFilter(new UploadConflictError('uploads/42', 'rec-42'), { 'x-correlation-id': 'corr-9' });

  assert.equal(response.statusCode, 409);
  assert.equal(response.headers.get('x-correlation-id'), 'corr-9');
  assert.deepEqual(errorOf(response), {
    code: 'UPLOAD_KEY_CONFLICT',
    message: 'Object key "uploads/42" is already held by upload rec-42.',
    details: { objectKey: 'uploads/42', recordId: 'rec-42' },
  });
});

test('HttpExceptionFilter falls back to status-based codes for plain Nest exceptions', () => {
  const response = runFilter(new BadRequestException('objectKey is invalid.'));

  assert.equal(response.statusCode, 400);
  assert.deepEqual(errorOf(response), { code: 'BAD_REQUEST', message: 'objectKey is invalid.', details: undefined });
});

test('HttpExceptionFilter hides unexpected errors behind a 500 response', () => {
  const response = runFilter(new Error('pool exhausted'));

  assert.equal(response.statusCode, 500);
  assert.deepEqual(errorOf(response), {
    code: 'INTERNAL_SERVER_ERROR',
    message: 'Unexpected server error.',
    details: undefined,
  });
  assert.ok(response.headers.get('x-correlation-id'));
});
