import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { createJsonLogEntry, generateId } from '@upload-reconciler/shared';

interface HttpRequestLike {
  headers: Record<string, string | string[] | undefined>;
  originalUrl?: string;
  url?: string;
  method: string;
}

interface HttpResponseLike {
  setHeader(name: string, value: string): void;
  status(code: number): HttpResponseLike;
  json(body: unknown): void;
}

export interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
  statusCode: number;
  path: string;
  method: string;
  timestamp: string;
  correlationId: string;
}

interface NormalizedHttpError {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<HttpRequestLike>();
    const response = ctx.getResponse<HttpResponseLike>();

    const correlationId = this.getCorrelationId(request);
    const normalized = this.normalizeException(exception);
    const body: ErrorResponseBody = {
      error: {
        code: normalized.code,
        message: normalized.message,
        ...(normalized.details === undefined ? {} : { details: normalized.details }),
      },
      statusCode: normalized.statusCode,
      path: request.originalUrl ?? request.url ?? '/',
      method: request.method,
      timestamp: new Date().toISOString(),
      correlationId,
    };

    response.setHeader('x-correlation-id', correlationId);
    response.status(normalized.statusCode).json(body);

    const level = normalized.statusCode >= 500 ? 'error' : 'warn';
    const logLine = JSON.stringify(createJsonLogEntry({
      level,
      service: 'upload-status-service',
      message: 'HTTP request failed.',
      correlationId,
      metadata: {
        method: body.method,
        path: body.path,
        statusCode: body.statusCode,
        errorCode: body.error.code,
      },
      error: normalized.statusCode >= 500 ? exception : undefined,
    }));

    if (level === 'error') {
      this.logger.error(logLine);
    } else {
      this.logger.warn(logLine);
    }
  }

  private getCorrelationId(request: HttpRequestLike): string {
    const header = request.headers['x-correlation-id'];
    if (Array.isArray(header) && header[0]?.trim()) {
      return header[0].trim();
    }
    if (typeof header === 'string' && header.trim()) {
      return header.trim();
    }
    return generateId();
  }

  private normalizeException(exception: unknown): NormalizedHttpError {
    if (!(exception instanceof HttpException)) {
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        code: 'INTERNAL_SERVER_ERROR',
        message: 'Unexpected server error.',
      };
    }

    const statusCode = exception.getStatus();
    const response = exception.getResponse();

    if (typeof response === 'string') {
      return {
        statusCode,
        code: defaultCodeForStatus(statusCode),
        message: response,
      };
    }

    if (!isRecord(response)) {
      return {
        statusCode,
        code: defaultCodeForStatus(statusCode),
        message: exception.message || 'Request failed.',
      };
    }

    const message = extractMessage(response.message) ?? (exception.message || 'Request failed.');
    const code = typeof response.errorCode === 'string'
      ? response.errorCode
      : defaultCodeForStatus(statusCode);
    const details = response.details ?? (Array.isArray(response.message) ? response.message : undefined);

    return { statusCode, code, message, details };
  }
}

function extractMessage(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) {
    return value;
  }
  if (Array.isArray(value)) {
    const first: unknown = value.find((item) => typeof item === 'string' && item.trim());
    if (typeof first === 'string') {
      return first;
    }
  }
  return undefined;
}

function defaultCodeForStatus(statusCode: number): string {
  switch (statusCode) {
    case HttpStatus.BAD_REQUEST:
      return 'BAD_REQUEST';
    case HttpStatus.NOT_FOUND:
      return 'NOT_FOUND';
    case HttpStatus.CONFLICT:
      return 'CONFLICT';
    case HttpStatus.UNPROCESSABLE_ENTITY:
      return 'UNPROCESSABLE_ENTITY';
    default:
      return statusCode >= 500 ? 'INTERNAL_SERVER_ERROR' : 'HTTP_ERROR';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
