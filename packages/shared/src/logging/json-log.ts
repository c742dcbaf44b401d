export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  stack?: string;
  cause?: SerializedError;
}

/** Optional fields that tie a log line to a message, a queue or an upload record. */
export interface JsonLogTraceFields {
  causationId?: string;
  messageId?: string;
  messageType?: string;
  routingKey?: string;
  queue?: string;
  recordId?: string;
  objectKey?: string;
}

export interface JsonLogEntry extends JsonLogTraceFields {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  correlationId: string;
  metadata?: Record<string, unknown>;
  error?: SerializedError;
}

export interface CreateJsonLogEntryInput extends JsonLogTraceFields {
  level: LogLevel;
  service: string;
  message: string;
  correlationId: string;
  metadata?: Record<string, unknown>;
  error?: unknown;
  timestamp?: string;
}

const TRACE_FIELDS = [
  'causationId',
  'messageId',
  'messageType',
  'routingKey',
  'queue',
  'recordId',
  'objectKey',
] as const satisfies ReadonlyArray<keyof JsonLogTraceFields>;

const MAX_CAUSE_DEPTH = 3;

export function serializeError(error: unknown, depth = 0): SerializedError | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }

  if (typeof error === 'string') {
    return { name: 'Error', message: error };
  }

  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: stringifyUnknown(error) };
  }

  const serialized: SerializedError = { name: error.name, message: error.message };

  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string') {
    serialized.code = code;
  }
  if (error.stack) {
    serialized.stack = error.stack;
  }

  // pg and amqplib failures arrive wrapped; keep the driver error visible.
  const cause = depth < MAX_CAUSE_DEPTH ? serializeError(error.cause, depth + 1) : undefined;
  if (cause) {
    serialized.cause = cause;
  }

  return serialized;
}

function stringifyUnknown(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/** Builds one log line's fields, leaving out every trace field that is not set. */
export function createJsonLogEntry(input: CreateJsonLogEntryInput): JsonLogEntry {
  const { timestamp, error, metadata, ...rest } = input;
  const entry: JsonLogEntry = {
    timestamp: timestamp ?? new Date().toISOString(),
    level: rest.level,
    service: rest.service,
    message: rest.message,
    correlationId: rest.correlationId,
  };

  for (const key of TRACE_FIELDS) {
    const value = rest[key];
    if (value !== undefined) {
      entry[key] = value;
    }
  }

  if (metadata && Object.keys(metadata).length > 0) {
    entry.metadata = metadata;
  }

  const serializedError = serializeError(error);
  if (serializedError) {
    entry.error = serializedError;
  }

  return entry;
}
