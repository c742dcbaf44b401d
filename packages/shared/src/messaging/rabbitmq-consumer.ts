import { createJsonLogEntry, type LogLevel } from '../logging/json-log.js';
import { buildDlqExchangeName } from './naming.js';

export interface RabbitMqConsumerMessageLike {
  content: Buffer;
  fields: {
    routingKey?: unknown;
  };
  properties: {
    messageId?: unknown;
    correlationId?: unknown;
    type?: unknown;
    headers?: unknown;
  };
}

export interface RabbitMqConsumerChannelLike {
  ack(message: unknown, allUpTo?: boolean): unknown;
  nack(message: unknown, allUpTo?: boolean, requeue?: boolean): unknown;
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options?: unknown,
  ): boolean;
}

export interface RetryPolicyDecision {
  action: 'retry' | 'parked';
  queue: string;
  deliveryAttempt: number;
  maxDeliveryAttempts: number;
  dlqExchange?: string;
  dlqRoutingKey?: string;
}

export interface ApplyRetryPolicyInput {
  channel: RabbitMqConsumerChannelLike;
  message: RabbitMqConsumerMessageLike;
  queue: string;
  maxDeliveryAttempts?: number;
  dlqRoutingKey?: string;
  parkingReason?: string;
  /** Skip the retry budget: the message can never succeed. */
  parkImmediately?: boolean;
}

const DEFAULT_MAX_DELIVERY_ATTEMPTS = 3;
const DEFAULT_DLQ_ROUTING_KEY = 'parking';

export function applyRabbitMqRetryPolicy(input: ApplyRetryPolicyInput): RetryPolicyDecision {
  const maxDeliveryAttempts = input.maxDeliveryAttempts ?? DEFAULT_MAX_DELIVERY_ATTEMPTS;
  const deliveryAttempt = getRabbitMqDeliveryAttempt(input.message, input.queue);

  if (!input.parkImmediately && deliveryAttempt < maxDeliveryAttempts) {
    input.channel.nack(input.message, false, false);
    return {
      action: 'retry',
      queue: input.queue,
      deliveryAttempt,
      maxDeliveryAttempts,
    };
  }

  const dlqExchange = buildDlqExchangeName(input.queue);
  const dlqRoutingKey = input.dlqRoutingKey ?? DEFAULT_DLQ_ROUTING_KEY;

  const headers = copyHeaders(input.message.properties.headers);
  headers['x-parked-at'] = new Date().toISOString();
  headers['x-parked-from-queue'] = input.queue;
  headers['x-parked-delivery-attempt'] = deliveryAttempt;
  if (input.parkingReason) {
    headers['x-parked-reason'] = input.parkingReason;
  }

  const publishOptions = {
    ...input.message.properties,
    headers,
  };

  input.channel.publish(dlqExchange, dlqRoutingKey, input.message.content, publishOptions);
  input.channel.ack(input.message);

  return {
    action: 'parked',
    queue: input.queue,
    deliveryAttempt,
    maxDeliveryAttempts,
    dlqExchange,
    dlqRoutingKey,
  };
}

export function getRabbitMqDeliveryAttempt(
  message: RabbitMqConsumerMessageLike,
  queue: string,
): number {
  return getRabbitMqQueueDeadLetterCount(message, queue) + 1;
}

export function getRabbitMqQueueDeadLetterCount(
  message: RabbitMqConsumerMessageLike,
  queue: string,
): number {
  const headers = isRecord(message.properties?.headers) ? message.properties.headers : undefined;
  const raw = headers?.['x-death'];
  if (!Array.isArray(raw)) {
    return 0;
  }

  let total = 0;

  for (const item of raw) {
    if (!isRecord(item)) {
      continue;
    }

    const queueName = typeof item.queue === 'string' ? item.queue : undefined;
    if (queueName !== queue) {
      continue;
    }

    total += toSafePositiveInt(item.count);
  }

  return total;
}

export function createRabbitMqConsumerJsonLogLine(input: {
  level: LogLevel;
  service: string;
  message: string;
  queue: string;
  amqpMessage?: RabbitMqConsumerMessageLike;
  correlationId?: string;
  recordId?: string;
  objectKey?: string;
  error?: unknown;
  metadata?: Record<string, unknown>;
}): string {
  const amqpFields = input.amqpMessage
    ? {
        routingKey: optionalString(input.amqpMessage.fields.routingKey),
        messageId: optionalString(input.amqpMessage.properties.messageId),
        correlationId: optionalString(input.amqpMessage.properties.correlationId),
        messageType: optionalString(input.amqpMessage.properties.type),
      }
    : {};

  return JSON.stringify(
    createJsonLogEntry({
      level: input.level,
      service: input.service,
      message: input.message,
      correlationId: input.correlationId ?? amqpFields.correlationId ?? 'unknown',
      messageId: amqpFields.messageId,
      messageType: amqpFields.messageType,
      routingKey: amqpFields.routingKey,
      queue: input.queue,
      recordId: input.recordId,
      objectKey: input.objectKey,
      metadata: input.metadata,
      error: input.error,
    }),
  );
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function copyHeaders(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    return {};
  }
  return { ...value };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSafePositiveInt(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    return Math.trunc(value);
  }

  if (typeof value === 'bigint' && value > 0n) {
    return Number(value);
  }

  const parsed = Number.parseInt(String(value ?? ''), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return 0;
  }

  return Math.trunc(parsed);
}
