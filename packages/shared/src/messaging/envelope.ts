/**
 * Wire shape of every event this system publishes. `messageId` is chosen by
 * the producer and is stable across republishes of the same fact.
 */
export interface EventEnvelope<TPayload = unknown, TType extends string = string> {
  messageId: string;
  kind: 'event';
  type: TType;
  occurredAt: string;
  correlationId: string;
  causationId?: string;
  producer: string;
  version: number;
  payload: TPayload;
}

export interface CreateEnvelopeInput<TPayload, TType extends string> {
  messageId: string;
  type: TType;
  producer: string;
  payload: TPayload;
  correlationId: string;
  causationId?: string;
  occurredAt?: string;
  version?: number;
}

export function createEnvelope<TPayload, TType extends string>(
  input: CreateEnvelopeInput<TPayload, TType>,
): EventEnvelope<TPayload, TType> {
  return {
    messageId: input.messageId,
    kind: 'event',
    type: input.type,
    producer: input.producer,
    payload: input.payload,
    correlationId: input.correlationId,
    ...(input.causationId === undefined ? {} : { causationId: input.causationId }),
    occurredAt: input.occurredAt ?? new Date().toISOString(),
    version: input.version ?? 1,
  };
}

/** Structural check for envelopes read back from a queue or a fixture; the payload stays unknown. */
export function isEventEnvelope(value: unknown): value is EventEnvelope {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const field = (key: string): unknown => Reflect.get(value, key);
  const occurredAt = field('occurredAt');

  return (
    field('kind') === 'event' &&
    typeof field('messageId') === 'string' &&
    typeof field('type') === 'string' &&
    typeof field('producer') === 'string' &&
    typeof field('correlationId') === 'string' &&
    typeof occurredAt === 'string' &&
    Number.isFinite(Date.parse(occurredAt)) &&
    Number.isInteger(field('version')) &&
    typeof field('payload') === 'object' &&
    field('payload') !== null
  );
}
