import { randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

export function ensureCorrelationId(correlationId?: string): string {
  const trimmed = correlationId?.trim();
  return trimmed ? trimmed : generateId();
}
