export const MESSAGE_EXCHANGES = {
  events: 'domain.events',
} as const;

export const SERVICE_QUEUES = {
  storageNotifications: 'q.upload-status.notifications',
} as const;

/** Binding a subscriber queue needs to receive one downstream action on the events exchange. */
export function downstreamActionBindingPattern(action: string): string {
  return `uploads.actions.${action}.*`;
}

export const JSON_LOG_STANDARD = {
  format: 'json',
  requiredFields: ['timestamp', 'level', 'service', 'message', 'correlationId'],
  optionalTraceFields: [
    'causationId',
    'messageId',
    'messageType',
    'routingKey',
    'queue',
    'recordId',
    'objectKey',
    'error',
  ],
} as const;
