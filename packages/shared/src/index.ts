export * from './standards.js';
export * from './logging/json-log.js';
export * from './messaging/contracts.js';
export * from './messaging/envelope.js';
export * from './messaging/ids.js';
export * from './messaging/naming.js';
export * from './messaging/rabbitmq-consumer.js';
