import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { once } from 'node:events';
import * as amqp from 'amqplib';
import {
  createEnvelope,
  createJsonLogEntry,
  uploadActionMessageId,
  uploadActionRoutingKey,
  type DomainEventV1,
} from '@upload-reconciler/shared';
import type {
  DownstreamActionMessage,
  DownstreamDispatcherPort,
} from '../../application/reconciliation/ports/downstream-dispatcher.port';
import type { DownstreamAction } from '../../domain/uploads/upload-record';
import { UploadStatusServiceConfigService } from '../config/upload-status-service-config.service';

const SERVICE_NAME = 'upload-status-service';

/** Publishes UploadActionRequested.v1; the broker confirm is the acknowledgement. */
@Injectable()
export class RabbitMqDownstreamDispatcherAdapter implements DownstreamDispatcherPort, OnModuleDestroy {
  private readonly logger = new Logger(RabbitMqDownstreamDispatcherAdapter.name);
  private connection?: amqp.ChannelModel;
  private channel?: amqp.ConfirmChannel;
  private channelPromise?: Promise<amqp.ConfirmChannel>;

  constructor(
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  async dispatch(action: DownstreamAction, message: DownstreamActionMessage): Promise<void> {
    const exchange = this.config.rabbitmqEventsExchange;
    const routingKey = uploadActionRoutingKey(action);
    const envelope: DomainEventV1<'UploadActionRequested.v1'> = createEnvelope({
      messageId: uploadActionMessageId(message.recordId, action),
      type: 'UploadActionRequested.v1',
      producer: SERVICE_NAME,
      correlationId: message.correlationId,
      causationId: message.recordId,
      payload: {
        recordId: message.recordId,
        objectKey: message.objectKey,
        uploadedAt: message.uploadedAt,
        action,
        bucket: message.bucket,
        ...(message.sizeBytes === undefined ? {} : { sizeBytes: message.sizeBytes }),
        ...(message.eTag === undefined ? {} : { eTag: message.eTag }),
      },
    });

    const channel = await this.getChannel(exchange);
    const published = channel.publish(exchange, routingKey, Buffer.from(JSON.stringify(envelope)), {
      contentType: 'application/json',
      contentEncoding: 'utf-8',
      deliveryMode: 2,
      timestamp: Date.now(),
      messageId: envelope.messageId,
      type: envelope.type,
      correlationId: envelope.correlationId,
      headers: {
        kind: envelope.kind,
        producer: envelope.producer,
        version: envelope.version,
        action,
      },
    });

    if (!published) {
      await once(channel, 'drain');
    }

    await channel.waitForConfirms();
  }

  async onModuleDestroy(): Promise<void> {
    const channel = this.channel;
    const connection = this.connection;
    this.channel = undefined;
    this.connection = undefined;

    if (channel) {
      await this.closeQuietly('close channel', () => channel.close());
    }
    if (connection) {
      await this.closeQuietly('close connection', () => connection.close());
    }
  }

  private async closeQuietly(step: string, close: () => Promise<unknown>): Promise<void> {
    try {
      await close();
    } catch (error) {
      this.logConnectionEvent('warn', `Downstream dispatcher could not ${step} on shutdown.`, error);
    }
  }

  private async getChannel(exchange: string): Promise<amqp.ConfirmChannel> {
    if (this.channel) {
      return this.channel;
    }

    if (!this.channelPromise) {
      this.channelPromise = this.createChannel(exchange);
    }

    try {
      return await this.channelPromise;
    } finally {
      this.channelPromise = undefined;
    }
  }

  private async createChannel(exchange: string): Promise<amqp.ConfirmChannel> {
    const connection = await amqp.connect(this.config.rabbitmqUrl);
    const channel = await connection.createConfirmChannel();

    connection.on('error', (error: unknown) => {
      this.logConnectionEvent('error', 'AMQP connection error in downstream dispatcher.', error);
      this.connection = undefined;
      this.channel = undefined;
    });
    connection.on('close', () => {
      this.logConnectionEvent('warn', 'AMQP connection closed for downstream dispatcher.');
      this.connection = undefined;
      this.channel = undefined;
    });

    channel.on('error', (error: unknown) => {
      this.logConnectionEvent('error', 'AMQP channel error in downstream dispatcher.', error);
      this.channel = undefined;
    });
    channel.on('close', () => {
      this.logConnectionEvent('warn', 'AMQP channel closed for downstream dispatcher.');
      this.channel = undefined;
    });

    await channel.assertExchange(exchange, 'topic', { durable: true });

    this.connection = connection;
    this.channel = channel;
    return channel;
  }

  private logConnectionEvent(level: 'warn' | 'error', message: string, error?: unknown): void {
    const line = JSON.stringify(createJsonLogEntry({
      level,
      service: SERVICE_NAME,
      message,
      correlationId: 'system',
      error,
    }));

    if (level === 'error') {
      this.logger.error(line);
    } else {
      this.logger.warn(line);
    }
  }
}
