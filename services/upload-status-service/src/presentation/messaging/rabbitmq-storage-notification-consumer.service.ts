import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import * as amqp from 'amqplib';
import {
  applyRabbitMqRetryPolicy,
  createRabbitMqConsumerJsonLogLine,
  type RabbitMqConsumerChannelLike,
  type RabbitMqConsumerMessageLike,
} from '@upload-reconciler/shared';
import { HandleStorageNotificationUseCase } from '../../application/reconciliation/handle-storage-notification.use-case';
import { MalformedEventError } from '../../domain/reconciliation/storage-notification';
import { UploadStatusServiceConfigService } from '../../infrastructure/config/upload-status-service-config.service';

const SERVICE_NAME = 'upload-status-service';

@Injectable()
export class RabbitMqStorageNotificationConsumerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RabbitMqStorageNotificationConsumerService.name);
  private readonly inFlight = new Set<Promise<void>>();
  private connection?: amqp.ChannelModel;
  private channel?: amqp.Channel;
  private consumerTag?: string;

  constructor(
    @Inject(HandleStorageNotificationUseCase)
    private readonly handleStorageNotificationUseCase: HandleStorageNotificationUseCase,
    @Inject(UploadStatusServiceConfigService)
    private readonly config: UploadStatusServiceConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.startConsumer();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stopConsumer();
  }

  private async startConsumer(): Promise<void> {
    const queue = this.config.notificationQueue;
    const prefetch = this.config.notificationPrefetch;

    const connection = await amqp.connect(this.config.rabbitmqUrl);
    const channel = await connection.createChannel();

    connection.on('error', (error: unknown) => {
      this.logger.error(this.systemLogLine('error', 'AMQP connection error in storage notification consumer.', error));
    });
    connection.on('close', () => {
      this.logger.warn(this.systemLogLine('warn', 'AMQP connection closed for storage notification consumer.'));
    });
    channel.on('error', (error: unknown) => {
      this.logger.error(this.systemLogLine('error', 'AMQP channel error in storage notification consumer.', error));
    });
    channel.on('close', () => {
      this.logger.warn(this.systemLogLine('warn', 'AMQP channel closed for storage notification consumer.'));
    });

    await channel.checkQueue(queue);
    await channel.prefetch(prefetch);

    const consumed = await channel.consume(queue, (message) => {
      if (!message) {
        return;
      }
      this.track(this.handleMessage(channel, message).catch((error: unknown) => {
        this.logger.error(this.systemLogLine('error', 'Storage notification could not be settled on the channel.', error));
      }));
    });

    this.connection = connection;
    this.channel = channel;
    this.consumerTag = consumed.consumerTag;
    this.logger.log(this.systemLogLine(
      'info',
      `Consuming storage notifications from queue "${queue}" with prefetch=${prefetch}.`,
    ));
  }

  private track(work: Promise<void>): void {
    this.inFlight.add(work);
    void work.finally(() => {
      this.inFlight.delete(work);
    });
  }

  /**
   * Settles one delivery: ack once handled, park malformed bodies at once,
   * and dead-letter other failures for retry until the attempt limit.
   */
  async handleMessage(channel: RabbitMqConsumerChannelLike, message: RabbitMqConsumerMessageLike): Promise<void> {
    const queue = this.config.notificationQueue;

    try {
      const handled = await this.handleStorageNotificationUseCase.execute(message.content);
      channel.ack(message);

      this.logger.log(createRabbitMqConsumerJsonLogLine({
        level: 'info',
        service: SERVICE_NAME,
        message: 'Storage notification handled.',
        queue,
        amqpMessage: message,
        metadata: {
          events: handled.normalization.events.length,
          discarded: handled.normalization.discarded.map((item) => item.reason),
          outcomes: handled.outcomes.map(({ outcome }) => outcome.kind),
        },
      }));
    } catch (error) {
      const malformed = error instanceof MalformedEventError;
      const decision = applyRabbitMqRetryPolicy({
        channel,
        message,
        queue,
        maxDeliveryAttempts: this.config.notificationMaxDeliveryAttempts,
        parkingReason: malformed ? 'malformed-storage-event' : 'processing-error',
        parkImmediately: malformed,
      });

      this.logger.error(createRabbitMqConsumerJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: malformed
          ? 'Malformed storage notification parked in DLQ.'
          : decision.action === 'parked'
            ? 'Failed to reconcile storage notification; parked in DLQ after retry limit.'
            : 'Failed to reconcile storage notification; sent to retry.',
        queue,
        amqpMessage: message,
        error,
        metadata: {
          retryAction: decision.action,
          deliveryAttempt: decision.deliveryAttempt,
          maxDeliveryAttempts: decision.maxDeliveryAttempts,
          ...(error instanceof MalformedEventError ? { details: error.details } : {}),
        },
      }));
    }
  }

  private async stopConsumer(): Promise<void> {
    const channel = this.channel;
    const connection = this.connection;
    const consumerTag = this.consumerTag;

    this.channel = undefined;
    this.connection = undefined;
    this.consumerTag = undefined;

    if (channel && consumerTag) {
      await this.closeQuietly('cancel consumer', () => channel.cancel(consumerTag));
    }

    await this.drainInFlight(this.config.shutdownGraceMs);

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
      this.logger.warn(this.systemLogLine('warn', `Storage notification consumer could not ${step} on shutdown.`, error));
    }
  }

  private async drainInFlight(graceMs: number): Promise<void> {
    if (this.inFlight.size === 0) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), graceMs);
    });

    const result = await Promise.race([
      Promise.allSettled(Array.from(this.inFlight)).then(() => 'drained' as const),
      graceElapsed,
    ]);
    if (timer) {
      clearTimeout(timer);
    }

    if (result === 'timeout') {
      this.logger.warn(this.systemLogLine(
        'warn',
        'Shutdown grace period elapsed with storage notifications still in flight; they will be redelivered.',
        undefined,
        { inFlight: this.inFlight.size, graceMs },
      ));
    }
  }

  private systemLogLine(
    level: 'info' | 'warn' | 'error',
    message: string,
    error?: unknown,
    metadata?: Record<string, unknown>,
  ): string {
    return createRabbitMqConsumerJsonLogLine({
      level,
      service: SERVICE_NAME,
      message,
      queue: this.config.notificationQueue,
      correlationId: 'system',
      error,
      metadata,
    });
  }
}
