import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ExpireStaleUploadsUseCase } from './application/expiry/expire-stale-uploads.use-case';
import { DispatchDownstreamActionsService } from './application/reconciliation/dispatch-downstream-actions.service';
import { HandleStorageNotificationUseCase } from './application/reconciliation/handle-storage-notification.use-case';
import { DOWNSTREAM_DISPATCHER_PORT } from './application/reconciliation/ports/downstream-dispatcher.port';
import { PROCESSED_NOTIFICATIONS_PORT } from './application/reconciliation/ports/processed-notifications.port';
import { ReconcileStorageEventUseCase } from './application/reconciliation/reconcile-storage-event.use-case';
import { RetryPendingDispatchesService } from './application/reconciliation/retry-pending-dispatches.service';
import { ServiceInfoQuery } from './application/system/service-info.query';
import { UPLOAD_AUTHORIZATION_ISSUER_PORT } from './application/uploads/ports/upload-authorization-issuer.port';
import { UPLOAD_RECORD_STORE_PORT } from './application/uploads/ports/upload-record-store.port';
import { RequestUploadUseCase } from './application/uploads/request-upload.use-case';
import {
  UPLOAD_STATUS_SERVICE_ENV_FILE_PATHS,
  UploadStatusServiceConfigService,
  validateUploadStatusServiceEnvironment,
} from './infrastructure/config/upload-status-service-config.service';
import { RabbitMqDownstreamDispatcherAdapter } from './infrastructure/messaging/rabbitmq-downstream-dispatcher.adapter';
import { InMemoryProcessedNotificationsAdapter } from './infrastructure/persistence/in-memory-processed-notifications.adapter';
import { InMemoryUploadRecordStore } from './infrastructure/persistence/in-memory-upload-record.store';
import { UploadStatusPostgresPool } from './infrastructure/persistence/postgres-pool';
import { PostgresProcessedNotificationsAdapter } from './infrastructure/persistence/postgres-processed-notifications.adapter';
import { PostgresUploadRecordStore } from './infrastructure/persistence/postgres-upload-record.store';
import { MinioUploadAuthorizationIssuerAdapter } from './infrastructure/storage/minio-upload-authorization-issuer.adapter';
import { RabbitMqStorageNotificationConsumerService } from './presentation/messaging/rabbitmq-storage-notification-consumer.service';
import { AppController } from './presentation/http/system/app.controller';
import { UploadsController } from './presentation/http/uploads/uploads.controller';
import { PendingDispatchPollerService } from './presentation/workers/pending-dispatch-poller.service';
import { UploadExpirySweeperService } from './presentation/workers/upload-expiry-sweeper.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: UPLOAD_STATUS_SERVICE_ENV_FILE_PATHS,
      validate: validateUploadStatusServiceEnvironment,
    }),
  ],
  controllers: [AppController, UploadsController],
  providers: [
    UploadStatusServiceConfigService,
    ServiceInfoQuery,
    UploadStatusPostgresPool,
    {
      provide: UPLOAD_RECORD_STORE_PORT,
      inject: [UploadStatusServiceConfigService, UploadStatusPostgresPool],
      useFactory: (config: UploadStatusServiceConfigService, database: UploadStatusPostgresPool) =>
        config.storeDriver === 'memory' ? new InMemoryUploadRecordStore() : new PostgresUploadRecordStore(database),
    },
    {
      provide: PROCESSED_NOTIFICATIONS_PORT,
      inject: [UploadStatusServiceConfigService, UploadStatusPostgresPool],
      useFactory: (config: UploadStatusServiceConfigService, database: UploadStatusPostgresPool) =>
        config.storeDriver === 'memory'
          ? new InMemoryProcessedNotificationsAdapter()
          : new PostgresProcessedNotificationsAdapter(database),
    },
    MinioUploadAuthorizationIssuerAdapter,
    {
      provide: UPLOAD_AUTHORIZATION_ISSUER_PORT,
      useExisting: MinioUploadAuthorizationIssuerAdapter,
    },
    RabbitMqDownstreamDispatcherAdapter,
    {
      provide: DOWNSTREAM_DISPATCHER_PORT,
      useExisting: RabbitMqDownstreamDispatcherAdapter,
    },
    RequestUploadUseCase,
    DispatchDownstreamActionsService,
    ReconcileStorageEventUseCase,
    HandleStorageNotificationUseCase,
    RetryPendingDispatchesService,
    ExpireStaleUploadsUseCase,
    RabbitMqStorageNotificationConsumerService,
    PendingDispatchPollerService,
    UploadExpirySweeperService,
  ],
})
export class AppModule {}
