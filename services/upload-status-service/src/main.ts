import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { createJsonLogEntry } from '@upload-reconciler/shared';
import { AppModule } from './app.module';
import { UploadStatusServiceConfigService } from './infrastructure/config/upload-status-service-config.service';
import { HttpExceptionFilter } from './presentation/http/common/http-exception.filter';

const SERVICE_NAME = 'upload-status-service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();
  const config = app.get(UploadStatusServiceConfigService);
  const port = config.port;

  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(JSON.stringify(createJsonLogEntry({
    level: 'info',
    service: SERVICE_NAME,
    message: `${SERVICE_NAME} listening on port ${port}`,
    correlationId: 'system',
    metadata: {
      store: config.storeDriver,
      notificationQueue: config.notificationQueue,
    },
  })));
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(JSON.stringify(createJsonLogEntry({
    level: 'error',
    service: SERVICE_NAME,
    message: `Failed to start ${SERVICE_NAME}`,
    correlationId: 'system',
    error,
  })));
  process.exitCode = 1;
});
