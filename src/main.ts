import 'reflect-metadata';
import { ConsoleLogger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { APP_OPTIONS, configureApp } from './app.setup';
import {
  ConfigurationService,
  DEFAULT_PORT,
  resolveLogLevels,
} from './modules';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    ...APP_OPTIONS,
    bufferLogs: true,
  });

  const { logLevel = 'INFO' } = app.get(ConfigurationService).getConfig();
  const logger = new ConsoleLogger({
    json: true,
    logLevels: resolveLogLevels(logLevel),
  });
  app.useLogger(logger);

  configureApp(app);

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Webhook Inbox')
    .setDescription(
      'Signed message webhooks stored once per message_id, with listing, statistics and operational probes.',
    )
    .setVersion('0.1.0')
    .addTag('Ingest', 'Receive signed message webhooks')
    .addTag('Query', 'List stored messages and aggregate statistics')
    .addTag('Health', 'Liveness, readiness and Prometheus metrics')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = app.get(ConfigService).get<string>('PORT') ?? String(DEFAULT_PORT);
  await app.listen(port);
  logger.log(`Webhook inbox listening on port ${port}; OpenAPI docs at /api`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  new ConsoleLogger({ json: true }).fatal(
    error instanceof Error ? error.stack ?? error.message : String(error),
    'Bootstrap',
  );
  process.exit(1);
});
