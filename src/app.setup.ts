import { NestApplicationOptions } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';

export const MAX_BODY_SIZE = '1mb';

/**
 * Options for NestFactory.create: Express must not parse bodies itself,
 * the raw parser installed by configureApp does.
 */
export const APP_OPTIONS = {
  bodyParser: false,
  rawBody: true,
} satisfies NestApplicationOptions;

/**
 * HTTP wiring shared by main.ts and the HTTP tests.
 *
 * Every body stays a Buffer so signatures are checked over the exact bytes
 * received, whatever the declared content type.
 */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  app.useBodyParser('raw', { type: '*/*', limit: MAX_BODY_SIZE });
  app.enableShutdownHooks();
  return app;
}
