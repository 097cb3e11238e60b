import { ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { FACTORY_CONFIG, FactoryConfig } from './infra/config/env.config';
import { FactoryErrorFilter } from './infra/http/factory-error.filter';

/** Room for JSON escaping of the code plus the other request fields. */
const JSON_ESCAPE_FACTOR = 2;
const JSON_ENVELOPE_HEADROOM_BYTES = 64 * 1024;

/** Largest JSON body accepted; a maximum-size upload must fit. */
export function jsonBodyLimit(config: FactoryConfig): number {
  return config.maxCodeSizeBytes * JSON_ESCAPE_FACTOR + JSON_ENVELOPE_HEADROOM_BYTES;
}

/**
 * Body parser, global pipes and filters shared by main.ts and the e2e specs.
 * The app must be created with `bodyParser: false`.
 */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  app.useBodyParser('json', { limit: jsonBodyLimit(app.get<FactoryConfig>(FACTORY_CONFIG)) });
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new FactoryErrorFilter());
  app.enableShutdownHooks();
  return app;
}
