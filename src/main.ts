import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { getPort } from './infra/config/env.config';

/**
 * Bootstrap the NestJS application with validation and Swagger documentation.
 */
async function bootstrap() {
  const app = configureApp(await NestFactory.create<NestExpressApplication>(AppModule, { bodyParser: false }));

  const config = new DocumentBuilder()
    .setTitle('Game Server Factory API')
    .setDescription('Builds sandboxed game servers from user code and tracks live servers for matchmaking.')
    .setVersion('1.0')
    .addTag('servers', 'Provision, inspect, stop and remove game servers')
    .addTag('system', 'Resource usage against admission limits')
    .addTag('matchmaker', 'Game server registration, heartbeat and discovery')
    .addTag('health', 'Health check')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = getPort();
  await app.listen(port);
  new Logger('Bootstrap').log(`Listening on ${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
