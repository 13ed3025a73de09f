import 'reflect-metadata';
import 'dotenv/config';
import { readFileSync } from 'fs';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { OpenAPIObject, SwaggerModule } from '@nestjs/swagger';
import yaml from 'js-yaml';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_CONFIG } from './config/app.constants';
import { loadAppConfig, type AppConfig } from './config/app.config';

async function bootstrap() {
  const { logLevels } = loadAppConfig();
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter(),
    { logger: logLevels },
  );
  const config = app.get<AppConfig>(APP_CONFIG);
  configureApp(app, config);

  const openApiPath = path.resolve(__dirname, '..', 'openapi', 'customers.yaml');
  const openApiDocument = yaml.load(
    readFileSync(openApiPath, 'utf8'),
  ) as OpenAPIObject;
  SwaggerModule.setup('/api/docs', app, openApiDocument);

  await app.listen(config.port, config.host);
  Logger.log(`Listening on ${config.host}:${config.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    'Failed to start the customer service',
    error instanceof Error ? error.stack : String(error),
    'Bootstrap',
  );
  process.exitCode = 1;
});
