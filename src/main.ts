import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { bootstrapApp } from './bootstrap';
import { EnvironmentVariables } from './config/env.validation';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  await bootstrapApp(app);
  app.enableShutdownHooks();

  const port = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService).get('PORT', { infer: true });
  await app.listen(port);

  const baseUrl = await app.getUrl();
  const logger = new Logger('Main');
  logger.log(`Application is running on: ${baseUrl}`);
  logger.log(`Swagger UI is available on: ${baseUrl}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Main').error('Application failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
