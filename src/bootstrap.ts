import { Logger, RequestMethod, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import * as bodyParser from 'body-parser';
import cookieParser from 'cookie-parser';
import { Sequelize } from 'sequelize-typescript';
import { DomainExceptionFilter } from './common/filters/domain-exception.filter';
import { EnvironmentVariables } from './config/env.validation';
import { setupSwagger } from './config/swagger';

export const API_PREFIX = 'api/v1';

const logger = new Logger('Bootstrap');

export const parseAllowedOrigins = (raw: string): string[] | boolean => {
  const origins = raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  if (origins.length === 0 || origins.includes('*')) return true;
  return origins;
};

export async function bootstrapApp(app: NestExpressApplication) {
  const config = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);

  app.use(bodyParser.json({ limit: '1mb' }));
  app.use(bodyParser.urlencoded({ limit: '1mb', extended: true }));
  app.use(cookieParser());

  app.enableCors({
    origin: parseAllowedOrigins(config.get('ALLOWED_ORIGINS', { infer: true })),
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE',
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: false,
      transformOptions: {
        enableImplicitConversion: true,
      },
      validationError: {
        target: false,
      },
    }),
  );
  app.useGlobalFilters(new DomainExceptionFilter());

  app.setGlobalPrefix(API_PREFIX, {
    exclude: [
      { path: 'health', method: RequestMethod.GET },
      { path: 'health/ready', method: RequestMethod.GET },
      { path: 'health/live', method: RequestMethod.GET },
    ],
  });

  try {
    const sequelize = app.get(Sequelize);
    logger.log('🔗 Connecting to database...');
    await sequelize.authenticate();
    logger.log('✅ Database connected successfully.');
  } catch (error) {
    logger.error('❌ Database initialization failed', error instanceof Error ? error.stack : String(error));
    throw error;
  }

  setupSwagger(app, '/api/docs');
}
