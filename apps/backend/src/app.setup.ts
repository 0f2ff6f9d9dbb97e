import { Logger, ValidationPipe } from '@nestjs/common';
import { CorsOptions } from '@nestjs/common/interfaces/external/cors-options.interface';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import helmet from 'helmet';
import { HttpExceptionFilter } from './common/filters';

const parseCorsOrigins = (rawValue: string | undefined): string[] =>
  (rawValue || '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

/** Credentials are only allowed for an explicit origin list. */
export const resolveCorsOptions = (rawValue: string | undefined): CorsOptions => {
  const corsOrigins = parseCorsOrigins(rawValue);
  if (corsOrigins.length === 0 || corsOrigins.includes('*')) {
    return { origin: '*', credentials: false };
  }
  return { origin: corsOrigins, credentials: true };
};

/** HTTP wiring shared by the server bootstrap and the end-to-end specs. */
export const configureApp = (app: NestExpressApplication) => {
  const configService = app.get(ConfigService);
  const corsOptions = resolveCorsOptions(configService.get<string>('CORS_ORIGIN'));

  app.use(helmet());
  app.set('trust proxy', 1);
  app.setGlobalPrefix('api');
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableCors(corsOptions);
  if (corsOptions.origin === '*') {
    Logger.warn('CORS_ORIGIN is unset or *, allowing all origins without credentials.');
  }
};
