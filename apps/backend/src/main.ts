import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { LoggerService } from './common/logger';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });
  app.useLogger(await app.resolve(LoggerService));
  configureApp(app);

  const port = Number(app.get(ConfigService).get<string>('PORT') || '3000');
  await app.listen(port);
  Logger.log(`Grading API listening on ${await app.getUrl()}`);
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start the grading API', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
