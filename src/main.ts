#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AllConfigType } from './config/config.type';
import { DocumentExtractionService } from './document-extraction/document-extraction.service';
import { resolveLogLevels } from './utils/log-levels';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  const configService = app.get(ConfigService<AllConfigType>);

  app.useLogger(
    resolveLogLevels(configService.getOrThrow('app.logLevel', { infer: true })),
  );

  try {
    await app.get(DocumentExtractionService).run();
  } finally {
    await app.close();
  }
}
void bootstrap();
