import 'reflect-metadata';

import { ValidationPipe } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { advisorConfig } from './config/advisor.config';
import { LokiLoggerService } from './shared/lib/logging/loki-logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(LokiLoggerService));

  const config = app.get<ConfigType<typeof advisorConfig>>(advisorConfig.KEY);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  app.enableCors({
    origin: config.corsOrigins,
    methods: 'GET,HEAD,PUT,POST',
    credentials: true,
  });

  await app.listen(config.port);
}

void bootstrap();
