import { Global, Module } from '@nestjs/common';
import { LokiLoggerService, LOKI_HOST } from './loki-logger.service';
import { LOGGER_SERVICE } from '../../types';

@Global()
@Module({
  providers: [
    {
      provide: 'JOB_NAME',
      useValue: process.env.JOB_NAME || 'business-law-advisor',
    },
    {
      provide: 'APP_NAME',
      useValue: process.env.APP_NAME || 'bizlaw',
    },
    {
      provide: LOKI_HOST,
      useValue: process.env.LOKI_HOST || null,
    },
    LokiLoggerService,
    {
      provide: LOGGER_SERVICE,
      useExisting: LokiLoggerService,
    },
  ],
  exports: [
    LOGGER_SERVICE, // main abstraction
    LokiLoggerService, // app.useLogger() in main.ts
    'JOB_NAME',
    'APP_NAME',
  ],
})
export class LoggingModule {}
