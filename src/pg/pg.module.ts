// src/pg/pg.module.ts
import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Pool } from 'pg';

import { AiUsageRepository, PG_POOL } from './ai-usage.repository';
import { advisorConfig } from '../config/advisor.config';
import { LOGGER_SERVICE, type LoggerService } from '../shared/types';

@Module({
  providers: [
    {
      provide: PG_POOL,
      inject: [LOGGER_SERVICE, advisorConfig.KEY],
      useFactory: (
        logger: LoggerService,
        config: ConfigType<typeof advisorConfig>,
      ) => {
        const poolName = process.env.PG_POOL_NAME || logger.app;
        const poolId = `${poolName}-${process.pid}-${Math.random().toString(16).slice(2, 8)}`;

        // the pool connects lazily, so startup does not need a live database
        const pool = new Pool({
          host: config.pg.host,
          port: config.pg.port,
          database: config.pg.database,
          user: config.pg.user,
          password: config.pg.password,
          max: config.pg.poolMax,
          idleTimeoutMillis: +(process.env.PG_IDLE_TIMEOUT_MS || 30_000),
          connectionTimeoutMillis: +(process.env.PG_CONN_TIMEOUT_MS || 5_000),
        });

        void logger.log(
          `[PG] pool created id="${poolId}" name="${poolName}" pid=${process.pid} max=${config.pg.poolMax}`,
        );

        pool.on('remove', () => {
          void logger.debug(
            `[PG] remove id="${poolId}" total=${pool.totalCount} idle=${pool.idleCount} waiting=${pool.waitingCount}`,
          );
        });

        pool.on('error', (err: Error) => {
          void logger.error(`[PG] pool error id="${poolId}": ${err.message}`, err.stack);
        });

        return pool;
      },
    },
    AiUsageRepository,
  ],
  exports: [PG_POOL, AiUsageRepository],
})
export class PgModule {}
