// src/config/advisor.config.ts
import { registerAs } from '@nestjs/config';
import { ConfigurationError } from '../shared/errors';

export interface AdvisorConfig {
  port: number;
  corsOrigins: string[];

  openai: {
    apiKey: string;
    model: string;
  };

  synthesis: {
    temperature: number;
    timeoutMs: number;
  };

  search: {
    serperApiKey: string;
    serperBaseUrl: string;
    timeoutMs: number;
    federalConcurrency: number;
  };

  artifactsDir: string;
  mongoUri: string;

  pg: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    poolMax: number;
  };
}

type Env = Record<string, string | undefined>;

// largest delay setTimeout accepts without firing immediately
const MAX_TIMER_MS = 2_147_483_647;

const isTimerDelay = (n: number) => n > 0 && n <= MAX_TIMER_MS;

/**
 * Reads the process environment once. Missing credentials or malformed
 * numbers abort startup with a ConfigurationError naming every bad key.
 */
export function loadAdvisorConfig(env: Env): AdvisorConfig {
  const problems: string[] = [];

  const required = (key: string): string => {
    const value = env[key]?.trim();
    if (!value) {
      problems.push(key);
      return '';
    }
    return value;
  };

  const num = (
    key: string,
    fallback: number,
    check: (n: number) => boolean = (n) => n > 0,
  ): number => {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const n = Number(raw);
    if (!Number.isFinite(n) || !check(n)) {
      problems.push(key);
      return fallback;
    }
    return n;
  };

  const config: AdvisorConfig = {
    port: num('PORT', 3000),
    corsOrigins: (env.CORS_ORIGINS ?? 'http://localhost:5173')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),

    openai: {
      apiKey: required('OPENAI_API_KEY'),
      model: env.OPENAI_MODEL?.trim() || 'gpt-4.1-mini',
    },

    synthesis: {
      temperature: num('SYNTHESIS_TEMPERATURE', 0.7, (n) => n >= 0 && n <= 2),
      timeoutMs: num('SYNTHESIS_TIMEOUT_MS', 60_000, isTimerDelay),
    },

    search: {
      serperApiKey: required('SERPER_API_KEY'),
      serperBaseUrl: env.SERPER_BASE_URL?.trim() || 'https://google.serper.dev',
      timeoutMs: num('SEARCH_TIMEOUT_MS', 10_000, isTimerDelay),
      federalConcurrency: num(
        'SEARCH_FEDERAL_CONCURRENCY',
        4,
        (n) => Number.isInteger(n) && n >= 1,
      ),
    },

    artifactsDir: env.ARTIFACTS_DIR?.trim() || 'artifacts',
    mongoUri:
      env.MONGO_URI?.trim() || 'mongodb://localhost:27017/business_law',

    pg: {
      host: env.PG_HOST || 'localhost',
      port: num('PG_PORT', 5432),
      database: env.PG_DB || 'business_law',
      user: env.PG_USER || 'postgres',
      password: env.PG_PASS || '',
      poolMax: num('PG_POOL_MAX', 10),
    },
  };

  if (problems.length) {
    throw new ConfigurationError(
      `Missing or invalid configuration: ${problems.join(', ')}`,
      problems,
    );
  }

  return config;
}

export const advisorConfig = registerAs('advisor', () =>
  loadAdvisorConfig(process.env),
);
