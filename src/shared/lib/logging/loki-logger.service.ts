import winston, { createLogger, transports } from 'winston';
import LokiTransport from 'winston-loki';
import {
  Inject,
  Injectable,
  Logger,
  LoggerService as NestLoggerService,
} from '@nestjs/common';
import { LoggerService, RedactedRequest } from '../../types';

export const LOKI_HOST = 'LOKI_HOST';

@Injectable()
export class LokiLoggerService implements LoggerService, NestLoggerService {
  private readonly logger: winston.Logger;

  public constructor(
    @Inject('JOB_NAME') private readonly job: string,
    @Inject('APP_NAME') private readonly appName: string,
    @Inject(LOKI_HOST) private readonly lokiHost: string | null,
  ) {
    this.logger = this.createLogger(job, appName);
  }

  public get app(): string {
    return this.appName;
  }

  public async log(message: unknown, context?: string): Promise<void> {
    this.logger.info(`ℹ️ [LOG] ${this.format(message, context)}`);
  }

  public async warn(message: unknown, context?: string): Promise<void> {
    this.logger.warn(`⚠️ [WARN] ${this.format(message, context)}`);
  }

  public async debug(message: unknown, context?: string): Promise<void> {
    if (process.env['NODE_ENV'] !== 'production')
      this.logger.debug(`🐛 [DEBUG] ${this.format(message, context)}`);
  }

  public async verbose(message: unknown, context?: string): Promise<void> {
    if (process.env['NODE_ENV'] !== 'production')
      this.logger.verbose(`🔎 [VERBOSE] ${this.format(message, context)}`);
  }

  public async fatal(message: unknown, context?: string): Promise<void> {
    return this.error(`[FATAL] ${this.format(message)}`, undefined, context);
  }

  /**
   * Nest's Logger calls `error(message, stack, context)`; our own callers may
   * pass the incoming request instead, which is redacted before it is shipped.
   */
  public async error(
    message: unknown,
    stack?: string,
    requestOrContext?: RedactedRequest | string,
  ): Promise<void> {
    const context =
      typeof requestOrContext === 'string' ? requestOrContext : undefined;
    const request =
      typeof requestOrContext === 'object' ? requestOrContext : undefined;

    const logObject = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message: `❌ [ERROR] ${this.format(message, context)}`,
      stack: stack ? this.cleanStackTrace(stack) : undefined,
      request: request ? this.redactRequest(request) : undefined,
    };

    try {
      this.logger.error(JSON.stringify(logObject));
    } catch (err) {
      Logger.log('Failed to log error:', err);
      throw err;
    }
  }

  private format(message: unknown, context?: string): string {
    const text =
      typeof message === 'string' ? message : JSON.stringify(message);
    return context ? `[${context}] ${text}` : text;
  }

  private createLogger(job: string, app: string): winston.Logger {
    const transportsArray = this.initializeTransports(job, app);

    return createLogger({
      level: 'debug',
      format: winston.format.json(),
      transports: transportsArray,
    });
  }

  private initializeTransports(job: string, app: string): winston.transport[] {
    const transportsArray: winston.transport[] = [];

    if (this.lokiHost) {
      transportsArray.push(this.createLokiTransport(this.lokiHost, job, app));
    }

    // without a Loki sink the console is the only place logs can go
    if (this.isDevelopmentEnvironment() || transportsArray.length === 0) {
      transportsArray.push(this.createConsoleTransport());
    }

    return transportsArray;
  }

  private createLokiTransport(
    host: string,
    job: string,
    app: string,
  ): LokiTransport {
    return new LokiTransport({
      host,
      labels: { job, app },
      json: true,
      format: winston.format.json(),
      replaceTimestamp: true,
      onConnectionError: (err: unknown) =>
        console.error('Loki connection error:', err),
    });
  }

  private createConsoleTransport(): winston.transport {
    return new transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple(),
      ),
    });
  }

  private isDevelopmentEnvironment(): boolean {
    return ['dev', 'development'].includes(process.env['NODE_ENV'] || '');
  }

  private cleanStackTrace(stack: string, maxDepth: number = 4): string {
    if (!stack) return '';

    const stackLines = stack
      .trim()
      .split('\n')
      .map((line) => line.trim())
      .filter(
        (line) =>
          line.startsWith('Error') || !line.includes('internal/modules'),
      )
      .map((line) => {
        if (line.startsWith('at')) {
          const match = line.match(/\((.+)\)/);
          if (match) {
            const path = match[1];
            const simplifiedPath = path.includes('node_modules')
              ? path.slice(path.lastIndexOf('node_modules/') + 'node_modules/'.length)
              : path.split('/').slice(-3).join('/');
            return `(${simplifiedPath})`;
          }
        }
        return line;
      });

    return stackLines.slice(0, maxDepth).join('\n    ');
  }

  private redactRequest(request: RedactedRequest) {
    return {
      method: request.method,
      url: request.url,
      headers: this.redactHeaders(request.headers ?? {}),
      body: this.redactBody(request.body),
    };
  }

  private redactHeaders(headers: Record<string, string>) {
    const sensitive = ['authorization', 'cookie', 'x-api-key'];
    return Object.fromEntries(
      Object.entries(headers).map(([k, v]) => [
        k,
        sensitive.includes(k.toLowerCase()) ? '*****' : v,
      ]),
    );
  }

  private redactBody(body: Record<string, unknown> | undefined | null) {
    const sensitive = ['password', 'token', 'apikey', 'api_key'];
    if (!body || typeof body !== 'object') return {};

    return Object.fromEntries(
      Object.entries(body).map(([k, v]) => [
        k,
        sensitive.includes(k.toLowerCase()) ? '*****' : v,
      ]),
    );
  }
}
