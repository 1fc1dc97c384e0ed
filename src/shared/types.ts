export type RedactedRequest = {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: Record<string, unknown> | null;
};

export interface LoggerService {
  app: string;
  error(message: string, stack?: string, request?: RedactedRequest): Promise<void>;
  log(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  debug(message: string): Promise<void>;
  verbose(message: string): Promise<void>;
}

export const LOGGER_SERVICE = 'LOGGER_SERVICE';
