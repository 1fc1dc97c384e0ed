// src/advisor/filters/advisor-error.filter.ts
import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Inject,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import {
  AdvisorError,
  ContextExtractionParseError,
  ModelInvocationError,
  ProviderError,
  SynthesisAbortedError,
  SynthesisParseError,
} from '../../shared/errors';
import { LOGGER_SERVICE, type LoggerService, type RedactedRequest } from '../../shared/types';

export function statusForAdvisorError(error: AdvisorError): number {
  if (error instanceof SynthesisAbortedError) return HttpStatus.GATEWAY_TIMEOUT;
  if (
    error instanceof SynthesisParseError ||
    error instanceof ContextExtractionParseError ||
    error instanceof ModelInvocationError ||
    error instanceof ProviderError
  ) {
    return HttpStatus.BAD_GATEWAY;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

function toRedactedRequest(req: Request): RedactedRequest {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    headers[key] = Array.isArray(value) ? value.join(', ') : value;
  }

  const body: unknown = req.body;
  return {
    method: req.method,
    url: req.originalUrl ?? req.url,
    headers,
    body: typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : null,
  };
}

/** Maps pipeline failures to HTTP statuses; Nest HttpExceptions are not caught here. */
@Catch(AdvisorError)
export class AdvisorErrorFilter implements ExceptionFilter<AdvisorError> {
  constructor(
    @Inject(LOGGER_SERVICE)
    private readonly logger: LoggerService,
  ) {}

  catch(exception: AdvisorError, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const req = http.getRequest<Request>();
    const res = http.getResponse<Response>();
    const status = statusForAdvisorError(exception);

    void this.logger.error(
      `${req.method} ${req.originalUrl ?? req.url} -> ${status} ${exception.name}: ${exception.message}`,
      exception.stack,
      toRedactedRequest(req),
    );

    res.status(status).json({
      statusCode: status,
      error: exception.name,
      message: exception.message,
    });
  }
}
