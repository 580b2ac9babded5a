import {
  BadRequestException,
  HttpException,
  HttpStatus,
  NotFoundException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import type { z } from 'zod';
import { DefinitionInvalidError, OrchestratorError, isOrchestratorError } from './errors';

/** Validate a request body (or query) against a zod schema; 400 with the issues otherwise. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (parsed.success) return parsed.data;
  throw new BadRequestException({
    message: 'Invalid request',
    issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
  });
}

/**
 * Translate a domain error into the HTTP exception a controller should throw.
 * Anything that is not an OrchestratorError is rethrown untouched (Nest turns it into a 500).
 */
export function toHttpException(err: unknown): HttpException {
  if (!isOrchestratorError(err)) throw err;
  return mapDomainError(err);
}

function mapDomainError(err: OrchestratorError): HttpException {
  const body = { code: err.code, message: err.message, retryable: err.retryable };
  switch (err.code) {
    case 'DefinitionInvalid': {
      const issues = err instanceof DefinitionInvalidError ? err.issues : [];
      const kind = err instanceof DefinitionInvalidError ? err.kind : undefined;
      return new BadRequestException({ ...body, kind, issues });
    }
    case 'ConcurrencyExceeded':
      return new HttpException(body, HttpStatus.TOO_MANY_REQUESTS);
    case 'TriggerNotMatched':
      return new UnprocessableEntityException(body);
    case 'InfrastructureError':
      return new ServiceUnavailableException(body);
    case 'NotFound':
      return new NotFoundException(body);
  }
}
