import { DigestError, ERROR_CODES, type ErrorContext } from './types';

const MAX_DESCRIPTION_LENGTH = 200;

export function isDigestError(value: unknown): value is DigestError {
  return value instanceof DigestError;
}

export function invalidInput(message: string, context?: ErrorContext): DigestError {
  return new DigestError({
    code: ERROR_CODES.INVALID_INPUT,
    kind: 'invalid_input',
    severity: 'low',
    message,
    context,
  });
}

export function serviceError(
  message: string,
  opts: { context?: ErrorContext; cause?: Error; retryable?: boolean } = {},
): DigestError {
  return new DigestError({
    code: ERROR_CODES.SERVICE_ERROR,
    kind: 'service_error',
    severity: 'medium',
    message,
    context: opts.context,
    cause: opts.cause,
    retryable: opts.retryable,
  });
}

export function serviceTimeout(timeoutMs: number, context?: ErrorContext): DigestError {
  return new DigestError({
    code: ERROR_CODES.SERVICE_TIMEOUT,
    kind: 'service_error',
    severity: 'medium',
    message: `Generation service did not respond within ${timeoutMs}ms`,
    context,
    retryable: true,
  });
}

export function parseFailure(message: string, context?: ErrorContext): DigestError {
  return new DigestError({
    code: ERROR_CODES.PARSE_FAILURE,
    kind: 'parse_failure',
    severity: 'medium',
    message,
    context,
  });
}

export function persistenceError(
  target: 'output' | 'ledger',
  message: string,
  opts: { context?: ErrorContext; cause?: Error } = {},
): DigestError {
  return new DigestError({
    code: target === 'output' ? ERROR_CODES.OUTPUT_WRITE_FAILED : ERROR_CODES.LEDGER_WRITE_FAILED,
    kind: 'persistence_error',
    severity: 'high',
    message,
    context: opts.context,
    cause: opts.cause,
  });
}

/**
 * Short, single-purpose description used as the JobOutcome `error` text.
 */
export function describeError(err: unknown): string {
  let text: string;
  if (isDigestError(err)) {
    text = `${err.code}: ${err.message}`;
  } else if (err instanceof Error) {
    text = err.message || err.name;
  } else {
    text = String(err);
  }
  return text.length > MAX_DESCRIPTION_LENGTH ? text.slice(0, MAX_DESCRIPTION_LENGTH - 3) + '...' : text;
}

/** Wrap a non-Error thrown value so it can be attached as a `cause`. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
