import { BadRequestException, NotFoundException } from '@nestjs/common';

export type ErrorCode = 'OK' | 'BadInput' | 'NotFound';

export interface ErrorInfo {
  errorCode: Exclude<ErrorCode, 'OK'>;
  message: string;
  field?: string;
}

export interface Success<T> {
  errorCode: 'OK';
  value: T;
}

/**
 * Result of a validator or an endpoint operation. Failures carry the first
 * error found; nothing after it runs.
 */
export type Outcome<T> = Success<T> | ErrorInfo;

export function ok<T>(value: T): Success<T> {
  return { errorCode: 'OK', value };
}

export function badInput(message: string, field?: string): ErrorInfo {
  return field
    ? { errorCode: 'BadInput', message, field }
    : { errorCode: 'BadInput', message };
}

export function notFound(message: string): ErrorInfo {
  return { errorCode: 'NotFound', message };
}

export function isOk<T>(outcome: Outcome<T>): outcome is Success<T> {
  return outcome.errorCode === 'OK';
}

export function toHttpException(
  error: ErrorInfo,
): BadRequestException | NotFoundException {
  if (error.errorCode === 'NotFound') {
    return new NotFoundException({
      statusCode: 404,
      error: 'Not Found',
      errorCode: error.errorCode,
      message: error.message,
    });
  }
  return new BadRequestException({
    statusCode: 400,
    error: 'Bad Request',
    errorCode: error.errorCode,
    message: error.message,
    ...(error.field ? { field: error.field } : {}),
  });
}

export function unwrapOutcome<T>(outcome: Outcome<T>): T {
  if (isOk(outcome)) {
    return outcome.value;
  }
  throw toHttpException(outcome);
}
