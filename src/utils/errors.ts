export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class InvalidTimeFormatError extends ValidationError {
  constructor(message = 'Invalid date or time format. Please use YYYY-MM-DD for date and HH:MM for time.') {
    super(message);
    Object.setPrototypeOf(this, InvalidTimeFormatError.prototype);
  }
}

export class PastInstantError extends ValidationError {
  constructor(message = 'Cannot book a meeting in the past. Please choose a future date and time.') {
    super(message);
    Object.setPrototypeOf(this, PastInstantError.prototype);
  }
}

export class MissingRequiredFieldError extends ValidationError {
  constructor(public fields: string[]) {
    super(`Missing required information. Please provide: ${fields.join(', ')}.`);
    Object.setPrototypeOf(this, MissingRequiredFieldError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/** Non-2xx or unreadable response from the booking API. */
export class ExternalServiceError extends AppError {
  constructor(
    public status: number,
    message: string,
    public responseBody: string = ''
  ) {
    super(502, message, true);
    Object.setPrototypeOf(this, ExternalServiceError.prototype);
  }
}

export class RateLimitedError extends ExternalServiceError {
  constructor(
    public attempts: number,
    responseBody: string = ''
  ) {
    super(429, `Rate limited by booking API after ${attempts} attempts`, responseBody);
    Object.setPrototypeOf(this, RateLimitedError.prototype);
  }
}

/** Connection refused, DNS failure, timeout: the request never got an HTTP answer. */
export class TransportError extends AppError {
  constructor(
    message: string,
    public cause?: unknown
  ) {
    super(503, message, true);
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export type FailureKind =
  | 'INVALID_TIME_FORMAT'
  | 'PAST_INSTANT'
  | 'INVALID_DURATION'
  | 'MISSING_REQUIRED_FIELD'
  | 'NOT_FOUND'
  | 'VALIDATION'
  | 'RATE_LIMITED'
  | 'EXTERNAL_SERVICE'
  | 'TRANSPORT';

export function failureKindOf(error: unknown): FailureKind {
  if (error instanceof InvalidTimeFormatError) return 'INVALID_TIME_FORMAT';
  if (error instanceof PastInstantError) return 'PAST_INSTANT';
  if (error instanceof MissingRequiredFieldError) return 'MISSING_REQUIRED_FIELD';
  if (error instanceof ValidationError) return 'VALIDATION';
  if (error instanceof NotFoundError) return 'NOT_FOUND';
  if (error instanceof RateLimitedError) return 'RATE_LIMITED';
  if (error instanceof ExternalServiceError) return 'EXTERNAL_SERVICE';
  if (error instanceof TransportError) return 'TRANSPORT';
  return 'EXTERNAL_SERVICE';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
