import { ErrorBody } from './types';

/**
 * Base class for every error that crosses a process boundary. `code` is the
 * stable machine-readable identifier, `status` the HTTP status the device or
 * console server answers with.
 */
export class FleetError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, status: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }

  toBody(): ErrorBody {
    return { code: this.code, message: this.message };
  }
}

export class AuthError extends FleetError {
  constructor(message = 'Invalid or missing bearer token') {
    super('UNAUTHORIZED', 401, message);
  }
}

export class ValidationError extends FleetError {
  constructor(message: string, code: 'INVALID_REQUEST' | 'MISSING_BODY' = 'INVALID_REQUEST') {
    super(code, 400, message);
  }

  static missingBody(): ValidationError {
    return new ValidationError('Request body is missing', 'MISSING_BODY');
  }
}

export class NotFoundError extends FleetError {
  constructor(resource: string) {
    super('NOT_FOUND', 404, `Resource not found: ${resource}`);
  }
}

export class ConflictError extends FleetError {
  constructor(message: string) {
    super('CONFLICT', 409, message);
  }
}

export class RateLimitError extends FleetError {
  readonly waitMs: number;

  constructor(waitMs: number) {
    super('RATE_LIMITED', 429, `Too many requests, wait ${waitMs}ms`);
    this.waitMs = waitMs;
  }
}

/** The capture/encode collaborator refused or failed an operation. */
export class UpstreamError extends FleetError {
  constructor(code: string, message: string) {
    super(code, 500, message);
  }
}

export class TimeoutError extends FleetError {
  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', 504, `${operation} timed out after ${timeoutMs}ms`);
  }
}

export class EncodingError extends FleetError {
  constructor(details: string) {
    super('ENCODING_FAILED', 500, `Failed to encode response: ${details}`);
  }
}

export class NotImplementedError extends FleetError {
  constructor(feature: string) {
    super('NOT_IMPLEMENTED', 501, `Not implemented: ${feature}`);
  }
}

// Console-side failure kinds when talking to a device

export class ConnectionError extends FleetError {
  constructor(target: string, details: string) {
    super('CONNECTION_FAILED', 502, `Cannot reach ${target}: ${details}`);
  }
}

export class DeviceNotFoundError extends FleetError {
  constructor(id: string) {
    super('DEVICE_NOT_FOUND', 404, `Device not found: ${id}`);
  }
}

/** The device answered with a non-success HTTP status. */
export class DeviceResponseError extends FleetError {
  constructor(code: string, status: number, message: string) {
    super(code, status, message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Summarizes any thrown value into the wire error body. */
export function toErrorBody(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof FleetError) {
    return { status: error.status, body: error.toBody() };
  }
  return {
    status: 500,
    body: { code: 'INTERNAL_ERROR', message: `Internal error: ${errorMessage(error)}` }
  };
}
