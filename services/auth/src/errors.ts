export class ServiceError extends Error {
  readonly status: number;

  readonly code: string;

  readonly details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'ServiceError';
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export function badRequest(code: string, message: string, details?: unknown) {
  return new ServiceError(400, code, message, details);
}

export function unauthorized(code: string, message: string, details?: unknown) {
  return new ServiceError(401, code, message, details);
}

export function notFound(code: string, message: string, details?: unknown) {
  return new ServiceError(404, code, message, details);
}

export function conflict(code: string, message: string, details?: unknown) {
  return new ServiceError(409, code, message, details);
}

export function locked(code: string, message: string, details?: unknown) {
  return new ServiceError(423, code, message, details);
}
