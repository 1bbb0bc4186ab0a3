import { Request, Response, NextFunction } from 'express';
import { logger } from './logger';

export class AppError extends Error {
  constructor(
    public message: string,
    public code = 'INTERNAL_ERROR',
    public statusCode = 500,
    public isOperational = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', 401);
    Object.setPrototypeOf(this, UnauthorizedError.prototype);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(message, 'FORBIDDEN', 403);
    Object.setPrototypeOf(this, ForbiddenError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class RateLimitError extends AppError {
  constructor(message: string, public retryAfterMs: number) {
    super(message, 'RATE_LIMITED', 429);
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

export class KeyGenerationError extends AppError {
  constructor(message: string) {
    super(message, 'KEY_GENERATION_ERROR', 500);
    Object.setPrototypeOf(this, KeyGenerationError.prototype);
  }
}

export class InterfaceCommandError extends AppError {
  constructor(message: string, public exitCode: number, public stderr: string) {
    super(message, 'INTERFACE_COMMAND_ERROR', 502);
    Object.setPrototypeOf(this, InterfaceCommandError.prototype);
  }
}

export class SyncFailure extends AppError {
  constructor(message: string) {
    super(message, 'SYNC_FAILURE', 502);
    Object.setPrototypeOf(this, SyncFailure.prototype);
  }
}

export class StorageError extends AppError {
  constructor(message: string, public cause?: unknown) {
    super(message, 'STORAGE_ERROR', 500);
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

export class AddressPoolExhaustedError extends AppError {
  constructor(subnet: string) {
    super(`No available IP addresses in subnet ${subnet}.0/24`, 'ADDRESS_POOL_EXHAUSTED', 507);
    Object.setPrototypeOf(this, AddressPoolExhaustedError.prototype);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500, false);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Body parser failures carry the client status they should answer with. */
function fromBodyParserError(error: Error): AppError | null {
  if (!('status' in error) || typeof error.status !== 'number' || error.status >= 500) {
    return null;
  }
  if ('type' in error && error.type === 'entity.parse.failed') {
    return new ValidationError('Malformed JSON body');
  }
  return new AppError(error.message, 'BAD_REQUEST', error.status);
}

export function errorHandler(thrown: Error, req: Request, res: Response, _next: NextFunction): void {
  const error = thrown instanceof AppError ? thrown : fromBodyParserError(thrown) ?? thrown;
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error('Request failed', { path: req.path, code: error.code, error: error.message });
    } else {
      logger.debug('Request rejected', { path: req.path, code: error.code, error: error.message });
    }
    if (error instanceof RateLimitError) {
      res.setHeader('Retry-After', Math.ceil(error.retryAfterMs / 1000).toString());
    }
    res.status(error.statusCode).json({ error: { code: error.code, message: error.message } });
    return;
  }

  logger.error('Unhandled request error', { path: req.path, error });
  res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
}
