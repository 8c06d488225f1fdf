import { log } from './logger';

// 自定义错误类
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string = 'APP_ERROR', isOperational: boolean = true) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

// 验证错误类
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * 把任意抛出值规范为 Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

// 错误处理：可预期的错误记 warn，其余记 error
export function handleError(error: unknown, context?: string): void {
  const errorContext = context ? `[${context}] ` : '';
  const normalized = toError(error);

  if (normalized instanceof AppError && normalized.isOperational) {
    log.warn(`${errorContext}${normalized.message}`, {
      code: normalized.code,
      stack: normalized.stack
    });
  } else {
    log.error(`${errorContext}${normalized.message}`, {
      stack: normalized.stack,
      name: normalized.name
    });
  }
}
