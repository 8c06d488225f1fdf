import { AppError } from '../../utils/errors';
import { ServiceKey } from './ServiceKey';

/**
 * 键已被强注册占用
 */
export class ServiceExistsError extends AppError {
  public readonly key: ServiceKey;

  constructor(key: ServiceKey) {
    super(`Service already registered: ${key.id}`, 'SERVICE_EXISTS');
    this.name = 'ServiceExistsError';
    this.key = key;
  }
}

/**
 * Raised for a missing registration, a dependency cycle, a failing factory or
 * collaborator, or a failed injection. `path` is the chain of keys being
 * constructed when the failure happened, outermost first.
 */
export class ServiceConstructionError extends AppError {
  public readonly key: ServiceKey;
  public readonly path: ServiceKey[];
  public readonly cause?: unknown;

  constructor(key: ServiceKey, message: string, path: ServiceKey[] = [], cause?: unknown) {
    super(message, 'SERVICE_CONSTRUCTION');
    this.name = 'ServiceConstructionError';
    this.key = key;
    this.path = path;
    this.cause = cause;
  }
}
