import {
  ILifetimeOwner,
  IMetadataProvider,
  IPluginLocator,
  RegistrationState,
  ServiceType
} from './IContainer';
import { Registration } from './Registration';
import { ServiceRegistry } from './ServiceRegistry';
import { ServiceKey } from './ServiceKey';
import { ServiceConstructionError } from './errors';
import { destroyQuietly } from './lifecycle';
import { errorMessage, toError } from '../../utils/errors';

function isObject(value: unknown): value is object {
  return (typeof value === 'object' || typeof value === 'function') && value !== null;
}

function describeTarget(target: object): string {
  return target.constructor?.name || 'object';
}

/**
 * Lazy construction on top of a ServiceRegistry. The CONSTRUCTING state of a
 * registration is what detects cycles; `resolutionStack` only feeds error
 * messages.
 */
export class Resolver {
  private resolutionStack: ServiceKey[] = [];

  constructor(
    private readonly registry: ServiceRegistry,
    private readonly metadata: IMetadataProvider,
    private readonly plugins?: IPluginLocator
  ) {}

  resolve(key: ServiceKey): unknown {
    const registration = this.registry.get(key);
    if (!registration) {
      throw this.failure(key, `Service not registered: ${key.id}`);
    }

    switch (registration.state) {
      case RegistrationState.CONSTRUCTED:
        return registration.instance;

      case RegistrationState.CONSTRUCTING:
        throw this.failure(
          key,
          `Circular dependency detected: ${[...this.resolutionStack, key].map(k => k.id).join(' -> ')}`
        );

      case RegistrationState.FAILED:
        throw this.failure(
          key,
          `Service ${key.id} failed to construct earlier; re-register it to retry`,
          registration.failure
        );

      case RegistrationState.UNCONSTRUCTED:
      default:
        return this.construct(registration);
    }
  }

  /**
   * 属性注入。失败时已经赋值的属性保留原样
   */
  injectServices(target: object): void {
    for (const slot of this.metadata.injectableSlots(target)) {
      let value: unknown;
      try {
        value = this.resolve(slot.key);
        slot.assign(target, value);
      } catch (error) {
        throw this.failure(
          slot.key,
          `Failed to inject ${slot.key.id} into ${describeTarget(target)}.${String(slot.property)}: ${errorMessage(error)}`,
          error
        );
      }
    }
  }

  constructInjected<T extends object>(type: ServiceType<T>, owner?: ILifetimeOwner): T {
    const key = ServiceKey.of<T>(type.name || '[Anonymous Class]');

    let instance: T;
    try {
      instance = this.metadata.constructStandard(type);
    } catch (error) {
      throw this.failure(key, `Failed to construct ${key.id}: ${errorMessage(error)}`, error);
    }

    try {
      this.injectServices(instance);
      this.metadata.invokePostConstructHook(instance);
      owner?.adopt(instance);
    } catch (error) {
      destroyQuietly(instance, key.id);
      throw error instanceof ServiceConstructionError
        ? error
        : this.failure(key, `Failed to initialize ${key.id}: ${errorMessage(error)}`, error);
    }

    return instance;
  }

  private construct(registration: Registration): unknown {
    const { key, source } = registration;

    registration.beginConstruction();
    this.resolutionStack.push(key);

    // 注册表自己创建的原始实例，失败时需要销毁
    let created: unknown;
    // 工厂返回了其他注册已经持有的实例（别名）
    let shared = false;
    try {
      let instance: unknown;
      switch (source.kind) {
        case 'instance':
          instance = source.instance;
          break;

        case 'type':
          instance = created = this.metadata.constructStandard(source.type);
          break;

        case 'function': {
          const dependencies = source.dependencies.map(dependency => this.resolve(dependency));
          instance = source.factory.create(...dependencies);
          shared = isObject(instance) && this.registry.isOwned(instance);
          if (!shared) {
            created = instance;
          }
          break;
        }

        case 'plugin': {
          if (!this.plugins) {
            throw new Error('No plugin locator configured');
          }
          const type = this.plugins.resolvePlugin(source.category, source.selector);
          if (!type) {
            throw new Error(
              `No plugin found in category ${source.category}` +
                (source.selector !== undefined ? ` matching ${source.selector}` : '')
            );
          }
          instance = created = this.metadata.constructStandard(type);
          break;
        }
      }

      if (!isObject(instance)) {
        throw new Error(`Service source produced ${instance === null ? 'null' : typeof instance} instead of an object`);
      }

      if (source.kind === 'type' || source.kind === 'plugin') {
        this.injectServices(instance);
      }
      if (!shared) {
        this.metadata.invokePostConstructHook(instance);
      }

      if (registration.discarded) {
        throw new Error('Registration was discarded during construction');
      }

      registration.complete(instance, !shared);
      return instance;
    } catch (error) {
      const failure = this.failure(key, `Failed to construct service ${key.id}: ${errorMessage(error)}`, error);
      registration.fail(failure);
      if (created !== undefined) {
        destroyQuietly(created, `partially constructed service ${key.id}`);
      }
      throw failure;
    } finally {
      this.resolutionStack.pop();
    }
  }

  private failure(key: ServiceKey, message: string, cause?: unknown): ServiceConstructionError {
    return new ServiceConstructionError(
      key,
      message,
      [...this.resolutionStack],
      cause === undefined ? undefined : toError(cause)
    );
  }
}
