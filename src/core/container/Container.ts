import {
  DependencyTreeNode,
  IContainer,
  ILifetimeOwner,
  IMetadataProvider,
  IPluginLocator,
  RegistrationOptions,
  RegistrationState,
  ScopeName,
  ServiceDescriptor,
  ServiceScope,
  ServiceSource,
  ServiceType,
  ValidationResult
} from './IContainer';
import { Registration } from './Registration';
import { ReflectMetadataProvider } from './ReflectMetadataProvider';
import { Resolver } from './Resolver';
import { ServiceRegistry } from './ServiceRegistry';
import { ServiceIdentifier, ServiceKey, toServiceKey } from './ServiceKey';
import { getInjectableMetadata } from './decorators';
import { ServiceConstructionError } from './errors';
import { log } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

export interface ContainerOptions {
  metadata?: IMetadataProvider;
  plugins?: IPluginLocator;
  defaultScope?: ScopeName;
}

export class Container implements IContainer {
  private readonly registry = new ServiceRegistry();
  private readonly resolver: Resolver;
  private readonly metadata: IMetadataProvider;
  private readonly defaultScope: ScopeName;

  constructor(options: ContainerOptions = {}) {
    this.metadata = options.metadata ?? new ReflectMetadataProvider();
    this.defaultScope = options.defaultScope ?? ServiceScope.APPLICATION;
    this.resolver = new Resolver(this.registry, this.metadata, options.plugins);
  }

  register<T>(
    identifier: ServiceIdentifier<T>,
    source: ServiceSource<T>,
    scope: ScopeName = this.defaultScope,
    weak: boolean = false
  ): void {
    const key = toServiceKey(identifier);
    this.registry.add(new Registration<T>(key, source, scope, weak));
  }

  registerInstance<T extends object>(identifier: ServiceIdentifier<T>, instance: T, options: RegistrationOptions = {}): IContainer {
    this.register(identifier, { kind: 'instance', instance }, options.scope, options.weak);
    return this;
  }

  registerType<T>(identifier: ServiceIdentifier<T>, type: ServiceType<T>, options: RegistrationOptions = {}): IContainer {
    // @Injectable 上声明的选项作为默认值
    const defaults = getInjectableMetadata(type) ?? {};
    this.register(
      identifier,
      { kind: 'type', type },
      options.scope ?? defaults.scope,
      options.weak ?? defaults.weak
    );
    return this;
  }

  registerFactory<T extends object>(
    identifier: ServiceIdentifier<T>,
    factory: (...dependencies: never[]) => T,
    dependencies: readonly ServiceIdentifier[] = [],
    options: RegistrationOptions = {}
  ): IContainer {
    this.register(
      identifier,
      { kind: 'function', factory: { create: factory }, dependencies: dependencies.map(toServiceKey) },
      options.scope,
      options.weak
    );
    return this;
  }

  registerPlugin<T>(
    identifier: ServiceIdentifier<T>,
    category: string,
    selector?: string,
    options: RegistrationOptions = {}
  ): IContainer {
    this.register<T>(identifier, { kind: 'plugin', category, selector }, options.scope, options.weak);
    return this;
  }

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    const key = toServiceKey(identifier);
    try {
      return this.resolver.resolve(key) as T;
    } catch (error) {
      log.error('Service resolution failed', {
        key: key.id,
        error: errorMessage(error)
      });
      throw error;
    }
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined {
    try {
      return this.resolve(identifier);
    } catch (error) {
      if (error instanceof ServiceConstructionError) {
        return undefined;
      }
      throw error;
    }
  }

  injectServices(target: object): void {
    this.resolver.injectServices(target);
  }

  constructInjected<T extends object>(type: ServiceType<T>, owner?: ILifetimeOwner): T {
    return this.resolver.constructInjected(type, owner);
  }

  teardownScope(scope: ScopeName): void {
    const removed = this.registry.teardownScope(scope);
    log.info('Scope destroyed', { scope, services: removed });
  }

  teardownAll(): void {
    this.registry.teardownAll();
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.registry.has(toServiceKey(identifier));
  }

  getState(identifier: ServiceIdentifier): RegistrationState | undefined {
    return this.registry.get(toServiceKey(identifier))?.state;
  }

  getRegisteredServices(): ServiceKey[] {
    return this.registry.keys();
  }

  getScopes(): ScopeName[] {
    return this.registry.scopeNames();
  }

  getDescriptor(identifier: ServiceIdentifier): ServiceDescriptor | undefined {
    const registration = this.registry.get(toServiceKey(identifier));
    if (!registration) {
      return undefined;
    }

    return {
      key: registration.key,
      kind: registration.source.kind,
      scope: registration.scope,
      weak: registration.weak,
      state: registration.state,
      dependencies: this.declaredDependencies(registration)
    };
  }

  // Debug methods

  getDependencyTree(): Record<string, DependencyTreeNode> {
    const tree: Record<string, DependencyTreeNode> = {};

    for (const registration of this.registry.values()) {
      tree[registration.key.id] = {
        kind: registration.source.kind,
        scope: registration.scope,
        weak: registration.weak,
        state: registration.state,
        dependencies: this.declaredDependencies(registration).map(key => key.id)
      };
    }

    return tree;
  }

  validate(): ValidationResult {
    const errors: string[] = [];

    for (const registration of this.registry.values()) {
      for (const dependency of this.declaredDependencies(registration)) {
        if (!this.registry.has(dependency)) {
          errors.push(`Service ${registration.key.id} depends on unregistered service ${dependency.id}`);
        }
      }
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * 工厂函数的依赖列表，或类型上声明的注入点
   */
  private declaredDependencies(registration: Registration): ServiceKey[] {
    const { source } = registration;
    switch (source.kind) {
      case 'function':
        return source.dependencies;
      case 'type':
        return this.metadata.injectableSlots(source.type.prototype).map(slot => slot.key);
      default:
        return [];
    }
  }
}
