import { ServiceIdentifier, ServiceKey } from './ServiceKey';

/**
 * 可由元数据提供者构造的类型（标准构造函数无参数）
 */
export type ServiceType<T = unknown> = new () => T;

export enum RegistrationState {
  UNCONSTRUCTED = 'unconstructed',
  CONSTRUCTING = 'constructing',
  CONSTRUCTED = 'constructed',
  FAILED = 'failed'
}

// 预定义的销毁作用域，调用方也可以使用任意其他名称
export const ServiceScope = {
  APPLICATION: 'application',
  TRANSIENT: 'transient'
} as const;

export type ScopeName = string;

/**
 * Factory invoked with its dependencies resolved in declaration order.
 */
export interface ServiceFactory<T> {
  create(...dependencies: unknown[]): T;
}

export interface InstanceSource<T = unknown> {
  kind: 'instance';
  instance: T;
}

export interface TypeFactorySource<T = unknown> {
  kind: 'type';
  type: ServiceType<T>;
}

export interface FunctionFactorySource<T = unknown> {
  kind: 'function';
  factory: ServiceFactory<T>;
  dependencies: ServiceKey[];
}

export interface PluginFactorySource {
  kind: 'plugin';
  category: string;
  selector?: string;
}

export type ServiceSource<T = unknown> =
  | InstanceSource<T>
  | TypeFactorySource<T>
  | FunctionFactorySource<T>
  | PluginFactorySource;

export type SourceKind = ServiceSource['kind'];

export interface RegistrationOptions {
  scope?: ScopeName;
  weak?: boolean;
}

/**
 * 注入点：依赖键 + 赋值方法
 */
export interface InjectionSlot {
  key: ServiceKey;
  property: string | symbol;
  assign(target: object, value: unknown): void;
}

/**
 * Host capability that knows how to build types and where they want
 * their dependencies.
 */
export interface IMetadataProvider {
  constructStandard<T>(type: ServiceType<T>): T;
  /** `target` is a prototype, or an instance whose prototype chain is inspected. */
  injectableSlots(target: object): InjectionSlot[];
  invokePostConstructHook(instance: object): void;
}

export interface IPluginLocator {
  /** Returns `undefined` when no candidate in `category` matches. */
  resolvePlugin(category: string, selector?: string): ServiceType | undefined;
}

/**
 * 生命周期所有者：接管通过 constructInjected 创建的对象
 */
export interface ILifetimeOwner {
  adopt(child: object): void;
}

export interface ServiceDescriptor {
  key: ServiceKey;
  kind: SourceKind;
  scope: ScopeName;
  weak: boolean;
  state: RegistrationState;
  dependencies: ServiceKey[];
}

export interface DependencyTreeNode {
  kind: SourceKind;
  scope: ScopeName;
  weak: boolean;
  state: RegistrationState;
  dependencies: string[];
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface IContainer {
  /**
   * 注册服务，已有强注册时抛出 ServiceExistsError
   */
  register<T>(
    identifier: ServiceIdentifier<T>,
    source: ServiceSource<T>,
    scope?: ScopeName,
    weak?: boolean
  ): void;

  registerInstance<T extends object>(identifier: ServiceIdentifier<T>, instance: T, options?: RegistrationOptions): IContainer;

  registerType<T>(identifier: ServiceIdentifier<T>, type: ServiceType<T>, options?: RegistrationOptions): IContainer;

  registerFactory<T extends object>(
    identifier: ServiceIdentifier<T>,
    factory: (...dependencies: never[]) => T,
    dependencies?: readonly ServiceIdentifier[],
    options?: RegistrationOptions
  ): IContainer;

  registerPlugin<T>(
    identifier: ServiceIdentifier<T>,
    category: string,
    selector?: string,
    options?: RegistrationOptions
  ): IContainer;

  /**
   * 解析服务，失败时抛出 ServiceConstructionError
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * 尝试解析服务（不抛出异常）
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined;

  injectServices(target: object): void;

  constructInjected<T extends object>(type: ServiceType<T>, owner?: ILifetimeOwner): T;

  teardownScope(scope: ScopeName): void;

  teardownAll(): void;

  isRegistered(identifier: ServiceIdentifier): boolean;

  getState(identifier: ServiceIdentifier): RegistrationState | undefined;

  /**
   * 获取所有已注册的服务标识符
   */
  getRegisteredServices(): ServiceKey[];

  getDescriptor(identifier: ServiceIdentifier): ServiceDescriptor | undefined;
}
