// Core interfaces and types
export type {
  IContainer,
  IMetadataProvider,
  IPluginLocator,
  ILifetimeOwner,
  InjectionSlot,
  ServiceType,
  ServiceSource,
  ServiceFactory,
  InstanceSource,
  TypeFactorySource,
  FunctionFactorySource,
  PluginFactorySource,
  SourceKind,
  ScopeName,
  RegistrationOptions,
  ServiceDescriptor,
  DependencyTreeNode,
  ValidationResult
} from './IContainer';
export { RegistrationState, ServiceScope } from './IContainer';

export { ServiceKey, toServiceKey } from './ServiceKey';
export type { ServiceIdentifier } from './ServiceKey';

// Container implementation
export { Container } from './Container';
export type { ContainerOptions } from './Container';
export { ServiceRegistry } from './ServiceRegistry';
export { Resolver } from './Resolver';
export { Registration } from './Registration';
export { ReflectMetadataProvider, POST_CONSTRUCT_METHOD } from './ReflectMetadataProvider';
export { LifetimeGroup } from './LifetimeGroup';
export { destroyInstance } from './lifecycle';
export type { IDestroyable, IDisposable } from './lifecycle';

// Errors
export { ServiceExistsError, ServiceConstructionError } from './errors';

// Decorators
export {
  Injectable,
  Inject,
  PostConstruct,
  getInjectionSlots,
  getPostConstructMethod,
  getInjectableMetadata,
  isInjectable
} from './decorators';
export type { InjectionSlotMetadata } from './decorators';
