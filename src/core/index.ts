// Application core
export { Application } from './Application';
export type { ApplicationConfig, ILifecycleAware, ServiceInstaller } from './Application';

// Container system
export * from './container';

// Plugins
export * from './plugins';
