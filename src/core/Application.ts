import { Container, ContainerOptions, ServiceIdentifier, toServiceKey } from './container';
import { DirectoryPluginLocator } from './plugins';
import { config as defaultConfig, Config } from '../config';
import { log } from '../utils/logger';
import { ValidationError, handleError, errorMessage } from '../utils/errors';

export interface ILifecycleAware {
  start?(): Promise<void> | void;
  stop?(): Promise<void> | void;
}

export interface ApplicationConfig {
  name: string;
  version: string;
  environment: Config['app']['nodeEnv'];
  /** 启动时立即解析的服务，按顺序启动、逆序停止 */
  eagerServices: ServiceIdentifier[];
}

export type ServiceInstaller = (container: Container) => void;

function isLifecycleAware(value: unknown): value is ILifecycleAware {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return typeof Reflect.get(value, 'start') === 'function' || typeof Reflect.get(value, 'stop') === 'function';
}

/**
 * Owns one container for the lifetime of the application: services are
 * registered during initialize() and every scope is torn down in stop().
 */
export class Application {
  private readonly container: Container;
  private readonly config: ApplicationConfig;
  private installers: ServiceInstaller[] = [];
  private shutdownHandlers: Array<() => Promise<void>> = [];
  private startedServices: ILifecycleAware[] = [];
  private isStarted = false;
  private isInitialized = false;
  private startupTimestamp?: number;

  constructor(config: Partial<ApplicationConfig> = {}, containerOptions: ContainerOptions = {}) {
    this.config = {
      name: 'service-registry',
      version: '1.0.0',
      environment: defaultConfig.app.nodeEnv,
      eagerServices: [],
      ...config
    };

    this.container = new Container({
      defaultScope: defaultConfig.registry.defaultScope,
      plugins: new DirectoryPluginLocator(defaultConfig.registry.pluginRoot),
      ...containerOptions
    });
  }

  /**
   * 添加服务注册回调，在 initialize() 中执行
   */
  use(installer: ServiceInstaller): this {
    if (this.isInitialized) {
      throw new Error('Cannot add service installers after initialization');
    }
    this.installers.push(installer);
    return this;
  }

  /**
   * 应用初始化 - 注册服务和验证依赖
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      log.warn('Application already initialized');
      return;
    }

    log.info('🚀 Initializing application', {
      name: this.config.name,
      version: this.config.version,
      environment: this.config.environment
    });

    // 1. 注册应用服务
    for (const installer of this.installers) {
      installer(this.container);
    }

    // 2. 验证服务依赖
    const validation = this.container.validate();
    if (!validation.valid) {
      throw new ValidationError(`Service validation failed: ${validation.errors.join(', ')}`);
    }

    this.isInitialized = true;
    log.info('✅ Application initialized successfully', {
      services: this.container.getRegisteredServices().length
    });
  }

  /**
   * 启动应用 - 解析并启动预加载服务
   */
  async start(): Promise<void> {
    if (!this.isInitialized) {
      await this.initialize();
    }

    if (this.isStarted) {
      log.warn('Application already started');
      return;
    }

    this.startupTimestamp = Date.now();
    this.isStarted = true;

    try {
      for (const identifier of this.config.eagerServices) {
        const service = this.container.resolve(identifier);
        if (isLifecycleAware(service) && !this.startedServices.includes(service)) {
          if (service.start) {
            await service.start();
          }
          this.startedServices.push(service);
          log.debug(`✅ Service started: ${toServiceKey(identifier).id}`);
        }
      }
    } catch (error) {
      log.error('❌ Failed to start application', { error: errorMessage(error) });
      await this.stop();
      throw error;
    }

    log.info('✅ Application started successfully', { startupTimeMs: Date.now() - this.startupTimestamp });
  }

  /**
   * 停止应用：逆序停止服务，执行关闭处理器，销毁所有作用域
   */
  async stop(): Promise<void> {
    if (!this.isStarted) {
      log.warn('Application not started');
      return;
    }

    log.info('🛑 Stopping application');

    const services = this.startedServices.slice().reverse();
    this.startedServices = [];
    for (const service of services) {
      if (service.stop) {
        try {
          await service.stop();
        } catch (error) {
          // 继续停止其他服务
          handleError(error, 'stop service');
        }
      }
    }

    for (const handler of this.shutdownHandlers) {
      try {
        await handler();
      } catch (error) {
        handleError(error, 'shutdown handler');
      }
    }

    this.container.teardownAll();
    this.isStarted = false;
    log.info('✅ Application stopped gracefully');
  }

  /**
   * 注册关闭处理器
   */
  onShutdown(handler: () => Promise<void>): void {
    this.shutdownHandlers.push(handler);
  }

  getContainer(): Container {
    return this.container;
  }

  /**
   * 获取应用状态
   */
  getStatus() {
    return {
      name: this.config.name,
      version: this.config.version,
      environment: this.config.environment,
      initialized: this.isInitialized,
      started: this.isStarted,
      uptime: this.isStarted && this.startupTimestamp ? Date.now() - this.startupTimestamp : 0,
      services: this.container.getRegisteredServices().length,
      scopes: this.container.getScopes()
    };
  }

  /**
   * 健康检查
   */
  async healthCheck(): Promise<{ status: 'healthy' | 'unhealthy'; details: Record<string, unknown> }> {
    if (!this.isStarted) {
      return {
        status: 'unhealthy',
        details: { reason: 'Application not started' }
      };
    }

    const validation = this.container.validate();
    return {
      status: validation.valid ? 'healthy' : 'unhealthy',
      details: {
        services: this.container.getRegisteredServices().length,
        errors: validation.errors
      }
    };
  }
}
