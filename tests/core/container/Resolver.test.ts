import {
  Container,
  Inject,
  LifetimeGroup,
  RegistrationState,
  ServiceConstructionError
} from '../../../src/core/container';
import { Plugin, PluginCatalog } from '../../../src/core/plugins';
import {
  CONFIG,
  ConsoleLogger,
  Database,
  LOGGER,
  Logger,
  Resource,
  Widget
} from '../../fixtures/services';

@Plugin({ key: 'memory' })
class MemoryQueue {
  @Inject(LOGGER) logger!: Logger;
}

@Plugin({ key: 'redis' })
class RedisQueue {}

class TrackedWidget extends Widget {
  static destroyedInstances: TrackedWidget[] = [];

  destroy(): void {
    super.destroy();
    TrackedWidget.destroyedInstances.push(this);
  }
}

class Fragile extends Resource {
  postConstruct(): void {
    throw new Error('hook failed');
  }
}

describe('Resolver', () => {
  let container: Container;

  beforeEach(() => {
    container = new Container();
  });

  describe('property injection', () => {
    test('type sources are injected before their hook runs', () => {
      container.registerType(LOGGER, ConsoleLogger);
      container.registerInstance(CONFIG, { url: 'memory://test' });
      container.registerType('Database', Database);

      const database = container.resolve<Database>('Database');

      expect(database.logger).toBe(container.resolve(LOGGER));
      expect(database.connected).toBe(true);
      expect(database.logger.lines).toEqual(['connected to memory://test']);
    });

    test('a failing slot fails the service that declares it', () => {
      container.registerType(LOGGER, ConsoleLogger);
      container.registerType('Database', Database);

      expect(() => container.resolve('Database')).toThrow(
        'Failed to construct service Database: Failed to inject Config into Database.settings: Service not registered: Config'
      );
      expect(container).toHaveRegistrationState('Database', RegistrationState.FAILED);
    });

    test('injectServices keeps slots assigned before a failure', () => {
      container.registerType(LOGGER, ConsoleLogger);
      const database = new Database();

      expect(() => container.injectServices(database)).toThrow(ServiceConstructionError);
      expect(database.logger).toBe(container.resolve(LOGGER));
      expect(database.settings).toBeUndefined();
    });

    test('instance and function sources are not property injected', () => {
      container.registerType(LOGGER, ConsoleLogger);
      const prebuilt = new Widget();
      container.registerInstance('prebuilt', prebuilt);
      container.registerFactory('built', () => new Widget());

      const built = container.resolve<Widget>('built');

      expect(container.resolve('prebuilt')).toBe(prebuilt);
      expect(prebuilt.logger).toBeUndefined();
      expect(prebuilt.ready).toBe(true);
      expect(built.logger).toBeUndefined();
      expect(built.ready).toBe(true);
    });
  });

  describe('construction failures', () => {
    test('an instance built before a failing hook is destroyed', () => {
      const built: Fragile[] = [];
      container.registerFactory('Fragile', () => {
        const fragile = new Fragile();
        built.push(fragile);
        return fragile;
      });

      expect(() => container.resolve('Fragile')).toThrow('Failed to construct service Fragile: hook failed');
      expect(built).toHaveLength(1);
      expect(built[0].destroyed).toBe(true);
    });

    test('a weak registration replaced during its own construction fails', () => {
      const replacement = new Resource();
      const built: Resource[] = [];
      container.registerFactory('Cache', () => {
        const resource = new Resource();
        built.push(resource);
        container.registerInstance('Cache', replacement);
        return resource;
      }, [], { weak: true });

      expect(() => container.resolve('Cache')).toThrow('Registration was discarded during construction');
      expect(built[0].destroyed).toBe(true);
      expect(container.resolve('Cache')).toBe(replacement);
    });
  });

  describe('plugin sources', () => {
    const catalog = new PluginCatalog()
      .add('queues', MemoryQueue)
      .add('queues', RedisQueue);

    test('construct the selected plugin type', () => {
      container = new Container({ plugins: catalog });
      container.registerPlugin('Queue', 'queues', 'redis');

      expect(container.resolve('Queue')).toBeInstanceOf(RedisQueue);
    });

    test('inject the plugin instance like a type source', () => {
      container = new Container({ plugins: catalog });
      container.registerType(LOGGER, ConsoleLogger);
      container.registerPlugin('Queue', 'queues');

      const queue = container.resolve<MemoryQueue>('Queue');

      expect(queue).toBeInstanceOf(MemoryQueue);
      expect(queue.logger).toBe(container.resolve(LOGGER));
    });

    test('fail when no plugin matches', () => {
      container = new Container({ plugins: catalog });
      container.registerPlugin('Queue', 'queues', 'kafka');

      expect(() => container.resolve('Queue')).toThrow('No plugin found in category queues matching kafka');
      expect(container).toHaveRegistrationState('Queue', RegistrationState.FAILED);
    });

    test('fail without a plugin locator', () => {
      container.registerPlugin('Queue', 'queues');

      expect(() => container.resolve('Queue')).toThrow('No plugin locator configured');
    });
  });

  describe('constructInjected', () => {
    test('injects, runs the hook and hands the object to its owner', () => {
      container.registerType(LOGGER, ConsoleLogger);
      const group = new LifetimeGroup('screen');

      const widget = container.constructInjected(Widget, group);

      expect(widget.logger).toBe(container.resolve(LOGGER));
      expect(widget.ready).toBe(true);
      expect(group.has(widget)).toBe(true);
      expect(container.isRegistered('Widget')).toBe(false);

      group.destroy();
      expect(widget.destroyed).toBe(true);
      expect(container.resolve<ConsoleLogger>('Logger').destroyCalls).toBe(0);
    });

    test('leaves ownership with the caller when no owner is given', () => {
      container.registerType(LOGGER, ConsoleLogger);

      const widget = container.constructInjected(Widget);

      expect(widget.ready).toBe(true);
      expect(widget.destroyed).toBe(false);
    });

    test('destroys the object when its owner refuses it', () => {
      container.registerType(LOGGER, ConsoleLogger);
      const group = new LifetimeGroup('closed');
      group.destroy();
      TrackedWidget.destroyedInstances = [];

      expect(() => container.constructInjected(TrackedWidget, group)).toThrow(ServiceConstructionError);
      expect(() => container.constructInjected(TrackedWidget, group)).toThrow(
        'Failed to initialize TrackedWidget: Lifetime group closed has been destroyed'
      );
      expect(TrackedWidget.destroyedInstances).toHaveLength(2);
      expect(TrackedWidget.destroyedInstances[0].ready).toBe(true);
      expect(TrackedWidget.destroyedInstances[0].destroyed).toBe(true);
      expect(group.size).toBe(0);
    });

    test('never adopts an object whose injection failed', () => {
      const group = new LifetimeGroup();

      expect(() => container.constructInjected(Widget, group)).toThrow(
        'Failed to inject Logger into Widget.logger: Service not registered: Logger'
      );
      expect(group.size).toBe(0);
    });
  });
});
