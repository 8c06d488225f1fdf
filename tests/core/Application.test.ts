import { Application, ILifecycleAware } from '../../src/core';

class Worker implements ILifecycleAware {
  constructor(private readonly name: string, private readonly events: string[]) {}

  start(): void {
    this.events.push(`start ${this.name}`);
  }

  async stop(): Promise<void> {
    this.events.push(`stop ${this.name}`);
  }

  destroy(): void {
    this.events.push(`destroy ${this.name}`);
  }
}

class StuckWorker extends Worker {
  async stop(): Promise<void> {
    throw new Error('still busy');
  }
}

describe('Application', () => {
  let events: string[];

  beforeEach(() => {
    events = [];
  });

  function createApplication(eagerServices: string[]): Application {
    return new Application({ name: 'test-app', version: '0.0.1', eagerServices }, { defaultScope: 'application' })
      .use(container => {
        container.registerFactory('scheduler', () => new Worker('scheduler', events));
        container.registerFactory('mailer', () => new Worker('mailer', events), [], { scope: 'request' });
      });
  }

  test('starts eager services in order and stops them in reverse', async () => {
    const app = createApplication(['scheduler', 'mailer']);
    app.onShutdown(async () => {
      events.push('shutdown');
    });

    await app.start();
    await app.stop();

    expect(events).toEqual([
      'start scheduler',
      'start mailer',
      'stop mailer',
      'stop scheduler',
      'shutdown',
      'destroy mailer',
      'destroy scheduler'
    ]);
    expect(app.getContainer().getRegisteredServices()).toEqual([]);
  });

  test('keeps stopping when a service fails to stop', async () => {
    const app = createApplication(['scheduler', 'stuck']).use(container => {
      container.registerFactory('stuck', () => new StuckWorker('stuck', events));
    });
    await app.start();

    await expect(app.stop()).resolves.toBeUndefined();
    expect(events).toEqual([
      'start scheduler',
      'start stuck',
      'stop scheduler',
      'destroy stuck',
      'destroy scheduler'
    ]);
  });

  test('refuses to initialize with unregistered dependencies', async () => {
    const app = new Application({ eagerServices: [] }).use(container => {
      container.registerFactory('report', (source: object) => ({ source }), ['Missing']);
    });

    await expect(app.initialize()).rejects.toThrow(
      'Service validation failed: Service report depends on unregistered service Missing'
    );
    expect(app.getStatus().initialized).toBe(false);
  });

  test('rejects installers after initialization', async () => {
    const app = createApplication([]);
    await app.initialize();

    expect(() => app.use(() => undefined)).toThrow('Cannot add service installers after initialization');
  });

  test('stops what already started when an eager service fails', async () => {
    const app = createApplication(['scheduler', 'broken']).use(container => {
      container.registerFactory('broken', (): object => {
        throw new Error('no credentials');
      });
    });

    await expect(app.start()).rejects.toThrow('Failed to construct service broken: no credentials');
    expect(events).toEqual(['start scheduler', 'stop scheduler', 'destroy scheduler']);
    expect(app.getStatus().started).toBe(false);
  });

  test('reports status and health', async () => {
    const app = createApplication(['scheduler', 'mailer']);

    expect(await app.healthCheck()).toEqual({
      status: 'unhealthy',
      details: { reason: 'Application not started' }
    });

    await app.start();

    expect(app.getStatus()).toMatchObject({
      name: 'test-app',
      version: '0.0.1',
      initialized: true,
      started: true,
      services: 2,
      scopes: ['application', 'request']
    });
    expect(await app.healthCheck()).toEqual({
      status: 'healthy',
      details: { services: 2, errors: [] }
    });

    await app.stop();
  });
});
