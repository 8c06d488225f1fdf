import 'reflect-metadata';
import { Container } from '../src/core/container/Container';
import { RegistrationState } from '../src/core/container/IContainer';
import { ServiceIdentifier, toServiceKey } from '../src/core/container/ServiceKey';

// Global test utilities
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    // eslint-disable-next-line @typescript-eslint/ban-types
    interface Matchers<R, T = {}> {
      toHaveRegistrationState(identifier: ServiceIdentifier, state: RegistrationState | undefined): R;
    }
  }
}

// Custom matchers
expect.extend({
  toHaveRegistrationState(received: unknown, identifier: ServiceIdentifier, state: RegistrationState | undefined) {
    const key = toServiceKey(identifier);

    if (!(received instanceof Container)) {
      return {
        message: () => `expected a Container but received ${typeof received}`,
        pass: false,
      };
    }

    const actual = received.getState(key);
    return {
      message: () => `expected ${key.id} to be in state ${String(state)} but it is ${String(actual)}`,
      pass: actual === state,
    };
  },
});
