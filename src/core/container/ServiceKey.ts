/**
 * Identity of a registration. Two keys are equal when their ids are equal;
 * the registry indexes registrations by `id`.
 *
 * `T` is carried only at compile time and lets `resolve(key)` return the
 * service type without annotations at the call site.
 */
export class ServiceKey<T = unknown> {
  // 仅用于类型推断
  declare readonly __type?: T;

  private constructor(public readonly id: string) {}

  static of<T = unknown>(id: string): ServiceKey<T> {
    if (id.trim().length === 0) {
      throw new TypeError('Service key must not be empty');
    }
    return new ServiceKey<T>(id);
  }

  equals(other: ServiceKey): boolean {
    return this.id === other.id;
  }

  toString(): string {
    return this.id;
  }
}

export type ServiceIdentifier<T = unknown> = ServiceKey<T> | string;

export function toServiceKey<T>(identifier: ServiceIdentifier<T>): ServiceKey<T> {
  return typeof identifier === 'string' ? ServiceKey.of<T>(identifier) : identifier;
}
