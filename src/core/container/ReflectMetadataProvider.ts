import { IMetadataProvider, InjectionSlot, ServiceType } from './IContainer';
import { getInjectionSlots, getPostConstructMethod } from './decorators';

// 约定的后置构造方法名，未使用 @PostConstruct 时生效
export const POST_CONSTRUCT_METHOD = 'postConstruct';

function typeName(type: ServiceType): string {
  return type.name || '[Anonymous Class]';
}

/**
 * Metadata provider backed by the `@Inject` / `@PostConstruct` decorators.
 */
export class ReflectMetadataProvider implements IMetadataProvider {
  constructStandard<T>(type: ServiceType<T>): T {
    // 只接受无参或单个可选参数的构造函数
    if (type.length > 1) {
      throw new Error(
        `${typeName(type)} has no standard constructor (constructor declares ${type.length} parameters)`
      );
    }
    return new type();
  }

  injectableSlots(target: object): InjectionSlot[] {
    return getInjectionSlots(target).map(({ key, property }) => ({
      key,
      property,
      assign: (instance: object, value: unknown) => {
        if (!Reflect.set(instance, property, value)) {
          throw new Error(`Cannot assign injected property ${String(property)}`);
        }
      }
    }));
  }

  invokePostConstructHook(instance: object): void {
    const method = getPostConstructMethod(instance) ?? POST_CONSTRUCT_METHOD;
    const hook: unknown = Reflect.get(instance, method);
    if (typeof hook === 'function') {
      hook.call(instance);
    }
  }
}
