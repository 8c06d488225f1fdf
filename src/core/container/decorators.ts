import 'reflect-metadata';
import { RegistrationOptions } from './IContainer';
import { ServiceIdentifier, ServiceKey, toServiceKey } from './ServiceKey';

// Metadata keys
export const INJECTABLE_METADATA_KEY = Symbol.for('service-registry:injectable');
export const INJECT_METADATA_KEY = Symbol.for('service-registry:inject');
export const POST_CONSTRUCT_METADATA_KEY = Symbol.for('service-registry:post-construct');

export interface InjectionSlotMetadata {
  key: ServiceKey;
  property: string | symbol;
}

function isInjectionSlotMetadata(value: unknown): value is InjectionSlotMetadata {
  return (
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    value.key instanceof ServiceKey &&
    'property' in value &&
    (typeof value.property === 'string' || typeof value.property === 'symbol')
  );
}

/**
 * 标记类为可注入的，并给出默认注册选项
 */
export function Injectable(options: RegistrationOptions = {}) {
  return function <T extends abstract new (...args: never[]) => unknown>(target: T): void {
    Reflect.defineMetadata(INJECTABLE_METADATA_KEY, { ...options }, target);
  };
}

/**
 * 注入特定的服务（属性注入）
 */
export function Inject(identifier: ServiceIdentifier) {
  const key = toServiceKey(identifier);

  return (target: object, property: string | symbol): void => {
    // 复制继承来的列表，避免修改父类的元数据
    const slots = getInjectionSlots(target).filter(slot => slot.property !== property);
    slots.push({ key, property });
    Reflect.defineMetadata(INJECT_METADATA_KEY, slots, target);
  };
}

/**
 * 标记注入完成后调用的方法
 */
export function PostConstruct() {
  return (target: object, property: string | symbol, _descriptor: PropertyDescriptor): void => {
    Reflect.defineMetadata(POST_CONSTRUCT_METADATA_KEY, property, target);
  };
}

/**
 * 读取注入点，父类声明的在前
 */
export function getInjectionSlots(target: object): InjectionSlotMetadata[] {
  const value: unknown = Reflect.getMetadata(INJECT_METADATA_KEY, target);
  return Array.isArray(value) ? value.filter(isInjectionSlotMetadata) : [];
}

export function getPostConstructMethod(target: object): string | symbol | undefined {
  const value: unknown = Reflect.getMetadata(POST_CONSTRUCT_METADATA_KEY, target);
  return typeof value === 'string' || typeof value === 'symbol' ? value : undefined;
}

/**
 * 获取可注入元数据
 */
export function getInjectableMetadata(target: object): RegistrationOptions | null {
  const value: unknown = Reflect.getMetadata(INJECTABLE_METADATA_KEY, target);
  if (typeof value !== 'object' || value === null) {
    return null;
  }

  const options: RegistrationOptions = {};
  const scope: unknown = Reflect.get(value, 'scope');
  const weak: unknown = Reflect.get(value, 'weak');
  if (typeof scope === 'string') {
    options.scope = scope;
  }
  if (typeof weak === 'boolean') {
    options.weak = weak;
  }
  return options;
}

/**
 * 检查类是否标记为可注入的
 */
export function isInjectable(target: object): boolean {
  return Reflect.hasMetadata(INJECTABLE_METADATA_KEY, target);
}
