import 'reflect-metadata';
import { ServiceType } from '../container/IContainer';

export const PLUGIN_METADATA_KEY = Symbol.for('service-registry:plugin');

export interface PluginMetadata {
  key?: string;
}

/**
 * 标记类为插件，key 用于按选择器筛选
 */
export function Plugin(metadata: PluginMetadata = {}) {
  return function <T extends abstract new (...args: never[]) => unknown>(target: T): void {
    Reflect.defineMetadata(PLUGIN_METADATA_KEY, { ...metadata }, target);
  };
}

export function getPluginMetadata(target: object): PluginMetadata | null {
  // 只看类自身，不继承父类的插件声明
  const value: unknown = Reflect.getOwnMetadata(PLUGIN_METADATA_KEY, target);
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const key: unknown = Reflect.get(value, 'key');
  return typeof key === 'string' ? { key } : {};
}

export function isPluginType(value: unknown): value is ServiceType {
  return typeof value === 'function' && getPluginMetadata(value) !== null;
}
