import { log } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

export interface IDestroyable {
  destroy(): void;
}

export interface IDisposable {
  dispose(): void;
}

function hasMethod<K extends string>(value: object, name: K): value is Record<K, () => unknown> {
  return typeof Reflect.get(value, name) === 'function';
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && hasMethod(value, 'then');
}

/**
 * 销毁实例：优先调用 destroy()，其次 dispose()，都没有则不做任何事
 */
export function destroyInstance(instance: unknown): void {
  if ((typeof instance !== 'object' && typeof instance !== 'function') || instance === null) {
    return;
  }

  let result: unknown;
  if (hasMethod(instance, 'destroy')) {
    result = instance.destroy();
  } else if (hasMethod(instance, 'dispose')) {
    result = instance.dispose();
  } else {
    return;
  }

  // 异步销毁不阻塞 teardown，但失败要记录
  if (isThenable(result)) {
    result.then(undefined, (error: unknown) => {
      log.warn('Asynchronous destroy failed', { error: errorMessage(error) });
    });
  }
}

/**
 * destroyInstance 的安全版本：异常只记录，不中断调用方的清理流程
 */
export function destroyQuietly(instance: unknown, context: string): boolean {
  try {
    destroyInstance(instance);
    return true;
  } catch (error) {
    log.warn(`⚠️ Error destroying ${context}`, { error: errorMessage(error) });
    return false;
  }
}
