import { ScopeName } from './IContainer';
import { Registration } from './Registration';
import { ServiceKey } from './ServiceKey';
import { ServiceExistsError } from './errors';
import { destroyQuietly } from './lifecycle';
import { log } from '../../utils/logger';

/**
 * Registration bookkeeping: one active registration per key, plus the
 * insertion order of each scope for teardown.
 */
export class ServiceRegistry {
  private registrations = new Map<string, Registration>();
  // Map 保持作用域首次使用的顺序
  private scopes = new Map<ScopeName, Registration[]>();

  /**
   * 安装注册。已有弱注册会被销毁替换，已有强注册则拒绝。
   */
  add(registration: Registration): void {
    const existing = this.registrations.get(registration.key.id);

    if (existing) {
      if (!existing.weak) {
        throw new ServiceExistsError(registration.key);
      }

      log.debug('Overriding weak registration', {
        key: existing.key.id,
        previousScope: existing.scope,
        previousState: existing.state
      });
      this.remove(existing);
    }

    this.registrations.set(registration.key.id, registration);

    const ordered = this.scopes.get(registration.scope);
    if (ordered) {
      ordered.push(registration);
    } else {
      this.scopes.set(registration.scope, [registration]);
    }

    log.debug('Service registered', {
      key: registration.key.id,
      kind: registration.source.kind,
      scope: registration.scope,
      weak: registration.weak
    });
  }

  get(key: ServiceKey): Registration | undefined {
    return this.registrations.get(key.id);
  }

  has(key: ServiceKey): boolean {
    return this.registrations.has(key.id);
  }

  keys(): ServiceKey[] {
    return Array.from(this.registrations.values(), registration => registration.key);
  }

  values(): Registration[] {
    return Array.from(this.registrations.values());
  }

  /**
   * 实例是否已由某个注册持有（负责销毁）
   */
  isOwned(instance: object): boolean {
    return this.values().some(registration => registration.ownsInstance(instance));
  }

  scopeNames(): ScopeName[] {
    return Array.from(this.scopes.keys());
  }

  /**
   * 销毁作用域内的所有注册（逆序），返回被移除的注册数
   */
  teardownScope(scope: ScopeName): number {
    const ordered = this.scopes.get(scope);
    if (!ordered) {
      return 0;
    }
    this.scopes.delete(scope);

    const removed = ordered.slice().reverse();
    for (const registration of removed) {
      this.detach(registration);
      destroyQuietly(registration.discard(), `service ${registration.key.id}`);
    }

    log.debug('Scope torn down', { scope, services: removed.map(r => r.key.id) });
    return removed.length;
  }

  /**
   * 按首次使用的逆序销毁所有作用域
   */
  teardownAll(): void {
    for (const scope of this.scopeNames().reverse()) {
      this.teardownScope(scope);
    }
  }

  private remove(registration: Registration): void {
    this.detach(registration);

    const ordered = this.scopes.get(registration.scope);
    if (ordered) {
      const index = ordered.indexOf(registration);
      if (index >= 0) {
        ordered.splice(index, 1);
      }
      if (ordered.length === 0) {
        this.scopes.delete(registration.scope);
      }
    }

    destroyQuietly(registration.discard(), `service ${registration.key.id}`);
  }

  private detach(registration: Registration): void {
    if (this.registrations.get(registration.key.id) === registration) {
      this.registrations.delete(registration.key.id);
    }
  }
}
