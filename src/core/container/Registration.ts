import { RegistrationState, ScopeName, ServiceSource } from './IContainer';
import { ServiceKey } from './ServiceKey';

/**
 * One binding of a key. A registration moves
 * UNCONSTRUCTED → CONSTRUCTING → CONSTRUCTED (or FAILED) once; re-registering
 * the key always creates a new Registration.
 */
export class Registration<T = unknown> {
  private _state = RegistrationState.UNCONSTRUCTED;
  private _instance: T | undefined;
  private _failure: Error | undefined;
  private _discarded = false;
  private _released = false;
  private _owned = true;

  constructor(
    public readonly key: ServiceKey,
    public readonly source: ServiceSource<T>,
    public readonly scope: ScopeName,
    public readonly weak: boolean
  ) {}

  get state(): RegistrationState {
    return this._state;
  }

  get instance(): T | undefined {
    return this._instance;
  }

  get failure(): Error | undefined {
    return this._failure;
  }

  get discarded(): boolean {
    return this._discarded;
  }

  get dependencies(): ServiceKey[] {
    return this.source.kind === 'function' ? this.source.dependencies : [];
  }

  beginConstruction(): void {
    if (this._state !== RegistrationState.UNCONSTRUCTED) {
      throw new Error(`Registration ${this.key.id} cannot start construction from state ${this._state}`);
    }
    this._state = RegistrationState.CONSTRUCTING;
  }

  /**
   * `owned` is false when the instance belongs to another registration; such an
   * instance is never handed out by `discard()`.
   */
  complete(instance: T, owned: boolean = true): void {
    if (this._state !== RegistrationState.CONSTRUCTING) {
      throw new Error(`Registration ${this.key.id} is not constructing`);
    }
    this._instance = instance;
    this._owned = owned;
    this._state = RegistrationState.CONSTRUCTED;
  }

  fail(error: Error): void {
    this._failure = error;
    this._instance = undefined;
    this._state = RegistrationState.FAILED;
  }

  /**
   * 从注册表移除时调用，返回需要销毁的实例（只返回一次）
   */
  discard(): T | undefined {
    this._discarded = true;
    if (this._released) {
      return undefined;
    }
    this._released = true;

    // Instance 来源的对象从注册起就归注册表所有
    if (this.source.kind === 'instance') {
      return this.source.instance;
    }
    return this._owned ? this._instance : undefined;
  }

  ownsInstance(instance: unknown): boolean {
    if (this._released) {
      return false;
    }
    if (this.source.kind === 'instance') {
      return this.source.instance === instance;
    }
    return this._owned && this._instance === instance;
  }
}
