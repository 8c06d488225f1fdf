import { ILifetimeOwner } from './IContainer';
import { destroyQuietly } from './lifecycle';

/**
 * Owner for objects built with `constructInjected`. Destroying the group
 * destroys its children, last adopted first.
 */
export class LifetimeGroup implements ILifetimeOwner {
  private children: object[] = [];
  private destroyed = false;

  constructor(public readonly name: string = 'lifetime-group') {}

  adopt(child: object): void {
    if (this.destroyed) {
      throw new Error(`Lifetime group ${this.name} has been destroyed`);
    }
    if (!this.children.includes(child)) {
      this.children.push(child);
    }
  }

  get size(): number {
    return this.children.length;
  }

  has(child: object): boolean {
    return this.children.includes(child);
  }

  destroy(): void {
    const children = this.children.reverse();
    this.children = [];
    this.destroyed = true;

    for (const child of children) {
      destroyQuietly(child, `child of ${this.name}`);
    }
  }
}
