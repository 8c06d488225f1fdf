import { IPluginLocator, ServiceType } from '../container/IContainer';
import { getPluginMetadata } from './decorators';

interface CatalogEntry {
  key?: string;
  type: ServiceType;
}

/**
 * In-memory plugin locator. Without a selector the first type added to the
 * category wins.
 */
export class PluginCatalog implements IPluginLocator {
  private categories = new Map<string, CatalogEntry[]>();

  add(category: string, type: ServiceType, key?: string): this {
    const entry: CatalogEntry = { type, key: key ?? getPluginMetadata(type)?.key };
    const entries = this.categories.get(category);
    if (entries) {
      entries.push(entry);
    } else {
      this.categories.set(category, [entry]);
    }
    return this;
  }

  resolvePlugin(category: string, selector?: string): ServiceType | undefined {
    const entries = this.categories.get(category) ?? [];
    const match = selector === undefined
      ? entries[0]
      : entries.find(entry => entry.key === selector);
    return match?.type;
  }

  categoryNames(): string[] {
    return Array.from(this.categories.keys());
  }
}
