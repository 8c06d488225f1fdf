import fs from 'fs';
import path from 'path';
import { IPluginLocator, ServiceType } from '../container/IContainer';
import { getPluginMetadata, isPluginType } from './decorators';
import { log } from '../../utils/logger';

const MODULE_EXTENSIONS = ['.js', '.ts'];
const IGNORED_SUFFIXES = ['.d.ts', '.test.ts', '.spec.ts', '.test.js', '.spec.js'];

export interface PluginCandidate {
  file: string;
  key?: string;
  type: ServiceType;
}

function isPluginModule(fileName: string): boolean {
  return (
    MODULE_EXTENSIONS.includes(path.extname(fileName)) &&
    !IGNORED_SUFFIXES.some(suffix => fileName.endsWith(suffix))
  );
}

/**
 * Finds plugins in a category directory. A relative category is looked up
 * under `pluginRoot`; an absolute one is used as is. Only the directory
 * itself is scanned, and every export marked with `@Plugin` is a candidate.
 */
export class DirectoryPluginLocator implements IPluginLocator {
  private cache = new Map<string, PluginCandidate[]>();

  constructor(private readonly pluginRoot: string) {}

  resolvePlugin(category: string, selector?: string): ServiceType | undefined {
    const candidates = this.candidates(category);
    const match = selector === undefined
      ? candidates[0]
      : candidates.find(candidate => candidate.key === selector);

    if (match) {
      log.debug('Plugin resolved', { category, selector, file: match.file, type: match.type.name });
    }
    return match?.type;
  }

  /**
   * 列出分类目录下的所有候选（按文件名排序）
   */
  candidates(category: string): PluginCandidate[] {
    const directory = this.directoryFor(category);
    const cached = this.cache.get(directory);
    if (cached) {
      return cached;
    }

    const candidates: PluginCandidate[] = [];
    if (fs.existsSync(directory) && fs.statSync(directory).isDirectory()) {
      const files = fs.readdirSync(directory, { withFileTypes: true })
        .filter(entry => entry.isFile() && isPluginModule(entry.name))
        .map(entry => entry.name)
        .sort();

      for (const file of files) {
        candidates.push(...this.loadModule(path.join(directory, file)));
      }
    } else {
      log.warn('Plugin category directory not found', { category, directory });
    }

    this.cache.set(directory, candidates);
    return candidates;
  }

  directoryFor(category: string): string {
    return path.isAbsolute(category)
      ? path.normalize(category)
      : path.resolve(this.pluginRoot, category);
  }

  private loadModule(file: string): PluginCandidate[] {
    // 插件模块在运行时同步加载
    // eslint-disable-next-line @typescript-eslint/no-var-requires
    const exported: unknown = require(file);
    if ((typeof exported !== 'object' && typeof exported !== 'function') || exported === null) {
      return [];
    }

    const values: unknown[] = typeof exported === 'function' ? [exported] : Object.values(exported);
    // 同一个类可能同时以默认导出和具名导出出现
    return Array.from(new Set(values.filter(isPluginType)))
      .map(type => ({ file, type, key: getPluginMetadata(type)?.key }));
  }
}
