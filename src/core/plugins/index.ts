export { Plugin, getPluginMetadata, isPluginType, PLUGIN_METADATA_KEY } from './decorators';
export type { PluginMetadata } from './decorators';
export { PluginCatalog } from './PluginCatalog';
export { DirectoryPluginLocator } from './DirectoryPluginLocator';
export type { PluginCandidate } from './DirectoryPluginLocator';
