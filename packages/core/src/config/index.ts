export {
  SwitchyardConfigSchema,
  ProviderKindSchema,
  DEFAULT_CONFIG,
  type SwitchyardConfig,
  type ProviderKind,
  type CatalogEntry,
  type RouterConfig,
  type SessionsConfig,
  type DisposableConfig,
  type ProxyConfig,
  type ProviderEntry,
} from './schema.js';
export { loadConfig, parseConfig, deepMerge } from './loader.js';
export { validateConfig, type ValidationResult, type ValidationError, type ValidationWarning } from './validator.js';
export { resolveSwitchyardHome, resolveStateDir, buildPaths, ensureDirectories, type SwitchyardPaths } from './paths.js';
