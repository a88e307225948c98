/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge, SAMPLE_CONFIG } from "./defaults";
// Loader
export { ConfigError, loadConfig } from "./loader";
// Resolver
export {
  defaultLockfile,
  getRetention,
  getSyncerForSource,
  getSyncOptions,
  resolvePaths,
} from "./resolver";
// Validator
export { validateConfig } from "./validator";
