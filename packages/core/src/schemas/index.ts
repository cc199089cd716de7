export {
  DEFAULTS,
  FetcherConfigSchema,
  LoggingConfigSchema,
  LogLevel,
  type FetcherConfig,
  type LoggingConfig,
} from "./fetcher-config.js";
export {
  ManifestSchema,
  ParamFileNameSchema,
  ParamFileSchema,
  toManifestEntry,
  type Manifest,
  type ManifestEntry,
  type ParamFile,
} from "./manifest.js";
