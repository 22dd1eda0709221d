export { ConfigLoader, BUNDLED_TEMPLATES_PATH, envOverrides } from './ConfigLoader.js';
export { ConfigValidator } from './ConfigValidator.js';

export type {
  Config,
  DebugEndpointConfig,
  ConnectConfig,
  FeedConfig,
  FileConfig,
  StagingConfig,
  DeepPartial,
  ConfigLoaderOptions,
  ValidationResult
} from './types.js';

export * from './schemas/index.js';
