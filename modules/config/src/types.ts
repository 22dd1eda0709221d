// Pipeline configuration

export interface DebugEndpointConfig {
  host: string;
  port: number;
}

export interface ConnectConfig {
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
}

export interface FeedConfig {
  startUrl: string;
  notificationsLinkName: string;
  maxPages: number;
  /** Wait after each scroll for the next page of entries */
  settleMs: number;
  timeoutMs: number;
}

export interface FileConfig {
  /** Relative paths resolve against the directory of the config file */
  path: string;
}

export interface StagingConfig {
  timeoutMs: number;
}

export interface Config {
  debugEndpoint: DebugEndpointConfig;
  connect: ConnectConfig;
  feed: FeedConfig;
  store: FileConfig;
  templates: FileConfig;
  staging: StagingConfig;
}

export type DeepPartial<T> = T extends Array<infer U>
  ? Array<DeepPartial<U>>
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

export interface ConfigLoaderOptions {
  configPath?: string;
  /**
   * Cache the loaded config (default true)
   */
  cache?: boolean;
  /** Source of ENGAGE_* overrides; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export interface ValidationResult {
  valid: boolean;
  errors?: Array<{
    path: string;
    message: string;
  }>;
}
