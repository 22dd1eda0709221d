import { existsSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, errorMessage } from '../../errors/src/index.js';
import { createLogger } from '../../logging/src/index.js';
import { atomicWriteJson, readJsonMaybe } from '../../state/src/atomic-json.js';
import { resolveDataPath, resolveDataRoot } from '../../state/src/paths.js';
import { ConfigValidator } from './ConfigValidator.js';
import type { Config, ConfigLoaderOptions, DeepPartial, ValidationResult } from './types.js';

const logger = createLogger('config');

// from sources (modules/config/src) or from the build (dist/modules/config/src)
const TEMPLATE_CANDIDATES = ['../../../config/templates.json', '../../../../config/templates.json'].map((relative) =>
  fileURLToPath(new URL(relative, import.meta.url)),
);

/** Template file shipped with the package, copied by `engage config init` */
export const BUNDLED_TEMPLATES_PATH = TEMPLATE_CANDIDATES.find((candidate) => existsSync(candidate)) ?? TEMPLATE_CANDIDATES[0];

function mergeSection<T extends object>(base: T, override: Partial<T> | undefined): T {
  return { ...base, ...override };
}

/** ENGAGE_DEBUG_HOST / ENGAGE_DEBUG_PORT as a partial config. */
export function envOverrides(env: NodeJS.ProcessEnv): DeepPartial<Config> {
  const debugEndpoint: Partial<Config['debugEndpoint']> = {};
  const host = String(env.ENGAGE_DEBUG_HOST || '').trim();
  if (host) debugEndpoint.host = host;
  const rawPort = String(env.ENGAGE_DEBUG_PORT || '').trim();
  if (rawPort) {
    const port = Number(rawPort);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError(`ENGAGE_DEBUG_PORT must be a port number, got "${rawPort}"`, { variable: 'ENGAGE_DEBUG_PORT' });
    }
    debugEndpoint.port = port;
  }
  return Object.keys(debugEndpoint).length > 0 ? { debugEndpoint } : {};
}

/**
 * Loads, validates and caches the pipeline config file.
 */
export class ConfigLoader {
  private validator: ConfigValidator;
  private configPath: string;
  private config: Config | null = null;
  private cacheEnabled: boolean;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigLoaderOptions = {}) {
    this.validator = new ConfigValidator();
    this.cacheEnabled = options.cache !== false;
    this.env = options.env ?? process.env;

    // explicit option, then ENGAGE_CONFIG_PATH, then <data root>/config.json
    this.configPath =
      options.configPath ||
      String(this.env.ENGAGE_CONFIG_PATH || '').trim() ||
      path.join(resolveDataRoot(), 'config.json');
  }

  /**
   * Loads the config file with ENGAGE_* overrides applied.
   * A missing file is a ConfigError unless `createIfMissing` (writes the
   * defaults) or `defaultsIfMissing` (uses them without writing) is set.
   */
  async load(options: { createIfMissing?: boolean; defaultsIfMissing?: boolean } = {}): Promise<Config> {
    if (this.cacheEnabled && this.config) {
      return this.config;
    }

    let raw: unknown;
    try {
      raw = await readJsonMaybe(this.configPath);
    } catch (err) {
      throw new ConfigError(`cannot read config ${this.configPath}: ${errorMessage(err)}`, { configPath: this.configPath }, { cause: err });
    }

    let fileConfig: Config;
    if (raw === null) {
      if (options.createIfMissing) {
        logger.warn('config file not found, writing defaults', { configPath: this.configPath });
        fileConfig = this.getDefaultConfig();
        await this.write(fileConfig);
      } else if (options.defaultsIfMissing) {
        fileConfig = this.getDefaultConfig();
      } else {
        throw new ConfigError(`config file not found: ${this.configPath} (run "engage config init")`, {
          configPath: this.configPath
        });
      }
    } else {
      fileConfig = this.validator.parse(raw, this.configPath);
    }

    const config = this.merge(fileConfig, envOverrides(this.env));
    this.config = config;
    return config;
  }

  /**
   * Writes the default config when no file exists. Returns true when a file
   * was created.
   */
  async ensureExists(): Promise<boolean> {
    const existing = await readJsonMaybe(this.configPath);
    if (existing !== null) return false;
    await this.write(this.getDefaultConfig());
    logger.info('created default config', { configPath: this.configPath });
    return true;
  }

  async save(config: Config): Promise<void> {
    await this.write(config);
    this.config = this.merge(config, envOverrides(this.env));
  }

  async reload(): Promise<Config> {
    this.config = null;
    return this.load();
  }

  /** Cached config, without loading */
  get(): Config | null {
    return this.config;
  }

  async validate(): Promise<ValidationResult> {
    return this.validator.validateFile(this.configPath);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getDefaultConfig(): Config {
    return this.validator.getDefaultConfig();
  }

  /** Absolute path of the store snapshot or template file named by `config`. */
  resolvePath(config: Config, key: 'store' | 'templates'): string {
    return resolveDataPath(config[key].path, path.dirname(this.configPath));
  }

  merge(base: Config, override: DeepPartial<Config>): Config {
    return {
      debugEndpoint: mergeSection(base.debugEndpoint, override.debugEndpoint),
      connect: mergeSection(base.connect, override.connect),
      feed: mergeSection(base.feed, override.feed),
      store: mergeSection(base.store, override.store),
      templates: mergeSection(base.templates, override.templates),
      staging: mergeSection(base.staging, override.staging)
    };
  }

  private async write(config: Config): Promise<void> {
    this.validator.parse(config, this.configPath);
    await atomicWriteJson(this.configPath, config);
  }
}
