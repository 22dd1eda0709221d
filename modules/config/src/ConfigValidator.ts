import { promises as fs } from 'node:fs';
import { Ajv, type ValidateFunction } from 'ajv';
import { ConfigError, errorMessage } from '../../errors/src/index.js';
import { mainSchema, debugEndpointSchema, connectSchema, feedSchema, fileSchema } from './schemas/index.js';
import type { Config, ValidationResult } from './types.js';

/**
 * Validates pipeline configuration against the JSON Schemas with ajv.
 */
export class ConfigValidator {
  private ajv: Ajv;
  private validateFn: ValidateFunction<Config>;

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      verbose: true,
      strict: false,
      allowUnionTypes: true
    });

    // sub-schemas first so the $refs of the main schema resolve
    this.ajv.addSchema(debugEndpointSchema);
    this.ajv.addSchema(connectSchema);
    this.ajv.addSchema(feedSchema);
    this.ajv.addSchema(fileSchema);

    this.validateFn = this.ajv.compile<Config>(mainSchema);
  }

  validate(config: unknown): ValidationResult {
    if (this.validateFn(config)) {
      return { valid: true };
    }
    const errors = (this.validateFn.errors || []).map((error) => ({
      path: error.instancePath || '/',
      message: error.message || 'invalid value'
    }));
    return { valid: false, errors };
  }

  /**
   * Narrows `config` to a Config or throws a ConfigError listing every
   * schema violation.
   */
  parse(config: unknown, source = '<memory>'): Config {
    if (this.validateFn(config)) return config;
    const details = (this.validateFn.errors || []).map((e) => `${e.instancePath || '/'}: ${e.message || 'invalid value'}`);
    throw new ConfigError(`config ${source} is invalid:\n  - ${details.join('\n  - ')}`, { source, details });
  }

  async validateFile(configPath: string): Promise<ValidationResult> {
    try {
      const content = await fs.readFile(configPath, 'utf-8');
      const config: unknown = JSON.parse(content);
      return this.validate(config);
    } catch (error) {
      return {
        valid: false,
        errors: [{ path: configPath, message: errorMessage(error) }]
      };
    }
  }

  getDefaultConfig(): Config {
    return {
      debugEndpoint: {
        host: 'localhost',
        port: 9222
      },
      connect: {
        timeoutMs: 10000,
        retries: 5,
        retryDelayMs: 3000
      },
      feed: {
        startUrl: 'https://room.rakuten.co.jp/items',
        notificationsLinkName: 'お知らせ',
        maxPages: 10,
        settleMs: 1500,
        timeoutMs: 15000
      },
      store: { path: 'records.json' },
      templates: { path: 'templates.json' },
      staging: { timeoutMs: 60000 }
    };
  }
}
