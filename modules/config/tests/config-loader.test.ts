import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigLoader, BUNDLED_TEMPLATES_PATH, envOverrides } from '../src/ConfigLoader.js';
import { ConfigError } from '../../errors/src/index.js';

describe('ConfigLoader', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'engage-config-'));
    configPath = path.join(dir, 'config.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('load()', () => {
    it('loads a valid config file', async () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      const config = loader.getDefaultConfig();
      config.feed.maxPages = 3;
      await fs.writeFile(configPath, JSON.stringify(config, null, 2), 'utf-8');

      assert.deepEqual(await loader.load(), config);
    });

    it('fails when the file is missing', async () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      await assert.rejects(loader.load(), (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.equal(err.message, `config file not found: ${configPath} (run "engage config init")`);
        return true;
      });
    });

    it('writes the defaults with createIfMissing', async () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      const config = await loader.load({ createIfMissing: true });
      assert.deepEqual(config, loader.getDefaultConfig());
      const written: unknown = JSON.parse(await fs.readFile(configPath, 'utf-8'));
      assert.deepEqual(written, loader.getDefaultConfig());
    });

    it('uses the defaults without writing with defaultsIfMissing', async () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      const config = await loader.load({ defaultsIfMissing: true });
      assert.equal(config.debugEndpoint.port, 9222);
      await assert.rejects(fs.access(configPath));
    });

    it('caches the loaded config', async () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      const first = await loader.load({ defaultsIfMissing: true });
      assert.equal(await loader.load(), first);
      assert.equal(loader.get(), first);
    });

    it('rejects an invalid file on reload', async () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      await loader.load({ createIfMissing: true });
      await fs.writeFile(configPath, JSON.stringify({ debugEndpoint: { port: 'invalid' } }), 'utf-8');
      await assert.rejects(loader.reload(), /is invalid/);
    });

    it('wraps malformed JSON in a ConfigError', async () => {
      await fs.writeFile(configPath, '{ "debugEndpoint": ', 'utf-8');
      const loader = new ConfigLoader({ configPath, env: {} });
      await assert.rejects(loader.load(), ConfigError);
    });

    it('applies ENGAGE_DEBUG_HOST and ENGAGE_DEBUG_PORT', async () => {
      const loader = new ConfigLoader({
        configPath,
        env: { ENGAGE_DEBUG_HOST: '127.0.0.1', ENGAGE_DEBUG_PORT: '9333' }
      });
      const config = await loader.load({ defaultsIfMissing: true });
      assert.deepEqual(config.debugEndpoint, { host: '127.0.0.1', port: 9333 });
    });

    it('takes the path from ENGAGE_CONFIG_PATH', () => {
      const loader = new ConfigLoader({ env: { ENGAGE_CONFIG_PATH: configPath } });
      assert.equal(loader.getConfigPath(), configPath);
    });
  });

  describe('envOverrides()', () => {
    it('is empty without variables', () => {
      assert.deepEqual(envOverrides({}), {});
    });

    it('rejects a port that is not a number', () => {
      assert.throws(() => envOverrides({ ENGAGE_DEBUG_PORT: 'abc' }), /ENGAGE_DEBUG_PORT must be a port number, got "abc"/);
    });
  });

  describe('ensureExists()', () => {
    it('creates the file once', async () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      assert.equal(await loader.ensureExists(), true);
      assert.equal(await loader.ensureExists(), false);
    });

    it('does not overwrite an existing file', async () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      const config = loader.getDefaultConfig();
      config.staging.timeoutMs = 5000;
      await loader.save(config);

      await loader.ensureExists();

      const reloaded = await new ConfigLoader({ configPath, env: {} }).load();
      assert.equal(reloaded.staging.timeoutMs, 5000);
    });
  });

  describe('save()', () => {
    it('refuses an invalid config and keeps the file', async () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      await loader.ensureExists();
      const config = loader.getDefaultConfig();
      config.feed.maxPages = 0;
      await assert.rejects(loader.save(config), ConfigError);
      const onDisk = await new ConfigLoader({ configPath, env: {} }).load();
      assert.equal(onDisk.feed.maxPages, 10);
    });
  });

  describe('resolvePath()', () => {
    it('resolves relative paths against the config directory', () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      const config = loader.getDefaultConfig();
      assert.equal(loader.resolvePath(config, 'store'), path.join(dir, 'records.json'));
      config.templates.path = '/etc/engage/templates.json';
      assert.equal(loader.resolvePath(config, 'templates'), '/etc/engage/templates.json');
    });
  });

  describe('merge()', () => {
    it('overrides only the given fields', () => {
      const loader = new ConfigLoader({ configPath, env: {} });
      const base = loader.getDefaultConfig();
      const merged = loader.merge(base, { feed: { maxPages: 2 } });
      assert.equal(merged.feed.maxPages, 2);
      assert.equal(merged.feed.settleMs, base.feed.settleMs);
      assert.deepEqual(merged.debugEndpoint, base.debugEndpoint);
    });
  });

  it('points at the bundled template file', async () => {
    const stat = await fs.stat(BUNDLED_TEMPLATES_PATH);
    assert.ok(stat.isFile());
  });
});
