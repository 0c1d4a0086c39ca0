import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join, resolve } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_CONFIG_PATH,
  getConfigPath,
  getDefaultConfig,
  loadConfig,
  mergeConfig,
} from '../../../../src/core/config/loader.js';
import { ConfigSchema } from '../../../../src/core/config/schema.js';
import { ConfigError } from '../../../../src/utils/errors.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `hexprobe-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(testDir, '.hexprobe'), { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should return the schema defaults', () => {
      expect(getDefaultConfig()).toEqual(ConfigSchema.parse({}));
    });
  });

  describe('loadConfig', () => {
    it('should return default config when no config file exists', async () => {
      expect(await loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should load config from file', async () => {
      const configContent = `
log_level: warn
classification:
  decision_policy: strict
  exclude: ['com.acme.legacy.**']
  explicit:
    com.acme.orders.domain.OrderId: VALUE_OBJECT
analysis:
  layers:
    - name: domain
      packages: ['**.domain']
`;
      await writeFile(join(testDir, '.hexprobe', 'config.yaml'), configContent);

      const config = await loadConfig(testDir);

      expect(config.log_level).toBe('warn');
      expect(config.classification.decision_policy).toBe('strict');
      expect(config.classification.exclude).toEqual(['com.acme.legacy.**']);
      expect(config.classification.explicit).toEqual({ 'com.acme.orders.domain.OrderId': 'VALUE_OBJECT' });
      expect(config.analysis.layers).toEqual([{ name: 'domain', packages: ['**.domain'], can_depend_on: [] }]);
    });

    it('should load config from a custom path', async () => {
      await writeFile(join(testDir, 'custom.yaml'), 'log_level: debug\n');

      const config = await loadConfig(testDir, 'custom.yaml');

      expect(config.log_level).toBe('debug');
    });

    it('should throw ConfigError for invalid values', async () => {
      await writeFile(join(testDir, '.hexprobe', 'config.yaml'), 'log_level: loud\n');

      try {
        await loadConfig(testDir);
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(error.code).toBe('C001');
          expect(error.message.startsWith(`Failed to load config from ${getConfigPath(testDir)}: `)).toBe(true);
          expect(error.details?.path).toBe(getConfigPath(testDir));
        }
      }
    });
  });

  describe('mergeConfig', () => {
    it('should fill missing sections with defaults', () => {
      const config = mergeConfig({ log_level: 'error' });

      expect(config.log_level).toBe('error');
      expect(config.classification.decision_policy).toBe('default');
    });
  });

  describe('getConfigPath', () => {
    it('should resolve the default path under the project root', () => {
      expect(getConfigPath(testDir)).toBe(resolve(testDir, DEFAULT_CONFIG_PATH));
    });
  });
});
