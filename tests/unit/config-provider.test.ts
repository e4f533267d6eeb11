/**
 * Unit tests for ConfigProvider
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ConfigProvider } from '../../src/services/config-provider.js';
import { defaultDaemonConfig, type DaemonConfig } from '../../src/models/daemon-config.js';
import { ConfigurationError } from '../../src/lib/errors/DaemonErrors.js';
import { createTempDir, unwrap, type TempDir } from '../helpers/daemon-test-helper.js';

describe('ConfigProvider', () => {
  let temp: TempDir;
  let configPath: string;

  beforeEach(() => {
    temp = createTempDir();
    configPath = join(temp.path, 'config.json');
  });

  afterEach(() => {
    temp.cleanup();
  });

  describe('loading', () => {
    it('should use defaults when no file exists', () => {
      const provider = new ConfigProvider(configPath);

      expect(provider.getConfig()).toEqual(defaultDaemonConfig());
      expect(provider.getWarnings()).toEqual([]);
    });

    it('should fill missing values from defaults', () => {
      writeFileSync(configPath, JSON.stringify({ suggestions: { max_suggestions: 3 } }));

      const config = new ConfigProvider(configPath).getConfig();

      expect(config.suggestions.max_suggestions).toBe(3);
      expect(config.suggestions.min_confidence).toBe(0.3);
    });

    it('should fall back to defaults on an invalid value', () => {
      writeFileSync(configPath, JSON.stringify({ suggestions: { max_suggestions: 0 } }));

      const provider = new ConfigProvider(configPath);

      expect(provider.getConfig()).toEqual(defaultDaemonConfig());
      expect(provider.getWarnings()[0]).toMatch(/^Invalid configuration: suggestions\.max_suggestions: /);
      expect(provider.getWarnings()[1]).toBe('Falling back to default configuration');
    });

    it('should warn on unparseable JSON', () => {
      writeFileSync(configPath, '{ not json');

      const provider = new ConfigProvider(configPath);

      expect(provider.getConfig()).toEqual(defaultDaemonConfig());
      expect(provider.getWarnings()[0]).toMatch(/^Failed to load configuration from /);
    });

    it('should apply overrides over the file', () => {
      writeFileSync(configPath, JSON.stringify({ suggestions: { max_suggestions: 3, semantic_k: 4 } }));

      const config = new ConfigProvider(configPath, {
        overrides: { suggestions: { max_suggestions: 8 } },
      }).getConfig();

      expect(config.suggestions.max_suggestions).toBe(8);
      expect(config.suggestions.semantic_k).toBe(4);
    });
  });

  describe('get', () => {
    it('should read a section or a leaf by dotted key', () => {
      const provider = new ConfigProvider(null);

      expect(unwrap(provider.get('privacy.retention_days'))).toBe(90);
      expect(unwrap(provider.get('daemon'))).toEqual(defaultDaemonConfig().daemon);
    });

    it('should reject an unknown key', () => {
      const result = new ConfigProvider(null).get('suggestions.nope');

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(ConfigurationError);
        expect(result.error.field).toBe('suggestions.nope');
      }
    });

    it('should return copies', () => {
      const provider = new ConfigProvider(null);
      const paths = unwrap(provider.get('privacy.excluded_paths'));
      if (Array.isArray(paths)) {
        paths.push('/mutated');
      }

      expect(unwrap(provider.get('privacy.excluded_paths'))).toEqual(defaultDaemonConfig().privacy.excluded_paths);
    });
  });

  describe('set', () => {
    it('should persist the new value', () => {
      const provider = new ConfigProvider(configPath);

      unwrap(provider.set('suggestions.max_suggestions', 7));

      const saved: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      expect(saved).toMatchObject({ suggestions: { max_suggestions: 7 } });
      expect(new ConfigProvider(configPath).getConfig().suggestions.max_suggestions).toBe(7);
    });

    it('should reject a value the schema refuses and keep the old one', () => {
      const provider = new ConfigProvider(configPath);

      const result = provider.set('suggestions.min_confidence', 2);

      expect(result.isErr()).toBe(true);
      expect(provider.getConfig().suggestions.min_confidence).toBe(0.3);
    });

    it('should refuse to replace a whole section', () => {
      expect(new ConfigProvider(null).set('suggestions', {}).isErr()).toBe(true);
    });

    it('should refuse unknown keys', () => {
      expect(new ConfigProvider(null).set('suggestions.bogus', 1).isErr()).toBe(true);
      expect(new ConfigProvider(null).set('bogus.key', 1).isErr()).toBe(true);
    });

    it('should notify listeners with the new configuration', () => {
      const provider = new ConfigProvider(null);
      const seen: Array<[string, DaemonConfig]> = [];
      provider.onConfigChange((config, key) => seen.push([key, config]));

      unwrap(provider.set('privacy.excluded_patterns', ['hunter2']));

      expect(seen).toHaveLength(1);
      expect(seen[0]?.[0]).toBe('privacy.excluded_patterns');
      expect(seen[0]?.[1].privacy.excluded_patterns).toEqual(['hunter2']);
    });
  });
});
