/**
 * Unit tests for environment path resolution
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationManager } from '../../src/lib/env-config.js';
import { unwrap } from '../helpers/daemon-test-helper.js';

describe('ConfigurationManager', () => {
  describe('resolvePaths', () => {
    it('should fall back to locations under HOME', () => {
      const paths = new ConfigurationManager({ HOME: '/home/tester' }).resolvePaths();

      expect(paths).toEqual({
        dataDir: '/home/tester/.local/share/cmdhint',
        runtimeDir: '/home/tester/.local/share/cmdhint/runtime',
        dbPath: '/home/tester/.local/share/cmdhint/history.db',
        indexDir: '/home/tester/.local/share/cmdhint/index',
        logDir: '/home/tester/.local/share/cmdhint/logs',
        socketPath: '/home/tester/.local/share/cmdhint/runtime/daemon.sock',
        pidPath: '/home/tester/.local/share/cmdhint/runtime/daemon.pid',
        configPath: '/home/tester/.config/cmdhint/config.json',
      });
    });

    it('should honour the XDG directories', () => {
      const paths = new ConfigurationManager({
        HOME: '/home/tester',
        XDG_DATA_HOME: '/xdg/data',
        XDG_RUNTIME_DIR: '/run/user/1000',
        XDG_CONFIG_HOME: '/xdg/config',
      }).resolvePaths();

      expect(paths.dataDir).toBe('/xdg/data/cmdhint');
      expect(paths.socketPath).toBe('/run/user/1000/cmdhint/daemon.sock');
      expect(paths.configPath).toBe('/xdg/config/cmdhint/config.json');
    });

    it('should prefer explicit variables and ignore empty ones', () => {
      const paths = new ConfigurationManager({
        HOME: '/home/tester',
        XDG_DATA_HOME: '',
        CMDHINT_DATA_DIR: '/srv/hints',
        CMDHINT_RUNTIME_DIR: '/srv/hints/run',
        CMDHINT_CONFIG_PATH: '/etc/cmdhint.json',
      }).resolvePaths();

      expect(paths.dbPath).toBe('/srv/hints/history.db');
      expect(paths.pidPath).toBe('/srv/hints/run/daemon.pid');
      expect(paths.configPath).toBe('/etc/cmdhint.json');
    });
  });

  describe('getLogLevel', () => {
    it('should accept a level in any case', () => {
      expect(unwrap(new ConfigurationManager({ CMDHINT_LOG_LEVEL: 'WARN' }).getLogLevel())).toBe('warn');
    });

    it('should be undefined when unset', () => {
      expect(unwrap(new ConfigurationManager({}).getLogLevel())).toBeUndefined();
    });

    it('should reject an unknown level', () => {
      const result = new ConfigurationManager({ CMDHINT_LOG_LEVEL: 'loud' }).getLogLevel();

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.field).toBe('CMDHINT_LOG_LEVEL');
      }
    });
  });
});
