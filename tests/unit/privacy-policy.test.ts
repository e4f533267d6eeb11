/**
 * Unit tests for PrivacyPolicy
 */

import { describe, it, expect } from 'vitest';
import { PrivacyPolicy, expandHome } from '../../src/services/privacy-policy.js';
import { defaultDaemonConfig } from '../../src/models/daemon-config.js';
import { MAX_PATTERN_LENGTH } from '../../src/constants/daemon-constants.js';

const HOME = '/home/tester';

function policy(excluded_paths: string[], excluded_patterns: string[] = []): PrivacyPolicy {
  return new PrivacyPolicy({ excluded_paths, excluded_patterns }, { homeDir: HOME });
}

describe('expandHome', () => {
  it('should expand a bare tilde and a tilde prefix', () => {
    expect(expandHome('~', HOME)).toBe(HOME);
    expect(expandHome('~/.ssh', HOME)).toBe('/home/tester/.ssh');
  });

  it('should leave other paths alone', () => {
    expect(expandHome('/etc/~x', HOME)).toBe('/etc/~x');
  });
});

describe('PrivacyPolicy', () => {
  describe('isExcluded', () => {
    it('should exclude a directory and everything below it', () => {
      const rules = policy(['~/.ssh']);

      expect(rules.isExcluded('/home/tester/.ssh')).toBe(true);
      expect(rules.isExcluded('/home/tester/.ssh/keys/old')).toBe(true);
      expect(rules.isExcluded('~/.ssh/')).toBe(true);
    });

    it('should not exclude siblings that share a prefix', () => {
      expect(policy(['/srv/secret']).isExcluded('/srv/secrets')).toBe(false);
    });

    it('should exclude everything under the root directory', () => {
      expect(policy(['/']).isExcluded('/tmp')).toBe(true);
    });

    it('should match glob entries and their descendants', () => {
      const rules = policy(['/work/*/private']);

      expect(rules.isExcluded('/work/acme/private')).toBe(true);
      expect(rules.isExcluded('/work/acme/private/notes')).toBe(true);
      expect(rules.isExcluded('/work/acme/public')).toBe(false);
    });
  });

  describe('isCommandExcluded', () => {
    it('should match patterns case-insensitively', () => {
      const rules = policy([], ['api[_-]?key']);

      expect(rules.isCommandExcluded('export API_KEY=test-secret')).toBe(true);
      expect(rules.isCommandExcluded('ls -la')).toBe(false);
    });

    it('should skip invalid and oversized patterns', () => {
      const rules = policy([], ['([', 'x'.repeat(MAX_PATTERN_LENGTH + 1), 'token']);

      expect(rules.isCommandExcluded('echo token')).toBe(true);
      expect(rules.isCommandExcluded('echo ([')).toBe(false);
    });
  });

  describe('shouldFilter', () => {
    it('should apply the default rules', () => {
      const { privacy } = defaultDaemonConfig();
      const rules = new PrivacyPolicy(privacy, { homeDir: HOME });

      expect(rules.shouldFilter('ls', '/home/tester/.gnupg')).toBe(true);
      expect(rules.shouldFilter('mysql --password=test-secret', '/tmp')).toBe(true);
      expect(rules.shouldFilter('git status', '/home/tester/project')).toBe(false);
    });
  });

  describe('update', () => {
    it('should replace the active rules', () => {
      const rules = policy(['/a'], ['foo']);
      rules.update({ excluded_paths: ['/b'], excluded_patterns: [] });

      expect(rules.isExcluded('/a')).toBe(false);
      expect(rules.isExcluded('/b/c')).toBe(true);
      expect(rules.isCommandExcluded('foo')).toBe(false);
    });
  });
});
