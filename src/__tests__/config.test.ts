import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  parseConfigString,
  parseConfigFile,
  findConnectionByName,
  loadConnectionSettings,
  validateConnectionSettings,
  isGitLabCloud,
} from '../config/parser.js';
import { ConfigurationError } from '../types/config.js';

describe('Config Parser', () => {
  describe('parseConfigString', () => {
    it('parses a single connection', () => {
      const yaml = `
connections:
  - name: "gitlab"
    baseurl: "https://gitlab.example.com/api/v4"
    token: "test-token"
`;
      const connections = parseConfigString(yaml);

      expect(connections).toEqual([
        { name: 'gitlab', baseurl: 'https://gitlab.example.com/api/v4', token: 'test-token' },
      ]);
    });

    it('parses several connections with optional fields left out', () => {
      const yaml = `
connections:
  - name: "gitlab"
    token: "test-token"
  - name: "gitlab_cloud"
    baseurl: "https://gitlab.com/api/v4"
`;
      const connections = parseConfigString(yaml);

      expect(connections).toHaveLength(2);
      expect(connections[0]).toEqual({ name: 'gitlab', token: 'test-token' });
      expect(connections[1]).toEqual({ name: 'gitlab_cloud', baseurl: 'https://gitlab.com/api/v4' });
    });

    it('keeps empty strings', () => {
      const yaml = `
connections:
  - name: "gitlab"
    token: ""
`;
      expect(parseConfigString(yaml)[0].token).toBe('');
    });

    it('rejects non-object YAML', () => {
      expect(() => parseConfigString('just a string')).toThrow('Configuration must be a valid YAML object');
    });

    it('reports a connection without a name', () => {
      const yaml = `
connections:
  - token: "test-token"
`;
      expect(() => parseConfigString(yaml)).toThrow(
        'Configuration validation failed:\n  - connections.0.name: Required'
      );
    });

    it('rejects an empty connection list', () => {
      expect(() => parseConfigString('connections: []')).toThrow(
        'Configuration validation failed:\n  - connections: At least one connection must be configured'
      );
    });

    it('rejects duplicate connection names', () => {
      const yaml = `
connections:
  - name: "gitlab"
  - name: "gitlab"
`;
      expect(() => parseConfigString(yaml)).toThrow('connections: Connection names must be unique');
    });

    it('throws ConfigurationError', () => {
      expect(() => parseConfigString('connections: []')).toThrow(ConfigurationError);
    });
  });

  describe('parseConfigFile', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gitlab-tables-config-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('reads connections from disk', () => {
      const file = path.join(tempDir, 'gitlab.yml');
      fs.writeFileSync(file, 'connections:\n  - name: gitlab\n    token: test-token\n');

      expect(parseConfigFile(file)).toEqual([{ name: 'gitlab', token: 'test-token' }]);
    });

    it('reports a missing file', () => {
      const file = path.join(tempDir, 'missing.yml');
      expect(() => parseConfigFile(file)).toThrow(`Configuration file not found: ${file}`);
    });
  });

  describe('findConnectionByName', () => {
    const connections = [{ name: 'gitlab' }, { name: 'Gitlab_Cloud', token: 'test-token' }];

    it('finds connection case-insensitively', () => {
      expect(findConnectionByName(connections, 'gitlab_cloud')).toEqual({ name: 'Gitlab_Cloud', token: 'test-token' });
    });

    it('returns undefined for unknown connection', () => {
      expect(findConnectionByName(connections, 'other')).toBeUndefined();
    });
  });

  describe('loadConnectionSettings', () => {
    const env = { GITLAB_ADDR: 'https://env.example.com', GITLAB_TOKEN: 'env-token' };

    it('uses environment values without a connection block', () => {
      expect(loadConnectionSettings(undefined, env)).toEqual({
        baseUrl: 'https://env.example.com',
        token: 'env-token',
      });
    });

    it('lets connection values override the environment', () => {
      const settings = loadConnectionSettings(
        { name: 'gitlab', baseurl: 'https://config.example.com', token: 'config-token' },
        env
      );
      expect(settings).toEqual({ baseUrl: 'https://config.example.com', token: 'config-token' });
    });

    it('overrides one field at a time', () => {
      const settings = loadConnectionSettings({ name: 'gitlab', token: 'config-token' }, env);
      expect(settings).toEqual({ baseUrl: 'https://env.example.com', token: 'config-token' });
    });

    it('lets an empty connection value override the environment', () => {
      const settings = loadConnectionSettings({ name: 'gitlab', baseurl: '' }, env);
      expect(settings.baseUrl).toBe('');
    });

    it('defaults to empty strings', () => {
      expect(loadConnectionSettings(undefined, {})).toEqual({ baseUrl: '', token: '' });
    });
  });

  describe('validateConnectionSettings', () => {
    it('accepts complete settings', () => {
      const settings = { baseUrl: 'https://gitlab.example.com', token: 'test-token' };
      expect(validateConnectionSettings(settings)).toBe(settings);
    });

    it('reports a missing base address', () => {
      expect(() => validateConnectionSettings({ baseUrl: '', token: 'test-token' })).toThrow(
        'GitLab base address must be set either in GITLAB_ADDR env var or in connection config file'
      );
    });

    it('reports a missing token', () => {
      expect(() => validateConnectionSettings({ baseUrl: 'https://gitlab.example.com', token: '' })).toThrow(
        'GitLab private/personal access token must be set either in GITLAB_TOKEN env var or in connection config file'
      );
    });

    it('reports the base address first when both are missing', () => {
      let caught: unknown;
      try {
        validateConnectionSettings({ baseUrl: '', token: '' });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught).toMatchObject({ field: 'baseUrl' });
    });
  });

  describe('isGitLabCloud', () => {
    it('matches the hosted API address', () => {
      expect(isGitLabCloud({ baseUrl: 'https://gitlab.com/api/v4', token: 'test-token' })).toBe(true);
    });

    it('ignores a trailing slash', () => {
      expect(isGitLabCloud({ baseUrl: 'https://gitlab.com/api/v4/', token: 'test-token' })).toBe(true);
    });

    it('matches the bare instance address the client expands', () => {
      expect(isGitLabCloud({ baseUrl: 'https://gitlab.com', token: 'test-token' })).toBe(true);
      expect(isGitLabCloud({ baseUrl: 'https://gitlab.com/', token: 'test-token' })).toBe(true);
    });

    it('does not match a self-managed instance', () => {
      expect(isGitLabCloud({ baseUrl: 'https://gitlab.example.com/api/v4', token: 'test-token' })).toBe(false);
    });

    it('does not match an empty address', () => {
      expect(isGitLabCloud({ baseUrl: '', token: 'test-token' })).toBe(false);
    });
  });
});
