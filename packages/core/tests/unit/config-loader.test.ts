/**
 * Unit tests for config-loader module.
 *
 * Tests cover:
 * - Valid configuration loading
 * - Default value population
 * - .env file loading
 * - Variable substitution
 * - Invalid configuration error reporting
 * - File-not-found error handling
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { loadConfig, parseConfig, resolveEnvVariables } from '../../src/config-loader.js';

/** Helper to create a temporary directory */
async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'accord-config-test-'));
}

/** Full YAML config with all optional fields */
function fullYaml(): string {
  return [
    'pactDir: ./contracts',
    'specification: V4',
    'logLevel: debug',
    'mockServer:',
    '  host: 0.0.0.0',
    '  port: 9090',
    '  cors: true',
    '  tls:',
    '    key: ./certs/key.pem',
    '    cert: ./certs/cert.pem',
    'verifier:',
    '  provider:',
    '    name: widgets',
    '    port: 8080',
    '    basePath: /api',
    '  sources:',
    '    - type: file',
    '      path: ./contracts/web-widgets.json',
    '    - type: url',
    '      url: http://pacts.example.test/web-widgets.json',
    '  timeout: 1000',
    '  stateChangeUrl: http://localhost:8080/_state',
  ].join('\n');
}

describe('config-loader', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await createTempDir();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should fill defaults for a minimal config', async () => {
      const configPath = path.join(tmpDir, 'accord.yaml');
      await fs.writeFile(configPath, 'pactDir: ./out\n');

      const config = await loadConfig(configPath);
      expect(config).toEqual({
        pactDir: './out',
        specification: 'V3',
        logLevel: 'info',
        mockServer: { host: '127.0.0.1', port: 0, cors: false, logRequests: false },
      });
    });

    it('should load every section of a full config', async () => {
      const configPath = path.join(tmpDir, 'accord.yaml');
      await fs.writeFile(configPath, fullYaml());

      const config = await loadConfig(configPath);
      expect(config.specification).toBe('V4');
      expect(config.logLevel).toBe('debug');
      expect(config.mockServer).toEqual({
        host: '0.0.0.0',
        port: 9090,
        cors: true,
        logRequests: false,
        tls: { key: './certs/key.pem', cert: './certs/cert.pem' },
      });
      expect(config.verifier?.provider).toEqual({
        name: 'widgets',
        protocol: 'http',
        host: 'localhost',
        port: 8080,
        basePath: '/api',
      });
      expect(config.verifier?.sources).toEqual([
        { type: 'file', path: './contracts/web-widgets.json' },
        { type: 'url', url: 'http://pacts.example.test/web-widgets.json' },
      ]);
      expect(config.verifier?.timeout).toBe(1000);
      expect(config.verifier?.concurrency).toBe(1);
      expect(config.verifier?.noState).toBe(false);
    });

    it('should substitute variables from a .env file beside the config', async () => {
      const configPath = path.join(tmpDir, 'accord.yaml');
      await fs.writeFile(path.join(tmpDir, '.env'), 'ACCORD_CONFIG_TEST_PROVIDER=widgets-from-env\n');
      await fs.writeFile(configPath, [
        'verifier:',
        '  provider:',
        '    name: "{{env.ACCORD_CONFIG_TEST_PROVIDER}}"',
      ].join('\n'));

      const config = await loadConfig(configPath);
      expect(config.verifier?.provider.name).toBe('widgets-from-env');
    });

    it('should report a missing file', async () => {
      const configPath = path.join(tmpDir, 'missing.yaml');
      await expect(loadConfig(configPath)).rejects.toThrow(`Configuration file not found: ${configPath}`);
    });

    it('should report malformed YAML', async () => {
      const configPath = path.join(tmpDir, 'accord.yaml');
      await fs.writeFile(configPath, 'mockServer: [unclosed\n');
      await expect(loadConfig(configPath)).rejects.toThrow(`YAML syntax error in ${configPath}`);
    });

    it('should reject an empty file', async () => {
      const configPath = path.join(tmpDir, 'accord.yaml');
      await fs.writeFile(configPath, '');
      await expect(loadConfig(configPath)).rejects.toThrow('Configuration file is empty or not a valid object');
    });
  });

  describe('parseConfig', () => {
    it('should list each validation issue with its path', () => {
      expect(() => parseConfig({ mockServer: { port: 70000 } })).toThrow(
        'Configuration validation failed:\n  - mockServer.port: Number must be less than or equal to 65535',
      );
    });

    it('should reject publishing settings', () => {
      expect(() => parseConfig({ verifier: { provider: { name: 'widgets' }, publish: true } })).toThrow(
        'verifier.publish: publishing verification results is not supported',
      );
    });

    it('should reject an unknown specification', () => {
      expect(() => parseConfig({ specification: 'V9' })).toThrow('specification');
    });
  });

  describe('resolveEnvVariables', () => {
    it('should replace known variables and keep unknown ones', () => {
      const env = { HOST: 'example.test' };
      expect(resolveEnvVariables({
        url: 'http://{{env.HOST}}/pacts',
        list: ['{{ env.HOST }}', '{{env.UNSET}}'],
        port: 8080,
      }, env)).toEqual({
        url: 'http://example.test/pacts',
        list: ['example.test', '{{env.UNSET}}'],
        port: 8080,
      });
    });
  });
});
