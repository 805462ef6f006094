/**
 * CLI tests for accord.
 *
 * The program runs in-process with exitOverride, so failures surface
 * as CommanderError instead of exiting the test runner.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CommanderError } from 'commander';
import Fastify, { type FastifyInstance } from 'fastify';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import { createProgram } from '../src/program.js';

const PACT = {
  consumer: { name: 'web' },
  provider: { name: 'widgets' },
  interactions: [
    {
      description: 'a request for widget 1',
      request: { method: 'GET', path: '/widgets/1' },
      response: {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
        body: { id: 1, name: 'Widget' },
        matchingRules: { body: { '$.name': { matchers: [{ match: 'type' }] } } },
      },
    },
  ],
  metadata: { pactSpecification: { version: '3.0.0' } },
};

interface RunResult {
  stdout: string;
  error?: CommanderError;
}

/** Run the CLI and collect what it printed. */
async function runCLI(args: string[]): Promise<RunResult> {
  const lines: string[] = [];
  const log = vi.spyOn(console, 'log').mockImplementation((...parts: unknown[]) => {
    lines.push(parts.map(String).join(' '));
  });
  const program = createProgram({ exitOverride: true });
  program.configureOutput({
    writeOut: (str) => { lines.push(str); },
    writeErr: () => undefined,
  });
  try {
    await program.parseAsync(['node', 'accord', ...args]);
    return { stdout: lines.join('\n') };
  } catch (err) {
    if (err instanceof CommanderError) return { stdout: lines.join('\n'), error: err };
    throw err;
  } finally {
    log.mockRestore();
  }
}

describe('CLI', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'accord-cli-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('--help', () => {
    it('should show help text with all commands', async () => {
      const { stdout, error } = await runCLI(['--help']);
      expect(error?.code).toBe('commander.helpDisplayed');
      expect(stdout).toContain('accord');
      for (const command of ['mock', 'verify', 'parse', 'schema', 'validate']) {
        expect(stdout).toContain(command);
      }
    });
  });

  describe('--version', () => {
    it('should show version number', async () => {
      const { stdout, error } = await runCLI(['--version']);
      expect(error?.code).toBe('commander.version');
      expect(stdout.trim()).toBe('0.1.0');
    });
  });

  describe('parse', () => {
    it('should print the parsed definition as JSON', async () => {
      const { stdout, error } = await runCLI(['parse', "matching(type, 'Name')"]);
      expect(error).toBeUndefined();
      expect(JSON.parse(stdout)).toEqual({
        value: 'Name',
        valueType: 'string',
        rules: [{ match: 'type' }],
      });
    });

    it('should include the generator of a datetime matcher', async () => {
      const { stdout } = await runCLI(['parse', "matching(date, 'yyyy-MM-dd', '2024-01-31')"]);
      const parsed = JSON.parse(stdout);
      expect(parsed.value).toBe('2024-01-31');
      expect(parsed.rules).toEqual([{ match: 'date', date: 'yyyy-MM-dd' }]);
      expect(parsed.generator).toEqual({ type: 'Date', format: 'yyyy-MM-dd' });
    });

    it('should fail with exit code 1 on a malformed expression', async () => {
      const { error } = await runCLI(['parse', 'matching(type,']);
      expect(error).toBeInstanceOf(CommanderError);
      expect(error?.exitCode).toBe(1);
    });
  });

  describe('schema', () => {
    it('should write both JSON Schema files', async () => {
      const out = path.join(tmpDir, 'schemas');
      const { error } = await runCLI(['schema', '--out', out]);
      expect(error).toBeUndefined();

      const files = (await fs.readdir(out)).sort();
      expect(files).toEqual(['accord-config.schema.json', 'pact-document.schema.json']);
      const schema = JSON.parse(await fs.readFile(path.join(out, 'pact-document.schema.json'), 'utf-8'));
      expect(schema.title).toBe('Pact document');
    });
  });

  describe('validate', () => {
    it('should accept a valid pact file', async () => {
      const file = path.join(tmpDir, 'web-widgets.json');
      await fs.writeFile(file, JSON.stringify(PACT));

      const { stdout, error } = await runCLI(['validate', file]);
      expect(error).toBeUndefined();
      expect(stdout).toContain('web -> widgets, 1 interactions');
    });

    it('should reject a document without a consumer', async () => {
      const file = path.join(tmpDir, 'broken.json');
      await fs.writeFile(file, JSON.stringify({ provider: { name: 'widgets' }, interactions: [] }));

      const { error } = await runCLI(['validate', file]);
      expect(error?.exitCode).toBe(1);
      expect(error?.message).toContain('is not a valid pact');
    });

    it('should reject a file that is not JSON', async () => {
      const file = path.join(tmpDir, 'broken.json');
      await fs.writeFile(file, '{ not json');

      const { error } = await runCLI(['validate', file]);
      expect(error?.exitCode).toBe(1);
    });
  });

  describe('verify', () => {
    let provider: FastifyInstance;
    let providerUrl: string;
    let pactFile: string;

    beforeEach(async () => {
      provider = Fastify({ logger: false });
      provider.get('/widgets/1', async () => ({ id: 1, name: 'Sprocket' }));
      await provider.listen({ host: '127.0.0.1', port: 0 });
      const address = provider.server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      providerUrl = `http://127.0.0.1:${port}`;

      pactFile = path.join(tmpDir, 'web-widgets.json');
      await fs.writeFile(pactFile, JSON.stringify(PACT));
    });

    afterEach(async () => {
      await provider.close();
    });

    it('should pass when the provider honours the pact', async () => {
      const { stdout, error } = await runCLI([
        'verify', '--file', pactFile, '--provider-name', 'widgets', '--provider-url', providerUrl,
      ]);
      expect(error).toBeUndefined();
      expect(stdout).toContain('Verification passed');
    });

    it('should print a JSON report with --reporter json', async () => {
      const { stdout, error } = await runCLI([
        'verify', '--file', pactFile, '--provider-name', 'widgets', '--provider-url', providerUrl, '--reporter', 'json',
      ]);
      expect(error).toBeUndefined();
      const report = JSON.parse(stdout);
      expect(report.totals.passed).toBe(1);
      expect(report.totals.failed).toBe(0);
    });

    it('should fail when the provider answers differently', async () => {
      const file = path.join(tmpDir, 'missing.json');
      const pact = structuredClone(PACT);
      pact.interactions[0].request.path = '/widgets/2';
      await fs.writeFile(file, JSON.stringify(pact));

      const { error } = await runCLI([
        'verify', '--file', file, '--provider-name', 'widgets', '--provider-url', providerUrl,
      ]);
      expect(error?.exitCode).toBe(1);
      expect(error?.message).toContain('Verification failed');
    });

    it('should fail on an empty pact directory unless told to ignore it', async () => {
      const empty = path.join(tmpDir, 'empty');
      await fs.mkdir(empty);
      const args = ['verify', '--dir', empty, '--provider-name', 'widgets', '--provider-url', providerUrl];

      const failed = await runCLI(args);
      expect(failed.error?.exitCode).toBe(1);

      const ignored = await runCLI([...args, '--ignore-no-pacts-error']);
      expect(ignored.error).toBeUndefined();
      expect(ignored.stdout).toContain('Verification passed');
    });

    it('should fail without any pact source', async () => {
      const config = path.join(tmpDir, 'accord.yaml');
      await fs.writeFile(config, 'pactDir: ./pacts\n');

      const { error } = await runCLI(['--config', config, 'verify']);
      expect(error?.exitCode).toBe(1);
      expect(error?.message).toContain('No pact sources');
    });
  });
});

describe('packaging', () => {
  const packages = fileURLToPath(new URL('../../', import.meta.url));
  const readJson = async (file: string): Promise<Record<string, unknown>> =>
    JSON.parse(await fs.readFile(path.join(packages, file), 'utf-8'));

  it('should run the built binary against the built core', async () => {
    const cli = await readJson('cli/package.json');
    const core = await readJson('core/package.json');
    const coreBuild = await readJson('core/tsconfig.build.json');

    expect(cli.bin).toEqual({ accord: './dist/index.js' });
    expect(core.exports).toEqual({ '.': { types: './src/index.ts', default: './dist/index.js' } });
    expect(coreBuild.compilerOptions).toMatchObject({ rootDir: 'src', outDir: 'dist' });
  });
});
