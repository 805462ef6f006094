/**
 * accord mock <pact> - Serve a pact file from a mock server until interrupted.
 */

import { Command } from 'commander';
import fs from 'node:fs/promises';
import {
  CHANNELS,
  createEventBus,
  createMockServer,
  cleanupMockServer,
  getLastError,
  getMockServer,
  mockServerMatched,
  mockServerMismatches,
  writePactFile,
} from 'accord-core';
import { logLevelOf, printLogs, resolveConfig } from '../config.js';

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';
const RESET = '\x1b[0m';

const CREATE_ERRORS: Record<number, string> = {
  [-1]: 'pact file is empty',
  [-2]: 'pact file is not a valid pact',
  [-3]: 'could not bind the address',
  [-4]: 'internal fault',
  [-5]: 'invalid bind address',
  [-6]: 'TLS configuration failed',
};

interface MockOptions {
  host?: string;
  port?: string;
  cors?: boolean;
  tls?: boolean;
  write?: string;
  overwrite?: boolean;
}

export function registerMock(program: Command): void {
  program
    .command('mock <pact>')
    .description('Start a mock server for a pact file')
    .option('--host <host>', 'address to bind')
    .option('--port <port>', 'port to bind (0 picks a free one)')
    .option('--cors', 'answer CORS pre-flight requests')
    .option('--tls', 'serve HTTPS with the key and cert from the config')
    .option('-w, --write <dir>', 'write the pact to this directory on shutdown')
    .option('--overwrite', 'replace an existing pact file instead of merging')
    .action(async (pactFile: string, opts: MockOptions) => {
      const config = await resolveConfig(program);
      const bus = createEventBus();
      printLogs(bus, CHANNELS.mockServer, 'mock', logLevelOf(program, config));

      let pactJson: string;
      try {
        pactJson = await fs.readFile(pactFile, 'utf-8');
      } catch (err) {
        return program.error(`${RED}Failed to read ${pactFile}: ${(err as Error).message}${RESET}`, { exitCode: 1 });
      }

      const settings = config.mockServer;
      let tlsMaterial: { key: string; cert: string } | undefined;
      if (opts.tls && settings.tls) {
        tlsMaterial = {
          key: await fs.readFile(settings.tls.key, 'utf-8'),
          cert: await fs.readFile(settings.tls.cert, 'utf-8'),
        };
      }

      const host = opts.host ?? settings.host;
      const port = opts.port ?? String(settings.port);
      const address = host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
      const result = await createMockServer(pactJson, address, opts.tls ?? false, {
        bus,
        cors: opts.cors ?? settings.cors,
        logRequests: settings.logRequests,
        tls: tlsMaterial,
        specification: config.specification,
      });
      if (result < 0) {
        const detail = getLastError();
        const reason = CREATE_ERRORS[result] ?? 'unknown error';
        return program.error(`${RED}Mock server failed (${result}): ${reason}${detail ? ` - ${detail}` : ''}${RESET}`, { exitCode: 1 });
      }

      const server = getMockServer(result);
      console.log(`${GREEN}✓ Mock server listening on ${CYAN}${server?.url ?? `port ${result}`}${RESET}`);
      console.log('  Press Ctrl+C to stop.');

      process.once('SIGINT', () => {
        shutdown(result, opts).then(
          (code) => process.exit(code),
          (err: unknown) => {
            console.error(`${RED}✗ Shutdown failed: ${(err as Error).message}${RESET}`);
            process.exit(1);
          },
        );
      });
    });

  async function shutdown(port: number, opts: MockOptions): Promise<number> {
    const matched = mockServerMatched(port);
    if (matched) {
      console.log(`\n${GREEN}✓ All interactions matched${RESET}`);
    } else {
      console.log(`\n${YELLOW}⚠ Not all interactions matched:${RESET}`);
      console.log(mockServerMismatches(port) ?? '[]');
    }
    let code = matched ? 0 : 1;
    if (opts.write) {
      const written = await writePactFile(port, opts.write, opts.overwrite ?? false);
      if (written === 0) {
        console.log(`${GREEN}✓ Pact written to ${opts.write}${RESET}`);
      } else {
        console.log(`${RED}✗ Failed to write pact (${written}): ${getLastError() ?? ''}${RESET}`);
        code = 1;
      }
    }
    await cleanupMockServer(port);
    return code;
  }
}
