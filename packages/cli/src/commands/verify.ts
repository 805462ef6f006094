/**
 * accord verify - Replay pacts against a running provider.
 *
 * Settings come from the `verifier` section of accord.yaml; flags
 * override them.
 */

import { Command } from 'commander';
import {
  CHANNELS,
  ConsoleReporter,
  JSONReporter,
  Verifier,
  createEventBus,
  type PactSource,
  type Reporter,
  type VerifierConfig,
} from 'accord-core';
import { logLevelOf, printLogs, resolveConfig } from '../config.js';

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

interface VerifyFlags {
  file: string[];
  dir: string[];
  url: string[];
  providerName?: string;
  providerUrl?: string;
  filterDescription?: string;
  filterState?: string;
  state: boolean;
  stateChangeUrl?: string;
  ignoreNoPactsError?: boolean;
  timeout?: string;
  reporter: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function sourcesOf(config: VerifierConfig | undefined, flags: VerifyFlags): PactSource[] {
  const fromFlags: PactSource[] = [
    ...flags.file.map((path): PactSource => ({ type: 'file', path })),
    ...flags.dir.map((path): PactSource => ({ type: 'dir', path })),
    ...flags.url.map((url): PactSource => ({ type: 'url', url })),
  ];
  return fromFlags.length > 0 ? fromFlags : (config?.sources ?? []);
}

export function registerVerify(program: Command): void {
  program
    .command('verify')
    .description('Verify pacts against a running provider')
    .option('-f, --file <path>', 'pact file to verify', collect, [])
    .option('-d, --dir <path>', 'directory of pact files', collect, [])
    .option('-u, --url <url>', 'URL of a pact document', collect, [])
    .option('-n, --provider-name <name>', 'provider name')
    .option('--provider-url <url>', 'provider base URL, e.g. http://localhost:8080/api')
    .option('--filter-description <regex>', 'only interactions whose description matches')
    .option('--filter-state <state>', 'only interactions with this provider state')
    .option('--no-state', 'only interactions without provider states')
    .option('--state-change-url <url>', 'URL for provider state setup and teardown')
    .option('--ignore-no-pacts-error', 'succeed when the sources hold no pacts')
    .option('--timeout <ms>', 'provider request timeout in ms')
    .option('--reporter <type>', 'console or json', 'console')
    .action(async (flags: VerifyFlags) => {
      const config = await resolveConfig(program);
      const settings = config.verifier;

      const sources = sourcesOf(settings, flags);
      if (sources.length === 0) {
        return program.error(`${RED}No pact sources: pass --file, --dir or --url, or configure verifier.sources${RESET}`, { exitCode: 1 });
      }

      let provider = {
        name: flags.providerName ?? settings?.provider.name ?? 'provider',
        protocol: settings?.provider.protocol,
        host: settings?.provider.host,
        port: settings?.provider.port,
        basePath: settings?.provider.basePath,
      };
      if (flags.providerUrl) {
        let url: URL;
        try {
          url = new URL(flags.providerUrl);
        } catch {
          return program.error(`${RED}Invalid --provider-url: ${flags.providerUrl}${RESET}`, { exitCode: 1 });
        }
        provider = {
          ...provider,
          protocol: url.protocol === 'https:' ? 'https' : 'http',
          host: url.hostname,
          port: url.port ? Number(url.port) : undefined,
          basePath: url.pathname === '/' ? '' : url.pathname,
        };
      }

      const timeout = flags.timeout !== undefined ? Number(flags.timeout) : settings?.timeout;
      if (timeout !== undefined && (!Number.isInteger(timeout) || timeout < 1)) {
        return program.error(`${RED}--timeout must be a positive integer${RESET}`, { exitCode: 1 });
      }

      const reporter: Reporter = flags.reporter === 'json' ? new JSONReporter() : new ConsoleReporter();
      const bus = createEventBus();
      printLogs(bus, CHANNELS.verifier, 'verify', logLevelOf(program, config));

      const verifier = new Verifier({
        provider,
        sources,
        timeout,
        concurrency: settings?.concurrency,
        filter: {
          description: flags.filterDescription ?? settings?.filterDescription,
          state: flags.filterState ?? settings?.filterState,
          noState: !flags.state || (settings?.noState ?? false),
        },
        stateChangeUrl: flags.stateChangeUrl ?? settings?.stateChangeUrl,
        ignoreNoPacts: flags.ignoreNoPactsError ?? settings?.ignoreNoPacts ?? false,
        reporters: [reporter],
        bus,
      });

      let success: boolean;
      try {
        const result = await verifier.execute();
        success = result.success;
        if (flags.reporter === 'json') {
          console.log(JSON.stringify(result.report, null, 2));
        }
      } catch (err) {
        return program.error(`${RED}Verification failed: ${(err as Error).message}${RESET}`, { exitCode: 1 });
      }

      if (!success) {
        return program.error(`${RED}✗ Verification failed${RESET}`, { exitCode: 1 });
      }
      if (flags.reporter !== 'json') console.log(`${GREEN}✓ Verification passed${RESET}`);
    });
}
