/**
 * @module verifier/verify-args
 * Argument-string entry point to the verifier.
 *
 * Arguments arrive as one string with each token on its own line, e.g.
 * `--file\n./pacts/web-api.json\n--port\n8080`. Return codes:
 *
 * | code | meaning                        |
 * |------|--------------------------------|
 * | 0    | every interaction passed       |
 * | 1    | verification failures found    |
 * | 2    | no arguments given             |
 * | 3    | internal fault                 |
 * | 4    | invalid arguments              |
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { setLastError } from '../errors.js';
import type { Bus, Reporter } from '../types.js';
import type { PactSource } from './sources.js';
import { Verifier, type MessageHandler, type VerifierOptions } from './verifier.js';

export interface VerifyHooks {
  reporters?: Reporter[];
  bus?: Bus;
  messageHandler?: MessageHandler;
}

type ParsedArgs = {
  file: string[];
  dir: string[];
  url: string[];
  hostname: string;
  port?: number;
  scheme: 'http' | 'https';
  basePath: string;
  providerName: string;
  filterDescription?: string;
  filterState?: string;
  state: boolean;
  stateChangeUrl?: string;
  ignoreNoPactsError: boolean;
  timeout: number;
  concurrency: number;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) throw new InvalidArgumentError(`'${value}' is not a positive integer`);
  return parsed;
}

function portNumber(value: string): number {
  const parsed = positiveInt(value);
  if (parsed > 65535) throw new InvalidArgumentError(`'${value}' is not a valid port`);
  return parsed;
}

function scheme(value: string): 'http' | 'https' {
  if (value === 'http' || value === 'https') return value;
  throw new InvalidArgumentError(`'${value}' must be http or https`);
}

/** Commander program describing the verifier's arguments; never exits the process. */
export function createVerifyCommand(): Command {
  return new Command('verify')
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
    .option('-f, --file <path>', 'pact file to verify', collect, [])
    .option('-d, --dir <path>', 'directory of pact files', collect, [])
    .option('-u, --url <url>', 'URL of a pact document', collect, [])
    .option('--hostname <host>', 'provider host', 'localhost')
    .option('-p, --port <port>', 'provider port', portNumber)
    .option('--scheme <scheme>', 'provider scheme', scheme, 'http')
    .option('--base-path <path>', 'path prefix for provider requests', '')
    .option('-n, --provider-name <name>', 'provider name', 'provider')
    .option('--filter-description <regex>', 'only interactions whose description matches')
    .option('--filter-state <state>', 'only interactions with this provider state')
    .option('--no-state', 'only interactions without provider states')
    .option('--state-change-url <url>', 'URL for provider state setup and teardown')
    .option('--ignore-no-pacts-error', 'succeed when the sources hold no pacts', false)
    .option('--timeout <ms>', 'provider request timeout in ms', positiveInt, 5000)
    .option('--concurrency <n>', 'pact sources verified at once', positiveInt, 1);
}

/** Turn parsed options into verifier options. */
export function toVerifierOptions(args: ParsedArgs, hooks: VerifyHooks = {}): VerifierOptions {
  const sources: PactSource[] = [
    ...args.file.map((path): PactSource => ({ type: 'file', path })),
    ...args.dir.map((path): PactSource => ({ type: 'dir', path })),
    ...args.url.map((url): PactSource => ({ type: 'url', url })),
  ];
  return {
    provider: {
      name: args.providerName,
      protocol: args.scheme,
      host: args.hostname,
      port: args.port,
      basePath: args.basePath,
    },
    sources,
    timeout: args.timeout,
    concurrency: args.concurrency,
    filter: {
      description: args.filterDescription,
      state: args.filterState,
      noState: !args.state,
    },
    stateChangeUrl: args.stateChangeUrl,
    ignoreNoPacts: args.ignoreNoPactsError,
    ...hooks,
  };
}

/** Run the verifier from a newline-delimited argument string. */
export async function verify(args: string | null | undefined, hooks: VerifyHooks = {}): Promise<number> {
  if (args === null || args === undefined) {
    setLastError('INVALID_ARGUMENTS', 'No verifier arguments were given');
    return 2;
  }
  const tokens = args.split(/\r?\n/).map((token) => token.trim()).filter((token) => token !== '');

  const command = createVerifyCommand();
  let parsed: ParsedArgs;
  try {
    command.parse(tokens, { from: 'user' });
    parsed = command.opts<ParsedArgs>();
  } catch (err) {
    if (err instanceof CommanderError) {
      setLastError('INVALID_ARGUMENTS', err.message);
      return 4;
    }
    setLastError('INTERNAL_FAULT', (err as Error).message);
    return 3;
  }
  if (parsed.file.length + parsed.dir.length + parsed.url.length === 0) {
    setLastError('INVALID_ARGUMENTS', 'At least one of --file, --dir or --url is required');
    return 4;
  }
  if (parsed.filterDescription !== undefined) {
    try {
      new RegExp(parsed.filterDescription);
    } catch (err) {
      setLastError('INVALID_ARGUMENTS', `--filter-description is not a valid regex: ${(err as Error).message}`);
      return 4;
    }
  }

  try {
    const result = await new Verifier(toVerifierOptions(parsed, hooks)).execute();
    return result.success ? 0 : 1;
  } catch (err) {
    setLastError('INTERNAL_FAULT', (err as Error).message);
    return 3;
  }
}
