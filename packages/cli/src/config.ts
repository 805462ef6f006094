/**
 * @module config
 * Config and log wiring shared by the commands.
 */

import { Command } from 'commander';
import { loadConfig, parseConfig, shouldLog, type AccordConfig, type Bus, type BusChannel, type LogLevel } from 'accord-core';

const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const GRAY = '\x1b[90m';
const RESET = '\x1b[0m';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface GlobalOptions {
  config?: string;
  logLevel?: string;
}

/**
 * Load `--config`, or `accord.yaml` from the cwd when present.
 * Without a config file the defaults apply.
 */
export async function resolveConfig(program: Command): Promise<AccordConfig> {
  const { config } = program.opts<GlobalOptions>();
  try {
    return await loadConfig(config);
  } catch (err) {
    if (config === undefined && (err as Error).message.startsWith('Configuration file not found')) {
      return parseConfig({});
    }
    return program.error(`${RED}Failed to load config: ${(err as Error).message}${RESET}`, { exitCode: 1 });
  }
}

/** The `--log-level` flag, falling back to the config. */
export function logLevelOf(program: Command, config: AccordConfig): LogLevel {
  const { logLevel } = program.opts<GlobalOptions>();
  return LOG_LEVELS.find((level) => level === logLevel) ?? config.logLevel;
}

/** Print `log` events of `channel` at or above `threshold` to stderr, prefixed with `[tag]`. */
export function printLogs(bus: Bus, channel: BusChannel, tag: string, threshold: LogLevel): () => void {
  return bus.onLog(channel, ({ level, message }) => {
    if (!shouldLog(level, threshold)) return;
    const colour = level === 'error' ? RED : level === 'warn' ? YELLOW : GRAY;
    console.error(`${colour}[${tag}]${RESET} ${message}`);
  });
}
