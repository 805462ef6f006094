/**
 * @module config-loader
 * Configuration loader for accord.
 *
 * Loads `accord.yaml` configuration files, validates them with Zod schemas,
 * supports `.env` file loading and `{{env.NAME}}` substitution.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';

// =====================================================================
// Zod Sub-Schemas
// =====================================================================

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']).describe('Lowest log level printed');

/** TLS material for the mock server */
export const TlsSchema = z.object({
  key: z.string().describe('Path to the PEM private key'),
  cert: z.string().describe('Path to the PEM certificate'),
}).describe('TLS key and certificate for HTTPS mock servers');

/** Mock server configuration schema */
export const MockServerSchema = z.object({
  host: z.string().default('127.0.0.1').describe('Address the mock server binds to'),
  port: z.number().int().min(0).max(65535).default(0).describe('Port to bind; 0 picks a free port'),
  cors: z.boolean().default(false).describe('Answer CORS pre-flight requests'),
  tls: TlsSchema.optional(),
  logRequests: z.boolean().default(false).describe('Log every received request at info level'),
}).describe('Mock server settings');

/** Provider under verification */
export const ProviderSchema = z.object({
  name: z.string().describe('Provider name; pacts for other providers are skipped'),
  protocol: z.enum(['http', 'https']).default('http').describe('Scheme used to reach the provider'),
  host: z.string().default('localhost').describe('Provider host'),
  port: z.number().int().min(1).max(65535).optional().describe('Provider port'),
  basePath: z.string().default('').describe('Path prefix added to every request'),
}).describe('Provider connection');

/** Pact source schema */
export const PactSourceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('file'), path: z.string().describe('Pact file') }),
  z.object({ type: z.literal('dir'), path: z.string().describe('Directory of *.json pact files') }),
  z.object({ type: z.literal('url'), url: z.string().url().describe('URL serving a pact document') }),
]).describe('Where pacts are read from');

/** Verifier configuration schema */
export const VerifierSchema = z.object({
  provider: ProviderSchema,
  sources: z.array(PactSourceSchema).default([]).describe('Pact sources to verify'),
  timeout: z.number().int().positive().default(5000).describe('Provider request timeout in ms'),
  concurrency: z.number().int().min(1).default(1).describe('Pact sources verified at once'),
  filterDescription: z.string().optional().describe('Only verify interactions whose description matches this regex'),
  filterState: z.string().optional().describe('Only verify interactions with this provider state'),
  noState: z.boolean().default(false).describe('Only verify interactions without provider states'),
  stateChangeUrl: z.string().url().optional().describe('URL receiving provider state setup and teardown calls'),
  ignoreNoPacts: z.boolean().default(false).describe('Succeed when the sources hold no pacts'),
  publish: z.undefined({ invalid_type_error: 'publishing verification results is not supported' }).optional(),
}).describe('Provider verification settings');

// =====================================================================
// Complete Configuration Schema
// =====================================================================

export const AccordConfigSchema = z.object({
  pactDir: z.string().default('./pacts').describe('Directory pact files are written to'),
  specification: z.enum(['V2', 'V3', 'V4']).default('V3').describe('Pact specification written'),
  logLevel: LogLevelSchema.default('info'),
  mockServer: MockServerSchema.default({}),
  verifier: VerifierSchema.optional(),
}).describe('accord configuration');

export type AccordConfig = z.infer<typeof AccordConfigSchema>;
export type VerifierConfig = z.infer<typeof VerifierSchema>;
export type PactSourceConfig = z.infer<typeof PactSourceSchema>;

const CONFIG_NAMES = ['accord.yaml', 'accord.yml'];

// =====================================================================
// Config Loader
// =====================================================================

/**
 * Load and validate an accord configuration file.
 *
 * Steps:
 * 1. Load `.env` from the config file's directory
 * 2. Read and parse the YAML file
 * 3. Substitute `{{env.NAME}}` variables
 * 4. Validate with the Zod schema
 *
 * @param configPath - Defaults to `accord.yaml` or `accord.yml` in the cwd
 * @throws {Error} If the file is missing, the YAML is malformed, or validation fails
 */
export async function loadConfig(configPath?: string): Promise<AccordConfig> {
  const resolvedPath = await resolveConfigPath(configPath);

  dotenv.config({ path: path.resolve(path.dirname(resolvedPath), '.env') });

  let rawContent: string;
  try {
    rawContent = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Configuration file not found: ${resolvedPath}`);
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    throw new Error(`YAML syntax error in ${resolvedPath}: ${(err as Error).message}`);
  }
  if (parsed === null || parsed === undefined || typeof parsed !== 'object') {
    throw new Error(`Configuration file is empty or not a valid object: ${resolvedPath}`);
  }

  return parseConfig(resolveEnvVariables(parsed, process.env));
}

/**
 * Validate an already-parsed configuration object.
 *
 * @throws {Error} listing each issue as `  - path: message`
 */
export function parseConfig(raw: unknown): AccordConfig {
  const result = AccordConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${issues}`);
  }
  return result.data;
}

/**
 * Replace `{{env.NAME}}` in every string of a parsed document.
 * Unknown variables are left as written.
 */
export function resolveEnvVariables(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\{\{\s*env\.([\w.-]+)\s*\}\}/g, (match, name: string) => env[name] ?? match);
  }
  if (Array.isArray(value)) return value.map((item) => resolveEnvVariables(item, env));
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvVariables(item, env);
    }
    return result;
  }
  return value;
}

// =====================================================================
// Internal Helpers
// =====================================================================

async function resolveConfigPath(configPath?: string): Promise<string> {
  if (configPath) {
    return path.resolve(configPath);
  }

  const candidates = CONFIG_NAMES.map((name) => path.resolve(process.cwd(), name));
  for (const candidate of candidates) {
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      // next candidate
    }
  }

  throw new Error(
    `Configuration file not found. Looked for:\n${candidates.map((c) => `  - ${c}`).join('\n')}`,
  );
}
