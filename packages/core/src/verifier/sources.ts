/**
 * @module verifier/sources
 * Loading pacts to verify from files, directories, URLs and brokers.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { AccordError } from '../errors.js';
import { readPact, readPactText } from '../models/pact.js';
import type { Pact } from '../types.js';

/** Remote pact repository. Publishing is not part of the contract. */
export interface PactBroker {
  /** Pacts for `provider`, as parsed JSON documents keyed by a display name. */
  fetchPacts(provider: string): Promise<Array<{ name: string; document: unknown }>>;
}

export type PactSource =
  | { type: 'file'; path: string }
  | { type: 'dir'; path: string }
  | { type: 'url'; url: string; headers?: Record<string, string> }
  | { type: 'broker'; broker: PactBroker };

export interface LoadedPact {
  /** Where the pact came from, used as the report's source name. */
  name: string;
  pact: Pact;
}

export function describeSource(source: PactSource): string {
  switch (source.type) {
    case 'file':
    case 'dir':
      return source.path;
    case 'url':
      return source.url;
    case 'broker':
      return 'broker';
  }
}

async function loadFile(file: string): Promise<LoadedPact> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    throw new AccordError('IO_ERROR', `Failed to read pact file ${file}: ${(err as Error).message}`, { file });
  }
  const result = readPactText(text);
  if (!result.ok) throw new AccordError('INVALID_PACT', `${file}: ${result.error}`, { file });
  return { name: file, pact: result.pact };
}

async function loadDirectory(directory: string): Promise<LoadedPact[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (err) {
    throw new AccordError('IO_ERROR', `Failed to read pact directory ${directory}: ${(err as Error).message}`, { directory });
  }
  const files = entries.filter((entry) => entry.endsWith('.json')).sort();
  const loaded: LoadedPact[] = [];
  for (const file of files) {
    loaded.push(await loadFile(path.join(directory, file)));
  }
  return loaded;
}

async function loadUrl(url: string, headers: Record<string, string>, timeout: number): Promise<LoadedPact> {
  let text: string;
  try {
    const response = await fetch(url, { headers, signal: AbortSignal.timeout(timeout) });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }
    text = await response.text();
  } catch (err) {
    throw new AccordError('PROVIDER_CONNECTION_ERROR', `Failed to fetch pact from ${url}: ${(err as Error).message}`, { url });
  }
  const result = readPactText(text);
  if (!result.ok) throw new AccordError('INVALID_PACT', `${url}: ${result.error}`, { url });
  return { name: url, pact: result.pact };
}

async function loadBroker(broker: PactBroker, provider: string): Promise<LoadedPact[]> {
  const documents = await broker.fetchPacts(provider);
  return documents.map(({ name, document }) => {
    const result = readPact(document);
    if (!result.ok) throw new AccordError('INVALID_PACT', `${name}: ${result.error}`, { name });
    return { name, pact: result.pact };
  });
}

/**
 * Read every pact a source refers to.
 *
 * @throws {AccordError} IO_ERROR, INVALID_PACT or PROVIDER_CONNECTION_ERROR
 */
export async function loadSource(source: PactSource, provider: string, timeout: number): Promise<LoadedPact[]> {
  switch (source.type) {
    case 'file':
      return [await loadFile(source.path)];
    case 'dir':
      return loadDirectory(source.path);
    case 'url':
      return [await loadUrl(source.url, source.headers ?? {}, timeout)];
    case 'broker':
      return loadBroker(source.broker, provider);
  }
}
