/**
 * @module pact-writer
 * Writes pacts to disk, merging with any existing document.
 *
 * Interactions are keyed by description and provider states. An incoming
 * interaction whose key already exists with different contents is a
 * conflict unless the write overwrites the file.
 */

import { isDeepStrictEqual } from 'node:util';
import fs from 'node:fs/promises';
import path from 'node:path';
import { AccordError } from './errors.js';
import { interactionToJson, readPactText, writePact } from './models/pact.js';
import type { Interaction, Pact, PactSpecification } from './types.js';

export interface WritePactOptions {
  /** Replace the existing file instead of merging into it. */
  overwrite?: boolean;
  /** Specification to write; defaults to the pact's own. */
  specification?: PactSpecification;
}

export type MergeResult = { ok: true; pact: Pact } | { ok: false; error: string };

/** Tail of each file's write queue. */
const writeQueues = new Map<string, Promise<void>>();

/**
 * Run `write` after every earlier write to `file` has settled. Failures
 * reach the caller through the returned promise; the queue moves on.
 */
function queueWrite<T>(file: string, write: () => Promise<T>): Promise<T> {
  const result = (writeQueues.get(file) ?? Promise.resolve()).then(write);
  const settled = (): void => {
    if (writeQueues.get(file) === tail) writeQueues.delete(file);
  };
  const tail = result.then(settled, settled);
  writeQueues.set(file, tail);
  return result;
}

function sanitise(name: string): string {
  return name.replace(/[^\w.-]+/g, '_');
}

/** `<consumer>-<provider>.json` */
export function pactFileName(pact: Pact): string {
  return `${sanitise(pact.consumer.name)}-${sanitise(pact.provider.name)}.json`;
}

function mergeKey(interaction: Interaction): string {
  return `${interaction.type}|${interaction.description}|${JSON.stringify(interaction.providerStates)}`;
}

function contents(interaction: Interaction): unknown {
  const json = interactionToJson(interaction, 'V4');
  delete json['key'];
  delete json['pending'];
  delete json['comments'];
  return json;
}

/**
 * Merge incoming interactions into an existing pact.
 * Identical interactions are kept once; differing ones under the same key fail.
 */
export function mergePacts(existing: Pact, incoming: Pact): MergeResult {
  const merged: Interaction[] = [...existing.interactions];
  const index = new Map(merged.map((interaction, i) => [mergeKey(interaction), i]));
  for (const interaction of incoming.interactions) {
    const key = mergeKey(interaction);
    const position = index.get(key);
    if (position === undefined) {
      index.set(key, merged.length);
      merged.push(interaction);
      continue;
    }
    const current = merged[position];
    if (current && !isDeepStrictEqual(contents(current), contents(interaction))) {
      return {
        ok: false,
        error: `Cannot merge pacts as there were conflicting interactions: '${interaction.description}' differs from the existing interaction with the same description and provider states`,
      };
    }
  }
  return {
    ok: true,
    pact: {
      ...incoming,
      interactions: merged,
      metadata: { ...existing.metadata, ...incoming.metadata },
    },
  };
}

/**
 * Write a pact into a directory.
 *
 * @returns the path of the written file
 * @throws {AccordError} IO_ERROR when the file cannot be read or written,
 *   PACT_FILE_CONFLICT when merging fails
 */
export async function writePactFile(pact: Pact, directory: string, options: WritePactOptions = {}): Promise<string> {
  const file = path.resolve(directory, pactFileName(pact));
  const specification = options.specification ?? pact.specification;

  return queueWrite(file, async () => {
    let toWrite = pact;
    if (!options.overwrite) {
      const existing = await readExisting(file);
      if (existing) {
        const merged = mergePacts(existing, pact);
        if (!merged.ok) throw new AccordError('PACT_FILE_CONFLICT', merged.error, { file });
        toWrite = merged.pact;
      }
    }
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, `${JSON.stringify(writePact(toWrite, specification), null, 2)}\n`, 'utf-8');
    } catch (err) {
      throw new AccordError('IO_ERROR', `Failed to write pact file ${file}: ${(err as Error).message}`, { file });
    }
    return file;
  });
}

async function readExisting(file: string): Promise<Pact | undefined> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return undefined;
    throw new AccordError('IO_ERROR', `Failed to read pact file ${file}: ${(err as Error).message}`, { file });
  }
  const result = readPactText(text);
  if (!result.ok) {
    throw new AccordError('IO_ERROR', `Existing pact file ${file} could not be read: ${result.error}`, { file });
  }
  return result.pact;
}
