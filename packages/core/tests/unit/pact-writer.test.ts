/**
 * Unit tests for the pact writer.
 *
 * Tests cover:
 * - File naming
 * - Merging into an existing file
 * - Conflicting interactions and overwrite
 * - Concurrent writes to one file
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { mergePacts, pactFileName, writePactFile } from '../../src/pact-writer.js';
import { emptyRequest, emptyResponse, readPactText } from '../../src/models/pact.js';
import { AccordError } from '../../src/errors.js';
import type { HttpInteraction, Pact } from '../../src/types.js';

function interaction(description: string, status = 200): HttpInteraction {
  return {
    type: 'Synchronous/HTTP',
    description,
    providerStates: [],
    pending: false,
    comments: {},
    request: { ...emptyRequest(), path: `/${description.replace(/\s+/g, '-')}` },
    response: { ...emptyResponse(), status },
  };
}

function pactOf(...interactions: HttpInteraction[]): Pact {
  return {
    consumer: { name: 'web' },
    provider: { name: 'widgets' },
    interactions,
    metadata: {},
    specification: 'V3',
  };
}

async function readBack(file: string): Promise<Pact> {
  const result = readPactText(await fs.readFile(file, 'utf-8'));
  if (!result.ok) throw new Error(result.error);
  return result.pact;
}

describe('pactFileName', () => {
  it('should join consumer and provider names', () => {
    expect(pactFileName(pactOf())).toBe('web-widgets.json');
  });

  it('should replace characters unsafe in file names', () => {
    const pact = { ...pactOf(), consumer: { name: 'web app' }, provider: { name: 'a/b' } };
    expect(pactFileName(pact)).toBe('web_app-a_b.json');
  });
});

describe('mergePacts', () => {
  it('should keep identical interactions once and append new ones', () => {
    const result = mergePacts(pactOf(interaction('first')), pactOf(interaction('first'), interaction('second')));
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.pact.interactions.map((i) => i.description)).toEqual(['first', 'second']);
  });

  it('should fail on a changed interaction under the same description', () => {
    const result = mergePacts(pactOf(interaction('first')), pactOf(interaction('first', 404)));
    expect(result).toEqual({
      ok: false,
      error: "Cannot merge pacts as there were conflicting interactions: 'first' differs from the existing interaction with the same description and provider states",
    });
  });
});

describe('writePactFile', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'accord-writer-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should create the directory and write the document', async () => {
    const dir = path.join(tmpDir, 'nested', 'pacts');
    const file = await writePactFile(pactOf(interaction('first')), dir);
    expect(file).toBe(path.join(dir, 'web-widgets.json'));

    const json = JSON.parse(await fs.readFile(file, 'utf-8'));
    expect(json.metadata.pactSpecification.version).toBe('3.0.0');
    expect(json.interactions).toHaveLength(1);
  });

  it('should honour the requested specification', async () => {
    const file = await writePactFile(pactOf(interaction('first')), tmpDir, { specification: 'V4' });
    const json = JSON.parse(await fs.readFile(file, 'utf-8'));
    expect(json.metadata.pactSpecification.version).toBe('4.0');
    expect(json.interactions[0].type).toBe('Synchronous/HTTP');
  });

  it('should merge into an existing file', async () => {
    await writePactFile(pactOf(interaction('first')), tmpDir);
    const file = await writePactFile(pactOf(interaction('second')), tmpDir);
    const pact = await readBack(file);
    expect(pact.interactions.map((i) => i.description)).toEqual(['first', 'second']);
  });

  it('should throw PACT_FILE_CONFLICT and leave the file as it was', async () => {
    const file = await writePactFile(pactOf(interaction('first')), tmpDir);
    const before = await fs.readFile(file, 'utf-8');

    const error = await writePactFile(pactOf(interaction('first', 500)), tmpDir).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AccordError);
    if (error instanceof AccordError) expect(error.code).toBe('PACT_FILE_CONFLICT');
    expect(await fs.readFile(file, 'utf-8')).toBe(before);
  });

  it('should replace the file when overwriting', async () => {
    await writePactFile(pactOf(interaction('first')), tmpDir);
    const file = await writePactFile(pactOf(interaction('first', 500)), tmpDir, { overwrite: true });
    const pact = await readBack(file);
    expect(pact.interactions).toHaveLength(1);
    const only = pact.interactions[0];
    expect(only?.type === 'Synchronous/HTTP' ? only.response.status : undefined).toBe(500);
  });

  it('should report an unreadable existing file as IO_ERROR', async () => {
    await fs.writeFile(path.join(tmpDir, 'web-widgets.json'), '{ not json');
    const error = await writePactFile(pactOf(interaction('first')), tmpDir).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AccordError);
    if (error instanceof AccordError) expect(error.code).toBe('IO_ERROR');
  });

  it('should serialise concurrent writes to the same file', async () => {
    const names = ['a', 'b', 'c', 'd', 'e'];
    await Promise.all(names.map((name) => writePactFile(pactOf(interaction(name)), tmpDir)));
    const pact = await readBack(path.join(tmpDir, 'web-widgets.json'));
    expect(pact.interactions.map((i) => i.description).sort()).toEqual(names);
  });

  it('should keep writing to a file after a queued write fails', async () => {
    await writePactFile(pactOf(interaction('first')), tmpDir);
    const [conflict, next] = await Promise.allSettled([
      writePactFile(pactOf(interaction('first', 500)), tmpDir),
      writePactFile(pactOf(interaction('second')), tmpDir),
    ]);
    expect(conflict.status).toBe('rejected');
    expect(next.status).toBe('fulfilled');
    const pact = await readBack(path.join(tmpDir, 'web-widgets.json'));
    expect(pact.interactions.map((i) => i.description)).toEqual(['first', 'second']);
  });
});
