/**
 * @module schema-generator
 * Converts the Zod schemas of accord into JSON Schema files.
 *
 * Uses zod-to-json-schema to produce standard JSON Schema Draft 7
 * output, suitable for IDE validation of `accord.yaml` and for
 * validating pact documents with Ajv.
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import { Ajv } from 'ajv';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { ZodTypeAny } from 'zod';
import { AccordConfigSchema } from './config-loader.js';
import { PactDocumentSchema } from './models/pact.js';

export interface SchemaDefinition {
  name: string;
  filename: string;
  title: string;
  description: string;
  schema: ZodTypeAny;
}

const CONFIG_SCHEMA: SchemaDefinition = {
  name: 'AccordConfig',
  filename: 'accord-config.schema.json',
  title: 'accord configuration',
  description: 'Schema for accord.yaml files: pact directory, mock server and verifier settings.',
  schema: AccordConfigSchema,
};

const PACT_SCHEMA: SchemaDefinition = {
  name: 'PactDocument',
  filename: 'pact-document.schema.json',
  title: 'Pact document',
  description: 'Top-level structure of a pact file: consumer, provider, interactions or messages, and metadata.',
  schema: PactDocumentSchema,
};

const SCHEMA_DEFINITIONS: SchemaDefinition[] = [CONFIG_SCHEMA, PACT_SCHEMA];

function toJsonSchema(def: SchemaDefinition): Record<string, unknown> {
  const schema = zodToJsonSchema(def.schema, { name: def.name, $refStrategy: 'none' });
  return { ...schema, title: def.title, description: def.description };
}

/**
 * Generate JSON Schema files from the Zod schemas.
 *
 * @param outputDir - Directory to write schema files into
 * @returns Array of generated file paths
 */
export async function generateSchemas(outputDir: string): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true });

  const writtenPaths: string[] = [];
  for (const def of SCHEMA_DEFINITIONS) {
    const filePath = path.join(outputDir, def.filename);
    await fs.writeFile(filePath, JSON.stringify(toJsonSchema(def), null, 2) + '\n', 'utf-8');
    writtenPaths.push(filePath);
  }
  return writtenPaths;
}

/** AccordConfigSchema as a JSON Schema object (in-memory, no file I/O). */
export function getConfigJsonSchema(): Record<string, unknown> {
  return toJsonSchema(CONFIG_SCHEMA);
}

/** PactDocumentSchema as a JSON Schema object (in-memory, no file I/O). */
export function getPactJsonSchema(): Record<string, unknown> {
  return toJsonSchema(PACT_SCHEMA);
}

/**
 * Validate a parsed pact document against the generated JSON Schema.
 *
 * @returns one message per violation; empty when the document is valid
 */
export function validatePactDocument(document: unknown): string[] {
  const ajv = new Ajv({ allErrors: true, strict: false });
  const validate = ajv.compile(getPactJsonSchema());
  if (validate(document)) return [];
  return (validate.errors ?? []).map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`);
}
