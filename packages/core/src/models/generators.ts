/**
 * @module models/generators
 * Generator variants and their pact JSON form.
 *
 * A generator describes how to produce an example value when a request or
 * response is materialised. Values are produced by the generator engine;
 * this module only models, reads and writes them.
 */

import { z } from 'zod';
import { DocPath } from './doc-path.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types.js';

// =====================================================================
// Generator variants
// =====================================================================

export type UuidFormat = 'simple' | 'lower-case-hyphenated' | 'upper-case-hyphenated' | 'URN';

/** Type a provider-state value is coerced to. */
export type DataType = 'RAW' | 'STRING' | 'INTEGER' | 'DECIMAL' | 'FLOAT' | 'BOOLEAN';

export interface ArrayContainsGeneratorVariant {
  index: number;
  generators: Array<[DocPath, Generator]>;
}

export type Generator =
  | { type: 'RandomInt'; min: number; max: number }
  | { type: 'Uuid'; format?: UuidFormat }
  | { type: 'RandomDecimal'; digits: number }
  | { type: 'RandomHexadecimal'; digits: number }
  | { type: 'RandomString'; size: number }
  | { type: 'Regex'; regex: string }
  | { type: 'Date'; format?: string; expression?: string }
  | { type: 'Time'; format?: string; expression?: string }
  | { type: 'DateTime'; format?: string; expression?: string }
  | { type: 'RandomBoolean' }
  | { type: 'ProviderState'; expression: string; dataType?: DataType }
  | { type: 'MockServerURL'; example: string; regex: string }
  | { type: 'RequestPath'; regex?: string }
  | { type: 'ArrayContains'; variants: ArrayContainsGeneratorVariant[] };

export type GeneratorType = Generator['type'];

/** Categories a pact groups generators under. */
export type GeneratorCategory = 'method' | 'path' | 'header' | 'query' | 'body' | 'status' | 'metadata';

export const GENERATOR_CATEGORIES: readonly GeneratorCategory[] = [
  'method', 'path', 'header', 'query', 'body', 'status', 'metadata',
];

/** Categories holding a single generator rather than a path-keyed map. */
const SINGLE_VALUE_CATEGORIES: ReadonlySet<GeneratorCategory> = new Set(['method', 'path', 'status']);

// =====================================================================
// JSON schemas
// =====================================================================

const DateLikeSchema = {
  format: z.string().optional(),
  expression: z.string().optional(),
};

const UuidFormatSchema = z.enum(['simple', 'lower-case-hyphenated', 'upper-case-hyphenated', 'URN']);

/** Zod schema for every generator except ArrayContains, which nests paths. */
export const GeneratorJsonSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('RandomInt'), min: z.number().int().default(0), max: z.number().int().default(10) }),
  z.object({ type: z.literal('Uuid'), format: UuidFormatSchema.optional() }),
  z.object({ type: z.literal('RandomDecimal'), digits: z.number().int().nonnegative().default(10) }),
  z.object({ type: z.literal('RandomHexadecimal'), digits: z.number().int().nonnegative().default(10) }),
  z.object({ type: z.literal('RandomString'), size: z.number().int().nonnegative().default(10) }),
  z.object({ type: z.literal('Regex'), regex: z.string() }),
  z.object({ type: z.literal('Date'), ...DateLikeSchema }),
  z.object({ type: z.literal('Time'), ...DateLikeSchema }),
  z.object({ type: z.literal('DateTime'), ...DateLikeSchema }),
  z.object({ type: z.literal('RandomBoolean') }),
  z.object({
    type: z.literal('ProviderState'),
    expression: z.string(),
    dataType: z.enum(['RAW', 'STRING', 'INTEGER', 'DECIMAL', 'FLOAT', 'BOOLEAN']).optional(),
  }),
  z.object({ type: z.literal('MockServerURL'), example: z.string(), regex: z.string() }),
  z.object({ type: z.literal('RequestPath'), regex: z.string().optional() }),
]);

/**
 * Read one generator from its JSON form.
 *
 * @returns the generator, or undefined when the JSON is not a known generator
 */
export function generatorFromJson(json: unknown): Generator | undefined {
  if (!isJsonObject(json)) return undefined;
  if (json['type'] === 'ArrayContains') {
    const variants = Array.isArray(json['variants']) ? json['variants'] : [];
    return {
      type: 'ArrayContains',
      variants: variants.filter(isJsonObject).map((variant) => ({
        index: typeof variant['index'] === 'number' ? variant['index'] : 0,
        generators: pathGeneratorsFromJson(variant['generators']),
      })),
    };
  }
  const parsed = GeneratorJsonSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

/** Serialise a generator to its pact JSON form. */
export function generatorToJson(generator: Generator): JsonObject {
  switch (generator.type) {
    case 'RandomInt':
      return { type: 'RandomInt', min: generator.min, max: generator.max };
    case 'Uuid':
      return generator.format ? { type: 'Uuid', format: generator.format } : { type: 'Uuid' };
    case 'RandomDecimal':
    case 'RandomHexadecimal':
      return { type: generator.type, digits: generator.digits };
    case 'RandomString':
      return { type: 'RandomString', size: generator.size };
    case 'Regex':
      return { type: 'Regex', regex: generator.regex };
    case 'Date':
    case 'Time':
    case 'DateTime': {
      const json: JsonObject = { type: generator.type };
      if (generator.format !== undefined) json['format'] = generator.format;
      if (generator.expression !== undefined) json['expression'] = generator.expression;
      return json;
    }
    case 'RandomBoolean':
      return { type: 'RandomBoolean' };
    case 'ProviderState':
      return generator.dataType
        ? { type: 'ProviderState', expression: generator.expression, dataType: generator.dataType }
        : { type: 'ProviderState', expression: generator.expression };
    case 'MockServerURL':
      return { type: 'MockServerURL', example: generator.example, regex: generator.regex };
    case 'RequestPath':
      return generator.regex !== undefined ? { type: 'RequestPath', regex: generator.regex } : { type: 'RequestPath' };
    case 'ArrayContains':
      return {
        type: 'ArrayContains',
        variants: generator.variants.map((variant) => ({
          index: variant.index,
          generators: pathGeneratorsToJson(variant.generators),
        })),
      };
  }
}

function pathGeneratorsFromJson(json: JsonValue | undefined): Array<[DocPath, Generator]> {
  const result: Array<[DocPath, Generator]> = [];
  if (!isJsonObject(json)) return result;
  for (const [key, value] of Object.entries(json)) {
    const path = DocPath.tryParse(key);
    const generator = generatorFromJson(value);
    if (path.ok && generator) result.push([path.path, generator]);
  }
  return result;
}

function pathGeneratorsToJson(entries: Array<[DocPath, Generator]>, keyed = false): JsonObject {
  const json: JsonObject = {};
  for (const [path, generator] of entries) {
    json[keyed ? path.toKeyString() : path.toString()] = generatorToJson(generator);
  }
  return json;
}

// =====================================================================
// Generators collection
// =====================================================================

/** Generators of one HTTP part or message, keyed by category then path. */
export class Generators {
  private readonly categories = new Map<GeneratorCategory, Map<string, [DocPath, Generator]>>();

  static fromJson(json: unknown): Generators {
    const generators = new Generators();
    if (!isJsonObject(json)) return generators;
    for (const category of GENERATOR_CATEGORIES) {
      const value = json[category];
      if (value === undefined) continue;
      if (SINGLE_VALUE_CATEGORIES.has(category)) {
        const generator = generatorFromJson(value);
        if (generator) generators.add(category, DocPath.empty(), generator);
      } else {
        for (const [path, generator] of pathGeneratorsFromJson(value)) {
          generators.add(category, path, generator);
        }
      }
    }
    return generators;
  }

  add(category: GeneratorCategory, path: DocPath, generator: Generator): void {
    let entries = this.categories.get(category);
    if (!entries) {
      entries = new Map();
      this.categories.set(category, entries);
    }
    entries.set(path.toString(), [path, generator]);
  }

  addAll(other: Generators): void {
    for (const [category, entries] of other.categories) {
      for (const [path, generator] of entries.values()) {
        this.add(category, path, generator);
      }
    }
  }

  get(category: GeneratorCategory): Array<[DocPath, Generator]> {
    return [...(this.categories.get(category)?.values() ?? [])];
  }

  isEmpty(): boolean {
    for (const entries of this.categories.values()) {
      if (entries.size > 0) return false;
    }
    return true;
  }

  clone(): Generators {
    const copy = new Generators();
    copy.addAll(this);
    return copy;
  }

  toJson(): JsonObject {
    const json: JsonObject = {};
    for (const category of GENERATOR_CATEGORIES) {
      const entries = this.categories.get(category);
      if (!entries || entries.size === 0) continue;
      if (SINGLE_VALUE_CATEGORIES.has(category)) {
        const first = entries.values().next();
        if (!first.done) json[category] = generatorToJson(first.value[1]);
      } else {
        json[category] = pathGeneratorsToJson([...entries.values()], category !== 'body');
      }
    }
    return json;
  }
}
