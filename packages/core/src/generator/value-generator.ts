/* eslint-disable complexity */
/* eslint-disable max-lines-per-function */
/**
 * Schema-driven value generation.
 *
 * Priority per node: const, enum, examples (sometimes), allOf merge,
 * oneOf/anyOf pick, then the declared (or inferred) type. Formats go through
 * the FormatRegistry; patterns through faker's regex sampler, checked against
 * the real RegExp before they are accepted.
 */

import type { Faker } from '@faker-js/faker';

import { ok, err, type Result } from '../types/result.js';
import { GenerationError } from '../types/errors.js';
import { isRecord, toJsonValue, type JsonObject, type JsonValue } from '../types/json.js';
import type { JsonSchema } from '../types/model.js';
import type { FormatRegistry } from '../registry/format-registry.js';
import type { XorShift32 } from '../util/rng.js';
import { canonicalJson } from '../util/canonical-json.js';
import {
  declaredTypes,
  inferType,
  list,
  mergeAllOf,
  num,
  record,
  requiredNames,
  resolveSchema,
  str,
} from './schema-utils.js';

export interface ValueGeneratorOptions {
  /** Document root for `$ref` resolution */
  root: Record<string, unknown>;
  formats: FormatRegistry;
  /** Beyond this depth only required content is generated */
  maxDepth?: number;
  /** Probability of using a declared example instead of synthesizing */
  exampleRate?: number;
}

export interface ValueContext {
  rng: XorShift32;
  faker: Faker;
  /** JSONPath-like location, for error messages */
  path: string;
  depth: number;
}

const PATTERN_ATTEMPTS = 10;
const HARD_DEPTH_LIMIT = 32;

export class ValueGenerator {
  private readonly maxDepth: number;
  private readonly exampleRate: number;

  constructor(private readonly options: ValueGeneratorOptions) {
    this.maxDepth = options.maxDepth ?? 4;
    this.exampleRate = options.exampleRate ?? 0.25;
  }

  generate(schemaIn: unknown, ctx: ValueContext): Result<JsonValue, GenerationError> {
    if (ctx.depth > HARD_DEPTH_LIMIT) {
      return err(this.fail(ctx, 'Schema nesting too deep (recursive $ref without an exit?)', 'depth'));
    }
    if (schemaIn === true || schemaIn === undefined) {
      return ok(ctx.faker.lorem.word());
    }
    if (schemaIn === false) {
      return err(this.fail(ctx, 'Schema `false` accepts no value', 'false'));
    }
    if (!isRecord(schemaIn)) {
      return err(this.fail(ctx, 'Schema node is not an object', 'schema'));
    }
    const resolved = resolveSchema(this.options.root, schemaIn);
    if (!resolved) {
      return err(this.fail(ctx, `Unresolvable $ref ${String(schemaIn.$ref)}`, '$ref'));
    }
    const schema = mergeAllOf(this.options.root, resolved);

    if (schema.const !== undefined) {
      return this.literal(schema.const, ctx, 'const');
    }
    const enumValues = list(schema, 'enum');
    if (enumValues) {
      const candidates = enumValues.filter((v) => v !== null);
      const picked = ctx.rng.pick(candidates.length > 0 ? candidates : enumValues);
      return picked === undefined
        ? err(this.fail(ctx, 'Enum array is empty', 'enum'))
        : this.literal(picked, ctx, 'enum');
    }
    const example = this.pickExample(schema, ctx);
    if (example !== undefined) return ok(example);

    const branches = list(schema, 'oneOf') ?? list(schema, 'anyOf');
    if (branches && branches.length > 0) {
      const branch = ctx.rng.pick(branches);
      const { oneOf: _oneOf, anyOf: _anyOf, ...parent } = schema;
      const merged = isRecord(branch)
        ? { ...parent, ...(resolveSchema(this.options.root, branch) ?? {}) }
        : parent;
      return this.generate(merged, ctx);
    }

    const types = declaredTypes(schema).filter((t) => t !== 'null');
    if (types.length === 0 && declaredTypes(schema).includes('null')) return ok(null);
    const type = ctx.rng.pick(types) ?? inferType(schema);

    switch (type) {
      case 'string':
        return this.generateString(schema, ctx);
      case 'integer':
        return this.generateNumber(schema, ctx, true);
      case 'number':
        return this.generateNumber(schema, ctx, false);
      case 'boolean':
        return ok(ctx.rng.chance(0.5));
      case 'array':
        return this.generateArray(schema, ctx);
      case 'object':
        return this.generateObject(schema, ctx);
      default:
        return err(this.fail(ctx, `Unsupported schema type "${type}"`, 'type'));
    }
  }

  private literal(value: unknown, ctx: ValueContext, constraint: string): Result<JsonValue, GenerationError> {
    const json = toJsonValue(value);
    return json === undefined
      ? err(this.fail(ctx, `${constraint} value is not JSON`, constraint))
      : ok(json);
  }

  private pickExample(schema: JsonSchema, ctx: ValueContext): JsonValue | undefined {
    const pool: unknown[] = [];
    if (schema.example !== undefined) pool.push(schema.example);
    const examples = list(schema, 'examples');
    if (examples) pool.push(...examples);
    if (pool.length === 0 || !ctx.rng.chance(this.exampleRate)) return undefined;
    return toJsonValue(ctx.rng.pick(pool));
  }

  private generateString(schema: JsonSchema, ctx: ValueContext): Result<JsonValue, GenerationError> {
    const minLength = num(schema, 'minLength') ?? 0;
    const maxLength = num(schema, 'maxLength');
    if (maxLength !== undefined && minLength > maxLength) {
      return err(
        this.fail(ctx, `Invalid constraints: minLength (${minLength}) > maxLength (${maxLength})`, 'constraint-conflict')
      );
    }

    const format = str(schema, 'format');
    if (format && this.options.formats.supports(format)) {
      return this.options.formats.generate(format, { rng: ctx.rng, faker: ctx.faker });
    }

    const pattern = str(schema, 'pattern');
    if (pattern) return this.generateFromPattern(pattern, minLength, maxLength, ctx);

    const hi = maxLength ?? Math.max(minLength + 8, 16);
    const target = ctx.rng.int(Math.min(Math.max(minLength, 3), hi), hi);
    let value = ctx.faker.lorem.words(3).replace(/\s+/g, '-');
    while (value.length < target) value += ctx.faker.string.alphanumeric(target - value.length);
    return ok(value.slice(0, target));
  }

  private generateFromPattern(
    pattern: string,
    minLength: number,
    maxLength: number | undefined,
    ctx: ValueContext
  ): Result<JsonValue, GenerationError> {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern, 'u');
    } catch (error) {
      return err(
        this.fail(ctx, `Invalid regex pattern: ${pattern}`, 'pattern', error, { valueExcerpt: pattern })
      );
    }
    // The sampler treats anchors as literals
    const body = pattern.replace(/^\^/, '').replace(/(?<!\\)\$$/, '');
    for (let attempt = 0; attempt < PATTERN_ATTEMPTS; attempt++) {
      let candidate: string;
      try {
        candidate = ctx.faker.helpers.fromRegExp(body);
      } catch {
        break;
      }
      const fits = candidate.length >= minLength && (maxLength === undefined || candidate.length <= maxLength);
      if (fits && regex.test(candidate)) return ok(candidate);
    }
    return err(
      this.fail(ctx, `Could not produce a string matching /${pattern}/`, 'pattern', undefined, {
        suggestion: 'Simplify the pattern or add an example',
        valueExcerpt: pattern,
      })
    );
  }

  private generateNumber(
    schema: JsonSchema,
    ctx: ValueContext,
    integer: boolean
  ): Result<JsonValue, GenerationError> {
    let min = num(schema, 'minimum');
    let max = num(schema, 'maximum');
    const exMin = schema.exclusiveMinimum;
    const exMax = schema.exclusiveMaximum;
    const step = integer ? 1 : 0.01;
    // 3.1 numeric exclusives, 3.0 boolean flags
    if (typeof exMin === 'number') min = Math.max(min ?? -Infinity, exMin + step);
    else if (exMin === true && min !== undefined) min += step;
    if (typeof exMax === 'number') max = Math.min(max ?? Infinity, exMax - step);
    else if (exMax === true && max !== undefined) max -= step;

    if (min === undefined && max === undefined) {
      min = 1;
      max = 1000;
    } else if (min === undefined) {
      min = (max ?? 0) - 1000;
    } else if (max === undefined) {
      max = min + 1000;
    }
    const lo = min ?? 0;
    const hi = max ?? lo;
    if (lo > hi) {
      return err(this.fail(ctx, `Invalid range: minimum ${lo} > maximum ${hi}`, 'range'));
    }

    const multipleOf = num(schema, 'multipleOf');
    if (multipleOf !== undefined && multipleOf > 0) {
      const first = Math.ceil(lo / multipleOf);
      const last = Math.floor(hi / multipleOf);
      if (first > last) {
        return err(this.fail(ctx, `No multiple of ${multipleOf} in [${lo}, ${hi}]`, 'multipleOf'));
      }
      const k = ctx.rng.int(first, last);
      const value = k * multipleOf;
      return ok(integer ? Math.round(value) : Number(value.toPrecision(12)));
    }

    if (integer) {
      return ok(ctx.rng.int(Math.ceil(lo), Math.floor(hi)));
    }
    const value = lo + ctx.rng.nextFloat01() * (hi - lo);
    const rounded = Math.round(value * 100) / 100;
    return ok(rounded < lo || rounded > hi ? lo : rounded);
  }

  private generateArray(schema: JsonSchema, ctx: ValueContext): Result<JsonValue, GenerationError> {
    const minItems = num(schema, 'minItems') ?? 0;
    const maxItems = num(schema, 'maxItems') ?? Math.max(minItems, 3);
    if (minItems > maxItems) {
      return err(this.fail(ctx, `minItems (${minItems}) > maxItems (${maxItems})`, 'constraint-conflict'));
    }
    const deep = ctx.depth >= this.maxDepth;
    const floor = Math.min(Math.max(minItems, 1), maxItems);
    const count = deep ? minItems : ctx.rng.int(floor, maxItems);
    const unique = schema.uniqueItems === true;
    const items: JsonValue[] = [];
    const seen = new Set<string>();
    let attempts = 0;
    while (items.length < count && attempts < count * 10) {
      attempts++;
      const item = this.generate(schema.items ?? true, {
        ...ctx,
        path: `${ctx.path}[${items.length}]`,
        depth: ctx.depth + 1,
      });
      if (item.isErr()) return item;
      const key = canonicalJson(item.value);
      if (unique && seen.has(key)) continue;
      seen.add(key);
      items.push(item.value);
    }
    if (items.length < minItems) {
      return err(this.fail(ctx, `Could not produce ${minItems} unique items`, 'uniqueItems'));
    }
    return ok(items);
  }

  private generateObject(schema: JsonSchema, ctx: ValueContext): Result<JsonValue, GenerationError> {
    const properties = record(schema, 'properties') ?? {};
    const required = requiredNames(schema);
    const deep = ctx.depth >= this.maxDepth;
    const out: JsonObject = {};

    for (const [name, propSchema] of Object.entries(properties)) {
      // readOnly properties belong to responses only
      if (isRecord(propSchema) && propSchema.readOnly === true) continue;
      const isRequired = required.has(name);
      if (!isRequired && (deep || !ctx.rng.chance(0.5))) continue;
      const value = this.generate(propSchema, {
        ...ctx,
        path: `${ctx.path}.${name}`,
        depth: ctx.depth + 1,
      });
      if (value.isErr()) {
        if (isRequired) return value;
        continue;
      }
      out[name] = value.value;
    }

    // Required names without a property schema still need a value
    for (const name of required) {
      if (name in out || name in properties) continue;
      out[name] = ctx.faker.lorem.word();
    }

    const additional = schema.additionalProperties;
    if (Object.keys(properties).length === 0 && isRecord(additional) && !deep) {
      const value = this.generate(additional, {
        ...ctx,
        path: `${ctx.path}.*`,
        depth: ctx.depth + 1,
      });
      if (value.isOk()) out[ctx.faker.lorem.word()] = value.value;
    }
    return ok(out);
  }

  private fail(
    ctx: ValueContext,
    message: string,
    constraint: string,
    cause?: unknown,
    extra: Record<string, unknown> = {}
  ): GenerationError {
    return new GenerationError({
      message,
      context: { path: ctx.path, constraint, ...extra },
      cause: cause instanceof Error ? cause : undefined,
    });
  }
}

/**
 * Break a generated value on purpose (EXPLORATORY mode).
 */
export function mutateValue(
  schemaIn: JsonSchema,
  value: JsonValue,
  root: Record<string, unknown>,
  rng: XorShift32
): JsonValue {
  const schema = mergeAllOf(root, resolveSchema(root, schemaIn) ?? schemaIn);
  if (Array.isArray(value)) {
    return rng.chance(0.5) ? { unexpected: value.length } : 'not-an-array';
  }
  if (isRecord(value)) {
    const required = [...requiredNames(schema)].filter((name) => name in value);
    const victim = rng.pick(required);
    const copy: JsonObject = { ...value };
    if (victim !== undefined) {
      delete copy[victim];
    } else {
      copy.__unexpected__ = true;
    }
    return copy;
  }
  switch (typeof value) {
    case 'number': {
      const max = num(schema, 'maximum');
      if (max !== undefined && rng.chance(0.5)) return max + 1;
      return 'not-a-number';
    }
    case 'string': {
      const maxLength = num(schema, 'maxLength');
      if (maxLength !== undefined && rng.chance(0.5)) return 'x'.repeat(maxLength + 1);
      return 12345;
    }
    case 'boolean':
      return 'maybe';
    default:
      return 'unexpected-null';
  }
}
