/* eslint-disable max-lines-per-function */
/**
 * Request case generation for a single operation.
 *
 * `generate()` returns a lazy, finite Iterable. Every call to
 * `[Symbol.iterator]()` starts a new run whose counter is mixed into the seed,
 * so restarting yields independent cases while `(seed, run)` stays
 * reproducible.
 */

import { Faker, en } from '@faker-js/faker';

import { GenerationError } from '../types/errors.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import type {
  ApiSpecModel,
  JsonSchema,
  Operation,
  ParameterSpec,
  RequestCase,
  UnresolvedParameter,
} from '../types/model.js';
import { selectRequestMediaType } from '../openapi/spec-model.js';
import type { FormatRegistry } from '../registry/format-registry.js';
import { CaseValidator, type ValidationFailure } from '../validator/case-validator.js';
import { canonicalJson } from '../util/canonical-json.js';
import { XorShift32 } from '../util/rng.js';
import { shortHash } from '../util/stable-hash.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { createFormatRegistry } from './formats/index.js';
import { ValueGenerator, mutateValue } from './value-generator.js';

export type GenerationMode = 'POSITIVE' | 'EXPLORATORY';

export interface CaseGeneratorOptions {
  seed?: number;
  formats?: FormatRegistry;
  /** Nesting depth past which optional content is dropped */
  maxDepth?: number;
  logger?: Logger;
}

export interface GenerateOptions {
  /** `in.name` keys a chain link will supply later */
  leaveUnresolved?: ReadonlySet<string>;
}

const VERIFY_ATTEMPTS = 10;
const DISTINCT_ATTEMPTS = 5;

// Header parameters OpenAPI says to ignore
const RESERVED_HEADERS = new Set(['accept', 'content-type', 'authorization']);

/** Replace anything outside printable ASCII with '?'. */
export function sanitizeHeaderValue(value: string): string {
  return value.replace(/[^\x20-\x7e]/gu, '?');
}

/** Header rules plus the cookie separators. */
export function sanitizeCookieValue(value: string): string {
  return sanitizeHeaderValue(value).replace(/[",;\\ ]/g, '?');
}

function scalarText(value: JsonValue): string {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Render a typed parameter value as the strings placed on the wire. */
export function formatParameterValues(param: ParameterSpec, value: JsonValue): string[] {
  switch (param.in) {
    case 'query':
      return Array.isArray(value) ? value.map(scalarText) : [scalarText(value)];
    case 'header': {
      const text = Array.isArray(value) ? value.map(scalarText).join(',') : scalarText(value);
      return [sanitizeHeaderValue(text)];
    }
    case 'cookie': {
      const text = Array.isArray(value) ? value.map(scalarText).join(',') : scalarText(value);
      return [sanitizeCookieValue(text)];
    }
    case 'path':
      return [Array.isArray(value) ? value.map(scalarText).join(',') : scalarText(value)];
  }
}

export class CaseGenerator {
  private readonly seed: number;
  private readonly values: ValueGenerator;
  private readonly validator: CaseValidator;
  private readonly faker = new Faker({ locale: [en] });
  private readonly logger: Logger;
  private runs = 0;

  constructor(
    private readonly model: ApiSpecModel,
    options: CaseGeneratorOptions = {}
  ) {
    this.seed = options.seed ?? 1;
    this.values = new ValueGenerator({
      root: model.document,
      formats: options.formats ?? createFormatRegistry(),
      maxDepth: options.maxDepth,
    });
    this.validator = new CaseValidator(model);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Lazy sequence of `count` cases. A case that cannot be produced surfaces as
   * a GenerationError thrown from the iterator.
   */
  generate(
    operation: Operation,
    count: number,
    mode: GenerationMode,
    options: GenerateOptions = {}
  ): Iterable<RequestCase> {
    const generator = this;
    const skip = options.leaveUnresolved ?? new Set<string>();
    return {
      *[Symbol.iterator](): Iterator<RequestCase> {
        const run = generator.runs++;
        const rng = new XorShift32(generator.seed, `${operation.operationId}|run:${run}`);
        const seenPaths = new Set<string>();
        for (let index = 0; index < count; index++) {
          yield generator.distinctCase(operation, mode, rng.fork(`case:${index}`), skip, seenPaths, `${run}.${index}`);
        }
      },
    };
  }

  /** One case from an explicit RNG; chains use this per step. */
  generateOne(
    operation: Operation,
    mode: GenerationMode,
    rng: XorShift32,
    options: GenerateOptions = {}
  ): RequestCase {
    return this.buildVerified(operation, mode, rng, options.leaveUnresolved ?? new Set(), 'single');
  }

  private distinctCase(
    operation: Operation,
    mode: GenerationMode,
    rng: XorShift32,
    skip: ReadonlySet<string>,
    seenPaths: Set<string>,
    tag: string
  ): RequestCase {
    const hasPathParams = operation.parameters.some((p) => p.in === 'path' && !skip.has(`path.${p.name}`));
    let candidate = this.buildVerified(operation, mode, rng, skip, tag);
    if (!hasPathParams) return candidate;
    for (let attempt = 1; attempt < DISTINCT_ATTEMPTS; attempt++) {
      const key = canonicalJson(candidate.pathParameters);
      if (!seenPaths.has(key)) break;
      candidate = this.buildVerified(operation, mode, rng, skip, tag);
    }
    seenPaths.add(canonicalJson(candidate.pathParameters));
    return candidate;
  }

  private buildVerified(
    operation: Operation,
    mode: GenerationMode,
    rng: XorShift32,
    skip: ReadonlySet<string>,
    tag: string
  ): RequestCase {
    let lastFailures: ValidationFailure[] = [];
    let lastError: GenerationError | undefined;
    for (let attempt = 0; attempt < VERIFY_ATTEMPTS; attempt++) {
      const built = this.buildOnce(operation, rng.fork(`attempt:${attempt}`), skip);
      if (built instanceof GenerationError) {
        lastError = built;
        continue;
      }
      if (mode === 'EXPLORATORY') {
        return this.finish(operation, this.mutate(operation, built, rng), skip, tag);
      }
      const failures = this.validator.validateCase(operation, built.raw, built.body, built.mediaType, skip);
      if (failures.length === 0) return this.finish(operation, built, skip, tag);
      lastFailures = failures;
      this.logger.debug('generated case failed validation, retrying', {
        operationId: operation.operationId,
        attempt,
        failures: failures.length,
      });
    }
    if (lastError && lastFailures.length === 0) throw lastError;
    const first = lastFailures[0];
    throw new GenerationError({
      message: `Could not generate a valid case for ${operation.operationId} after ${VERIFY_ATTEMPTS} attempts`,
      context: {
        operationId: operation.operationId,
        path: first ? `${first.location}${first.instancePath}` : undefined,
        constraint: first?.keyword ?? 'unknown',
        reason: first?.message,
      },
      cause: lastError,
    });
  }

  private buildOnce(
    operation: Operation,
    rng: XorShift32,
    skip: ReadonlySet<string>
  ): BuiltValues | GenerationError {
    this.faker.seed(rng.next());
    const raw: JsonObject = {};
    for (const param of operation.parameters) {
      const key = `${param.in}.${param.name}`;
      if (skip.has(key)) continue;
      if (param.in === 'header' && RESERVED_HEADERS.has(param.name.toLowerCase())) continue;
      if (!param.required && !rng.chance(0.5)) continue;
      const value = this.values.generate(param.schema, {
        rng: rng.fork(key),
        faker: this.faker,
        path: key,
        depth: 0,
      });
      if (value.isErr()) {
        if (param.required) return value.error;
        continue;
      }
      raw[key] = value.value;
    }

    let body: JsonValue | undefined;
    let mediaType: string | undefined;
    const bodySpec = operation.requestBody;
    if (bodySpec && (bodySpec.required || rng.chance(0.5))) {
      mediaType = selectRequestMediaType(bodySpec);
      const schema: JsonSchema = (mediaType ? bodySpec.content[mediaType] : undefined) ?? {};
      const value = this.values.generate(schema, {
        rng: rng.fork('body'),
        faker: this.faker,
        path: '$',
        depth: 0,
      });
      if (value.isErr()) return value.error;
      body = value.value;
    }
    return { raw, body, mediaType };
  }

  private mutate(operation: Operation, built: BuiltValues, rng: XorShift32): BuiltValues {
    const targets: string[] = Object.keys(built.raw);
    if (built.body !== undefined) targets.push('body');
    const victim = rng.pick(targets);
    if (victim === undefined) return built;
    const root = this.model.document;
    if (victim === 'body') {
      const schema = built.mediaType ? operation.requestBody?.content[built.mediaType] : undefined;
      return { ...built, body: mutateValue(schema ?? {}, built.body ?? null, root, rng) };
    }
    const param = operation.parameters.find((p) => `${p.in}.${p.name}` === victim);
    const current = built.raw[victim];
    if (!param || current === undefined) return built;
    return { ...built, raw: { ...built.raw, [victim]: mutateValue(param.schema, current, root, rng) } };
  }

  private finish(operation: Operation, built: BuiltValues, skip: ReadonlySet<string>, tag: string): RequestCase {
    const pathParameters: Record<string, string> = {};
    const query: Record<string, string[]> = {};
    const headers: Record<string, string[]> = {};
    const cookies: Record<string, string> = {};

    for (const param of operation.parameters) {
      const value = built.raw[`${param.in}.${param.name}`];
      if (value === undefined) continue;
      const wire = formatParameterValues(param, value);
      switch (param.in) {
        case 'path':
          pathParameters[param.name] = wire[0] ?? '';
          break;
        case 'query':
          query[param.name] = wire;
          break;
        case 'header':
          headers[param.name.toLowerCase()] = wire;
          break;
        case 'cookie':
          cookies[param.name] = wire[0] ?? '';
          break;
      }
    }

    const unresolved: UnresolvedParameter[] = operation.parameters
      .filter((p) => skip.has(`${p.in}.${p.name}`))
      .map((p) => ({ in: p.in, name: p.name, required: p.required }));

    const requestCase: RequestCase = {
      caseId: '',
      operationId: operation.operationId,
      method: operation.method,
      pathTemplate: operation.pathTemplate,
      pathParameters,
      query,
      headers,
      cookies,
      rawParameters: built.raw,
    };
    if (built.body !== undefined) requestCase.body = built.body;
    if (built.mediaType !== undefined && built.body !== undefined) requestCase.mediaType = built.mediaType;
    if (unresolved.length > 0) requestCase.unresolved = unresolved;
    requestCase.caseId = `${operation.operationId}-${shortHash({
      tag,
      seed: this.seed,
      raw: built.raw,
      body: built.body ?? null,
    })}`;
    return requestCase;
  }
}

interface BuiltValues {
  raw: JsonObject;
  body: JsonValue | undefined;
  mediaType: string | undefined;
}
