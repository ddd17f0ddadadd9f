/**
 * AJV-backed verification of POSITIVE cases against their operation schemas.
 */

import type { SchemaObject, ValidateFunction } from 'ajv';

import { createSchemaAjv, dialectForOpenApi, type AjvInstance } from '../ajv/factory.js';
import { isRecord, type JsonValue } from '../types/json.js';
import type { ApiSpecModel, JsonSchema, Operation } from '../types/model.js';

export interface ValidationFailure {
  /** `path.item_id`, `query.limit`, `body` ... */
  location: string;
  instancePath: string;
  message: string;
  keyword: string;
}

export class CaseValidator {
  private readonly ajv: AjvInstance;
  private readonly compiled = new WeakMap<JsonSchema, ValidateFunction>();
  private readonly root: Record<string, unknown>;

  constructor(model: ApiSpecModel) {
    this.ajv = createSchemaAjv(dialectForOpenApi(model.openapi));
    this.root = model.document;
  }

  private compile(schema: JsonSchema): ValidateFunction {
    const cached = this.compiled.get(schema);
    if (cached) return cached;
    // Local refs ('#/components/...') resolve against this wrapper's root
    const wrapper: SchemaObject = { allOf: [schema] };
    if (isRecord(this.root.components)) wrapper.components = this.root.components;
    if (isRecord(this.root.$defs)) wrapper.$defs = this.root.$defs;
    const fn = this.ajv.compile(wrapper);
    this.compiled.set(schema, fn);
    return fn;
  }

  validateValue(schema: JsonSchema, value: JsonValue, location: string): ValidationFailure[] {
    const fn = this.compile(schema);
    if (fn(value)) return [];
    return (fn.errors ?? []).map((e) => ({
      location,
      instancePath: e.instancePath,
      message: e.message ?? 'invalid',
      keyword: e.keyword,
    }));
  }

  /**
   * Check typed parameter values (keyed `in.name`) and the body.
   * Parameters listed in `skip` (awaiting link extraction) are not checked.
   */
  validateCase(
    operation: Operation,
    raw: Record<string, JsonValue>,
    body: JsonValue | undefined,
    mediaType: string | undefined,
    skip: ReadonlySet<string> = new Set()
  ): ValidationFailure[] {
    const failures: ValidationFailure[] = [];
    for (const param of operation.parameters) {
      const key = `${param.in}.${param.name}`;
      if (skip.has(key)) continue;
      const value = raw[key];
      if (value === undefined) {
        if (param.required) {
          failures.push({ location: key, instancePath: '', message: 'required parameter missing', keyword: 'required' });
        }
        continue;
      }
      failures.push(...this.validateValue(param.schema, value, key));
    }
    const bodySpec = operation.requestBody;
    if (bodySpec) {
      const schema = mediaType ? bodySpec.content[mediaType] : undefined;
      if (body === undefined) {
        if (bodySpec.required) {
          failures.push({ location: 'body', instancePath: '', message: 'required body missing', keyword: 'required' });
        }
      } else if (schema) {
        failures.push(...this.validateValue(schema, body, 'body'));
      }
    }
    return failures;
  }
}
