import AjvModule, { type AnySchema, type ErrorObject, type Options as AjvOptions, type Schema } from 'ajv';
import Ajv2020Module from 'ajv/dist/2020.js';
import addFormatsModule from 'ajv-formats';

import { ok, err, type Result } from '../types/result.js';

const Ajv = AjvModule.default;
const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

export type AjvInstance = InstanceType<typeof Ajv>;

export type SchemaDialect = 'draft-07' | '2020-12';

// Formats OpenAPI defines that JSON Schema validators do not know
const OPENAPI_FORMATS = ['int32', 'int64', 'float', 'double', 'byte', 'binary', 'password'];

/** OpenAPI 3.1 schemas are 2020-12; 3.0 schemas are a draft-07 dialect. */
export function dialectForOpenApi(version: string): SchemaDialect {
  return version.startsWith('3.1') ? '2020-12' : 'draft-07';
}

export function createSchemaAjv(dialect: SchemaDialect, options: { allErrors?: boolean } = {}): AjvInstance {
  const flags: AjvOptions = {
    strict: false,
    strictSchema: false,
    strictTypes: false,
    allowUnionTypes: true,
    validateFormats: true,
    allErrors: options.allErrors ?? false,
    coerceTypes: false,
    useDefaults: false,
    logger: false,
  };
  const ajv = dialect === '2020-12' ? new Ajv2020(flags) : new Ajv(flags);
  addFormats(ajv);
  for (const format of OPENAPI_FORMATS) ajv.addFormat(format, true);
  return ajv;
}

export function formatAjvErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
}

/**
 * Compile a document schema (config, rules) into a checker that lists
 * every violation.
 */
export function createDocumentValidator(schema: AnySchema): (value: unknown) => string[] {
  const validate = createSchemaAjv('draft-07', { allErrors: true }).compile(schema);
  return (value) => (validate(value) ? [] : formatAjvErrors(validate.errors));
}

/**
 * Like createDocumentValidator, but a passing value comes back typed as T.
 * The schema is the only thing standing behind that claim.
 */
export function createTypedValidator<T>(schema: Schema): (value: unknown) => Result<T, string[]> {
  const validate = createSchemaAjv('draft-07', { allErrors: true }).compile<T>(schema);
  return (value) => (validate(value) ? ok(value) : err(formatAjvErrors(validate.errors)));
}
