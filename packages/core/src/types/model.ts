/**
 * Core data model shared by generation, execution, comparison and bundling.
 * Everything here is plain JSON-serializable data.
 */

import type { JsonObject, JsonValue } from './json.js';
import type { TransportErrorKind } from './errors.js';

export const HTTP_METHODS = [
  'get',
  'put',
  'post',
  'delete',
  'options',
  'head',
  'patch',
  'trace',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type ParameterLocation = 'path' | 'query' | 'header' | 'cookie';

/** JSON Schema node as found in the document; `$ref`s stay unresolved. */
export type JsonSchema = Record<string, unknown>;

export interface ParameterSpec {
  name: string;
  in: ParameterLocation;
  required: boolean;
  schema: JsonSchema;
}

export interface RequestBodySpec {
  required: boolean;
  /** media type -> schema */
  content: Record<string, JsonSchema>;
}

export interface LinkSpec {
  name: string;
  /** Status key of the response declaring the link ('201', '2XX', 'default') */
  statusCode: string;
  sourceOperationId: string;
  targetOperationId: string;
  /** Target parameter key (bare or `path.x` qualified) -> runtime expression */
  parameters: Record<string, string>;
}

export interface Operation {
  operationId: string;
  method: HttpMethod;
  pathTemplate: string;
  parameters: ParameterSpec[];
  requestBody?: RequestBodySpec;
  /** status key -> media type -> schema */
  responses: Record<string, Record<string, JsonSchema>>;
  links: LinkSpec[];
}

export interface ApiSpecModel {
  title: string;
  version: string;
  /** '3.0' | '3.1' family, drives the validation dialect */
  openapi: string;
  operations: Operation[];
  /** Raw document, the resolution root for local `$ref`s */
  document: Record<string, unknown>;
}

/** Parameter awaiting a value extracted from the previous chain step */
export interface UnresolvedParameter {
  in: ParameterLocation;
  name: string;
  required: boolean;
}

/**
 * One concrete request for an Operation.
 */
export interface RequestCase {
  caseId: string;
  operationId: string;
  method: HttpMethod;
  pathTemplate: string;
  pathParameters: Record<string, string>;
  query: Record<string, string[]>;
  headers: Record<string, string[]>;
  cookies: Record<string, string>;
  body?: JsonValue;
  mediaType?: string;
  /** Typed values before formatting, keyed `in.name`; links read these */
  rawParameters?: JsonObject;
  unresolved?: UnresolvedParameter[];
}

export type StepBodyKind = 'json' | 'xml' | 'text' | 'binary' | 'empty';

export interface StepError {
  kind: TransportErrorKind;
  message: string;
}

/**
 * One step against one target. `statusCode` is null exactly when `error` is set.
 */
export interface StepResult {
  statusCode: number | null;
  /** lowercase name -> non-empty ordered values */
  headers: Record<string, string[]>;
  bodyKind: StepBodyKind;
  body?: JsonValue;
  bodyBase64?: string;
  elapsedMs: number;
  error?: StepError;
}

export interface LinkSource {
  linkName: string;
  sourceOperationId: string;
  statusCode: string;
  parameters: Record<string, string>;
}

export interface ChainStep {
  stepIndex: number;
  operationId: string;
  request: RequestCase;
  linkSource?: LinkSource;
}

export interface ChainCase {
  chainId: string;
  /** operationIds joined with ' -> '; dedup/reporting key */
  sequenceKey: string;
  steps: ChainStep[];
}

export type MismatchKind = 'status_code' | 'header' | 'body';

export interface Mismatch {
  kind: MismatchKind;
  /** JSON pointer (body), header name (header), '' (status) */
  path: string;
  /** Display path: `$.items[0].id`, `header.content-type`, `status_code` */
  jsonPath: string;
  /** jsonPath with indices replaced by `[*]`; replay classification key */
  pattern: string;
  /** Rule that fired, or the literal evaluation error text */
  rule: string;
  targetA?: JsonValue;
  targetB?: JsonValue;
}

export interface ComparisonResult {
  match: boolean;
  mismatches: Mismatch[];
  /** Both sides failed at transport level: an execution error, not a mismatch */
  executionError?: string;
}

export type ReplayClassification = 'FIXED' | 'PERSISTENT' | 'DIFFERENT' | 'ERROR';
