import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import bundleSchema from '../schemas/bundle.schema.json' with { type: 'json' };

import { createTypedValidator } from '../ajv/factory.js';
import type { Mismatch, RequestCase } from '../types/model.js';
import { BundleCorruption, describeError } from '../types/errors.js';
import { ok, err, type Result } from '../types/result.js';
import { silentLogger, type Logger } from '../util/logger.js';
import {
  CASE_FILE,
  CHAIN_FILE,
  DIFF_FILE,
  MISMATCHES_DIR,
  type BundleType,
  type ChainDescriptor,
  type DiffRecord,
} from './format.js';

function validatorFor<T>(definition: string): (value: unknown) => Result<T, string[]> {
  return createTypedValidator<T>({
    allOf: [{ $ref: `#/definitions/${definition}` }],
    definitions: bundleSchema.definitions,
  });
}

const checkCase = validatorFor<RequestCase>('requestCase');
const checkChain = validatorFor<ChainDescriptor>('chainDescriptor');
const checkDiff = validatorFor<DiffRecord>('diffRecord');

export interface LoadedBundle {
  directory: string;
  name: string;
  type: BundleType;
  /** A case bundle loads as a one-step chain */
  chain: ChainDescriptor;
  diff: DiffRecord;
  /** Mismatches recorded at the halting step */
  mismatches: Mismatch[];
}

export interface LoadedBundles {
  /** Directory that was scanned */
  root: string;
  bundles: LoadedBundle[];
  /** Directories skipped for a missing descriptor or unreadable files */
  skipped: BundleCorruption[];
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function readJson(file: string): Promise<Result<unknown, string>> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    return err(describeError(error));
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return ok(parsed);
  } catch (error) {
    return err(`invalid JSON: ${describeError(error)}`);
  }
}

function corrupt(directory: string, message: string): BundleCorruption {
  return new BundleCorruption({ message: `${path.basename(directory)}: ${message}`, context: { directory } });
}

export async function loadBundle(directory: string): Promise<Result<LoadedBundle, BundleCorruption>> {
  const name = path.basename(directory);
  let chain: ChainDescriptor;
  let type: BundleType;

  const chainFile = path.join(directory, CHAIN_FILE);
  const caseFile = path.join(directory, CASE_FILE);
  if (await fileExists(chainFile)) {
    const raw = await readJson(chainFile);
    if (raw.isErr()) return err(corrupt(directory, `${CHAIN_FILE}: ${raw.error}`));
    const checked = checkChain(raw.value);
    if (checked.isErr()) return err(corrupt(directory, `${CHAIN_FILE}: ${checked.error.join('; ')}`));
    chain = checked.value;
    type = 'chain';
  } else if (await fileExists(caseFile)) {
    const raw = await readJson(caseFile);
    if (raw.isErr()) return err(corrupt(directory, `${CASE_FILE}: ${raw.error}`));
    const checked = checkCase(raw.value);
    if (checked.isErr()) return err(corrupt(directory, `${CASE_FILE}: ${checked.error.join('; ')}`));
    const request = checked.value;
    chain = {
      chainId: request.caseId,
      sequenceKey: request.operationId,
      steps: [{ stepIndex: 0, operationId: request.operationId, request }],
    };
    type = 'case';
  } else {
    return err(corrupt(directory, `no ${CASE_FILE} or ${CHAIN_FILE}`));
  }

  const rawDiff = await readJson(path.join(directory, DIFF_FILE));
  if (rawDiff.isErr()) return err(corrupt(directory, `${DIFF_FILE}: ${rawDiff.error}`));
  const diff = checkDiff(rawDiff.value);
  if (diff.isErr()) return err(corrupt(directory, `${DIFF_FILE}: ${diff.error.join('; ')}`));

  return ok({ directory, name, type, chain, diff: diff.value, mismatches: diff.value.mismatches });
}

async function fileExists(file: string): Promise<boolean> {
  try {
    return (await stat(file)).isFile();
  } catch {
    return false;
  }
}

/**
 * Discover bundles under `inDir`, preferring its `mismatches/` subdirectory.
 * Unusable directories are collected in `skipped`, never fatal; only a
 * missing input directory is an error.
 */
export async function loadBundles(
  inDir: string,
  logger: Logger = silentLogger
): Promise<Result<LoadedBundles, BundleCorruption>> {
  if (!(await isDirectory(inDir))) {
    return err(corrupt(inDir, 'input directory does not exist'));
  }
  const nested = path.join(inDir, MISMATCHES_DIR);
  const root = (await isDirectory(nested)) ? nested : inDir;

  const entries = await readdir(root, { withFileTypes: true });
  const names = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
  const bundles: LoadedBundle[] = [];
  const skipped: BundleCorruption[] = [];
  for (const entry of names) {
    const loaded = await loadBundle(path.join(root, entry));
    if (loaded.isOk()) {
      bundles.push(loaded.value);
    } else {
      logger.debug(`skipping bundle: ${loaded.error.message}`);
      skipped.push(loaded.error);
    }
  }
  return ok({ root, bundles, skipped });
}
