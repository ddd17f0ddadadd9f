#!/usr/bin/env -S node --import tsx

// CLI entry point
// - `list-operations` prints the operations and links of an OpenAPI document.
// - `explore` generates cases and link chains, runs them against two targets
//   and writes a bundle for every divergence plus summary.json.
// - `replay` re-runs stored bundles and classifies each one.
// Mismatches are results, not failures: only errors change the exit code.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  TOOL_VERSION,
  isDiffProbeError,
  type DiffProbeError,
} from '@diffprobe/core';
import { renderCLIView } from './render.js';
import { registerExploreCommand } from './commands/explore.js';
import { registerReplayCommand } from './commands/replay.js';
import { registerListOperationsCommand } from './commands/list-operations.js';

const program = new Command();

program
  .name('diffprobe')
  .description('Differential testing of two implementations of one OpenAPI contract')
  .version(TOOL_VERSION);

registerListOperationsCommand(program);
registerExploreCommand(program);
registerReplayCommand(program);

export function toDiffProbeError(err: unknown): DiffProbeError {
  if (isDiffProbeError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError({
    message: message || 'Unexpected error',
    cause: err instanceof Error ? err : undefined,
  });
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: process.stderr.isTTY === true });

  const error = toDiffProbeError(err);
  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
