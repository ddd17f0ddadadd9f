import type { Command } from 'commander';
import { loadSpecFile, type ApiSpecModel } from '@diffprobe/core';
import type { OutputStreams } from '../flags.js';
import { renderOperations } from '../render.js';

export async function listOperationsCommand(
  flags: { spec: string },
  io: OutputStreams = process
): Promise<ApiSpecModel> {
  const model = await loadSpecFile(flags.spec);
  io.stdout.write(`${renderOperations(model)}\n`);
  return model;
}

export function registerListOperationsCommand(program: Command): void {
  program
    .command('list-operations')
    .description('Print every operation and its outgoing links')
    .requiredOption('--spec <file>', 'OpenAPI 3.x document (YAML or JSON)')
    .action(async (opts: { spec: string }) => {
      await listOperationsCommand(opts);
    });
}
