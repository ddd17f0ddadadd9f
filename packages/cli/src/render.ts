import type { ApiSpecModel, CLIErrorView, ExploreSummary, ReplaySummary } from '@diffprobe/core';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  green: '\u001B[32m',
  yellow: '\u001B[33m',
  bold: '\u001B[1m',
};

export function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

/** NO_COLOR wins, then FORCE_COLOR, then whether stdout is a terminal. */
export function shouldUseColors(env: NodeJS.ProcessEnv = process.env, isTTY = process.stdout.isTTY === true): boolean {
  const noColor = env.NO_COLOR;
  const force = env.FORCE_COLOR;
  if (noColor && noColor !== '0' && noColor !== 'false') return false;
  if (force && force !== '0' && force !== 'false') return true;
  return isTTY;
}

function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  lines.push(colorize(colorize(`✖ ${view.title}`, view.colors, ANSI.bold), view.colors, ANSI.red));
  if (view.location) lines.push(wrapText(view.location, width));
  if (view.excerpt) lines.push(wrapText(`Excerpt: ${view.excerpt}`, width));
  if (view.cause) lines.push(wrapText(`Cause: ${view.cause}`, width));
  if (view.workaround) lines.push(wrapText(`Workaround: ${view.workaround}`, width));
  return lines.join('\n');
}

export function renderOperations(model: ApiSpecModel): string {
  const lines = [`${model.title} ${model.version} (OpenAPI ${model.openapi})`, ''];
  for (const op of model.operations) {
    lines.push(`${op.operationId}  ${op.method.toUpperCase()} ${op.pathTemplate}`);
    for (const link of op.links) {
      lines.push(`  -> ${link.targetOperationId} via ${link.name} (${link.statusCode})`);
    }
  }
  lines.push('', `${model.operations.length} operations`);
  return lines.join('\n');
}

export function renderExploreSummary(summary: ExploreSummary, useColor = false): string {
  const mismatchText = `${summary.mismatches} mismatches`;
  const lines = [
    `cases: ${summary.cases}  chains: ${summary.chains}`,
    `matches: ${summary.matches}  ${colorize(mismatchText, useColor && summary.mismatches > 0, ANSI.red)}  errors: ${summary.errors}`,
    `degraded chains: ${summary.degraded}  truncated chains: ${summary.truncated}`,
  ];
  if (summary.generationFailures > 0) lines.push(`generation failures: ${summary.generationFailures}`);
  if (summary.bundles.length > 0) {
    lines.push('', 'bundles:');
    for (const bundle of summary.bundles) lines.push(`  ${bundle}`);
  }
  return lines.join('\n');
}

export function renderReplaySummary(summary: ReplaySummary, useColor = false): string {
  const colorOf = { FIXED: ANSI.green, PERSISTENT: ANSI.red, DIFFERENT: ANSI.yellow, ERROR: ANSI.red } as const;
  const lines = [`replayed ${summary.total} bundles`];
  for (const cls of ['FIXED', 'PERSISTENT', 'DIFFERENT', 'ERROR'] as const) {
    lines.push(`  ${colorize(cls.padEnd(10), useColor, colorOf[cls])} ${summary.counts[cls]}`);
  }
  if (summary.skipped.length > 0) lines.push(`skipped (corrupt): ${summary.skipped.length}`);
  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  const ansiRe = /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}

export default renderCLIView;
