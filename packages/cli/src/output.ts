/**
 * Entitle CLI — Result output
 *
 * Writes a rendered OperationResult to the context streams and maps it to
 * an exit code. JSON goes to stdout in full; text splits across stdout and
 * stderr as the renderer decides.
 */

import type { OperationAction, OperationResult, OutputFormat } from '@entitle/kernel';
import { REBOOT_REQUIRED_MESSAGE, ResultStatus, renderResultJson, renderResultText } from '@entitle/kernel';
import { Option } from 'commander';
import type { CliContext } from './context.js';
import { createTheme } from './theme.js';

export const FORMAT_CHOICES: ReadonlyArray<OutputFormat> = ['text', 'json'];

export function formatOption(): Option {
  return new Option('--format <format>', 'Output format').choices(FORMAT_CHOICES).default('text');
}

/** Commander hands the --format value over as a plain string. */
export function toOutputFormat(value: string): OutputFormat {
  return value === 'json' ? 'json' : 'text';
}

export function printResult(
  ctx: CliContext,
  result: OperationResult,
  action: OperationAction,
  format: OutputFormat,
): number {
  if (format === 'json') {
    ctx.stdout(renderResultJson(result));
  } else {
    const t = createTheme(ctx.color);
    const warnings = new Set(result.warnings.map((w) => w.message));
    const text = renderResultText(result, action);
    for (const line of text.stdout) {
      if (line === REBOOT_REQUIRED_MESSAGE || warnings.has(line)) {
        ctx.stdout(t.warn(line));
      } else {
        ctx.stdout(t.ok(line));
      }
    }
    for (const line of text.stderr) {
      ctx.stderr(t.error(line));
    }
  }
  return result.result === ResultStatus.Success ? 0 : 1;
}
