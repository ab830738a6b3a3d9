/**
 * pro help <service> / pro status — Read-only queries
 *
 * Neither command takes the operation lock or writes state.
 * An unknown help name fails with HelpNotFoundError, which the program
 * reports on stderr without any JSON output.
 */

import { Command } from 'commander';
import { renderHelpJson, renderHelpText, renderStatusJson, renderStatusText } from '@entitle/kernel';
import type { CliContext } from '../context.js';
import { formatOption, toOutputFormat } from '../output.js';
import { createTheme } from '../theme.js';

export function helpCommand(ctx: CliContext): Command {
  return new Command('help')
    .description('Show information about a service')
    .argument('<service>', 'Service name')
    .addOption(formatOption())
    .action((service: string, options: { format: string }) => {
      const info = ctx.manager().help(service);
      ctx.stdout(toOutputFormat(options.format) === 'json' ? renderHelpJson(info) : renderHelpText(info));
    });
}

export function statusCommand(ctx: CliContext): Command {
  return new Command('status')
    .description('Show subscription and service status')
    .option('--all', 'Include beta services', false)
    .addOption(formatOption())
    .action((options: { all: boolean; format: string }) => {
      const report = ctx.manager().status(options.all ? { includeBeta: true } : undefined);
      if (toOutputFormat(options.format) === 'json') {
        ctx.stdout(renderStatusJson(report));
        return;
      }
      const [header, ...rest] = renderStatusText(report);
      if (header !== undefined) {
        ctx.stdout(createTheme(ctx.color).heading(header));
      }
      for (const line of rest) {
        ctx.stdout(line);
      }
    });
}
