/**
 * pro attach / detach / refresh — Subscription lifecycle
 *
 *   pro attach <token> [--no-auto-enable] [--format text|json]
 *   pro auto-attach [--enable <service...>] [--enable-beta <service...>] [--format text|json]
 *   pro detach [--assume-yes] [--format text|json]
 *   pro refresh [--format text|json]
 *
 * detach lists the services it is about to disable and asks for
 * confirmation unless --assume-yes is given. The listing and the prompt go
 * to stderr so that stdout holds only the result.
 */

import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { formatOption, printResult, toOutputFormat } from '../output.js';
import { createTheme } from '../theme.js';

// ---------------------------------------------------------------------------
// pro attach <token>
// ---------------------------------------------------------------------------

export function attachCommand(ctx: CliContext, setExitCode: (code: number) => void): Command {
  return new Command('attach')
    .description('Attach this machine to an Ubuntu Pro subscription')
    .argument('<token>', 'Contract token')
    .option('--no-auto-enable', 'Do not enable the default services after attaching')
    .addOption(formatOption())
    .action(async (token: string, options: { autoEnable: boolean; format: string }) => {
      const format = toOutputFormat(options.format);
      const manager = ctx.manager();
      const { result, state } = await manager.attach(token, { autoEnable: options.autoEnable });
      const code = printResult(ctx, result, 'attach', format);
      if (format === 'text' && state.contract !== null && result.errors.every((e) => e.service !== null)) {
        ctx.stdout(createTheme(ctx.color).heading(`This machine is now attached to '${state.contract.name}'`));
      }
      setExitCode(code);
    });
}

// ---------------------------------------------------------------------------
// pro auto-attach
// ---------------------------------------------------------------------------

interface AutoAttachCommandOptions {
  enable?: string[];
  enableBeta?: string[];
  format: string;
}

export function autoAttachCommand(ctx: CliContext, setExitCode: (code: number) => void): Command {
  return new Command('auto-attach')
    .description('Attach this cloud instance using the token its image provides')
    .option('--enable <service...>', 'Enable these services instead of the defaults')
    .option('--enable-beta <service...>', 'Also enable these beta services')
    .addOption(formatOption())
    .action(async (options: AutoAttachCommandOptions) => {
      const format = toOutputFormat(options.format);
      const { result, state } = await ctx.manager().autoAttach({
        enable: options.enable,
        enableBeta: options.enableBeta,
      });
      const code = printResult(ctx, result, 'auto-attach', format);
      if (format === 'text' && code === 0 && state.contract !== null) {
        ctx.stdout(createTheme(ctx.color).heading(`This machine is now attached to '${state.contract.name}'`));
      }
      setExitCode(code);
    });
}

// ---------------------------------------------------------------------------
// pro detach
// ---------------------------------------------------------------------------

export function detachCommand(ctx: CliContext, setExitCode: (code: number) => void): Command {
  return new Command('detach')
    .description('Remove this machine from its Ubuntu Pro subscription')
    .option('--assume-yes', 'Do not prompt for confirmation', false)
    .addOption(formatOption())
    .action(async (options: { assumeYes: boolean; format: string }) => {
      const format = toOutputFormat(options.format);
      const manager = ctx.manager();
      const current = manager.state();

      if (current.attached && !options.assumeYes) {
        if (current.enabled_services.length > 0) {
          ctx.stderr('Detach will disable the following services:');
          for (const name of current.enabled_services) {
            ctx.stderr(`    ${name}`);
          }
        }
        if (!(await ctx.confirm('Are you sure? (y/N) '))) {
          ctx.stderr('Aborted.');
          setExitCode(1);
          return;
        }
      }

      const { result, state } = await manager.detach();
      const code = printResult(ctx, result, 'detach', format);
      if (format === 'text' && current.attached && !state.attached) {
        ctx.stdout('This machine is now detached.');
      }
      setExitCode(code);
    });
}

// ---------------------------------------------------------------------------
// pro refresh
// ---------------------------------------------------------------------------

export function refreshCommand(ctx: CliContext, setExitCode: (code: number) => void): Command {
  return new Command('refresh')
    .description('Refresh the subscription contract and entitlements')
    .addOption(formatOption())
    .action(async (options: { format: string }) => {
      const format = toOutputFormat(options.format);
      const { result } = await ctx.manager().refresh();
      const code = printResult(ctx, result, 'refresh', format);
      if (format === 'text' && code === 0) {
        ctx.stdout('Successfully refreshed your subscription.');
      }
      setExitCode(code);
    });
}
