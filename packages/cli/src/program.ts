/**
 * Entitle CLI — Commander program
 *
 * buildProgram() wires every subcommand to a CliContext. runCli() parses one
 * argument vector and resolves to the process exit code:
 *
 *   0  the operation succeeded (or help/version was shown)
 *   1  a failed result, a thrown EntitleError, or a usage error
 *
 * The privilege check runs before commander sees the arguments, so a
 * non-root caller never reaches the catalog or the attachment state.
 */

import { Command, CommanderError } from 'commander';
import { EntitleError, PrivilegeError } from '@entitle/kernel';
import type { CliContext } from './context.js';
import { createTheme } from './theme.js';
import { serviceCommand } from './commands/services.js';
import { attachCommand, autoAttachCommand, detachCommand, refreshCommand } from './commands/lifecycle.js';
import { helpCommand, statusCommand } from './commands/queries.js';

export function buildProgram(ctx: CliContext, setExitCode: (code: number) => void): Command {
  const program = new Command('pro')
    .description(
      'Manage Ubuntu Pro services on this machine.\n' +
      'Services are enabled per subscription entitlement and release series.',
    )
    .version('0.1.0')
    .helpCommand(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.stdout(text.trimEnd()),
      writeErr: (text) => ctx.stderr(text.trimEnd()),
    });

  const commands = [
    serviceCommand('enable', ctx, setExitCode),
    serviceCommand('disable', ctx, setExitCode),
    attachCommand(ctx, setExitCode),
    autoAttachCommand(ctx, setExitCode),
    detachCommand(ctx, setExitCode),
    refreshCommand(ctx, setExitCode),
    helpCommand(ctx),
    statusCommand(ctx),
  ];
  for (const command of commands) {
    // addCommand() does not propagate exitOverride or output settings.
    program.addCommand(command.copyInheritedSettings(program));
  }
  return program;
}

export async function runCli(args: ReadonlyArray<string>, ctx: CliContext): Promise<number> {
  const t = createTheme(ctx.color);
  if (!ctx.isRoot()) {
    ctx.stderr(t.error(new PrivilegeError().message));
    return 1;
  }

  let exitCode = 0;
  const program = buildProgram(ctx, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...args], { from: 'user' });
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (err instanceof EntitleError) {
      ctx.stderr(t.error(err.message));
      return 1;
    }
    throw err;
  }
  return exitCode;
}
