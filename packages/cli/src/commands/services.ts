/**
 * pro enable / pro disable — Change services by name
 *
 *   pro enable <service...> [--assume-yes] [--format text|json] [--beta]
 *   pro disable <service...> [--assume-yes] [--format text|json] [--beta]
 *
 * Names are processed in the order given. With --assume-yes, required
 * services (enable) or dependent services (disable) are handled first
 * instead of failing the name.
 */

import { Command } from 'commander';
import type { ServiceAction } from '@entitle/kernel';
import type { CliContext } from '../context.js';
import { formatOption, printResult, toOutputFormat } from '../output.js';

interface ServiceCommandOptions {
  assumeYes: boolean;
  format: string;
  beta: boolean;
}

const DESCRIPTIONS: Readonly<Record<ServiceAction, string>> = {
  enable: 'Enable one or more Ubuntu Pro services',
  disable: 'Disable one or more Ubuntu Pro services',
};

export function serviceCommand(
  action: ServiceAction,
  ctx: CliContext,
  setExitCode: (code: number) => void,
): Command {
  return new Command(action)
    .description(DESCRIPTIONS[action])
    .argument('[service...]', 'Service names (see: pro status)')
    .option('--assume-yes', `Also ${action} the services this change depends on`, false)
    .addOption(formatOption())
    .option('--beta', 'Allow beta services', false)
    .action(async (services: string[], options: ServiceCommandOptions) => {
      const format = toOutputFormat(options.format);
      const manager = ctx.manager();
      const opts = { assumeYes: options.assumeYes, allowBeta: options.beta, format };
      const { result } =
        action === 'enable' ? await manager.enable(services, opts) : await manager.disable(services, opts);
      setExitCode(printResult(ctx, result, action, format));
    });
}
