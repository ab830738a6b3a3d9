/**
 * Entitle CLI — `pro` command-line interface
 *
 * Usage:
 *   pro enable <service...> [--assume-yes] [--format text|json] [--beta]
 *   pro disable <service...> [--assume-yes] [--format text|json] [--beta]
 *   pro attach <token> [--no-auto-enable] [--format text|json]
 *   pro auto-attach [--enable <service...>] [--enable-beta <service...>] [--format text|json]
 *   pro detach [--assume-yes] [--format text|json]
 *   pro refresh [--format text|json]
 *   pro help <service> [--format text|json]
 *   pro status [--all] [--format text|json]
 */

export type { CliContext } from './context.js';
export { processContext } from './context.js';
export { buildProgram, runCli } from './program.js';
export { FORMAT_CHOICES, printResult, toOutputFormat } from './output.js';
export type { Theme } from './theme.js';
export { createTheme } from './theme.js';
