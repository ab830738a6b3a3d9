import { Chalk, type ChalkInstance } from 'chalk'

/** Colours for text output. A colourless theme renders plain strings. */
export interface Theme {
  readonly ok: ChalkInstance
  readonly warn: ChalkInstance
  readonly error: ChalkInstance
  readonly heading: ChalkInstance
}

export function createTheme(color: boolean): Theme {
  const chalk = new Chalk({ level: color ? 1 : 0 })
  return {
    ok:      chalk.hex('#81C784'),
    warn:    chalk.hex('#D4880A'),
    error:   chalk.hex('#CF6679'),
    heading: chalk.bold,
  }
}
