/**
 * Entitle CLI — Invocation Context
 *
 * Everything a command touches outside its own arguments: output streams,
 * the privilege check, the confirmation prompt and the ServiceManager.
 * processContext() binds these to the real process; tests pass their own.
 */

import * as readline from 'node:readline/promises'
import { stdin as input, stderr as output } from 'node:process'
import type { ServiceManager } from '@entitle/service-manager'
import { buildServiceManager } from '@entitle/service-manager'
import { isRoot } from '@entitle/runtime-host'

export interface CliContext {
  readonly stdout: (text: string) => void
  readonly stderr: (text: string) => void
  readonly isRoot: () => boolean
  /** Built on first use, after the privilege check has passed. */
  readonly manager: () => ServiceManager
  /** Ask a yes/no question on stderr; true only for an explicit yes. */
  readonly confirm: (question: string) => Promise<boolean>
  readonly color: boolean
}

export function processContext(): CliContext {
  let manager: ServiceManager | undefined
  const stderr = (text: string): void => {
    process.stderr.write(text + '\n')
  }

  return {
    stdout: (text) => {
      process.stdout.write(text + '\n')
    },
    stderr,
    isRoot,
    manager: () => {
      if (manager === undefined) {
        const built = buildServiceManager({ env: process.env })
        for (const warning of built.warnings) {
          stderr(`[warn] ${warning}`)
        }
        manager = built.manager
      }
      return manager
    },
    confirm: async (question) => {
      const rl = readline.createInterface({ input, output })
      try {
        const answer = await rl.question(question)
        return ['y', 'yes'].includes(answer.trim().toLowerCase())
      } finally {
        rl.close()
      }
    },
    color: process.stdout.isTTY === true && process.env['NO_COLOR'] === undefined,
  }
}
