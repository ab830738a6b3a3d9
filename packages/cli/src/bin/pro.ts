#!/usr/bin/env node
/**
 * bin/pro.ts — entry point for the `pro` CLI command.
 *
 * Sets process.exitCode rather than calling process.exit() so pending
 * stdout writes drain before the process ends.
 */

import { processContext, runCli } from '../index.js'

process.exitCode = await runCli(process.argv.slice(2), processContext())
