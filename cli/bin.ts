#!/usr/bin/env node
/**
 * pkgresolve executable
 */

import { runCLI } from './index.js'

const result = await runCLI(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  cwd: process.cwd(),
  env: process.env,
})

process.exitCode = result.exitCode
