/**
 * Help text for CLI commands
 */

import { VERSION } from './version.js'

/**
 * Main help text shown with --help or no arguments
 */
export function mainHelp(): string {
  return `pkgresolve/${VERSION}

Usage:
  $ pkgresolve <command> [options]

Commands:
  resolve [dir]  print the dependency install order
  plan [dir]     print the install plan with concrete versions

For more info, run any command with the --help flag:
  $ pkgresolve resolve --help
  $ pkgresolve plan --help

Options:
  -v, --version  Display version number
  -h, --help     Display this message
`
}

const sharedOptions = `  --registry <url>    Use custom registry
  --timeout <ms>      Registry request timeout
  --retries <n>       Attempts per registry request
  --prerelease        Let ranges match prerelease versions
  --verbose           Log each dependency as it is resolved
  --json              Output as JSON
  -h, --help          Display this message`

/**
 * Help text for resolve command
 */
export function resolveHelp(): string {
  return `pkgresolve/${VERSION}

Usage:
  $ pkgresolve resolve [dir]

Options:
  --include-root      Keep the root package at the end of the order
${sharedOptions}

Description:
  Read package.json from dir (default: current directory), resolve the
  full dependency closure and print one name@constraint per line,
  dependencies before the packages that need them.

Examples:
  $ pkgresolve resolve
  $ pkgresolve resolve ./packages/app --json
`
}

/**
 * Help text for plan command
 */
export function planHelp(): string {
  return `pkgresolve/${VERSION}

Usage:
  $ pkgresolve plan [dir]

Options:
${sharedOptions}

Description:
  Resolve the install order, then resolve each entry to a concrete
  version and print one name@version per line in install order.

Examples:
  $ pkgresolve plan
  $ pkgresolve plan --registry https://registry.example.com
`
}

/**
 * Get help text for a specific command
 */
export function getCommandHelp(command: string): string | null {
  switch (command) {
    case 'resolve':
      return resolveHelp()
    case 'plan':
      return planHelp()
    default:
      return null
  }
}
