/**
 * CLI for pkgresolve
 *
 * Commands:
 * - resolve [dir]  - print the dependency install order
 * - plan [dir]     - print the install plan with concrete versions
 */

import { resolve as resolvePath } from 'node:path'
import { cac, type CAC } from 'cac'
import { loadConfig, type PkgResolveConfig } from '../core/config.js'
import { planInstall } from '../core/installer/index.js'
import { readManifest } from '../core/package/manifest.js'
import { RegistryClient } from '../core/registry/client.js'
import type { RegistryMetadataProvider } from '../core/registry/types.js'
import { DependencyResolver } from '../core/resolver/resolver.js'
import { getCommandHelp, mainHelp } from './help.js'
import type { CLIContext, CommandOptions, CommandResult } from './types.js'
import {
  formatError,
  formatOrder,
  formatPlan,
  getErrorMessage,
  invalidOptionError,
  unknownCommandError,
} from './utils/index.js'
import { VERSION } from './version.js'

// Re-export formatters for tests
export { formatOrder, formatPlan } from './utils/index.js'

/**
 * CLI instance type
 */
export interface CLIInstance {
  name: string
  commands: string[]
  cli: CAC
}

/**
 * Create and return the CLI instance with all commands registered
 */
export function createCLI(): CLIInstance {
  const cli = cac('pkgresolve')

  cli.version(VERSION)
  cli.help()

  for (const [name, description] of [
    ['resolve [dir]', 'print the dependency install order'],
    ['plan [dir]', 'print the install plan with concrete versions'],
  ] as const) {
    cli.command(name, description)
      .option('--registry <url>', 'Use custom registry')
      .option('--timeout <ms>', 'Registry request timeout')
      .option('--retries <n>', 'Attempts per registry request')
      .option('--include-root', 'Keep the root package at the end of the order')
      .option('--prerelease', 'Let ranges match prerelease versions')
      .option('--verbose', 'Log each dependency as it is resolved')
      .option('--json', 'Output as JSON')
      .action(() => {})
  }

  return {
    name: 'pkgresolve',
    commands: ['resolve', 'plan'],
    cli,
  }
}

/**
 * Execute a CLI command with the given arguments and context
 */
export async function runCLI(args: string[], context: CLIContext): Promise<CommandResult> {
  const { stdout, stderr } = context

  if (args.includes('--version') || args.includes('-v')) {
    stdout(VERSION)
    return { exitCode: 0 }
  }

  if (args.length === 0 || (args.length === 1 && (args[0] === '--help' || args[0] === '-h'))) {
    stdout(mainHelp())
    return { exitCode: 0 }
  }

  const command = args[0] ?? ''
  const restArgs = args.slice(1)
  const helpText = getCommandHelp(command)

  if (!helpText) {
    stderr(unknownCommandError(command))
    return { exitCode: 1, error: `unknown command '${command}'` }
  }

  if (restArgs.includes('--help') || restArgs.includes('-h')) {
    stdout(helpText)
    return { exitCode: 0 }
  }

  const { cli } = createCLI()
  const parsed = cli.parse(['node', 'pkgresolve', ...args], { run: false })
  const rawOptions: Record<string, unknown> = parsed.options

  let options: CommandOptions
  try {
    options = readCommandOptions(command, rawOptions)
  } catch (err: unknown) {
    const message = getErrorMessage(err)
    stderr(message)
    return { exitCode: 1, error: message }
  }

  const dir = parsed.args[0] ?? '.'

  try {
    switch (command) {
      case 'resolve':
        return await executeResolve(dir, options, context)
      case 'plan':
        return await executePlan(dir, options, context)
      default:
        stderr(unknownCommandError(command))
        return { exitCode: 1, error: `unknown command '${command}'` }
    }
  } catch (err: unknown) {
    stderr(formatError(command, err))
    return { exitCode: 1, error: getErrorMessage(err) }
  }
}

/**
 * Execute resolve command
 */
async function executeResolve(dir: string, options: CommandOptions, context: CLIContext): Promise<CommandResult> {
  const { config, registry, manifest } = await prepare(dir, options, context)

  const resolver = new DependencyResolver({
    registry,
    includeRoot: config.includeRoot,
    verbose: config.verbose,
    log: context.stderr,
    match: { includePrerelease: options.prerelease },
  })
  const order = await resolver.resolve(manifest.root, manifest.dependencies)

  context.stdout(formatOrder(order, { json: options.json }))
  return { exitCode: 0 }
}

/**
 * Execute plan command
 */
async function executePlan(dir: string, options: CommandOptions, context: CLIContext): Promise<CommandResult> {
  const { config, registry, manifest } = await prepare(dir, options, context)
  const match = { includePrerelease: options.prerelease }

  const resolver = new DependencyResolver({
    registry,
    includeRoot: false,
    verbose: config.verbose,
    log: context.stderr,
    match,
  })
  const order = await resolver.resolve(manifest.root, manifest.dependencies)
  const steps = await planInstall(order, registry, { root: manifest.root, match })

  context.stdout(formatPlan(steps, { json: options.json }))
  return { exitCode: 0 }
}

async function prepare(dir: string, options: CommandOptions, context: CLIContext) {
  const config = loadConfig(context.env, {
    registry: options.registry,
    timeout: options.timeout,
    retries: options.retries,
    verbose: options.verbose ? true : undefined,
    includeRoot: options.includeRoot ? true : undefined,
  })

  const createRegistry = context.createRegistry ?? defaultRegistry
  const loadManifest = context.loadManifest ?? readManifest

  const manifest = await loadManifest(resolvePath(context.cwd, dir))
  return { config, registry: createRegistry(config), manifest }
}

function defaultRegistry(config: PkgResolveConfig): RegistryMetadataProvider {
  return new RegistryClient({
    registry: config.registry,
    timeout: config.timeout,
    retries: config.retries,
  })
}

/**
 * Narrow cac's parsed options. cac (through mri) turns numeric-looking
 * values into numbers, so both forms are accepted.
 */
function readCommandOptions(command: string, raw: Record<string, unknown>): CommandOptions {
  return {
    registry: readString(command, 'registry', raw['registry']),
    timeout: readPositiveInt(command, 'timeout', raw['timeout']),
    retries: readPositiveInt(command, 'retries', raw['retries']),
    includeRoot: raw['includeRoot'] === true,
    prerelease: raw['prerelease'] === true,
    verbose: raw['verbose'] === true,
    json: raw['json'] === true,
  }
}

function readString(command: string, option: string, value: unknown): string | undefined {
  if (value === undefined) return undefined
  if (typeof value === 'string' && value.length > 0) return value
  throw new Error(invalidOptionError(command, option, value))
}

function readPositiveInt(command: string, option: string, value: unknown): number | undefined {
  if (value === undefined) return undefined
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN
  if (Number.isInteger(parsed) && parsed > 0) return parsed
  throw new Error(invalidOptionError(command, option, value))
}
