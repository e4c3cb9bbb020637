import { CommandRunner, commandExists, nodeRunner } from '../core/exec.js'
import { MissingToolError } from '../errors.js'
import { FileLedger } from '../ledger/io.js'
import { DotfileRepo } from '../dotfiles/repo.js'
import type { Host } from '../platform/host.js'
import { Confirm, Logger, silentLogger } from '../types.js'
import type { Settings } from './settings.js'

export interface RunOptions {
  settings: Settings
  confirm: Confirm
  logger?: Logger
  /**
   * Default: spawns real processes.
   */
  runner?: CommandRunner
  host?: Host
}

export interface RunContext {
  settings: Settings
  confirm: Confirm
  logger: Logger
  runner: CommandRunner
  host?: Host
  repo: DotfileRepo
  packageLedger: FileLedger
  generationLedger: FileLedger
}

export function createRunContext(opts: RunOptions): RunContext {
  const runner = opts.runner ?? nodeRunner
  const { settings } = opts
  return {
    settings,
    confirm: opts.confirm,
    logger: opts.logger ?? silentLogger(),
    runner,
    host: opts.host,
    repo: new DotfileRepo({ gitDir: settings.repoDir, workTree: settings.homeDir, branch: settings.branch, runner }),
    packageLedger: new FileLedger(settings.packageLedger),
    generationLedger: new FileLedger(settings.generationLedger),
  }
}

export async function requireTool(runner: CommandRunner, tool: string, logger: Logger) {
  if (!await commandExists(runner, tool)) {
    throw new MissingToolError(tool)
  }
  logger.info(`'${tool}' command found.`)
}
