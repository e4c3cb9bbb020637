import fs from 'fs-extra'
import path from 'path'

import { BackupGeneration, newGeneration, planBackups } from '../core/backup.js'
import { formatPlan } from '../core/format-plan.js'
import { runOperation } from '../core/runner.js'
import { ConfigError, OperationError, UserDeclinedError, errorMessage } from '../errors.js'
import type { OrderedLog } from '../ledger/types.js'
import { CommonOptions, Confirm, Result, silentLogger } from '../types.js'
import { listDotfileEntries } from './entries.js'
import type { DotfileRepo } from './repo.js'

export interface DeployOptions extends CommonOptions {
  repo: DotfileRepo
  /**
   * Required only when the bare clone does not exist yet.
   */
  repoUrl?: string
  backupBase: string
  /**
   * backup-generations ledger.
   */
  generations: OrderedLog
  confirm: Confirm
  now?: Date
}

export interface DeployResult {
  result: Result
  entries: string[]
  /**
   * Set only when something was backed up.
   */
  generation?: BackupGeneration
}

/**
 * Overlay the repository onto the home directory.
 *
 * Existing files that the checkout would overwrite are first moved into a new
 * backup generation, mirrored by relative path. A failed move aborts before
 * the checkout; moves already made stay where they are, listed in the
 * rollback plan of the thrown OperationError.
 */
export async function deployDotfiles(opts: DeployOptions): Promise<DeployResult> {
  const logger = opts.logger ?? silentLogger()
  const { repo } = opts
  const homeDir = repo.workTree

  await syncRepo(opts)

  logger.info("Configuring git's status.showUntrackedFiles for the bare repository...")
  await repo.hideUntrackedFiles()

  const entries = await listDotfileEntries(repo)
  logger.info(`Repository tracks ${entries.length} dotfile(s).`)

  const generation = await newGeneration(opts.backupBase, opts.now)
  const steps = await planBackups(entries, homeDir, generation)
  if (steps.length) {
    logger.info(`Backing up ${steps.length} existing file(s) into '${generation.root}':\n${formatPlan(steps)}`)
  } else {
    logger.info('No existing dotfiles to back up.')
  }

  const result = await runOperation({
    operation: 'deploy',
    steps,
    generation: steps.length ? generation.id : undefined,
    opts,
  })
  if (!result.ok) {
    if (result.rollbackSteps?.length) {
      logger.error(`Backups already moved are left in '${generation.root}'. To undo by hand:\n${formatPlan(result.rollbackSteps)}`)
    }
    throw new OperationError('Failed to back up existing dotfiles', result)
  }

  logger.info(`Checking out dotfiles into ${homeDir}...`)
  if (!await opts.confirm("This will overwrite existing dotfiles in your home directory with your repository's versions. Proceed?")) {
    throw new UserDeclinedError('Dotfile checkout cancelled. Dotfiles may not be fully deployed')
  }
  await repo.checkout()
  logger.info(`Dotfiles deployed to ${homeDir}.`)

  const backedUp = result.steps.some(s => s.kind === 'backup' && s.status === 'executed')
  if (!backedUp) {
    return { result, entries }
  }

  try {
    await fs.ensureDir(path.resolve(opts.backupBase))
    await opts.generations.append(generation.root)
  } catch (e) {
    throw new OperationError(`Failed to record backup generation '${generation.root}' in ${opts.generations.path}: ${errorMessage(e)}`, result)
  }
  logger.info(`Backup directory '${generation.root}' recorded in ${opts.generations.path}.`)
  return { result, entries, generation }
}

async function syncRepo(opts: DeployOptions) {
  const logger = opts.logger ?? silentLogger()
  const { repo } = opts

  if (await repo.exists()) {
    logger.info('Dotfiles bare repository already exists. Updating...')
    const state = await repo.pull()
    logger.info(state === 'up-to-date'
      ? 'Dotfiles repository is already up to date.'
      : 'Dotfiles repository updated successfully.')
    return
  }

  if (!opts.repoUrl) {
    throw new ConfigError(`No dotfiles repository configured and no clone found at '${repo.gitDir}'. Set "repoUrl" in the config file.`)
  }
  logger.info(`Cloning dotfiles bare repository from ${opts.repoUrl}...`)
  await repo.clone(opts.repoUrl)
  logger.info(`Dotfiles bare repository cloned to ${repo.gitDir}.`)
}
