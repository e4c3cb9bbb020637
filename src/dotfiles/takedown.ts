import fs from 'fs-extra'
import path from 'path'

import { BackupGeneration, generationFromRoot, planRestores } from '../core/backup.js'
import { formatPlan } from '../core/format-plan.js'
import { lexists } from '../core/fs-ops.js'
import { runOperation } from '../core/runner.js'
import { ConfigError, OperationError, errorMessage } from '../errors.js'
import type { OrderedLog } from '../ledger/types.js'
import { CommonOptions, Confirm, Logger, PlanStep, Result, silentLogger } from '../types.js'
import { listDotfileEntries } from './entries.js'
import type { DotfileRepo } from './repo.js'

export interface TakedownDotfilesOptions extends CommonOptions {
  repo: DotfileRepo
  /**
   * backup-generations ledger.
   */
  generations: OrderedLog
  confirm: Confirm
}

export interface TakedownDotfilesResult {
  result: Result
  generation?: BackupGeneration
  generationDeleted: boolean
  repoDeleted: boolean
}

/**
 * The generation to restore from: the last ledger entry, provided its
 * directory still exists.
 */
export async function lastGeneration(generations: OrderedLog, logger: Logger = silentLogger()): Promise<BackupGeneration | undefined> {
  if (!await generations.exists()) {
    logger.warn(`Backup ledger not found at '${generations.path}'. Cannot restore original dotfiles.`)
    return undefined
  }
  const last = await generations.peekLast()
  if (!last) {
    logger.warn(`Backup ledger '${generations.path}' is empty. No backup to restore.`)
    return undefined
  }
  const generation = generationFromRoot(last)
  const isDir = await fs.stat(generation.root).then(st => st.isDirectory(), () => false)
  if (!isDir) {
    logger.warn(`Last recorded backup directory '${generation.root}' does not exist. Cannot restore original dotfiles.`)
    return undefined
  }
  return generation
}

/**
 * Remove every tracked dotfile from the home directory, then move the last
 * backup generation's files back into place, file by file.
 */
export async function takedownDotfiles(opts: TakedownDotfilesOptions): Promise<TakedownDotfilesResult> {
  const logger = opts.logger ?? silentLogger()
  const { repo } = opts
  const homeDir = repo.workTree
  logger.info('Beginning dotfiles takedown...')

  const generation = await lastGeneration(opts.generations, logger)

  if (!await repo.exists()) {
    throw new ConfigError(`Dotfiles bare repository '${repo.gitDir}' not found. Cannot list tracked files.`)
  }
  const entries = await listDotfileEntries(repo)

  const steps: PlanStep[] = []
  for (const rel of entries) {
    const target = path.join(homeDir, rel)
    if (!await lexists(target)) {
      logger.info(`Dotfile '${target}' not found in home, skipping removal.`)
      continue
    }
    steps.push({ kind: 'rm', message: `Remove deployed ${rel}`, paths: { path: target } })
  }
  if (generation) {
    steps.push(...await planRestores(generation, homeDir))
  }

  logger.info(`Removing deployed dotfiles from ${homeDir}${generation ? ` and restoring from '${generation.root}'` : ''}:\n${formatPlan(steps)}`)
  const result = await runOperation({
    operation: 'takedown',
    steps,
    generation: generation?.id,
    opts,
  })
  if (!result.ok) {
    throw new OperationError('Failed to take down dotfiles', result)
  }

  let generationDeleted = false
  if (generation) {
    logger.info(`Original dotfiles restored from '${generation.root}'.`)
    if (await opts.confirm(`Delete the backup directory '${generation.root}'?`)) {
      await fs.remove(generation.root)
      generationDeleted = true
      try {
        await opts.generations.popLast()
      } catch (e) {
        logger.warn(`Failed to remove last entry from ${opts.generations.path}. Manual cleanup may be required. ${errorMessage(e)}`)
      }
      logger.info(`Backup directory '${generation.root}' removed.`)
    } else {
      logger.info(`Keeping backup directory '${generation.root}'.`)
    }
  } else {
    logger.warn(`No valid backup generation to restore. Tracked dotfiles were removed from ${homeDir}, but no original files were restored.`)
  }

  let repoDeleted = false
  if (await opts.confirm(`Delete the dotfiles bare repository '${repo.gitDir}'?`)) {
    await repo.delete()
    repoDeleted = true
    logger.info('Dotfiles bare repository removed.')
  } else {
    logger.info('Keeping dotfiles bare repository.')
  }

  return { result, generation, generationDeleted, repoDeleted }
}
