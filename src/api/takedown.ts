import fs from 'fs-extra'

import { isEmptyDir } from '../core/fs-ops.js'
import { TakedownDotfilesResult, takedownDotfiles } from '../dotfiles/takedown.js'
import { errorMessage } from '../errors.js'
import type { OrderedLog } from '../ledger/types.js'
import { UninstallSummary, uninstallPackages } from '../packages/manager.js'
import { PlatformProfile, resolvePlatform } from '../platform/resolve.js'
import { RunContext, RunOptions, createRunContext, requireTool } from './context.js'

export interface TakedownHooks {
  /**
   * Runs after packages are uninstalled and before dotfiles are restored;
   * typically removes the shell alias pointing at the bare repository.
   */
  removeAlias?: (profile: PlatformProfile) => Promise<void>
}

export interface TakedownOptions extends RunOptions {
  hooks?: TakedownHooks
}

export interface TakedownReport {
  profile: PlatformProfile
  packages: UninstallSummary
  dotfiles: TakedownDotfilesResult
  deletedLedgers: string[]
  backupBaseRemoved: boolean
}

/**
 * Takedown: uninstall what setup installed, then put the home directory back
 * the way the last setup found it.
 */
export async function takedown(opts: TakedownOptions): Promise<TakedownReport> {
  const ctx = createRunContext(opts)
  const { logger } = ctx
  logger.info('Executing takedown process...')

  await requireTool(ctx.runner, 'git', logger)
  const profile = await resolvePlatform({ runner: ctx.runner, host: ctx.host, logger })

  const packages = await uninstallPackages({
    packageManager: profile.packageManager,
    ledger: ctx.packageLedger,
    confirm: ctx.confirm,
    logger,
  })

  if (opts.hooks?.removeAlias) {
    await opts.hooks.removeAlias(profile)
  }

  const dotfiles = await takedownDotfiles({
    repo: ctx.repo,
    generations: ctx.generationLedger,
    confirm: ctx.confirm,
    logger,
    auditLogPath: ctx.settings.auditLogPath,
  })

  const deletedLedgers: string[] = []
  for (const ledger of [ctx.packageLedger, ctx.generationLedger]) {
    if (await deleteIfEmpty(ledger, ctx)) deletedLedgers.push(ledger.path)
  }
  const backupBaseRemoved = await removeBackupBaseIfEmpty(ctx)

  logger.info('Takedown complete.')
  return { profile, packages, dotfiles, deletedLedgers, backupBaseRemoved }
}

async function deleteIfEmpty(ledger: OrderedLog, ctx: RunContext): Promise<boolean> {
  if (!await ledger.exists() || !await ledger.isEmpty()) return false
  if (!await ctx.confirm(`Ledger '${ledger.path}' is now empty. Delete it?`)) {
    ctx.logger.info(`Keeping empty ledger '${ledger.path}'.`)
    return false
  }
  try {
    await ledger.delete()
  } catch (e) {
    ctx.logger.warn(`Failed to remove empty ledger '${ledger.path}'. ${errorMessage(e)}`)
    return false
  }
  ctx.logger.info(`Empty ledger '${ledger.path}' removed.`)
  return true
}

async function removeBackupBaseIfEmpty(ctx: RunContext): Promise<boolean> {
  const base = ctx.settings.backupBase
  if (!await fs.pathExists(base) || !await isEmptyDir(base)) return false
  if (!await ctx.confirm(`The backup directory '${base}' is now empty. Delete it?`)) {
    ctx.logger.info(`Keeping empty backup directory '${base}'.`)
    return false
  }
  try {
    await fs.remove(base)
  } catch (e) {
    ctx.logger.warn(`Failed to remove backup directory '${base}'. Manual cleanup may be required. ${errorMessage(e)}`)
    return false
  }
  ctx.logger.info(`Backup directory '${base}' removed.`)
  return true
}
