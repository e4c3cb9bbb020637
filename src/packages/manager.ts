import { UserDeclinedError, errorMessage } from '../errors.js'
import type { OrderedLog } from '../ledger/types.js'
import type { PackageManager } from '../platform/package-managers.js'
import { Confirm, Logger, silentLogger } from '../types.js'
import type { PackageSpec } from './catalog.js'

export interface PackageContext {
  packageManager: PackageManager
  /**
   * installed-packages ledger: names this tool installed, oldest first.
   */
  ledger: OrderedLog
  confirm: Confirm
  logger?: Logger
}

export interface InstallSummary {
  installed: string[]
  alreadyInstalled: string[]
  warnings: string[]
}

export interface UninstallSummary {
  declined: boolean
  uninstalled: string[]
  notInstalled: string[]
  failed: string[]
  ledgerDeleted: boolean
  warnings: string[]
}

/**
 * Refresh the package index before installing. Failure only warns: the
 * installs that follow may still succeed from a stale index.
 */
export async function refreshPackageIndex(ctx: Pick<PackageContext, 'packageManager' | 'logger'>): Promise<boolean> {
  const logger = ctx.logger ?? silentLogger()
  try {
    await ctx.packageManager.refresh()
    return true
  } catch (e) {
    logger.warn(`Failed to refresh ${ctx.packageManager.id} package index. Installation might fail. ${errorMessage(e)}`)
    return false
  }
}

/**
 * Install every package of a category in list order. Packages already present
 * are left alone and never recorded, so uninstall only reverses what this tool
 * did.
 */
export async function installPackages(category: string, packages: readonly PackageSpec[], ctx: PackageContext): Promise<InstallSummary> {
  const logger = ctx.logger ?? silentLogger()
  const summary: InstallSummary = { installed: [], alreadyInstalled: [], warnings: [] }

  if (!packages.length) {
    logger.info(`No packages defined for '${category}', skipping.`)
    return summary
  }

  logger.info(`Installing packages for '${category}'...`)
  for (const pkg of packages) {
    if (await ctx.packageManager.isInstalled(pkg.name)) {
      logger.info(`'${pkg.name}' is already installed, skipping.`)
      summary.alreadyInstalled.push(pkg.name)
      continue
    }

    if (!await ctx.confirm(`Install '${pkg.name}'?`)) {
      throw new UserDeclinedError(`Installation of '${pkg.name}' declined`)
    }

    // CommandError propagates: a failed install ends the run.
    await ctx.packageManager.install(pkg.name)
    logger.info(`'${pkg.name}' installed.`)
    summary.installed.push(pkg.name)

    try {
      await ctx.ledger.append(pkg.name)
    } catch (e) {
      const msg = `Failed to record '${pkg.name}' in package ledger ${ctx.ledger.path}; takedown will not remove it. ${errorMessage(e)}`
      logger.warn(msg)
      summary.warnings.push(msg)
    }
  }

  logger.info(`Package installation for '${category}' complete.`)
  return summary
}

/**
 * Uninstall everything the ledger records, newest first. Best effort: a failed
 * uninstall warns, keeps its ledger entry, and the pass moves on.
 */
export async function uninstallPackages(ctx: PackageContext): Promise<UninstallSummary> {
  const logger = ctx.logger ?? silentLogger()
  const summary: UninstallSummary = {
    declined: false,
    uninstalled: [],
    notInstalled: [],
    failed: [],
    ledgerDeleted: false,
    warnings: [],
  }

  if (!await ctx.ledger.exists()) {
    logger.warn(`Package ledger '${ctx.ledger.path}' not found. Skipping package uninstallation.`)
    return summary
  }

  if (!await ctx.confirm(`Uninstall packages listed in '${ctx.ledger.path}'? This removes packages installed by homestead.`)) {
    logger.info('Skipping package uninstallation as requested.')
    summary.declined = true
    return summary
  }

  const names = await ctx.ledger.entries()
  for (const name of [...names].reverse()) {
    logger.info(`Attempting to uninstall: ${name}`)
    let installed: boolean
    try {
      installed = await ctx.packageManager.isInstalled(name)
    } catch (e) {
      const msg = `Failed to query whether '${name}' is installed. Manual removal may be required. ${errorMessage(e)}`
      logger.warn(msg)
      summary.warnings.push(msg)
      summary.failed.push(name)
      continue
    }
    if (!installed) {
      logger.info(`'${name}' not found as installed, skipping uninstallation.`)
      summary.notInstalled.push(name)
      await dropEntry(ctx.ledger, name, logger, summary)
      continue
    }

    try {
      await ctx.packageManager.uninstall(name)
    } catch (e) {
      const msg = `Failed to uninstall '${name}'. Manual removal may be required. ${errorMessage(e)}`
      logger.warn(msg)
      summary.warnings.push(msg)
      summary.failed.push(name)
      continue
    }
    logger.info(`'${name}' uninstalled successfully.`)
    summary.uninstalled.push(name)
    await dropEntry(ctx.ledger, name, logger, summary)
  }
  logger.info('Package uninstallation complete.')

  if (await ctx.confirm(`Delete the package ledger '${ctx.ledger.path}'?`)) {
    try {
      await ctx.ledger.delete()
      summary.ledgerDeleted = true
      logger.info(`Package ledger '${ctx.ledger.path}' deleted.`)
    } catch (e) {
      const msg = `Failed to delete package ledger '${ctx.ledger.path}'. Manual removal may be required. ${errorMessage(e)}`
      logger.warn(msg)
      summary.warnings.push(msg)
    }
  } else {
    logger.info(`Keeping package ledger '${ctx.ledger.path}'.`)
  }

  return summary
}

async function dropEntry(ledger: OrderedLog, name: string, logger: Logger, summary: UninstallSummary) {
  try {
    await ledger.remove(name)
  } catch (e) {
    const msg = `Failed to remove '${name}' from package ledger ${ledger.path}. ${errorMessage(e)}`
    logger.warn(msg)
    summary.warnings.push(msg)
  }
}
