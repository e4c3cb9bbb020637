import type { DeployResult } from '../dotfiles/deploy.js'
import { deployDotfiles } from '../dotfiles/deploy.js'
import { InstallSummary, installPackages, refreshPackageIndex } from '../packages/manager.js'
import { PlatformProfile, resolvePlatform } from '../platform/resolve.js'
import { RunOptions, createRunContext, requireTool } from './context.js'

export interface SetupHooks {
  /**
   * Runs after platform detection and before the dotfiles repository is
   * cloned or pulled; typically makes sure an SSH key is loaded.
   */
  bootstrapSsh?: (profile: PlatformProfile) => Promise<void>
}

export interface SetupOptions extends RunOptions {
  hooks?: SetupHooks
  now?: Date
}

export interface SetupReport {
  profile: PlatformProfile
  deploy: DeployResult
  packages: Array<{ category: string; summary: InstallSummary }>
}

/**
 * Setup: deploy dotfiles, then install packages group by group.
 * Nothing is rolled back when a later step fails.
 */
export async function setup(opts: SetupOptions): Promise<SetupReport> {
  const ctx = createRunContext(opts)
  const { logger, settings } = ctx
  logger.info('Executing setup process...')

  await requireTool(ctx.runner, 'git', logger)
  const profile = await resolvePlatform({ runner: ctx.runner, host: ctx.host, logger })

  if (!await ctx.packageLedger.exists()) {
    await ctx.packageLedger.ensure()
    logger.info(`Created empty package ledger '${ctx.packageLedger.path}'.`)
  }

  if (opts.hooks?.bootstrapSsh) {
    await opts.hooks.bootstrapSsh(profile)
  }

  logger.info(`Setting up dotfiles${settings.repoUrl ? ` from ${settings.repoUrl}` : ''}...`)
  const deploy = await deployDotfiles({
    repo: ctx.repo,
    repoUrl: settings.repoUrl,
    backupBase: settings.backupBase,
    generations: ctx.generationLedger,
    confirm: ctx.confirm,
    now: opts.now,
    logger,
    auditLogPath: settings.auditLogPath,
  })

  logger.info('Beginning package installation...')
  const pkgCtx = { packageManager: profile.packageManager, ledger: ctx.packageLedger, confirm: ctx.confirm, logger }
  await refreshPackageIndex(pkgCtx)
  const packages: SetupReport['packages'] = []
  for (const group of settings.packageGroups) {
    packages.push({ category: group.category, summary: await installPackages(group.label, group.packages, pkgCtx) })
  }
  logger.info('All package installations complete.')

  return { profile, deploy, packages }
}
