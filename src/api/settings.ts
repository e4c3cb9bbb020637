import type { PackageGroup } from '../packages/catalog.js'

/**
 * Fully resolved, absolute locations and choices for one run.
 */
export interface Settings {
  homeDir: string
  repoUrl?: string
  /**
   * Bare clone of the dotfiles repository.
   */
  repoDir: string
  branch: string
  /**
   * Parent directory of every backup generation.
   */
  backupBase: string
  /**
   * backup-generations ledger; lives inside backupBase.
   */
  generationLedger: string
  /**
   * installed-packages ledger.
   */
  packageLedger: string
  auditLogPath?: string
  packageGroups: PackageGroup[]
}
