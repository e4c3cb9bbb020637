export type { Result, Step, Logger, Confirm, CommonOptions, Operation } from './types.js'
export type { Settings } from './api/settings.js'
export type { SetupOptions, SetupReport, SetupHooks } from './api/setup.js'
export type { TakedownOptions, TakedownReport, TakedownHooks } from './api/takedown.js'
export type { CommandRunner, CommandResult, RunOptions } from './core/exec.js'
export type { BackupGeneration } from './core/backup.js'
export type { OrderedLog } from './ledger/types.js'
export type { PackageSpec, PackageGroup } from './packages/catalog.js'
export type { PackageManager, PackageManagerId } from './platform/package-managers.js'
export type { PlatformProfile, PlatformKind } from './platform/resolve.js'
export type { Host } from './platform/host.js'

export { setup } from './api/setup.js'
export { takedown } from './api/takedown.js'
export { resolvePlatform, parseOsRelease } from './platform/resolve.js'
export { createPackageManager } from './platform/package-managers.js'
export { FileLedger } from './ledger/io.js'
export { installPackages, uninstallPackages, refreshPackageIndex } from './packages/manager.js'
export { defaultPackageGroups } from './packages/catalog.js'
export { DotfileRepo } from './dotfiles/repo.js'
export { deployDotfiles } from './dotfiles/deploy.js'
export { takedownDotfiles, lastGeneration } from './dotfiles/takedown.js'
export { RESERVED_ENTRIES, filterDotfileEntries } from './dotfiles/entries.js'
export { backupItem, restoreItem, newGeneration, listGenerationFiles } from './core/backup.js'
export { loadSettings, resolveSettings } from './cli/config.js'
export { autoConfirm } from './cli/confirm.js'
export { nodeRunner } from './core/exec.js'
export * from './errors.js'
