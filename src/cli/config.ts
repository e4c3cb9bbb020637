import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { z } from 'zod'

import type { Settings } from '../api/settings.js'
import { ConfigError } from '../errors.js'
import { PackageGroup, defaultPackageGroups } from '../packages/catalog.js'

// Package names are handed to the package manager as arguments: no
// whitespace, and nothing that looks like an option.
const packageName = z.string().regex(/^[^\s-]\S*$/, 'must be a package name without whitespace or a leading "-"')

export const configFileSchema = z.object({
  repoUrl: z.string().min(1).optional(),
  branch: z.string().min(1).optional(),
  homeDir: z.string().min(1).optional(),
  repoDir: z.string().min(1).optional(),
  backupDir: z.string().min(1).optional(),
  packageLedger: z.string().min(1).optional(),
  auditLog: z.string().min(1).optional(),
  packages: z.array(z.object({
    category: z.string().min(1),
    label: z.string().min(1).optional(),
    packages: z.array(packageName),
  }).strict()).optional(),
}).strict()

export type ConfigFile = z.infer<typeof configFileSchema>

export interface ConfigEnv {
  env?: NodeJS.ProcessEnv
  /**
   * For tests or embedding, override home dir (default: os.homedir()).
   */
  homeDir?: string
}

export function getGlobalConfigPath(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  const base = env.XDG_CONFIG_HOME || path.join(opts.homeDir ?? os.homedir(), '.config')
  return path.join(base, 'homestead', 'config.json')
}

export function getDefaultAuditLogPath(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  const base = env.XDG_STATE_HOME || path.join(opts.homeDir ?? os.homedir(), '.local', 'state')
  return path.join(base, 'homestead', 'audit.log.jsonl')
}

export async function readGlobalConfig(opts: ConfigEnv = {}): Promise<ConfigFile> {
  const p = getGlobalConfigPath(opts)
  if (!await fs.pathExists(p)) return {}
  let json: unknown
  try {
    json = await fs.readJson(p)
  } catch (e) {
    throw new ConfigError(`Cannot parse config file ${p}: ${e instanceof Error ? e.message : String(e)}`)
  }
  const parsed = configFileSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
      .join('; ')
    throw new ConfigError(`Invalid config file ${p}: ${issues}`)
  }
  return parsed.data
}

function expandHome(p: string, homeDir: string): string {
  if (p === '~') return homeDir
  if (p.startsWith('~/')) return path.join(homeDir, p.slice(2))
  return path.resolve(homeDir, p)
}

export function resolveSettings(config: ConfigFile, opts: ConfigEnv = {}): Settings {
  const homeDir = path.resolve(config.homeDir ? expandHome(config.homeDir, opts.homeDir ?? os.homedir()) : (opts.homeDir ?? os.homedir()))
  const backupBase = expandHome(config.backupDir ?? '~/.dotfiles_backups', homeDir)

  const packageGroups: PackageGroup[] = config.packages
    ? config.packages.map(g => ({
      category: g.category,
      label: g.label ?? g.category,
      packages: g.packages.map(name => ({ name, category: g.category })),
    }))
    : defaultPackageGroups()

  return {
    homeDir,
    repoUrl: config.repoUrl,
    repoDir: expandHome(config.repoDir ?? '~/.dotfiles', homeDir),
    branch: config.branch ?? 'main',
    backupBase,
    generationLedger: path.join(backupBase, 'manifest.log'),
    packageLedger: expandHome(config.packageLedger ?? '~/.package_manifest.log', homeDir),
    auditLogPath: config.auditLog ? expandHome(config.auditLog, homeDir) : getDefaultAuditLogPath({ ...opts, homeDir }),
    packageGroups,
  }
}

export async function loadSettings(opts: ConfigEnv = {}): Promise<Settings> {
  return resolveSettings(await readGlobalConfig(opts), opts)
}
