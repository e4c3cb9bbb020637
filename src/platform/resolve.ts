import { CommandRunner, commandExists } from '../core/exec.js'
import { UnsupportedPlatformError } from '../errors.js'
import { Logger } from '../types.js'
import { Host, nodeHost } from './host.js'
import { PackageManager, PackageManagerId, createPackageManager, describePackageManager } from './package-managers.js'

export const TERMUX_MARKER_DIR = '/data/data/com.termux/files/usr/etc/termux'
export const OS_RELEASE_PATH = '/etc/os-release'

export type PlatformKind = 'termux' | 'linux' | 'macos'

export interface PlatformProfile {
  readonly kind: PlatformKind
  /**
   * os-release ID on Linux.
   */
  readonly distroId?: string
  /**
   * Human readable name, for logs.
   */
  readonly name: string
  readonly packageManager: PackageManager
}

const DISTRO_FAMILIES: Record<string, PackageManagerId> = {
  ubuntu: 'apt',
  debian: 'apt',
  pop: 'apt',
  fedora: 'dnf',
  centos: 'dnf',
  rhel: 'dnf',
  arch: 'pacman',
}

export interface ResolvePlatformOptions {
  runner: CommandRunner
  host?: Host
  logger?: Logger
}

/**
 * Parse os-release(5) content into its key/value pairs.
 */
export function parseOsRelease(content: string): Record<string, string> {
  const out: Record<string, string> = {}
  for (const raw of content.split('\n')) {
    const line = raw.trim()
    if (!line || line.startsWith('#')) continue
    const eq = line.indexOf('=')
    if (eq <= 0) continue
    const key = line.slice(0, eq).trim()
    let value = line.slice(eq + 1).trim()
    if (value.length >= 2 && (value[0] === '"' || value[0] === '\'') && value.endsWith(value[0])) {
      value = value.slice(1, -1)
    }
    out[key] = value
  }
  return out
}

function freeze(profile: PlatformProfile): PlatformProfile {
  return Object.freeze({ ...profile })
}

export async function resolvePlatform(opts: ResolvePlatformOptions): Promise<PlatformProfile> {
  const host = opts.host ?? nodeHost
  const logger = opts.logger
  logger?.info('Detecting operating system...')

  const profile = await detect(host, opts.runner, logger)
  logger?.info(`OS detection complete. Package manager: ${describePackageManager(profile.packageManager)}`)
  return profile
}

async function detect(host: Host, runner: CommandRunner, logger?: Logger): Promise<PlatformProfile> {
  if (await host.isDirectory(TERMUX_MARKER_DIR)) {
    logger?.info('Detected Termux environment.')
    logger?.warn('Termux operates in userland; no sudo is used for pkg.')
    return freeze({ kind: 'termux', distroId: 'termux', name: 'Termux', packageManager: createPackageManager('pkg', runner) })
  }

  const kernel = host.kernelName()
  switch (kernel) {
    case 'Linux': {
      const content = await host.readTextFile(OS_RELEASE_PATH)
      if (content === undefined) {
        throw new UnsupportedPlatformError(`Cannot determine Linux distribution: ${OS_RELEASE_PATH} not found`)
      }
      const release = parseOsRelease(content)
      const id = release.ID ?? ''
      const name = release.NAME ?? id
      logger?.info(`Detected Linux distribution: ${name} (ID: ${id})`)
      const pmId = Object.hasOwn(DISTRO_FAMILIES, id) ? DISTRO_FAMILIES[id] : undefined
      if (!pmId) {
        throw new UnsupportedPlatformError(`Unsupported Linux distribution: ${id || '(unknown)'}`)
      }
      return freeze({ kind: 'linux', distroId: id, name, packageManager: createPackageManager(pmId, runner) })
    }
    case 'Darwin': {
      logger?.info('Detected macOS.')
      if (!await commandExists(runner, 'brew')) {
        throw new UnsupportedPlatformError('Homebrew not found. Install Homebrew (https://brew.sh/) to proceed on macOS.')
      }
      return freeze({ kind: 'macos', name: 'macOS', packageManager: createPackageManager('brew', runner) })
    }
    default:
      throw new UnsupportedPlatformError(`Unsupported operating system: ${kernel}`)
  }
}
