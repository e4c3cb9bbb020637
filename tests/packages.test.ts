import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import fs from 'fs-extra'
import path from 'node:path'

import { CommandError, UserDeclinedError } from '../src/errors.js'
import { FileLedger } from '../src/ledger/io.js'
import type { PackageSpec } from '../src/packages/catalog.js'
import { installPackages, refreshPackageIndex, uninstallPackages } from '../src/packages/manager.js'
import type { PackageManager } from '../src/platform/package-managers.js'
import { approveAll, makeTmp, recordingLogger } from './helpers.js'

class FakePackageManager implements PackageManager {
  readonly id = 'apt' as const
  readonly installCommand = ['sudo', 'apt-get', 'install', '-y'] as const
  readonly uninstallCommand = ['sudo', 'apt-get', 'purge', '-y'] as const
  readonly installed: Set<string>
  readonly log: string[] = []
  failInstall = new Set<string>()
  failUninstall = new Set<string>()
  failQuery = new Set<string>()
  failRefresh = false

  constructor(installed: string[] = []) {
    this.installed = new Set(installed)
  }

  async refresh() {
    this.log.push('refresh')
    if (this.failRefresh) throw new CommandError('Failed to refresh apt package index', { argv: ['sudo', 'apt-get', 'update'], exitCode: 100 })
  }

  async isInstalled(name: string) {
    if (this.failQuery.has(name)) throw new Error('spawn dpkg ENOENT')
    return this.installed.has(name)
  }

  async install(name: string) {
    this.log.push(`install ${name}`)
    if (this.failInstall.has(name)) throw new CommandError(`Failed to install '${name}'`, { argv: [], exitCode: 100 })
    this.installed.add(name)
  }

  async uninstall(name: string) {
    this.log.push(`uninstall ${name}`)
    if (this.failUninstall.has(name)) throw new CommandError(`Failed to uninstall '${name}'`, { argv: [], exitCode: 100 })
    this.installed.delete(name)
  }
}

const specs = (...names: string[]): PackageSpec[] => names.map(name => ({ name, category: 'core' }))

describe('installPackages', () => {
  let tmp: string
  let ledger: FileLedger

  beforeEach(async () => {
    tmp = await makeTmp()
    ledger = new FileLedger(path.join(tmp, '.package_manifest.log'))
    await ledger.ensure()
  })

  afterEach(async () => {
    await fs.remove(tmp)
  })

  it('skips already-installed packages without a command or ledger entry', async () => {
    const pm = new FakePackageManager(['git'])
    const confirm = vi.fn(approveAll)
    const summary = await installPackages('Core', specs('git', 'curl'), { packageManager: pm, ledger, confirm })

    expect(pm.log).toEqual(['install curl'])
    expect(confirm).toHaveBeenCalledTimes(1)
    expect(confirm).toHaveBeenCalledWith("Install 'curl'?")
    expect(summary.alreadyInstalled).toEqual(['git'])
    expect(summary.installed).toEqual(['curl'])
    expect(await ledger.entries()).toEqual(['curl'])
  })

  it('installs in list order', async () => {
    const pm = new FakePackageManager()
    await installPackages('Core', specs('git', 'curl', 'wget'), { packageManager: pm, ledger, confirm: approveAll })
    expect(pm.log).toEqual(['install git', 'install curl', 'install wget'])
    expect(await ledger.entries()).toEqual(['git', 'curl', 'wget'])
  })

  it('is a no-op for an empty category', async () => {
    const pm = new FakePackageManager()
    const { logger, lines } = recordingLogger()
    await installPackages('Go', [], { packageManager: pm, ledger, confirm: approveAll, logger })
    expect(pm.log).toEqual([])
    expect(lines).toEqual(["info: No packages defined for 'Go', skipping."])
  })

  it('stops the run when a package install is declined', async () => {
    const pm = new FakePackageManager()
    const confirm = async () => false
    await expect(installPackages('Core', specs('git'), { packageManager: pm, ledger, confirm })).rejects.toThrow(UserDeclinedError)
    expect(pm.log).toEqual([])
    expect(await ledger.entries()).toEqual([])
  })

  it('propagates an install failure and records nothing for it', async () => {
    const pm = new FakePackageManager()
    pm.failInstall.add('curl')
    await expect(installPackages('Core', specs('git', 'curl', 'wget'), { packageManager: pm, ledger, confirm: approveAll }))
      .rejects.toThrow(CommandError)
    expect(pm.log).toEqual(['install git', 'install curl'])
    expect(await ledger.entries()).toEqual(['git'])
  })

  it('warns and continues when the ledger append fails', async () => {
    const pm = new FakePackageManager()
    const { logger, lines } = recordingLogger()
    const broken = new FileLedger(path.join(tmp, '.package_manifest.log'))
    vi.spyOn(broken, 'append').mockRejectedValue(new Error('EACCES: permission denied'))

    const summary = await installPackages('Core', specs('git', 'curl'), { packageManager: pm, ledger: broken, confirm: approveAll, logger })
    expect(summary.installed).toEqual(['git', 'curl'])
    expect(summary.warnings).toHaveLength(2)
    expect(lines.filter(l => l.startsWith('warn: '))).toHaveLength(2)
    expect(summary.warnings[0]).toContain("Failed to record 'git' in package ledger")
  })
})

describe('refreshPackageIndex', () => {
  it('turns a refresh failure into a warning', async () => {
    const pm = new FakePackageManager()
    pm.failRefresh = true
    const { logger, lines } = recordingLogger()
    expect(await refreshPackageIndex({ packageManager: pm, logger })).toBe(false)
    expect(lines[0]).toMatch(/^warn: Failed to refresh apt package index/)
  })
})

describe('uninstallPackages', () => {
  let tmp: string
  let ledger: FileLedger

  beforeEach(async () => {
    tmp = await makeTmp()
    ledger = new FileLedger(path.join(tmp, '.package_manifest.log'))
  })

  afterEach(async () => {
    await fs.remove(tmp)
  })

  it('is a no-op when the ledger does not exist', async () => {
    const pm = new FakePackageManager(['git'])
    const confirm = vi.fn(approveAll)
    const summary = await uninstallPackages({ packageManager: pm, ledger, confirm })
    expect(confirm).not.toHaveBeenCalled()
    expect(pm.log).toEqual([])
    expect(summary.uninstalled).toEqual([])
  })

  it('uninstalls in reverse order of installation', async () => {
    for (const name of ['A', 'B', 'C']) await ledger.append(name)
    const pm = new FakePackageManager(['A', 'B', 'C'])
    const summary = await uninstallPackages({ packageManager: pm, ledger, confirm: approveAll })
    expect(pm.log).toEqual(['uninstall C', 'uninstall B', 'uninstall A'])
    expect(summary.uninstalled).toEqual(['C', 'B', 'A'])
    expect(summary.ledgerDeleted).toBe(true)
    expect(await ledger.exists()).toBe(false)
  })

  it('asks once before uninstalling and once before deleting the ledger', async () => {
    await ledger.append('A')
    await ledger.append('B')
    const confirm = vi.fn(approveAll)
    await uninstallPackages({ packageManager: new FakePackageManager(['A', 'B']), ledger, confirm })
    expect(confirm).toHaveBeenCalledTimes(2)
  })

  it('skips packages no longer installed and keeps going past failures', async () => {
    for (const name of ['A', 'B', 'C']) await ledger.append(name)
    const pm = new FakePackageManager(['A', 'C'])
    pm.failUninstall.add('C')
    const { logger, lines } = recordingLogger()
    const confirm = vi.fn(async (msg: string) => !msg.startsWith('Delete'))

    const summary = await uninstallPackages({ packageManager: pm, ledger, confirm, logger })
    expect(pm.log).toEqual(['uninstall C', 'uninstall A'])
    expect(summary.failed).toEqual(['C'])
    expect(summary.notInstalled).toEqual(['B'])
    expect(summary.uninstalled).toEqual(['A'])
    expect(summary.ledgerDeleted).toBe(false)
    expect(lines.some(l => l.startsWith("warn: Failed to uninstall 'C'"))).toBe(true)
    // Only the failed package stays recorded.
    expect(await ledger.entries()).toEqual(['C'])
  })

  it('keeps going when the installed-check itself fails', async () => {
    for (const name of ['A', 'B', 'C']) await ledger.append(name)
    const pm = new FakePackageManager(['A', 'B', 'C'])
    pm.failQuery.add('B')
    const { logger, lines } = recordingLogger()

    const summary = await uninstallPackages({ packageManager: pm, ledger, confirm: async (msg: string) => !msg.startsWith('Delete'), logger })
    expect(pm.log).toEqual(['uninstall C', 'uninstall A'])
    expect(summary.failed).toEqual(['B'])
    expect(summary.uninstalled).toEqual(['C', 'A'])
    expect(lines).toContain("warn: Failed to query whether 'B' is installed. Manual removal may be required. spawn dpkg ENOENT")
    expect(await ledger.entries()).toEqual(['B'])
  })

  it('does nothing when the blanket confirmation is declined', async () => {
    await ledger.append('A')
    const pm = new FakePackageManager(['A'])
    const summary = await uninstallPackages({ packageManager: pm, ledger, confirm: async () => false })
    expect(summary.declined).toBe(true)
    expect(pm.log).toEqual([])
    expect(await ledger.entries()).toEqual(['A'])
  })
})
