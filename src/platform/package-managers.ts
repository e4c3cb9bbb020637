import { CommandRunner, formatArgv, runChecked } from '../core/exec.js'

export type PackageManagerId = 'apt' | 'dnf' | 'pacman' | 'pkg' | 'brew'

/**
 * A command line that can never be empty.
 */
export type Argv = readonly [string, ...string[]]

export interface PackageManager {
  readonly id: PackageManagerId
  readonly installCommand: Argv
  readonly uninstallCommand: Argv
  /**
   * Refresh the package index. A no-op for managers that have none.
   * Throws CommandError when the refresh command fails.
   */
  refresh(): Promise<void>
  isInstalled(name: string): Promise<boolean>
  /**
   * Throws CommandError when the install command fails.
   */
  install(name: string): Promise<void>
  /**
   * Throws CommandError when the uninstall command fails.
   */
  uninstall(name: string): Promise<void>
}

interface Descriptor {
  install: Argv
  uninstall: Argv
  refresh?: Argv
  isInstalled(runner: CommandRunner, name: string): Promise<boolean>
}

function exitsZero(cmd: string, ...args: string[]) {
  return async (runner: CommandRunner, name: string) => {
    const res = await runner.run(cmd, [...args, name])
    return res.code === 0
  }
}

const DESCRIPTORS: Record<PackageManagerId, Descriptor> = {
  apt: {
    install: ['sudo', 'apt-get', 'install', '-y'],
    uninstall: ['sudo', 'apt-get', 'purge', '-y'],
    refresh: ['sudo', 'apt-get', 'update'],
    isInstalled: exitsZero('dpkg', '-s'),
  },
  dnf: {
    install: ['sudo', 'dnf', 'install', '-y'],
    uninstall: ['sudo', 'dnf', 'remove', '-y'],
    refresh: ['sudo', 'dnf', 'makecache'],
    isInstalled: exitsZero('rpm', '-q'),
  },
  pacman: {
    install: ['sudo', 'pacman', '-S', '--noconfirm'],
    uninstall: ['sudo', 'pacman', '-Rs', '--noconfirm'],
    refresh: ['sudo', 'pacman', '-Sy', '--noconfirm'],
    isInstalled: exitsZero('pacman', '-Q'),
  },
  // Termux runs in userland: no sudo.
  pkg: {
    install: ['pkg', 'install', '-y'],
    uninstall: ['pkg', 'uninstall', '-y'],
    async isInstalled(runner, name) {
      const res = await runner.run('pkg', ['list-installed'])
      if (res.code !== 0) return false
      return res.stdout.split('\n').some(line => line.startsWith(`${name}/`))
    },
  },
  brew: {
    install: ['brew', 'install'],
    uninstall: ['brew', 'uninstall', '--force'],
    isInstalled: exitsZero('brew', 'list'),
  },
}

class CommandPackageManager implements PackageManager {
  readonly installCommand: Argv
  readonly uninstallCommand: Argv

  constructor(
    readonly id: PackageManagerId,
    private readonly descriptor: Descriptor,
    private readonly runner: CommandRunner,
  ) {
    this.installCommand = descriptor.install
    this.uninstallCommand = descriptor.uninstall
  }

  async refresh(): Promise<void> {
    const refresh = this.descriptor.refresh
    if (!refresh) return
    const [cmd, ...args] = refresh
    await runChecked(this.runner, cmd, args, `Failed to refresh ${this.id} package index`, { stdio: 'inherit' })
  }

  isInstalled(name: string): Promise<boolean> {
    return this.descriptor.isInstalled(this.runner, name)
  }

  async install(name: string): Promise<void> {
    const [cmd, ...args] = this.installCommand
    await runChecked(this.runner, cmd, [...args, name], `Failed to install '${name}'`, { stdio: 'inherit' })
  }

  async uninstall(name: string): Promise<void> {
    const [cmd, ...args] = this.uninstallCommand
    await runChecked(this.runner, cmd, [...args, name], `Failed to uninstall '${name}'`, { stdio: 'inherit' })
  }
}

export function createPackageManager(id: PackageManagerId, runner: CommandRunner): PackageManager {
  return new CommandPackageManager(id, DESCRIPTORS[id], runner)
}

export function describePackageManager(pm: PackageManager): string {
  const [cmd, ...args] = pm.installCommand
  return formatArgv(cmd, args)
}
