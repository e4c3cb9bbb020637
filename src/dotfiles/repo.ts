import fs from 'fs-extra'
import path from 'path'

import { CommandRunner, runChecked } from '../core/exec.js'
import { CommandError, ConfigError } from '../errors.js'

export interface DotfileRepoOptions {
  /**
   * Directory of the bare clone (the git dir).
   */
  gitDir: string
  /**
   * Work tree the repository is overlaid onto: the home directory.
   */
  workTree: string
  branch: string
  runner: CommandRunner
}

const UP_TO_DATE = /Already up[ -]to[ -]date/i

/**
 * A bare git repository deployed against an external work tree.
 */
export class DotfileRepo {
  readonly gitDir: string
  readonly workTree: string
  readonly branch: string
  private readonly runner: CommandRunner

  constructor(opts: DotfileRepoOptions) {
    this.gitDir = path.resolve(opts.gitDir)
    this.workTree = path.resolve(opts.workTree)
    this.branch = opts.branch
    this.runner = opts.runner
  }

  /**
   * True when gitDir holds a bare clone. A directory that exists but is not
   * one is a configuration problem, not something to clone over.
   */
  async exists(): Promise<boolean> {
    if (!await fs.pathExists(this.gitDir)) return false
    if (await fs.pathExists(path.join(this.gitDir, 'HEAD'))) return true
    throw new ConfigError(`'${this.gitDir}' exists but is not a bare git repository`)
  }

  async clone(url: string): Promise<void> {
    await runChecked(
      this.runner,
      'git',
      ['clone', '--bare', url, this.gitDir],
      'Failed to clone dotfiles repository. Check that the repository URL is correct and your SSH key is authorized',
      { stdio: 'inherit' },
    )
  }

  /**
   * Pull the tracked branch. Resolves 'updated' or 'up-to-date'; any other
   * failure throws CommandError.
   */
  async pull(): Promise<'updated' | 'up-to-date'> {
    const args = [...this.scoped(), 'pull', 'origin', this.branch]
    const res = await this.runner.run('git', args)
    const output = `${res.stdout}\n${res.stderr}`
    if (res.code === 0) return UP_TO_DATE.test(output) ? 'up-to-date' : 'updated'
    if (UP_TO_DATE.test(output)) return 'up-to-date'
    throw new CommandError('Failed to pull dotfiles', { argv: ['git', ...args], exitCode: res.code, output })
  }

  async hideUntrackedFiles(): Promise<void> {
    await runChecked(
      this.runner,
      'git',
      [`--git-dir=${this.gitDir}`, 'config', 'status.showUntrackedFiles', 'no'],
      "Failed to configure git with 'status.showUntrackedFiles no'",
    )
  }

  /**
   * Every path tracked on the branch, relative to the work tree.
   */
  async listTracked(): Promise<string[]> {
    const res = await runChecked(
      this.runner,
      'git',
      [`--git-dir=${this.gitDir}`, 'ls-tree', '-r', '-z', '--name-only', this.branch],
      `Failed to list files tracked on '${this.branch}'`,
    )
    return res.stdout.split('\0').filter(Boolean)
  }

  /**
   * Forced overlay checkout: tracked files overwrite whatever is in the work tree.
   */
  async checkout(): Promise<void> {
    await runChecked(
      this.runner,
      'git',
      [...this.scoped(), 'checkout', this.branch, '--force'],
      'Failed to checkout dotfiles',
      { stdio: 'inherit' },
    )
  }

  async delete(): Promise<void> {
    await fs.remove(this.gitDir)
  }

  private scoped(): string[] {
    return [`--git-dir=${this.gitDir}`, `--work-tree=${this.workTree}`]
  }
}
