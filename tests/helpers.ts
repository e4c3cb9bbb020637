import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import type { CommandResult, CommandRunner, RunOptions } from '../src/core/exec.js'
import type { Host } from '../src/platform/host.js'
import type { Logger } from '../src/types.js'

export type Handler = (cmd: string, args: string[], opts?: RunOptions) => CommandResult | Promise<CommandResult>

export function ok(stdout = ''): CommandResult {
  return { code: 0, stdout, stderr: '' }
}

export function fail(code = 1, stderr = ''): CommandResult {
  return { code, stdout: '', stderr }
}

/**
 * In-process stand-in for spawning programs. Records every call.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: Array<{ cmd: string; args: string[]; opts?: RunOptions }> = []

  constructor(private readonly handler: Handler) {}

  async run(cmd: string, args: readonly string[], opts?: RunOptions): Promise<CommandResult> {
    this.calls.push({ cmd, args: [...args], opts })
    return await this.handler(cmd, [...args], opts)
  }

  commandLines(): string[] {
    return this.calls.map(c => [c.cmd, ...c.args].join(' '))
  }
}

export interface FakeGitState {
  /**
   * Tracked files on the branch, relative path -> content.
   */
  files: Record<string, string>
  pull?: CommandResult
  checkout?: CommandResult
}

function flagValue(args: string[], flag: string): string | undefined {
  const hit = args.find(a => a.startsWith(`${flag}=`))
  return hit?.slice(flag.length + 1)
}

/**
 * Handles the git invocations of DotfileRepo against a real work tree on disk,
 * plus `sh -c command -v` lookups (every tool is found).
 */
export function gitHandler(state: FakeGitState): Handler {
  return async (cmd, args) => {
    if (cmd === 'sh') return ok()
    if (cmd !== 'git') return fail(127, `${cmd}: not found`)

    const rest = args.filter(a => !a.startsWith('--git-dir=') && !a.startsWith('--work-tree='))
    const workTree = flagValue(args, '--work-tree')
    switch (rest[0]) {
      case 'clone': {
        const dir = rest[rest.length - 1]
        await fs.ensureDir(dir)
        await fs.writeFile(path.join(dir, 'HEAD'), 'ref: refs/heads/main\n')
        return ok()
      }
      case 'pull':
        return state.pull ?? ok('Already up to date.\n')
      case 'config':
        return ok()
      case 'ls-tree':
        return ok(Object.keys(state.files).map(f => `${f}\0`).join(''))
      case 'checkout': {
        if (state.checkout) return state.checkout
        if (!workTree) return fail(128, 'fatal: this operation must be run in a work tree')
        for (const [rel, content] of Object.entries(state.files)) {
          await fs.outputFile(path.join(workTree, rel), content)
        }
        return ok()
      }
      default:
        return fail(1, `unsupported git command: ${rest.join(' ')}`)
    }
  }
}

export function fakeHost(opts: { kernel?: string; dirs?: string[]; files?: Record<string, string> } = {}): Host {
  return {
    kernelName: () => opts.kernel ?? 'Linux',
    isDirectory: async (p) => (opts.dirs ?? []).includes(p),
    readTextFile: async (p) => opts.files?.[p],
  }
}

export function ubuntuHost(): Host {
  return fakeHost({ kernel: 'Linux', files: { '/etc/os-release': 'NAME="Ubuntu"\nID=ubuntu\n' } })
}

export function recordingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = []
  return {
    lines,
    logger: {
      info: (m) => { lines.push(`info: ${m}`) },
      warn: (m) => { lines.push(`warn: ${m}`) },
      error: (m) => { lines.push(`error: ${m}`) },
    },
  }
}

export async function makeTmp(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), 'homestead-test-'))
}

export const approveAll = async () => true
