import { spawn } from 'child_process'

import { CommandError } from '../errors.js'

export interface RunOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /**
   * inherit streams to the terminal (package managers may prompt for a sudo
   * password); pipe captures output for inspection. Default: pipe.
   */
  stdio?: 'inherit' | 'pipe'
}

export interface CommandResult {
  code: number
  stdout: string
  stderr: string
}

/**
 * Every external program goes through this seam. Non-zero exit codes resolve;
 * only a failure to start the process rejects.
 */
export interface CommandRunner {
  run(cmd: string, args: readonly string[], opts?: RunOptions): Promise<CommandResult>
}

export const nodeRunner: CommandRunner = {
  run(cmd, args, opts = {}) {
    const stdio = opts.stdio ?? 'pipe'
    return new Promise((resolve, reject) => {
      const child = spawn(cmd, [...args], {
        cwd: opts.cwd,
        env: { ...process.env, ...opts.env },
        stdio: stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      })

      let stdout = ''
      let stderr = ''
      child.stdout?.on('data', (c: Buffer) => { stdout += c.toString() })
      child.stderr?.on('data', (c: Buffer) => { stderr += c.toString() })

      child.on('error', reject)
      child.on('close', (code) => {
        resolve({ code: code ?? 1, stdout, stderr })
      })
    })
  },
}

export function formatArgv(cmd: string, args: readonly string[]): string {
  return [cmd, ...args].map(a => (/\s/.test(a) ? `"${a}"` : a)).join(' ')
}

/**
 * Run and throw CommandError on a non-zero exit.
 */
export async function runChecked(
  runner: CommandRunner,
  cmd: string,
  args: readonly string[],
  failureMessage: string,
  opts?: RunOptions,
): Promise<CommandResult> {
  let res: CommandResult
  try {
    res = await runner.run(cmd, args, opts)
  } catch (e) {
    throw new CommandError(`${failureMessage} (${formatArgv(cmd, args)})`, {
      argv: [cmd, ...args],
      exitCode: null,
      output: e instanceof Error ? e.message : String(e),
    })
  }
  if (res.code !== 0) {
    throw new CommandError(`${failureMessage} (${formatArgv(cmd, args)} exited with ${res.code})`, {
      argv: [cmd, ...args],
      exitCode: res.code,
      output: res.stderr || res.stdout,
    })
  }
  return res
}

export async function commandExists(runner: CommandRunner, name: string): Promise<boolean> {
  try {
    const res = await runner.run('sh', ['-c', 'command -v "$1" >/dev/null 2>&1', 'sh', name])
    return res.code === 0
  } catch {
    return false
  }
}
