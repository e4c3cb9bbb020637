#!/usr/bin/env node
import path from 'path'
import { fileURLToPath } from 'url'

import { setup } from './api/setup.js'
import { takedown } from './api/takedown.js'
import { loadSettings } from './cli/config.js'
import { autoConfirm, createPromptConfirm } from './cli/confirm.js'
import { createConsoleLogger } from './cli/logger.js'
import { HomesteadError } from './errors.js'
import type { Logger } from './types.js'

type Argv = string[]
type Action = 'setup' | 'takedown'

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = 1) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = 1): never {
  throw new CliExit(msg, code)
}

function hasFlag(args: Argv, names: string[]): boolean {
  const idx = args.findIndex(a => names.includes(a))
  if (idx >= 0) {
    args.splice(idx, 1)
    return true
  }
  return false
}

const USAGE = `
homestead

Usage:
  homestead --setup [--force]
  homestead --takedown [--force]

Options:
  --setup     Deploy dotfiles and install packages.
  --takedown  Uninstall recorded packages and restore the original dotfiles.
  --force     Non-interactive: auto-confirm every prompt.
  -h, --help  Show this help.
`

function printHelp(stream: NodeJS.WritableStream = process.stdout): void {
  stream.write(USAGE.trimStart())
}

interface ParsedArgs {
  action: Action
  force: boolean
}

function parseArgs(argv: Argv): ParsedArgs {
  const args = [...argv]
  const wantsSetup = hasFlag(args, ['--setup'])
  const wantsTakedown = hasFlag(args, ['--takedown'])
  const force = hasFlag(args, ['--force'])

  if (args.length) die(`Unknown option: ${args.join(' ')}`)
  if (wantsSetup && wantsTakedown) die('Choose one of --setup or --takedown, not both.')
  if (!wantsSetup && !wantsTakedown) die('No action specified (--setup or --takedown).')
  return { action: wantsSetup ? 'setup' : 'takedown', force }
}

export interface MainDeps {
  logger?: Logger
  env?: NodeJS.ProcessEnv
  homeDir?: string
}

export async function main(argv: string[] = process.argv.slice(2), deps: MainDeps = {}): Promise<number> {
  const logger = deps.logger ?? createConsoleLogger()
  try {
    if (hasFlag([...argv], ['-h', '--help'])) {
      printHelp()
      return 0
    }

    const { action, force } = parseArgs(argv)
    logger.info('Starting environment management...')

    const settings = await loadSettings({ env: deps.env ?? process.env, homeDir: deps.homeDir })
    const confirm = force ? autoConfirm(logger) : createPromptConfirm(logger)

    if (action === 'setup') {
      await setup({ settings, confirm, logger })
    } else {
      await takedown({ settings, confirm, logger })
    }

    logger.info('Finished.')
    return 0
  } catch (e) {
    if (e instanceof CliExit) {
      logger.error(e.message)
      printHelp(process.stderr)
      return e.exitCode
    }
    if (e instanceof HomesteadError) {
      logger.error(e.message)
      return 1
    }
    throw e
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const msg = err instanceof Error && err.stack ? err.stack : String(err)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
