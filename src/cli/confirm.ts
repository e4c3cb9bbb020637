import * as clack from '@clack/prompts'

import { UserDeclinedError } from '../errors.js'
import type { Confirm, Logger } from '../types.js'

/**
 * --force: every checkpoint approves itself.
 */
export function autoConfirm(logger?: Logger): Confirm {
  return async (message) => {
    logger?.info(`Non-interactive mode: auto-confirming '${message}'`)
    return true
  }
}

/**
 * Ask on the terminal, defaulting to no. Ctrl-C ends the run.
 * Without a terminal to ask on, every checkpoint is declined.
 */
export function createPromptConfirm(logger?: Logger, isTTY: boolean = process.stdin.isTTY === true): Confirm {
  if (!isTTY) {
    return async (message) => {
      logger?.warn(`No terminal to confirm '${message}'; treating as declined. Use --force to run unattended.`)
      return false
    }
  }
  return async (message) => {
    const answer = await clack.confirm({ message, initialValue: false })
    if (clack.isCancel(answer)) {
      clack.cancel('Operation cancelled.')
      throw new UserDeclinedError()
    }
    return answer
  }
}
