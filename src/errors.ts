import type { Result } from './types.js'

export type ErrorCode =
  | 'UNSUPPORTED_PLATFORM'
  | 'MISSING_TOOL'
  | 'COMMAND_FAILED'
  | 'OPERATION_FAILED'
  | 'CONFIG_ERROR'
  | 'USER_DECLINED'

/**
 * Base class for every failure that should end a run with a readable message
 * instead of a stack trace.
 */
export class HomesteadError extends Error {
  readonly code: ErrorCode
  constructor(message: string, code: ErrorCode) {
    super(message)
    this.name = 'HomesteadError'
    this.code = code
  }
}

export class UnsupportedPlatformError extends HomesteadError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_PLATFORM')
    this.name = 'UnsupportedPlatformError'
  }
}

export class MissingToolError extends HomesteadError {
  readonly tool: string
  constructor(tool: string) {
    super(`'${tool}' is not installed. Please install it to proceed.`, 'MISSING_TOOL')
    this.name = 'MissingToolError'
    this.tool = tool
  }
}

export class CommandError extends HomesteadError {
  readonly argv: readonly string[]
  readonly exitCode: number | null
  readonly output: string
  constructor(message: string, details: { argv: readonly string[]; exitCode: number | null; output?: string }) {
    const output = details.output?.trim() ?? ''
    super(output ? `${message}\n${output}` : message, 'COMMAND_FAILED')
    this.name = 'CommandError'
    this.argv = details.argv
    this.exitCode = details.exitCode
    this.output = output
  }
}

export class OperationError extends HomesteadError {
  readonly result: Result
  constructor(message: string, result: Result) {
    const detail = result.errors.length ? `: ${result.errors.join('; ')}` : ''
    super(`${message}${detail}`, 'OPERATION_FAILED')
    this.name = 'OperationError'
    this.result = result
  }
}

export class ConfigError extends HomesteadError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR')
    this.name = 'ConfigError'
  }
}

export class UserDeclinedError extends HomesteadError {
  constructor(message = 'Operation cancelled by user') {
    super(message, 'USER_DECLINED')
    this.name = 'UserDeclinedError'
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
