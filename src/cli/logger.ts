import chalk from 'chalk'

import type { Logger } from '../types.js'

export interface LoggerStreams {
  out: NodeJS.WritableStream
  err: NodeJS.WritableStream
}

export function createConsoleLogger(streams: LoggerStreams = { out: process.stdout, err: process.stderr }): Logger {
  return {
    info: (msg) => { streams.out.write(`${chalk.green('[INFO]')} ${msg}\n`) },
    warn: (msg) => { streams.out.write(`${chalk.yellow('[WARN]')} ${msg}\n`) },
    error: (msg) => { streams.err.write(`${chalk.red('[ERROR]')} ${msg}\n`) },
  }
}
