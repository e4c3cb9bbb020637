import fs from 'fs-extra'
import path from 'path'

import { errorMessage } from '../errors.js'
import { Result } from '../types.js'

export async function appendAudit(logPath: string, result: Result) {
  await fs.ensureDir(path.dirname(logPath))
  const line = JSON.stringify(result) + '\n'
  await fs.appendFile(logPath, line, 'utf8')
}

/**
 * Append the result to the audit log. A write failure is recorded as a
 * warning on the result, never thrown.
 */
export async function tryAppendAuditStep(result: Result, logPath: string): Promise<Result> {
  try {
    await appendAudit(logPath, result)
    result.steps.push({ kind: 'audit', message: 'Append audit log', status: 'executed', paths: { file: logPath } })
  } catch (e) {
    const msg = errorMessage(e)
    result.warnings.push(`Failed to write audit log: ${msg}`)
    result.steps.push({ kind: 'audit', message: 'Append audit log', status: 'failed', error: msg, paths: { file: logPath } })
  }
  return result
}
