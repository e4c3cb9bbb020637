import { applyPlan } from './apply.js'
import { tryAppendAuditStep } from './audit.js'
import { CommonOptions, PlanStep, Result } from '../types.js'

function nowIso() {
  return new Date().toISOString()
}

export interface RunOperationInput {
  operation: Result['operation']
  steps: PlanStep[]
  generation?: string
  opts?: CommonOptions
}

export async function runOperation(input: RunOperationInput): Promise<Result> {
  const startedAt = nowIso()
  const startedMs = Date.now()
  const logger = input.opts?.logger

  let res = await applyPlan(input.operation, input.steps, { logger })

  res.operation = input.operation
  res.generation = input.generation
  res.startedAt = startedAt
  res.durationMs = Date.now() - startedMs
  res.finishedAt = nowIso()

  if (input.opts?.auditLogPath) {
    res = await tryAppendAuditStep(res, input.opts.auditLogPath)
    const audit = res.steps[res.steps.length - 1]
    if (audit?.status === 'failed') logger?.warn(`Failed to write audit log ${input.opts.auditLogPath}: ${audit.error ?? ''}`)
  }

  logger?.info(`${input.operation} ${res.ok ? 'ok' : 'failed'} (${res.durationMs}ms)`)
  return res
}
