import { errorMessage } from '../errors.js'
import { Logger, PlanStep, Result, Step, silentLogger } from '../types.js'
import { backupItem, restoreItem } from './backup.js'
import { removePath } from './fs-ops.js'

function nowIso() {
  return new Date().toISOString()
}

function durationMs(start: number) {
  return Date.now() - start
}

export interface ApplyOptions {
  logger?: Logger
}

/**
 * Execute steps in order. The first failure stops the run: later steps are
 * not attempted and nothing already done is undone. The reverse plan is
 * returned in Result.rollbackSteps for manual recovery.
 */
export async function applyPlan(operation: Result['operation'], steps: PlanStep[], opts: ApplyOptions = {}): Promise<Result> {
  const startTs = Date.now()
  const startedAt = nowIso()
  const logger = opts.logger ?? silentLogger()

  const result: Result = {
    ok: true,
    operation,
    startedAt,
    finishedAt: startedAt,
    durationMs: 0,
    steps: [],
    warnings: [],
    errors: [],
    changes: [],
  }

  for (const s of steps) {
    const step: Step = { ...s, status: 'planned' }
    try {
      switch (s.kind) {
        case 'rm': {
          const p = s.paths?.path
          if (!p) throw new Error('rm step missing path')
          await removePath(p)
          step.status = 'executed'
          result.changes.push({ action: 'rm', target: p })
          break
        }
        case 'backup': {
          const from = s.paths?.from
          const to = s.paths?.to
          if (!from || !to) throw new Error('backup step missing from/to')
          logger.warn(`Backing up existing '${from}' to '${to}'...`)
          if (await backupItem(from, to)) {
            step.status = 'executed'
            result.changes.push({ action: 'backup', source: from, target: to })
          } else {
            step.status = 'skipped'
          }
          break
        }
        case 'restore': {
          const from = s.paths?.from
          const to = s.paths?.to
          if (!from || !to) throw new Error('restore step missing from/to')
          if (await restoreItem(from, to, logger)) {
            logger.info(`Restored '${to}'.`)
            step.status = 'executed'
            result.changes.push({ action: 'restore', source: from, target: to })
            step.undo = step.undo ?? { kind: 'backup', message: 'Rollback: move restored item back', paths: { from: to, to: from } }
          } else {
            step.status = 'skipped'
            result.warnings.push(`Backup item missing: ${from}`)
          }
          break
        }
        default: {
          const _exhaustive: never = s.kind
          throw new Error(`Unknown step kind: ${String(_exhaustive)}`)
        }
      }
      result.steps.push(step)
    } catch (e) {
      step.status = 'failed'
      step.error = errorMessage(e)
      result.steps.push(step)
      result.ok = false
      result.errors.push(step.error)
      logger.error(`Step failed: ${step.kind} ${step.error}`)
      break
    }
  }

  result.rollbackSteps = result.steps
    .flatMap(s => (s.status === 'executed' && s.undo ? [s.undo] : []))
    .reverse()

  result.finishedAt = nowIso()
  result.durationMs = durationMs(startTs)
  return result
}
