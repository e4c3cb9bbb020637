export type Operation = 'deploy' | 'takedown'

export type StepKind =
  | 'rm'
  | 'backup'
  | 'restore'
  | 'audit'

export interface Step {
  kind: StepKind
  message: string
  /**
   * Optional paths involved in the step, for observability and auditing.
   */
  paths?: Record<string, string>
  /**
   * Whether the step was executed or skipped.
   */
  status?: 'planned' | 'executed' | 'skipped' | 'failed'
  /**
   * Optional error message for failed steps.
   */
  error?: string
  /**
   * Optional rollback hint for this step. Never applied automatically;
   * surfaced so a failed run can be recovered by hand.
   */
  undo?: Omit<Step, 'status' | 'error' | 'undo'>
}

/**
 * A step applyPlan can execute. Audit steps are only ever recorded after the fact.
 */
export type PlanStep = Step & { kind: Exclude<StepKind, 'audit'> }

export interface Result {
  ok: boolean
  operation: Operation
  /**
   * Backup generation the operation wrote to or restored from, if any.
   */
  generation?: string
  startedAt: string
  finishedAt: string
  durationMs: number
  steps: Step[]
  warnings: string[]
  errors: string[]
  /**
   * Summary of changes that occurred.
   */
  changes: Array<{ target?: string; source?: string; action: string }>
  /**
   * Rollback plan (best-effort) in reverse order of execution.
   */
  rollbackSteps?: Step[]
}

export interface Logger {
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

/**
 * Operator approval for a checkpoint. Resolves true to proceed.
 */
export type Confirm = (message: string) => Promise<boolean>

export interface CommonOptions {
  /**
   * If provided, one JSON line per operation (Result summary) is appended here.
   */
  auditLogPath?: string
  logger?: Logger
}

export function silentLogger(): Logger {
  return {
    info: () => {},
    warn: () => {},
    error: () => {},
  }
}
