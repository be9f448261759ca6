/**
 * Scheduler Types
 */

export type TriggerReason =
  | { kind: 'scheduled'; firedAt: Date }
  | { kind: 'manual'; requestedAt: Date }

export type InvocationStatus = 'succeeded' | 'failed' | 'install-failed' | 'secrets-failed' | 'spawn-failed'

export interface JobInvocation {
  id: string
  trigger: TriggerReason
  startedAt: Date
  finishedAt: Date
  status: InvocationStatus
  exitCode: number | null
  signal: NodeJS.Signals | null
  error?: string
}

export interface CommandSpec {
  command: string
  args: string[]
}

export interface JobDefinition {
  name: string
  workdir: string
  install: CommandSpec
  entry: CommandSpec
}

export interface SchedulerStatus {
  running: boolean
  cronExpression: string
  timeZone: string
  inFlight: number
  nextRunTime?: Date
  lastInvocation?: JobInvocation
}

export function describeTrigger(trigger: TriggerReason): string {
  switch (trigger.kind) {
    case 'scheduled':
      return `scheduled tick at ${trigger.firedAt.toISOString()}`
    case 'manual':
      return `manual request at ${trigger.requestedAt.toISOString()}`
  }
}
