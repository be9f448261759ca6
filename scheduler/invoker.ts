/**
 * Job Invoker
 *
 * One invocation is a straight line: install the job's dependencies, resolve
 * the secret set, start the entry point with those secrets as its environment,
 * report how it ended. Scheduled ticks and manual requests both come through
 * here. Nothing is retried and nothing survives the invocation.
 */

import { randomUUID } from 'crypto'
import type { CommandRunner } from './utils/command-runner'
import { formatCommand } from './utils/command-runner'
import { buildJobEnv, pickRuntimeEnv, resolveSecrets } from './utils/secrets'
import type { SecretProvider, SecretSet } from './utils/secrets'
import { describeTrigger } from './types'
import type { InvocationStatus, JobDefinition, JobInvocation, TriggerReason } from './types'

export interface Invoker {
  invoke(trigger: TriggerReason): Promise<JobInvocation>
}

export interface JobInvokerOptions {
  job: JobDefinition
  runner: CommandRunner
  secrets: SecretProvider
  parentEnv?: NodeJS.ProcessEnv
  onInvocation?: (invocation: JobInvocation) => void
  now?: () => Date
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}

export class JobInvoker implements Invoker {
  private readonly now: () => Date

  constructor(private readonly options: JobInvokerOptions) {
    this.now = options.now ?? (() => new Date())
  }

  async invoke(trigger: TriggerReason): Promise<JobInvocation> {
    const { job, runner } = this.options
    const parentEnv = this.options.parentEnv ?? process.env
    const id = randomUUID()
    const startedAt = this.now()

    const finish = (
      status: InvocationStatus,
      exitCode: number | null,
      signal: NodeJS.Signals | null,
      error?: string
    ): JobInvocation => {
      const invocation: JobInvocation = {
        id,
        trigger,
        startedAt,
        finishedAt: this.now(),
        status,
        exitCode,
        signal,
        ...(error ? { error } : {}),
      }
      this.report(invocation)
      return invocation
    }

    console.log(`[Invoker] ${job.name} invocation ${id} (${describeTrigger(trigger)})`)

    // 1. Install declared dependencies; the entry point never starts without them
    console.log(`[Invoker] Installing dependencies: ${formatCommand(job.install)}`)
    try {
      const install = await runner.run(job.install, { cwd: job.workdir, env: pickRuntimeEnv(parentEnv) })
      if (install.exitCode !== 0) {
        return finish('install-failed', install.exitCode, install.signal, 'Dependency installation failed')
      }
    } catch (error) {
      return finish('install-failed', null, null, errorMessage(error))
    }

    // 2. Secrets, once per invocation
    let secrets: SecretSet
    try {
      secrets = await resolveSecrets(this.options.secrets)
    } catch (error) {
      return finish('secrets-failed', null, null, errorMessage(error))
    }

    // 3. Entry point
    console.log(`[Invoker] Starting job: ${formatCommand(job.entry)}`)
    try {
      const outcome = await runner.run(job.entry, { cwd: job.workdir, env: buildJobEnv(secrets, parentEnv) })
      return finish(outcome.exitCode === 0 ? 'succeeded' : 'failed', outcome.exitCode, outcome.signal)
    } catch (error) {
      return finish('spawn-failed', null, null, errorMessage(error))
    }
  }

  private report(invocation: JobInvocation): void {
    const duration = invocation.finishedAt.getTime() - invocation.startedAt.getTime()
    const exit = invocation.signal ? `signal ${invocation.signal}` : `exit code ${invocation.exitCode ?? 'n/a'}`
    const line = `[Invoker] ${invocation.id} ${invocation.status} (${exit}, ${(duration / 1000).toFixed(1)}s)`

    if (invocation.status === 'succeeded') {
      console.log(line)
    } else {
      console.error(invocation.error ? `${line}: ${invocation.error}` : line)
    }

    this.options.onInvocation?.(invocation)
  }
}
