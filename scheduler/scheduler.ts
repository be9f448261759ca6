/**
 * Job Scheduler
 *
 * Fires the invoker on a cron cadence and on manual request. Both paths
 * build a TriggerReason and go through the same invoker.
 */

import { CronJob, CronTime } from 'cron'
import type { Invoker } from './invoker'
import type { JobInvocation, SchedulerStatus, TriggerReason } from './types'

export type CronJobFactory = (cronExpression: string, onTick: () => void, timeZone: string) => CronJob

export interface JobSchedulerOptions {
  cronExpression: string
  timeZone: string
  invoker: Invoker
  createCronJob?: CronJobFactory
  now?: () => Date
}

const defaultCronJobFactory: CronJobFactory = (cronExpression, onTick, timeZone) =>
  new CronJob(cronExpression, onTick, null, false, timeZone)

export class JobScheduler {
  private cronJob: CronJob | null = null
  private readonly inFlight = new Set<Promise<JobInvocation>>()
  private lastInvocation?: JobInvocation
  private readonly createCronJob: CronJobFactory
  private readonly now: () => Date

  constructor(private readonly options: JobSchedulerOptions) {
    this.createCronJob = options.createCronJob ?? defaultCronJobFactory
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Register the cadence. Calling it again while running does nothing.
   */
  start(): void {
    if (this.cronJob) {
      console.log('[Scheduler] Already running')
      return
    }

    const { cronExpression, timeZone } = this.options
    try {
      this.cronJob = this.createCronJob(cronExpression, () => this.onTick(), timeZone)
      this.cronJob.start()
    } catch (error) {
      this.cronJob = null
      console.error(`[Scheduler] Failed to set up schedule with expression: ${cronExpression}`, error)
      throw error
    }

    console.log(`[Scheduler] Started (${cronExpression}, ${timeZone}); next run: ${this.nextRunTime()?.toISOString()}`)
  }

  stop(): void {
    if (!this.cronJob) return
    this.cronJob.stop()
    this.cronJob = null
    console.log('[Scheduler] Stopped')
  }

  isRunning(): boolean {
    return this.cronJob !== null
  }

  /**
   * One invocation on request, whatever the cadence is doing
   */
  async triggerManual(): Promise<JobInvocation> {
    console.log('[Scheduler] Manual run triggered')
    return this.execute({ kind: 'manual', requestedAt: this.now() })
  }

  /**
   * Resolves once every invocation started so far has finished
   */
  async whenIdle(): Promise<void> {
    await Promise.allSettled(Array.from(this.inFlight))
  }

  /**
   * The next `count` instants the cadence fires at, after `from`
   */
  nextRuns(count: number, from: Date = this.now()): Date[] {
    const cronTime = new CronTime(this.options.cronExpression, this.options.timeZone)
    const runs: Date[] = []
    let cursor = from

    while (runs.length < count) {
      const next = cronTime.getNextDateFrom(cursor, this.options.timeZone).toJSDate()
      runs.push(next)
      cursor = new Date(next.getTime() + 1000)
    }
    return runs
  }

  nextRunTime(): Date | undefined {
    return this.cronJob ? this.cronJob.nextDate().toJSDate() : undefined
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.isRunning(),
      cronExpression: this.options.cronExpression,
      timeZone: this.options.timeZone,
      inFlight: this.inFlight.size,
      nextRunTime: this.nextRunTime(),
      lastInvocation: this.lastInvocation,
    }
  }

  private onTick(): void {
    if (this.inFlight.size > 0) {
      console.warn('[Scheduler] Previous invocation still running; tick not started')
      return
    }

    this.execute({ kind: 'scheduled', firedAt: this.now() }).catch(error => {
      console.error('[Scheduler] Scheduled invocation failed:', error)
    })
  }

  private async execute(trigger: TriggerReason): Promise<JobInvocation> {
    const run = this.options.invoker.invoke(trigger)
    this.inFlight.add(run)

    try {
      const invocation = await run
      this.lastInvocation = invocation
      return invocation
    } finally {
      this.inFlight.delete(run)
    }
  }
}
