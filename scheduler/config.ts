/**
 * Scheduler configuration from the environment
 */

import * as path from 'path'
import { CronTime } from 'cron'
import type { CommandSpec, JobDefinition } from './types'

export interface SchedulerSettings {
  cronExpression: string
  timeZone: string
  job: JobDefinition
}

// 08:00 every second day of the month
export const DEFAULT_CRON_EXPRESSION = '0 8 */2 * *'
export const DEFAULT_TIME_ZONE = 'UTC'
export const DEFAULT_INSTALL_COMMAND = 'npm install --no-audit --no-fund'
export const DEFAULT_JOB_COMMAND = 'npx tsx tender-scraper/index.ts'

export function parseCommand(raw: string): CommandSpec {
  const parts = raw.trim().split(/\s+/).filter(part => part.length > 0)
  if (parts.length === 0) {
    throw new Error('Command must not be empty')
  }
  const [command, ...args] = parts
  return { command, args }
}

export function loadSchedulerConfig(env: NodeJS.ProcessEnv = process.env): SchedulerSettings {
  const cronExpression = (env.SCHEDULE_CRON || DEFAULT_CRON_EXPRESSION).trim()
  const timeZone = (env.SCHEDULE_TZ || DEFAULT_TIME_ZONE).trim()

  try {
    new CronTime(cronExpression, timeZone)
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error'
    throw new Error(`Invalid schedule "${cronExpression}" (${timeZone}): ${errorMessage}`)
  }

  return {
    cronExpression,
    timeZone,
    job: {
      name: 'tender-scraper',
      workdir: path.resolve(env.JOB_WORKDIR || process.cwd()),
      install: parseCommand(env.JOB_INSTALL_COMMAND || DEFAULT_INSTALL_COMMAND),
      entry: parseCommand(env.JOB_COMMAND || DEFAULT_JOB_COMMAND),
    },
  }
}
