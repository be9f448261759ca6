#!/usr/bin/env node
/**
 * tender-watch CLI
 *
 * Usage:
 *   npx tsx scheduler/index.ts start      # every two days at 08:00 UTC
 *   npx tsx scheduler/index.ts run        # once, now
 *   npx tsx scheduler/index.ts next 5
 */

import * as path from 'path'
import { config } from 'dotenv'
import { createProgram } from './cli'
import type { CliRuntime } from './cli'
import { loadSchedulerConfig } from './config'
import { JobInvoker } from './invoker'
import { JobScheduler } from './scheduler'
import { SpawnCommandRunner } from './utils/command-runner'
import { EnvSecretProvider } from './utils/secrets'

config({ path: path.join(__dirname, '..', '.env.local') })
config()

const defaultRuntime: CliRuntime = {
  createScheduler() {
    const settings = loadSchedulerConfig(process.env)
    const invoker = new JobInvoker({
      job: settings.job,
      runner: new SpawnCommandRunner(),
      secrets: new EnvSecretProvider(process.env),
    })
    return new JobScheduler({
      cronExpression: settings.cronExpression,
      timeZone: settings.timeZone,
      invoker,
    })
  },
  log: line => console.log(line),
  setExitCode: code => {
    process.exitCode = code
  },
  waitForShutdown: () =>
    new Promise(resolve => {
      process.once('SIGINT', () => resolve())
      process.once('SIGTERM', () => resolve())
    }),
}

createProgram(defaultRuntime)
  .parseAsync(process.argv)
  .catch(error => {
    console.error('Fatal error:', error)
    process.exit(1)
  })
