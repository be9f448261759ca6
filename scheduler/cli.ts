import { Command, InvalidArgumentError } from 'commander'
import type { JobScheduler } from './scheduler'
import type { JobInvocation } from './types'

export interface CliRuntime {
  createScheduler(): JobScheduler
  log(line: string): void
  setExitCode(code: number): void
  waitForShutdown(): Promise<void>
}

/**
 * Map an invocation to the CLI's exit code: the job's own non-zero code when
 * it has one, 1 for every other failure.
 */
export function exitCodeFor(invocation: JobInvocation): number {
  if (invocation.status === 'succeeded') return 0
  return invocation.exitCode !== null && invocation.exitCode > 0 ? invocation.exitCode : 1
}

function parseCount(value: string): number {
  const count = Number.parseInt(value, 10)
  if (!/^\d+$/.test(value) || count <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return count
}

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command()

  program
    .name('tender-watch')
    .description('Run the tender scraper on its schedule or on demand')

  program
    .command('start')
    .description('Run the schedule in the foreground until interrupted')
    .action(async () => {
      const scheduler = runtime.createScheduler()
      scheduler.start()
      await runtime.waitForShutdown()
      scheduler.stop()
      await scheduler.whenIdle()
    })

  program
    .command('run')
    .description('Invoke the job once, now')
    .action(async () => {
      const invocation = await runtime.createScheduler().triggerManual()
      runtime.setExitCode(exitCodeFor(invocation))
    })

  program
    .command('next')
    .description('List upcoming scheduled runs')
    .argument('[count]', 'number of runs to list', parseCount, 5)
    .action((count: number) => {
      const scheduler = runtime.createScheduler()
      for (const run of scheduler.nextRuns(count)) {
        runtime.log(run.toISOString())
      }
    })

  return program
}
