import type { Command } from 'commander'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createProgram, exitCodeFor } from '../cli'
import type { CliRuntime } from '../cli'
import type { Invoker } from '../invoker'
import { JobScheduler } from '../scheduler'
import type { InvocationStatus, JobInvocation, TriggerReason } from '../types'

const NOW = new Date('2026-03-01T00:00:00Z')

function invocation(status: InvocationStatus, exitCode: number | null, trigger?: TriggerReason): JobInvocation {
  return {
    id: 'run-1',
    trigger: trigger ?? { kind: 'manual', requestedAt: NOW },
    startedAt: NOW,
    finishedAt: NOW,
    status,
    exitCode,
    signal: null,
  }
}

function quiet(program: Command): Command {
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
  }
  return program
}

describe('exitCodeFor', () => {
  it('maps invocations to process exit codes', () => {
    expect(exitCodeFor(invocation('succeeded', 0))).toBe(0)
    expect(exitCodeFor(invocation('failed', 3))).toBe(3)
    expect(exitCodeFor(invocation('failed', null))).toBe(1)
    expect(exitCodeFor(invocation('install-failed', 1))).toBe(1)
    expect(exitCodeFor(invocation('spawn-failed', null))).toBe(1)
    expect(exitCodeFor(invocation('secrets-failed', null))).toBe(1)
  })
})

describe('createProgram', () => {
  let result: JobInvocation
  let scheduler: JobScheduler
  let runtime: CliRuntime & { lines: string[]; exitCodes: number[] }

  beforeEach(() => {
    result = invocation('succeeded', 0)
    const invoker: Invoker = { invoke: async trigger => ({ ...result, trigger }) }
    scheduler = new JobScheduler({ cronExpression: '0 8 */2 * *', timeZone: 'UTC', invoker, now: () => NOW })

    const lines: string[] = []
    const exitCodes: number[] = []
    runtime = {
      lines,
      exitCodes,
      createScheduler: () => scheduler,
      log: line => lines.push(line),
      setExitCode: code => exitCodes.push(code),
      waitForShutdown: async () => undefined,
    }

    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  it('run invokes the job once and sets the exit code from it', async () => {
    result = invocation('failed', 3)

    await quiet(createProgram(runtime)).parseAsync(['run'], { from: 'user' })

    expect(runtime.exitCodes).toEqual([3])
    expect(scheduler.getStatus().lastInvocation?.trigger).toEqual({ kind: 'manual', requestedAt: NOW })
  })

  it('run exits 0 when the job succeeds', async () => {
    await quiet(createProgram(runtime)).parseAsync(['run'], { from: 'user' })
    expect(runtime.exitCodes).toEqual([0])
  })

  it('next prints upcoming run times', async () => {
    await quiet(createProgram(runtime)).parseAsync(['next', '3'], { from: 'user' })

    expect(runtime.lines).toEqual([
      '2026-03-01T08:00:00.000Z',
      '2026-03-03T08:00:00.000Z',
      '2026-03-05T08:00:00.000Z',
    ])
  })

  it('next lists five runs by default', async () => {
    await quiet(createProgram(runtime)).parseAsync(['next'], { from: 'user' })
    expect(runtime.lines).toHaveLength(5)
  })

  it('next rejects a count that is not a positive integer', async () => {
    await expect(quiet(createProgram(runtime)).parseAsync(['next', '0'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    })
    expect(runtime.lines).toEqual([])
  })

  it('start runs the cadence until shutdown, then stops it', async () => {
    const start = vi.spyOn(scheduler, 'start')

    await quiet(createProgram(runtime)).parseAsync(['start'], { from: 'user' })

    expect(start).toHaveBeenCalledTimes(1)
    expect(scheduler.isRunning()).toBe(false)
  })
})
