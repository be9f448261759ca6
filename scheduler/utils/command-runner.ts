import { spawn } from 'child_process'
import type { CommandSpec } from '../types'

export interface CommandOutcome {
  exitCode: number | null
  signal: NodeJS.Signals | null
}

export interface CommandOptions {
  cwd: string
  env: NodeJS.ProcessEnv
}

export interface CommandRunner {
  /** Rejects only when the process cannot be started */
  run(spec: CommandSpec, options: CommandOptions): Promise<CommandOutcome>
}

/**
 * Runs commands as child processes with inherited stdio, so the job's own
 * output lands in the scheduler's log.
 */
export class SpawnCommandRunner implements CommandRunner {
  run(spec: CommandSpec, options: CommandOptions): Promise<CommandOutcome> {
    return new Promise((resolve, reject) => {
      const child = spawn(spec.command, spec.args, {
        cwd: options.cwd,
        env: options.env,
        stdio: 'inherit',
      })

      child.once('error', reject)
      child.once('close', (code, signal) => {
        resolve({ exitCode: code, signal })
      })
    })
  }
}

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(' ')
}
