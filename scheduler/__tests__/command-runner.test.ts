import { describe, expect, it } from 'vitest'
import { formatCommand, SpawnCommandRunner } from '../utils/command-runner'

const node = process.execPath

describe('SpawnCommandRunner', () => {
  const runner = new SpawnCommandRunner()

  it('reports the exit code of the child', async () => {
    const outcome = await runner.run({ command: node, args: ['-e', 'process.exit(3)'] }, { cwd: process.cwd(), env: {} })
    expect(outcome).toEqual({ exitCode: 3, signal: null })
  })

  it('starts the child with exactly the given environment', async () => {
    const script = 'process.exit(process.env.PROBE === "on" && process.env.HOME === undefined ? 0 : 5)'

    const outcome = await runner.run({ command: node, args: ['-e', script] }, { cwd: process.cwd(), env: { PROBE: 'on' } })

    expect(outcome.exitCode).toBe(0)
  })

  it('rejects when the command cannot be started', async () => {
    await expect(
      runner.run({ command: 'tender-watch-no-such-binary', args: [] }, { cwd: process.cwd(), env: { PATH: '/nonexistent' } })
    ).rejects.toThrow(/ENOENT/)
  })
})

describe('formatCommand', () => {
  it('joins command and arguments', () => {
    expect(formatCommand({ command: 'npx', args: ['tsx', 'tender-scraper/index.ts'] })).toBe('npx tsx tender-scraper/index.ts')
  })
})
