import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, test } from 'vitest'
import { runCli } from '../src/interfaces/cli/run.js'
import type { IO } from '../src/interfaces/cli/io.js'
import { computeRevision } from '../src/shared/revision.js'

function createTestIO() {
  const out: string[] = []
  const err: string[] = []
  const io: IO = {
    stdout: (t) => out.push(t),
    stderr: (t) => err.push(t)
  }
  return { io, out, err }
}

describe('CLI', () => {
  const workspaces: string[] = []

  afterEach(async () => {
    for (const dir of workspaces.splice(0)) await rm(dir, { recursive: true, force: true })
  })

  test('tick prints the requested number of ticks as JSON lines', async () => {
    const io1 = createTestIO()
    const code = await runCli({ argv: ['tick', '--interval', '5', '--count', '3'], cwd: tmpdir(), io: io1.io, env: {} })

    expect(code).toBe(0)
    expect(io1.err).toEqual([])
    const ticks: Array<{ seq: number; at: string }> = io1.out.map((line) => JSON.parse(line))
    expect(ticks.map((t) => t.seq)).toEqual([1, 2, 3])
    expect(io1.out.every((line) => line.endsWith('\n'))).toBe(true)
  })

  test('watch --initial reports existing files relative to the directory', async () => {
    const workspace = await mkdtemp(join(tmpdir(), 'push-bridge-'))
    workspaces.push(workspace)
    await writeFile(join(workspace, 'a.md'), 'alpha', 'utf8')
    await writeFile(join(workspace, 'b.md'), 'beta', 'utf8')
    await writeFile(join(workspace, 'c.txt'), 'gamma', 'utf8')

    const io1 = createTestIO()
    const code = await runCli({
      argv: ['watch', '.', '--initial', '--ext', 'md', '--interval', '10', '--count', '2'],
      cwd: workspace,
      io: io1.io,
      env: {}
    })

    expect(code).toBe(0)
    expect(io1.out).toEqual([
      `${JSON.stringify({ path: 'a.md', changeKind: 'created', revision: computeRevision('alpha') })}\n`,
      `${JSON.stringify({ path: 'b.md', changeKind: 'created', revision: computeRevision('beta') })}\n`
    ])
  })

  test('watch on a missing directory exits 1 with the producer error', async () => {
    const io1 = createTestIO()
    const missing = join(tmpdir(), 'push-bridge-does-not-exist-4d1c')
    const code = await runCli({ argv: ['watch', missing, '--interval', '10'], cwd: tmpdir(), io: io1.io, env: {} })

    expect(code).toBe(1)
    expect(io1.err.join('')).toMatch(/^Producer failed: ENOENT/)
  })

  test('invalid --count is rejected', async () => {
    const io1 = createTestIO()
    const code = await runCli({ argv: ['tick', '--count', '0'], cwd: tmpdir(), io: io1.io, env: {} })

    expect(code).toBe(1)
    expect(io1.err).toEqual(['--count must be a positive integer, got 0\n'])
  })

  test('invalid configuration exits 1 before parsing', async () => {
    const io1 = createTestIO()
    const code = await runCli({
      argv: ['tick'],
      cwd: tmpdir(),
      io: io1.io,
      env: { PUSH_BRIDGE_TICK_INTERVAL_MS: 'soon' }
    })

    expect(code).toBe(1)
    expect(io1.err).toEqual(['Invalid configuration: PUSH_BRIDGE_TICK_INTERVAL_MS must be a positive integer\n'])
  })

  test('no command is an error', async () => {
    const io1 = createTestIO()
    const code = await runCli({ argv: [], cwd: tmpdir(), io: io1.io, env: {} })

    expect(code).toBe(1)
    expect(io1.err.join('')).toContain('Specify a command: tick or watch')
  })
})
