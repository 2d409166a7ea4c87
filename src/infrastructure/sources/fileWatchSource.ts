/**
 * File-watch push-source.
 *
 * Polls a directory tree on an interval and reports each file that was
 * created, modified, or deleted since the previous poll. A file's identity
 * is its path relative to `baseDir`; its revision is a content hash.
 *
 * The first poll after construction records a baseline and reports nothing
 * unless `emitInitial` is set. Any fs failure while polling is reported
 * once through `onError` and stops the timer.
 */

import { readdir, readFile } from 'node:fs/promises'
import { join, relative, resolve } from 'node:path'
import type { PushSink, PushSource } from '../../core/ports/pushSource.js'
import { AsyncMutex } from '../../shared/asyncMutex.js'
import { computeRevision } from '../../shared/revision.js'

export type FileChangeKind = 'created' | 'modified' | 'deleted'

export type FileChange = {
  path: string
  changeKind: FileChangeKind
  revision: string | undefined
}

export type FileWatchSourceConfig = {
  baseDir: string
  intervalMs: number
  /** Only files ending in one of these are watched. Empty means all files. */
  includeExtensions?: string[]
  /** Report files present at the first poll as `created`. */
  emitInitial?: boolean
}

type FileSnapshot = Map<string, string>

function shouldSkipDir(name: string): boolean {
  return name === '.git' || name === 'node_modules' || name === 'dist'
}

async function collectFiles(root: string, includeExtensions: string[]): Promise<string[]> {
  const files: string[] = []

  const visit = async (abs: string) => {
    const entries = await readdir(abs, { withFileTypes: true })
    for (const ent of entries) {
      const full = join(abs, ent.name)
      if (ent.isDirectory()) {
        if (shouldSkipDir(ent.name)) continue
        await visit(full)
        continue
      }
      if (!ent.isFile()) continue
      if (includeExtensions.length > 0 && !includeExtensions.some((ext) => full.endsWith(ext))) continue
      files.push(full)
    }
  }

  await visit(root)
  return files.sort()
}

async function readIfPresent(absPath: string): Promise<string | undefined> {
  try {
    return await readFile(absPath, 'utf8')
  } catch (error) {
    // Deleted between readdir and read; the next poll reports it.
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined
    throw error
  }
}

function toRelPath(baseDir: string, absPath: string): string {
  return relative(baseDir, absPath).split('\\').join('/')
}

export class FileWatchSource implements PushSource {
  readonly #sink: PushSink<FileChange>
  readonly #baseDir: string
  readonly #intervalMs: number
  readonly #includeExtensions: string[]
  readonly #mutex = new AsyncMutex()
  #snapshot: FileSnapshot | undefined
  #timer: NodeJS.Timeout | undefined
  #failed = false

  constructor(config: FileWatchSourceConfig, sink: PushSink<FileChange>) {
    if (!Number.isFinite(config.intervalMs) || config.intervalMs <= 0) {
      throw new Error(`intervalMs must be a positive number, got ${config.intervalMs}`)
    }
    this.#sink = sink
    this.#baseDir = resolve(config.baseDir)
    this.#intervalMs = config.intervalMs
    this.#includeExtensions = config.includeExtensions ?? []
    if (config.emitInitial) this.#snapshot = new Map()
  }

  get isRunning(): boolean {
    return this.#timer !== undefined
  }

  activate(): void {
    if (this.#timer !== undefined || this.#failed) return
    this.#timer = setInterval(() => this.#tick(), this.#intervalMs)
    this.#tick()
  }

  deactivate(): void {
    if (this.#timer === undefined) return
    clearInterval(this.#timer)
    this.#timer = undefined
  }

  /**
   * Scan once, send every change to the sink, and return them.
   * Concurrent calls run one after another.
   */
  pollOnce(): Promise<FileChange[]> {
    return this.#mutex.runExclusive(async () => {
      const changes = await this.#diff()
      for (const change of changes) this.#sink.onEvent(change)
      return changes
    })
  }

  #tick(): void {
    // A slow scan is still running; skip rather than queue behind it.
    if (this.#mutex.isLocked) return
    this.pollOnce().catch((err: unknown) => {
      this.#failed = true
      this.deactivate()
      this.#sink.onError(err)
    })
  }

  async #diff(): Promise<FileChange[]> {
    const current: FileSnapshot = new Map()
    for (const absPath of await collectFiles(this.#baseDir, this.#includeExtensions)) {
      const text = await readIfPresent(absPath)
      if (text === undefined) continue
      current.set(toRelPath(this.#baseDir, absPath), computeRevision(text))
    }

    const previous = this.#snapshot
    this.#snapshot = current
    if (!previous) return []

    const changes: FileChange[] = []
    for (const [path, revision] of current) {
      const oldRevision = previous.get(path)
      if (oldRevision === undefined) {
        changes.push({ path, changeKind: 'created', revision })
      } else if (oldRevision !== revision) {
        changes.push({ path, changeKind: 'modified', revision })
      }
    }
    for (const path of previous.keys()) {
      if (current.has(path)) continue
      changes.push({ path, changeKind: 'deleted', revision: undefined })
    }
    return changes
  }
}

export function fileWatchSource(config: FileWatchSourceConfig, sink: PushSink<FileChange>): PushSource {
  return new FileWatchSource(config, sink)
}
