import fs from 'fs'
import { copyFile, mkdir, readdir, rename, stat, unlink } from 'fs/promises'
import path from 'path'
import { errorMessage } from '../lib/errors'
import { getLogger, redactFilePath } from '../lib/logger'
import { createJobId } from '../models/jobStateMachine'
import type { ArtifactStore } from '../services/artifactStore'
import { sanitizeFilename } from '../utils/sanitizeFilename'
import type { SubmitInput } from './pipelineScheduler'

const log = getLogger('watcher')

export const SUPPORTED_VIDEO_EXTENSIONS = new Set(['.mp4', '.mov', '.avi', '.mkv', '.webm'])

export function isSupportedVideo(fileName: string): boolean {
  return SUPPORTED_VIDEO_EXTENSIONS.has(path.extname(fileName).toLowerCase())
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export interface InboxWatcherOptions {
  inputDir: string
  submit: (input: SubmitInput) => Promise<string>
  artifacts: Pick<ArtifactStore, 'jobDir'>
  ownerId?: string
  /** Consecutive equal size readings before a file counts as fully written. */
  stableChecks?: number
  checkIntervalMs?: number
  readyTimeoutMs?: number
}

/**
 * Submits videos dropped into the input folder. Each file is moved into its
 * job's directory before submission, so the inbox only holds unclaimed files.
 */
export class InboxWatcher {
  private readonly inputDir: string
  private readonly submit: (input: SubmitInput) => Promise<string>
  private readonly artifacts: Pick<ArtifactStore, 'jobDir'>
  private readonly ownerId: string
  private readonly stableChecks: number
  private readonly checkIntervalMs: number
  private readonly readyTimeoutMs: number
  private readonly inFlight = new Set<string>()
  private watcher: fs.FSWatcher | undefined

  constructor(options: InboxWatcherOptions) {
    this.inputDir = options.inputDir
    this.submit = options.submit
    this.artifacts = options.artifacts
    this.ownerId = options.ownerId ?? 'inbox'
    this.stableChecks = options.stableChecks ?? 3
    this.checkIntervalMs = options.checkIntervalMs ?? 1000
    this.readyTimeoutMs = options.readyTimeoutMs ?? 60_000
  }

  /** Picks up files already waiting, then watches for new ones. */
  async start(): Promise<void> {
    await mkdir(this.inputDir, { recursive: true })
    this.watcher = fs.watch(this.inputDir, (_event, fileName) => {
      if (fileName) this.schedule(fileName.toString())
    })
    this.watcher.on('error', (err) => log.error({ msg: 'inbox watch failed', err }))
    for (const fileName of await readdir(this.inputDir)) this.schedule(fileName)
    log.info({ msg: 'watching inbox', dir: this.inputDir })
  }

  stop(): void {
    this.watcher?.close()
    this.watcher = undefined
  }

  private schedule(fileName: string): void {
    if (!isSupportedVideo(fileName) || this.inFlight.has(fileName)) return
    this.inFlight.add(fileName)
    this.handleFile(fileName)
      .catch((err: unknown) => log.error({ msg: 'inbox file failed', file: fileName, reason: errorMessage(err) }))
      .finally(() => this.inFlight.delete(fileName))
  }

  /** Returns the new job id, or undefined when the file vanished or never settled. */
  async handleFile(fileName: string): Promise<string | undefined> {
    const source = path.join(this.inputDir, fileName)
    if (!(await this.waitUntilStable(source))) {
      log.warn({ msg: 'file not ready, skipping', file: fileName })
      return undefined
    }

    const jobId = createJobId()
    const jobDir = this.artifacts.jobDir(jobId)
    await mkdir(jobDir, { recursive: true })
    const destination = path.join(jobDir, sanitizeFilename(fileName, 'video'))
    await moveFile(source, destination)
    log.info({ msg: 'video claimed', jobId, file: redactFilePath(source) })

    return this.submit({ jobId, videoPath: destination, sourceName: fileName, ownerId: this.ownerId })
  }

  private async waitUntilStable(filePath: string): Promise<boolean> {
    const deadline = Date.now() + this.readyTimeoutMs
    let lastSize = -1
    let stable = 0
    while (Date.now() < deadline) {
      let size: number
      try {
        const info = await stat(filePath)
        if (!info.isFile()) return false
        size = info.size
      } catch {
        return false
      }
      if (size === lastSize && size > 0) {
        stable += 1
        if (stable >= this.stableChecks) return true
      } else {
        stable = 0
        lastSize = size
      }
      await sleep(this.checkIntervalMs)
    }
    return false
  }
}

/** rename, falling back to copy + unlink across devices. */
export async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination)
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'EXDEV') {
      await copyFile(source, destination)
      await unlink(source)
      return
    }
    throw err
  }
}
