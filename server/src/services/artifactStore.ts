import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises'
import path from 'path'
import type { StageName } from '../models/Job'
import { parseArtifact, serializeArtifact, type ArtifactOf } from '../models/artifacts'
import { assertPathWithinDir } from '../utils/assertPathWithinDir'
import { sanitizeFilename } from '../utils/sanitizeFilename'

/**
 * Durable per-stage outputs. `save` resolves only once the artifact is fully
 * written, so a reference handed to the job record always points at a complete
 * value.
 */
export interface ArtifactStore {
  save<S extends StageName>(jobId: string, stage: S, value: ArtifactOf<S>): Promise<string>
  load<S extends StageName>(ref: string, stage: S): Promise<ArtifactOf<S>>
  /** Scratch directory for collaborator outputs (audio, frames, document). */
  jobDir(jobId: string): string
  removeJob(jobId: string): Promise<void>
}

export class FileArtifactStore implements ArtifactStore {
  constructor(private readonly root: string) {}

  jobDir(jobId: string): string {
    return path.join(this.root, sanitizeFilename(jobId))
  }

  async save<S extends StageName>(jobId: string, stage: S, value: ArtifactOf<S>): Promise<string> {
    const dir = path.join(this.jobDir(jobId), 'artifacts')
    await mkdir(dir, { recursive: true })
    const filePath = path.join(dir, `${stage}.json`)
    const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`
    await writeFile(tmpPath, serializeArtifact(value), 'utf8')
    await rename(tmpPath, filePath)
    return filePath
  }

  async load<S extends StageName>(ref: string, _stage: S): Promise<ArtifactOf<S>> {
    assertPathWithinDir(this.root, ref)
    const raw = await readFile(ref, 'utf8')
    return parseArtifact<S>(raw)
  }

  async removeJob(jobId: string): Promise<void> {
    await rm(this.jobDir(jobId), { recursive: true, force: true })
  }
}

/** Keeps serialized copies so loads never share objects with the writer. */
export class InMemoryArtifactStore implements ArtifactStore {
  private readonly values = new Map<string, string>()

  constructor(private readonly root = 'memory') {}

  jobDir(jobId: string): string {
    return path.join(this.root, sanitizeFilename(jobId))
  }

  async save<S extends StageName>(jobId: string, stage: S, value: ArtifactOf<S>): Promise<string> {
    const ref = `${jobId}/${stage}`
    this.values.set(ref, serializeArtifact(value))
    return ref
  }

  async load<S extends StageName>(ref: string, stage: S): Promise<ArtifactOf<S>> {
    const raw = this.values.get(ref)
    if (raw === undefined) {
      throw new Error(`Artifact ${ref} (${stage}) not found`)
    }
    return parseArtifact<S>(raw)
  }

  async removeJob(jobId: string): Promise<void> {
    for (const ref of [...this.values.keys()]) {
      if (ref.startsWith(`${jobId}/`)) this.values.delete(ref)
    }
  }

  has(ref: string): boolean {
    return this.values.has(ref)
  }
}
