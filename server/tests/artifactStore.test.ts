import assert from 'node:assert/strict'
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { after, before, describe, it } from 'node:test'
import { FileArtifactStore, InMemoryArtifactStore } from '../src/services/artifactStore'
import type { UnifiedTranscript } from '../src/models/Transcript'

const transcript: UnifiedTranscript = {
  metadata: { sourceFile: 'lecture.mp4', durationSec: 90, totalFramesExtracted: 1 },
  chapters: [
    {
      index: 0,
      start: 0,
      end: Infinity,
      timestampDisplay: '00:00',
      frame: { timestamp: 0, imagePath: '/frames/a.jpg', ocrText: 'Title' },
      frameImage: '/frames/a.jpg',
      ocrText: 'Title',
      speechSegments: [{ start: 1, end: 2, text: 'welcome' }],
      speechText: 'welcome',
      summary: '',
    },
  ],
  overallSummary: '',
}

describe('FileArtifactStore', () => {
  let root = ''
  let store: FileArtifactStore

  before(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'artifacts-'))
    store = new FileArtifactStore(root)
  })

  after(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('writes each stage to its own JSON file under the job directory', async () => {
    const ref = await store.save('job_a', 'extract_audio', { audioPath: '/tmp/a.wav', durationSec: 12.5 })
    assert.equal(ref, path.join(root, 'job_a', 'artifacts', 'extract_audio.json'))
    assert.deepEqual(JSON.parse(await readFile(ref, 'utf8')), { audioPath: '/tmp/a.wav', durationSec: 12.5 })
  })

  it('stores an open chapter end as null and reads it back as Infinity', async () => {
    const ref = await store.save('job_a', 'integrate', transcript)
    const raw = JSON.parse(await readFile(ref, 'utf8'))
    assert.equal(raw.chapters[0].end, null)
    const loaded = await store.load(ref, 'integrate')
    assert.equal(loaded.chapters[0].end, Infinity)
    assert.deepEqual(loaded, transcript)
  })

  it('refuses references outside its root', async () => {
    await assert.rejects(store.load('/etc/passwd', 'extract_audio'), /is outside/)
  })

  it('keeps job ids inside the root', () => {
    assert.equal(store.jobDir('../escape'), path.join(root, 'escape'))
  })

  it('removes a job directory', async () => {
    await store.save('job_b', 'generate_output', { documentPath: '/out/b.html' })
    await store.removeJob('job_b')
    await assert.rejects(stat(store.jobDir('job_b')), { code: 'ENOENT' })
  })
})

describe('InMemoryArtifactStore', () => {
  it('returns copies, not the saved object', async () => {
    const store = new InMemoryArtifactStore()
    const value = { frames: [{ timestamp: 0, imagePath: 'a.jpg' }] }
    const ref = await store.save('job_c', 'extract_frames', value)
    value.frames.push({ timestamp: 5, imagePath: 'b.jpg' })
    const loaded = await store.load(ref, 'extract_frames')
    assert.equal(loaded.frames.length, 1)
  })

  it('throws on a missing reference', async () => {
    const store = new InMemoryArtifactStore()
    await assert.rejects(store.load('job_x/ocr', 'ocr'), /Artifact job_x\/ocr \(ocr\) not found/)
  })

  it('drops every artifact of a removed job', async () => {
    const store = new InMemoryArtifactStore()
    const kept = await store.save('job_e', 'extract_audio', { audioPath: 'e.wav', durationSec: 1 })
    const removed = await store.save('job_d', 'extract_audio', { audioPath: 'd.wav', durationSec: 1 })
    await store.removeJob('job_d')
    assert.equal(store.has(removed), false)
    assert.equal(store.has(kept), true)
  })
})
