import ffmpeg, { type FfprobeData } from 'fluent-ffmpeg'
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg'
import ffprobeInstaller from '@ffprobe-installer/ffprobe'
import path from 'path'
import fs from 'fs'
import { PassThrough } from 'stream'
import { ExtractionError, errorMessage } from '../lib/errors'
import { getLogger, redactFilePath } from '../lib/logger'
import type { ExtractedFrame } from '../models/Transcript'
import { computeDifferenceHash, dedupeByHash, HASH_HEIGHT, HASH_WIDTH } from '../utils/frameHash'
import type { AudioExtraction, CallOptions, KeyframeOptions, MediaExtractor } from './collaborators'

const log = getLogger('worker')

// Explicit paths: use env in Docker (e.g. /usr/bin/ffmpeg) if the file exists, else npm installer
function resolveFfmpegPath(envPath: string | undefined, fallback: string): string {
  if (envPath && fs.existsSync(envPath)) return envPath
  return fallback
}
ffmpeg.setFfmpegPath(resolveFfmpegPath(process.env.FFMPEG_PATH, ffmpegInstaller.path))
ffmpeg.setFfprobePath(resolveFfmpegPath(process.env.FFPROBE_PATH, ffprobeInstaller.path))

/** FFmpeg thread count. */
const FFMPEG_THREADS = process.env.FFMPEG_THREADS || '4'

/** Kill a command that produced no output for this long. */
export const HUNG_COMMAND_MS = 90 * 1000

/** Fallback spacing when scene detection finds no cut. */
export const INTERVAL_FALLBACK_SEC = 30

function setupHungProtection(
  cmd: { kill: (signal: string) => unknown },
  reject: (err: Error) => void
): { clear: () => void; reset: () => void } {
  let hungTimer: NodeJS.Timeout | undefined
  const reset = () => {
    clearTimeout(hungTimer)
    hungTimer = setTimeout(() => {
      try {
        cmd.kill('SIGKILL')
      } catch (killErr) {
        log.warn({ msg: 'ffmpeg kill failed', err: killErr })
      }
      reject(new Error(`ffmpeg produced no output for ${HUNG_COMMAND_MS / 1000}s`))
    }, HUNG_COMMAND_MS)
  }
  const clear = () => clearTimeout(hungTimer)
  reset()
  return { clear, reset }
}

export function getMediaDuration(videoPath: string): Promise<number> {
  return new Promise((resolve, reject) => {
    if (!fs.existsSync(videoPath)) {
      reject(new Error(`Media file not found: ${redactFilePath(videoPath)}`))
      return
    }
    ffmpeg.ffprobe(videoPath, (err: Error | null, metadata: FfprobeData) => {
      if (err) {
        reject(new Error(`Failed to probe media: ${err.message}`))
        return
      }
      const duration = metadata?.format?.duration || 0
      if (duration === 0) {
        reject(new Error('Could not determine video duration from metadata'))
        return
      }
      resolve(duration)
    })
  })
}

/** Kills the command once `signal` aborts. Returns a function that detaches the listener. */
function killOnAbort(
  cmd: { kill: (signal: string) => unknown },
  signal: AbortSignal | undefined,
  reject: (err: Error) => void
): () => void {
  if (!signal) return () => undefined
  const onAbort = () => {
    try {
      cmd.kill('SIGKILL')
    } catch (killErr) {
      log.warn({ msg: 'ffmpeg kill failed', err: killErr })
    }
    reject(new Error('ffmpeg command aborted'))
  }
  signal.addEventListener('abort', onAbort, { once: true })
  return () => signal.removeEventListener('abort', onAbort)
}

/** 16 kHz mono signed 16-bit PCM WAV, the input format speech models expect. */
export function extractAudioTrack(videoPath: string, outputPath: string, signal?: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const cmd = ffmpeg(videoPath)
      .outputOptions(['-threads', FFMPEG_THREADS, '-vn', '-acodec', 'pcm_s16le', '-ar', '16000', '-ac', '1'])
      .on('progress', () => hung.reset())
      .on('end', () => {
        hung.clear()
        detach()
        resolve(outputPath)
      })
      .on('error', (err: Error) => {
        hung.clear()
        detach()
        reject(err)
      })
    const hung = setupHungProtection(cmd, reject)
    const detach = killOnAbort(cmd, signal, reject)
    cmd.save(outputPath)
  })
}

/**
 * Split an audio file into fixed-duration WAV chunks. Returns chunk paths in
 * order; the caller deletes them.
 */
export function splitAudioIntoChunks(
  audioPath: string,
  chunkDurationSec: number,
  outputDir: string,
  signal?: AbortSignal
): Promise<string[]> {
  return new Promise((resolve, reject) => {
    const pattern = path.join(outputDir, 'chunk_%03d.wav')
    const cmd = ffmpeg(audioPath)
      .outputOptions([
        '-f', 'segment',
        '-segment_time', String(chunkDurationSec),
        '-reset_timestamps', '1',
        '-c', 'copy',
        '-map', '0',
      ])
      .output(pattern)
      .on('end', () => {
        detach()
        const files = fs.readdirSync(outputDir)
          .filter((f) => f.startsWith('chunk_') && f.endsWith('.wav'))
          .sort()
        resolve(files.map((f) => path.join(outputDir, f)))
      })
      .on('error', (err: Error) => {
        detach()
        reject(err)
      })
    const detach = killOnAbort(cmd, signal, reject)
    cmd.run()
  })
}

/** `pts_time` values from ffmpeg showinfo stderr lines, in output order. */
export function parseShowinfoTimestamps(lines: string[]): number[] {
  const timestamps: number[] = []
  for (const line of lines) {
    if (!line.includes('Parsed_showinfo')) continue
    const match = /pts_time:\s*(\d+(?:\.\d+)?)/.exec(line)
    if (match) timestamps.push(parseFloat(match[1]))
  }
  return timestamps
}

export function intervalTimestamps(durationSec: number, intervalSec = INTERVAL_FALLBACK_SEC): number[] {
  const timestamps: number[] = []
  for (let t = 0; t < durationSec; t += intervalSec) timestamps.push(t)
  return timestamps
}

/** e.g. frame_00_03_25_0004.jpg for the fifth frame at 3:25. */
export function frameFileName(timestampSec: number, index: number): string {
  const total = Math.floor(timestampSec)
  const pad = (n: number, width = 2) => String(n).padStart(width, '0')
  const hms = `${pad(Math.floor(total / 3600))}_${pad(Math.floor((total % 3600) / 60))}_${pad(total % 60)}`
  return `frame_${hms}_${pad(index, 4)}.jpg`
}

export function detectSceneChanges(videoPath: string, threshold: number, signal?: AbortSignal): Promise<number[]> {
  return new Promise((resolve, reject) => {
    const stderrLines: string[] = []
    const cmd = ffmpeg(videoPath)
      .videoFilters(`select='gt(scene,${threshold})',showinfo`)
      .outputOptions(['-vsync', 'vfr', '-f', 'null'])
      .output('-')
      .on('stderr', (line: string) => {
        hung.reset()
        stderrLines.push(line)
      })
      .on('end', () => {
        hung.clear()
        detach()
        resolve(parseShowinfoTimestamps(stderrLines))
      })
      .on('error', (err: Error) => {
        hung.clear()
        detach()
        reject(err)
      })
    const hung = setupHungProtection(cmd, reject)
    const detach = killOnAbort(cmd, signal, reject)
    cmd.run()
  })
}

export function grabFrame(videoPath: string, timestampSec: number, outputPath: string, signal?: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const cmd = ffmpeg(videoPath)
      .seekInput(timestampSec)
      .outputOptions(['-frames:v', '1', '-q:v', '2'])
      .on('end', () => {
        detach()
        resolve(outputPath)
      })
      .on('error', (err: Error) => {
        detach()
        reject(err)
      })
    const detach = killOnAbort(cmd, signal, reject)
    cmd.save(outputPath)
  })
}

/** Raw 9x8 grayscale pixels of an image, the input of the difference hash. */
export function readHashPixels(imagePath: string): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    const output = new PassThrough()
    output.on('data', (chunk: Buffer) => chunks.push(chunk))
    output.on('end', () => resolve(new Uint8Array(Buffer.concat(chunks))))
    ffmpeg(imagePath)
      .outputOptions(['-vf', `scale=${HASH_WIDTH}:${HASH_HEIGHT},format=gray`, '-f', 'rawvideo', '-frames:v', '1'])
      .on('error', (err: Error) => reject(err))
      .pipe(output, { end: true })
  })
}

/**
 * Media extraction through ffmpeg: audio track, scene-change key frames with
 * an interval fallback, and near-duplicate removal by difference hash.
 */
export class FfmpegMediaExtractor implements MediaExtractor {
  async extractAudio(videoPath: string, outputDir: string, options: CallOptions = {}): Promise<AudioExtraction> {
    try {
      options.signal?.throwIfAborted()
      await fs.promises.mkdir(outputDir, { recursive: true })
      const durationSec = await getMediaDuration(videoPath)
      const audioPath = await extractAudioTrack(videoPath, path.join(outputDir, 'audio.wav'), options.signal)
      log.info({ msg: 'audio extracted', file: redactFilePath(videoPath), durationSec })
      return { audioPath, durationSec }
    } catch (err) {
      throw new ExtractionError(`Audio extraction failed: ${errorMessage(err)}`, 'extract_audio', { cause: err })
    }
  }

  async extractKeyframes(videoPath: string, outputDir: string, options: KeyframeOptions): Promise<ExtractedFrame[]> {
    try {
      const { signal } = options
      signal?.throwIfAborted()
      await fs.promises.mkdir(outputDir, { recursive: true })
      let timestamps = await detectSceneChanges(videoPath, options.sceneThreshold, signal)
      if (timestamps.length === 0) {
        log.warn({ msg: 'no scene changes detected, using interval extraction', intervalSec: INTERVAL_FALLBACK_SEC })
        timestamps = intervalTimestamps(await getMediaDuration(videoPath))
      }

      const frames: ExtractedFrame[] = []
      for (const [i, timestamp] of timestamps.entries()) {
        signal?.throwIfAborted()
        const imagePath = await grabFrame(videoPath, timestamp, path.join(outputDir, frameFileName(timestamp, i)), signal)
        frames.push({ timestamp, imagePath })
      }

      const hashes = new Map<string, bigint>()
      for (const frame of frames) {
        signal?.throwIfAborted()
        hashes.set(frame.imagePath, computeDifferenceHash(await readHashPixels(frame.imagePath)))
      }
      const { kept, dropped } = dedupeByHash(
        frames,
        (frame) => hashes.get(frame.imagePath) ?? 0n,
        options.similarityThreshold
      )
      await Promise.all(dropped.map((frame) => fs.promises.rm(frame.imagePath, { force: true })))
      log.info({ msg: 'keyframes deduplicated', extracted: frames.length, kept: kept.length })
      return kept
    } catch (err) {
      throw new ExtractionError(`Keyframe extraction failed: ${errorMessage(err)}`, 'extract_frames', { cause: err })
    }
  }
}
