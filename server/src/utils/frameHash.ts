/**
 * Difference hash (dHash) for near-duplicate slide detection. A frame is
 * scaled to 9x8 grayscale; each of the 64 bits says whether a pixel is
 * brighter than its right neighbour.
 */

export const HASH_WIDTH = 9
export const HASH_HEIGHT = 8

export function computeDifferenceHash(pixels: Uint8Array): bigint {
  if (pixels.length < HASH_WIDTH * HASH_HEIGHT) {
    throw new Error(`Expected ${HASH_WIDTH * HASH_HEIGHT} grayscale pixels, got ${pixels.length}`)
  }
  let hash = 0n
  for (let y = 0; y < HASH_HEIGHT; y++) {
    for (let x = 0; x < HASH_WIDTH - 1; x++) {
      const left = pixels[y * HASH_WIDTH + x]
      const right = pixels[y * HASH_WIDTH + x + 1]
      hash = (hash << 1n) | (left > right ? 1n : 0n)
    }
  }
  return hash
}

export function hammingDistance(a: bigint, b: bigint): number {
  let diff = a ^ b
  let count = 0
  while (diff > 0n) {
    count += Number(diff & 1n)
    diff >>= 1n
  }
  return count
}

export interface DedupeResult<T> {
  kept: T[]
  dropped: T[]
}

/**
 * Keeps an item unless its hash is within `threshold` (exclusive) of the last
 * kept item. Comparing against the last kept item, not every kept one, lets a
 * slide that reappears later in the talk start a new chapter.
 */
export function dedupeByHash<T>(items: T[], hashOf: (item: T) => bigint, threshold: number): DedupeResult<T> {
  const kept: T[] = []
  const dropped: T[] = []
  let lastHash: bigint | undefined
  for (const item of items) {
    const hash = hashOf(item)
    if (lastHash !== undefined && hammingDistance(hash, lastHash) < threshold) {
      dropped.push(item)
      continue
    }
    kept.push(item)
    lastHash = hash
  }
  return { kept, dropped }
}
