import Redis from 'ioredis'
import { getLogger } from '../lib/logger'

const log = getLogger('pipeline')

/**
 * Create a Redis client for the job store. Works with both:
 * - Self-hosted Redis: redis://host:6379 (or redis://redis:6379 in Docker)
 * - Managed TLS endpoints: rediss://...
 */
export function createRedisClient(redisUrl: string): Redis {
  const tls = redisUrl.startsWith('rediss://')
  log.info({ msg: 'connecting to redis', transport: tls ? 'tls' : 'tcp' })
  const client = new Redis(redisUrl, {
    ...(tls ? { tls: {} } : {}),
    enableReadyCheck: !tls,
    maxRetriesPerRequest: 3,
  })
  client.on('error', (err: Error) => log.error({ msg: 'redis error', err }))
  return client
}
