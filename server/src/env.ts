/**
 * Load env before anything reads process.env at import time (logger, Sentry, ffmpeg).
 * Must be the first import in index.ts.
 */
import 'dotenv/config'
import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'

// Project root .env (used by docker-compose); try cwd then __dirname so it works regardless of how the process is started
const rootEnvCwd = path.join(process.cwd(), '..', '.env')
const rootEnvDir = path.join(__dirname, '..', '..', '.env')
const rootEnv = fs.existsSync(rootEnvCwd) ? rootEnvCwd : fs.existsSync(rootEnvDir) ? rootEnvDir : null
if (rootEnv) {
  dotenv.config({ path: rootEnv, override: false })
}

// Outside Docker, redis://redis:6379 won't resolve; use localhost.
const inDocker = fs.existsSync('/.dockerenv')
if (process.env.REDIS_URL === 'redis://redis:6379' && !inDocker) {
  process.env.REDIS_URL = 'redis://localhost:6379'
}
