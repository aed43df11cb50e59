import 'dotenv/config'

import type { LogType } from 'consola'

import { dirname, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { ConfigError } from '@/utils'

const __dirname = dirname(fileURLToPath(import.meta.url))

const LOG_LEVELS: LogType[] = ['silent', 'error', 'warn', 'info', 'debug']

export interface Config {
  readonly environment: string
  readonly port: number
  readonly host: string
  readonly secret: string
  readonly mongo: {
    readonly uri: string
    readonly database: string
  }
  readonly storageDir: string
  readonly publicUrl: string | null
  readonly janitorInterval: string
  readonly rateLimitMax: number
  readonly logLevel: LogType
}

const positiveInteger = (name: string, value: string | undefined, fallback: number) => {
  if (!value) return fallback

  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) throw new ConfigError(`${name} must be a positive integer, got "${value}"`)

  return parsed
}

const logLevel = (value: string | undefined): LogType => {
  const level = LOG_LEVELS.find((entry) => entry === value)
  if (value && !level) throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`)

  return level ?? 'info'
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  if (env.NODE_ENV === 'production' && !env.SECRET_KEY) throw new ConfigError('SECRET_KEY must be set in production')

  const secret = env.SECRET_KEY || 'dev-secret-key-change-this-before-deploying'
  if (secret.length < 32) throw new ConfigError('SECRET_KEY must be at least 32 characters long')

  return Object.freeze({
    environment: env.NODE_ENV || 'development',
    port: positiveInteger('PORT', env.PORT, 5000),
    host: env.HOST || '0.0.0.0',
    secret,
    mongo: {
      uri: env.MONGO_URI || 'mongodb://127.0.0.1:27017',
      database: env.MONGO_DATABASE || 'snapalbum'
    },
    storageDir: env.STORAGE_DIR ? resolve(env.STORAGE_DIR) : join(__dirname, '..', 'static'),
    publicUrl: env.PUBLIC_URL ? env.PUBLIC_URL.replace(/\/+$/, '') : null,
    janitorInterval: env.JANITOR_INTERVAL || '0 3 * * *',
    rateLimitMax: positiveInteger('RATE_LIMIT_MAX', env.RATE_LIMIT_MAX, 100),
    logLevel: logLevel(env.LOG_LEVEL)
  })
}
