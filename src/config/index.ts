import dotenv from 'dotenv'

dotenv.config()

type Env = {
  NODE_ENV: string
  PORT: number
  LOG_LEVEL: string
  DATABASE_URL: string
  AUTH_SECRET: string
  TOKEN_TTL_SECONDS: number
  RABBITMQ_URL?: string
}

const required = ['NODE_ENV', 'PORT', 'LOG_LEVEL', 'DATABASE_URL', 'AUTH_SECRET'] as const

const env: Env = {
  NODE_ENV: process.env.NODE_ENV ?? 'development',
  PORT: Number(process.env.PORT ?? 3001),
  LOG_LEVEL: process.env.LOG_LEVEL ?? 'info',
  DATABASE_URL: process.env.DATABASE_URL ?? '',
  AUTH_SECRET: process.env.AUTH_SECRET ?? '',
  TOKEN_TTL_SECONDS: Number(process.env.TOKEN_TTL_SECONDS ?? 12 * 60 * 60),
  RABBITMQ_URL: process.env.RABBITMQ_URL,
}

for (const key of required) {
  if (!env[key]) {
    throw new Error(`Missing required environment variable: ${key}`)
  }
}

if (!Number.isFinite(env.TOKEN_TTL_SECONDS) || env.TOKEN_TTL_SECONDS <= 0) {
  throw new Error(`Invalid TOKEN_TTL_SECONDS: ${process.env.TOKEN_TTL_SECONDS}`)
}

export default env
