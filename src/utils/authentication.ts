import crypto from 'node:crypto'
import type { FastifyRequest } from 'fastify'
import env from '../config'
import { USER_ROLES } from '../types/user'
import type { AuthenticatedUser, UserRole } from '../types/user'

const BEARER_PREFIX = 'bearer '
const SCRYPT_KEY_LENGTH = 64

type TokenPayload = {
  sub?: unknown
  username?: unknown
  roles?: unknown
  exp?: unknown
  iat?: unknown
}

const encodeBase64Url = (value: string): string => Buffer.from(value, 'utf-8').toString('base64url')

const decodeBase64Url = (value: string): string => {
  const normalized = value.replace(/-/g, '+').replace(/_/g, '/')
  const paddingLength = normalized.length % 4
  const padded = paddingLength === 0 ? normalized : normalized.padEnd(normalized.length + (4 - paddingLength), '=')
  return Buffer.from(padded, 'base64').toString('utf-8')
}

const safeJsonParse = (value: string): unknown => {
  try {
    return JSON.parse(value)
  } catch {
    return null
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const sign = (data: string): string => crypto.createHmac('sha256', env.AUTH_SECRET).update(data).digest('base64url')

const coerceRoles = (roles: unknown): UserRole[] => {
  if (!Array.isArray(roles)) {
    return []
  }

  return USER_ROLES.filter((role) => roles.includes(role))
}

export const issueToken = (user: AuthenticatedUser, now: Date = new Date()): { token: string; expiresAt: Date } => {
  const iat = Math.floor(now.getTime() / 1000)
  const exp = iat + env.TOKEN_TTL_SECONDS
  const header = encodeBase64Url(JSON.stringify({ alg: 'HS256', typ: 'JWT' }))
  const payload = encodeBase64Url(
    JSON.stringify({ sub: String(user.id), username: user.username, roles: user.roles, iat, exp }),
  )

  return {
    token: `${header}.${payload}.${sign(`${header}.${payload}`)}`,
    expiresAt: new Date(exp * 1000),
  }
}

export const verifyToken = (token: string, now: Date = new Date()): AuthenticatedUser | null => {
  const segments = token.split('.')
  if (segments.length !== 3) {
    return null
  }

  const [encodedHeader, encodedPayload, encodedSignature] = segments

  const header = safeJsonParse(decodeBase64Url(encodedHeader))
  if (!isRecord(header) || header.alg !== 'HS256' || header.typ !== 'JWT') {
    return null
  }

  const providedSignatureBuffer = Buffer.from(encodedSignature, 'base64url')
  const expectedSignatureBuffer = Buffer.from(sign(`${encodedHeader}.${encodedPayload}`), 'base64url')

  if (
    providedSignatureBuffer.length === 0 ||
    providedSignatureBuffer.length !== expectedSignatureBuffer.length ||
    !crypto.timingSafeEqual(providedSignatureBuffer, expectedSignatureBuffer)
  ) {
    return null
  }

  const decoded = safeJsonParse(decodeBase64Url(encodedPayload))
  if (!isRecord(decoded)) {
    return null
  }

  const payload: TokenPayload = decoded
  if (typeof payload.username !== 'string' || typeof payload.sub !== 'string') {
    return null
  }

  if (typeof payload.exp !== 'number' || payload.exp < Math.floor(now.getTime() / 1000)) {
    return null
  }

  const id = Number(payload.sub)
  if (!Number.isInteger(id)) {
    return null
  }

  return {
    id,
    username: payload.username,
    roles: coerceRoles(payload.roles),
  }
}

export const extractUserFromRequest = (request: FastifyRequest): AuthenticatedUser | null => {
  const header = request.headers.authorization
  if (typeof header !== 'string' || !header.toLowerCase().startsWith(BEARER_PREFIX)) {
    return null
  }

  return verifyToken(header.slice(BEARER_PREFIX.length).trim())
}

export const hashPassword = (password: string): string => {
  const salt = crypto.randomBytes(16).toString('hex')
  const hash = crypto.scryptSync(password, salt, SCRYPT_KEY_LENGTH).toString('hex')
  return `scrypt$${salt}$${hash}`
}

export const verifyPassword = (password: string, stored: string): boolean => {
  const [scheme, salt, hash] = stored.split('$')
  if (scheme !== 'scrypt' || !salt || !hash) {
    return false
  }

  const expected = Buffer.from(hash, 'hex')
  const actual = crypto.scryptSync(password, salt, expected.length)
  return expected.length > 0 && crypto.timingSafeEqual(actual, expected)
}
