import { eq } from 'drizzle-orm'
import db from '../lib/db'
import { users } from '../db/schema'
import type { User } from '../types/database'
import type { UserRole } from '../types/user'
import { hashPassword } from '../utils/authentication'
import { badRequest, serviceError } from '../utils/errors'
import { normalizeUsername } from '../utils/strings'

const MIN_PASSWORD_LENGTH = 8

export const UserService = {
  async findByUsername(username: string): Promise<User | null> {
    const normalized = normalizeUsername(username)
    if (!normalized) {
      return null
    }
    return db.select().from(users).where(eq(users.username, normalized)).get() ?? null
  },

  async create(payload: { username: string; password: string; roles: UserRole[] }): Promise<User> {
    const username = normalizeUsername(payload.username)
    if (!username) {
      throw badRequest('A username is required.')
    }

    if (payload.password.length < MIN_PASSWORD_LENGTH) {
      throw badRequest(`Passwords must be at least ${MIN_PASSWORD_LENGTH} characters long.`)
    }

    if (payload.roles.length === 0) {
      throw badRequest('At least one role is required.')
    }

    if (await this.findByUsername(username)) {
      throw serviceError(409, `User ${username} already exists.`)
    }

    const [created] = db
      .insert(users)
      .values({
        username,
        passwordHash: hashPassword(payload.password),
        roles: [...new Set(payload.roles)],
        active: true,
        createdAt: new Date(),
      })
      .returning()
      .all()
    return created
  },
}
