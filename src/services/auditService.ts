import { count, desc, eq } from 'drizzle-orm'
import db from '../lib/db'
import logger from '../lib/logger'
import { allOf } from '../db/filters'
import { audits } from '../db/schema'
import eventPublisher from '../events/eventPublisher'
import { userLoggedIn, userLoggedOut, userLoginFailed } from '../events/signals'
import type { AuthSignalPayload } from '../events/signals'
import type { Audit } from '../types/database'
import type { AuditAction } from '../types/models'
import type { AuthenticatedUser } from '../types/user'
import { canViewAudit } from '../utils/authorization'
import { forbidden } from '../utils/errors'
import { paginate, resolvePage } from '../utils/pagination'
import type { PageQuery, Paginated } from '../utils/pagination'

export interface AuditQuery extends PageQuery {
  action?: AuditAction
  username?: string
}

export const AuditService = {
  async record(action: AuditAction, payload: AuthSignalPayload): Promise<Audit> {
    const [audit] = db
      .insert(audits)
      .values({
        action,
        ip: payload.ip,
        username: payload.username,
        when: new Date(),
      })
      .returning()
      .all()

    logger.info({ action, username: audit.username, ip: audit.ip }, 'Recorded login activity')

    await eventPublisher.publish({
      name: 'audit.recorded',
      payload: {
        id: audit.id,
        action: audit.action,
        username: audit.username,
        ip: audit.ip,
        when: audit.when.toISOString(),
      },
    })

    return audit
  },

  async list(user: AuthenticatedUser, query: AuditQuery): Promise<Paginated<Audit>> {
    if (!canViewAudit(user)) {
      throw forbidden()
    }

    const page = resolvePage(query)
    const where = allOf([
      query.action ? eq(audits.action, query.action) : undefined,
      query.username ? eq(audits.username, query.username) : undefined,
    ])

    const total = db.select({ total: count() }).from(audits).where(where).get()?.total ?? 0
    const items = db
      .select()
      .from(audits)
      .where(where)
      .orderBy(desc(audits.when), desc(audits.id))
      .limit(page.limit)
      .offset(page.offset)
      .all()

    return paginate(items, total, page)
  },
}

/** Connects the audit receivers to the authentication signals; returns a disconnect function. */
export const registerAuditReceivers = (): (() => void) => {
  const disconnects = [
    userLoggedIn.connect(async (payload) => {
      await AuditService.record('Login', payload)
    }),
    userLoggedOut.connect(async (payload) => {
      await AuditService.record('Logout', payload)
    }),
    userLoginFailed.connect(async (payload) => {
      await AuditService.record('LoginFailed', payload)
    }),
  ]

  return () => {
    for (const disconnect of disconnects) {
      disconnect()
    }
  }
}
