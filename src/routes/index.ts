import type { FastifyInstance } from 'fastify'
import auditsRoutes from './audits'
import authRoutes from './auth'
import issuesRoutes from './issues'
import linesRoutes from './lines'
import outingsRoutes from './outings'
import teamMembersRoutes from './teamMembers'

const registerRoutes = async (app: FastifyInstance) => {
  app.register(authRoutes, { prefix: '/api/auth' })
  app.register(linesRoutes, { prefix: '/api/lines' })
  app.register(teamMembersRoutes, { prefix: '/api/team-members' })
  app.register(outingsRoutes, { prefix: '/api/outings' })
  app.register(issuesRoutes, { prefix: '/api/issues' })
  app.register(auditsRoutes, { prefix: '/api/audits' })
}

export default registerRoutes
