import type { FastifyPluginAsync } from 'fastify'
import { Type } from '@sinclair/typebox'
import type { Static } from '@sinclair/typebox'
import { AuditService } from '../services/auditService'
import { buildAuditResponse } from '../transformers/recordTransformer'
import { AuditActionSchema, PageQuerystring } from './schemas'

const AuditListQuery = Type.Object({
  ...PageQuerystring,
  action: Type.Optional(AuditActionSchema),
  username: Type.Optional(Type.String()),
})

const auditsRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get<{ Querystring: Static<typeof AuditListQuery> }>(
    '/',
    { schema: { querystring: AuditListQuery } },
    async (request) => {
      const result = await AuditService.list(request.user, request.query)
      return { items: result.items.map(buildAuditResponse), pagination: result.pagination }
    },
  )

  // The audit log is append-only through the login signals.
  fastify.route({
    method: ['POST', 'PUT', 'PATCH', 'DELETE'],
    url: '/',
    handler: async () => {
      throw fastify.httpErrors.methodNotAllowed('Audit records are read-only.')
    },
  })

  fastify.route({
    method: ['PUT', 'PATCH', 'DELETE'],
    url: '/:id',
    handler: async () => {
      throw fastify.httpErrors.methodNotAllowed('Audit records are read-only.')
    },
  })
}

export default auditsRoutes
