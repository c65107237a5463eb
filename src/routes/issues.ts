import type { FastifyPluginAsync } from 'fastify'
import { Type } from '@sinclair/typebox'
import type { Static } from '@sinclair/typebox'
import { issueResource } from '../resources'
import { IssueService } from '../services/issueService'
import { buildIssueResponse } from '../transformers/recordTransformer'
import { IdParams, IssueBody, IssueStatusSchema, IssueTypeSchema, PageQuerystring, StationTypeSchema } from './schemas'
import { registerTabularRoutes } from './tabular'

const IssueListQuery = Type.Object({
  ...PageQuerystring,
  issueStatus: Type.Optional(IssueStatusSchema),
  issueType: Type.Optional(IssueTypeSchema),
  stationType: Type.Optional(StationTypeSchema),
  lineId: Type.Optional(Type.Integer({ minimum: 1 })),
  outingId: Type.Optional(Type.Integer({ minimum: 1 })),
  search: Type.Optional(Type.String()),
})

const IssuePatch = Type.Partial(IssueBody)

type IdRoute = { Params: Static<typeof IdParams> }

const issuesRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get<{ Querystring: Static<typeof IssueListQuery> }>(
    '/',
    { schema: { querystring: IssueListQuery } },
    async (request) => {
      const result = await IssueService.list(request.user, request.query)
      return { items: result.items.map(buildIssueResponse), pagination: result.pagination }
    },
  )

  registerTabularRoutes(fastify, issueResource)

  fastify.get<IdRoute>('/:id', { schema: { params: IdParams } }, async (request) => {
    const issue = await IssueService.getIssueForUser(request.params.id, request.user)
    return { issue: buildIssueResponse(issue) }
  })

  fastify.post<{ Body: Static<typeof IssueBody> }>('/', { schema: { body: IssueBody } }, async (request, reply) => {
    const issue = await IssueService.create(request.user, request.body)
    return reply.code(201).send({ issue: buildIssueResponse(issue) })
  })

  fastify.patch<IdRoute & { Body: Static<typeof IssuePatch> }>(
    '/:id',
    { schema: { params: IdParams, body: IssuePatch } },
    async (request) => {
      const issue = await IssueService.update(request.user, request.params.id, request.body)
      return { issue: buildIssueResponse(issue) }
    },
  )

  fastify.delete<IdRoute>('/:id', { schema: { params: IdParams } }, async (request, reply) => {
    await IssueService.remove(request.user, request.params.id)
    return reply.code(204).send()
  })
}

export default issuesRoutes
