import type { FastifyPluginAsync } from 'fastify'
import { Type } from '@sinclair/typebox'
import type { Static } from '@sinclair/typebox'
import { outingResource } from '../resources'
import { OutingService } from '../services/outingService'
import { buildIssueResponse, buildOutingResponse } from '../transformers/recordTransformer'
import { CompletionStatusSchema, IdParams, IsoDate, OutingBody, OutingIssueBody, PageQuerystring } from './schemas'
import { registerTabularRoutes } from './tabular'

const OutingListQuery = Type.Object({
  ...PageQuerystring,
  dateFrom: Type.Optional(IsoDate),
  dateTo: Type.Optional(IsoDate),
  lineId: Type.Optional(Type.Integer({ minimum: 1 })),
  completionStatus: Type.Optional(CompletionStatusSchema),
})

const OutingPatch = Type.Partial(OutingBody)

type IdRoute = { Params: Static<typeof IdParams> }

const outingsRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get<{ Querystring: Static<typeof OutingListQuery> }>(
    '/',
    { schema: { querystring: OutingListQuery } },
    async (request) => {
      const result = await OutingService.list(request.user, request.query)
      return { items: result.items.map(buildOutingResponse), pagination: result.pagination }
    },
  )

  registerTabularRoutes(fastify, outingResource)

  fastify.get<IdRoute>('/:id', { schema: { params: IdParams } }, async (request) => {
    const outing = await OutingService.getOutingForUser(request.params.id, request.user)
    return { outing: buildOutingResponse(outing) }
  })

  fastify.post<{ Body: Static<typeof OutingBody> }>('/', { schema: { body: OutingBody } }, async (request, reply) => {
    const outing = await OutingService.create(request.user, request.body)
    return reply.code(201).send({ outing: buildOutingResponse(outing) })
  })

  fastify.patch<IdRoute & { Body: Static<typeof OutingPatch> }>(
    '/:id',
    { schema: { params: IdParams, body: OutingPatch } },
    async (request) => {
      const outing = await OutingService.update(request.user, request.params.id, request.body)
      return { outing: buildOutingResponse(outing) }
    },
  )

  fastify.delete<IdRoute>('/:id', { schema: { params: IdParams } }, async (request, reply) => {
    await OutingService.remove(request.user, request.params.id)
    return reply.code(204).send()
  })

  fastify.post<IdRoute & { Body: Static<typeof OutingIssueBody> }>(
    '/:id/issues',
    { schema: { params: IdParams, body: OutingIssueBody } },
    async (request, reply) => {
      const issue = await OutingService.createIssue(request.user, request.params.id, request.body)
      return reply.code(201).send({ issue: buildIssueResponse(issue) })
    },
  )
}

export default outingsRoutes
