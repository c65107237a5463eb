import type { FastifyPluginAsync } from 'fastify'
import { Type } from '@sinclair/typebox'
import type { Static } from '@sinclair/typebox'
import { teamMemberResource } from '../resources'
import { TeamMemberService } from '../services/teamMemberService'
import { buildTeamMemberResponse } from '../transformers/recordTransformer'
import { IdParams, PageQuerystring, TeamMemberBody } from './schemas'
import { registerTabularRoutes } from './tabular'

const TeamMemberListQuery = Type.Object({
  ...PageQuerystring,
  search: Type.Optional(Type.String()),
  available: Type.Optional(Type.Boolean()),
})

const TeamMemberPatch = Type.Partial(TeamMemberBody)

type IdRoute = { Params: Static<typeof IdParams> }

const teamMembersRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get<{ Querystring: Static<typeof TeamMemberListQuery> }>(
    '/',
    { schema: { querystring: TeamMemberListQuery } },
    async (request) => {
      const result = await TeamMemberService.list(request.user, request.query)
      return { items: result.items.map(buildTeamMemberResponse), pagination: result.pagination }
    },
  )

  registerTabularRoutes(fastify, teamMemberResource)

  fastify.get<IdRoute>('/:id', { schema: { params: IdParams } }, async (request) => {
    const member = await TeamMemberService.getTeamMemberForUser(request.params.id, request.user)
    return { teamMember: buildTeamMemberResponse(member) }
  })

  fastify.post<{ Body: Static<typeof TeamMemberBody> }>(
    '/',
    { schema: { body: TeamMemberBody } },
    async (request, reply) => {
      const member = await TeamMemberService.create(request.user, request.body)
      return reply.code(201).send({ teamMember: buildTeamMemberResponse(member) })
    },
  )

  fastify.patch<IdRoute & { Body: Static<typeof TeamMemberPatch> }>(
    '/:id',
    { schema: { params: IdParams, body: TeamMemberPatch } },
    async (request) => {
      const member = await TeamMemberService.update(request.user, request.params.id, request.body)
      return { teamMember: buildTeamMemberResponse(member) }
    },
  )

  fastify.delete<IdRoute>('/:id', { schema: { params: IdParams } }, async (request, reply) => {
    await TeamMemberService.remove(request.user, request.params.id)
    return reply.code(204).send()
  })
}

export default teamMembersRoutes
