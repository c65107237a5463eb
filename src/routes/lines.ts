import type { FastifyPluginAsync } from 'fastify'
import { Type } from '@sinclair/typebox'
import type { Static } from '@sinclair/typebox'
import { toDelimitedText } from '../lib/tabular'
import { lineResource } from '../resources'
import { IssueService } from '../services/issueService'
import { LINE_ORDERINGS, LineService } from '../services/lineService'
import type { LineOrdering } from '../services/lineService'
import { ReportService } from '../services/reportService'
import {
  COMPLETION_REPORT_HEADERS,
  buildCompletionReportResponse,
  buildIssueResponse,
  buildLineDetailResponse,
  buildLineResponse,
  completionReportCsvRows,
} from '../transformers/recordTransformer'
import { IdParams, InlineIssueBody, LineBody, LineTypeSchema, PageQuerystring } from './schemas'
import { CSV_CONTENT_TYPE, registerTabularRoutes } from './tabular'

const LineListQuery = Type.Object({
  ...PageQuerystring,
  lineType: Type.Optional(LineTypeSchema),
  search: Type.Optional(Type.String()),
  ordering: Type.Optional(Type.Unsafe<LineOrdering>({ type: 'string', enum: [...LINE_ORDERINGS] })),
})

const CompletionReportQuery = Type.Object({
  sort: Type.Optional(Type.String()),
  order: Type.Optional(Type.String()),
  format: Type.Optional(Type.Literal('csv')),
})

const LinePatch = Type.Partial(LineBody)

type IdRoute = { Params: Static<typeof IdParams> }

const linesRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get<{ Querystring: Static<typeof LineListQuery> }>(
    '/',
    { schema: { querystring: LineListQuery } },
    async (request) => {
      const result = await LineService.list(request.user, request.query)
      return { items: result.items.map(buildLineResponse), pagination: result.pagination }
    },
  )

  fastify.get<{ Querystring: Static<typeof CompletionReportQuery> }>(
    '/completion-report',
    { schema: { querystring: CompletionReportQuery } },
    async (request, reply) => {
      const report = await ReportService.completionReport(request.user, request.query.sort, request.query.order)

      if (request.query.format !== 'csv') {
        return buildCompletionReportResponse(report)
      }

      return reply
        .header('Content-Type', `${CSV_CONTENT_TYPE}; charset=utf-8`)
        .header('Content-Disposition', 'attachment; filename="completion_report.csv"')
        .send(toDelimitedText(COMPLETION_REPORT_HEADERS, completionReportCsvRows(report)))
    },
  )

  registerTabularRoutes(fastify, lineResource)

  fastify.get<IdRoute>('/:id', { schema: { params: IdParams } }, async (request) => {
    const line = await LineService.getLineForUser(request.params.id, request.user)
    return { line: buildLineDetailResponse(line) }
  })

  fastify.post<{ Body: Static<typeof LineBody> }>('/', { schema: { body: LineBody } }, async (request, reply) => {
    const line = await LineService.create(request.user, request.body)
    return reply.code(201).send({ line: buildLineResponse(line) })
  })

  fastify.patch<IdRoute & { Body: Static<typeof LinePatch> }>(
    '/:id',
    { schema: { params: IdParams, body: LinePatch } },
    async (request) => {
      const line = await LineService.update(request.user, request.params.id, request.body)
      return { line: buildLineResponse(line) }
    },
  )

  fastify.delete<IdRoute>('/:id', { schema: { params: IdParams } }, async (request, reply) => {
    await LineService.remove(request.user, request.params.id)
    return reply.code(204).send()
  })

  fastify.post<IdRoute & { Body: Static<typeof InlineIssueBody> }>(
    '/:id/issues',
    { schema: { params: IdParams, body: InlineIssueBody } },
    async (request, reply) => {
      const line = await LineService.getLineOrThrow(request.params.id)
      const issue = await IssueService.create(request.user, { ...request.body, lineId: line.id })
      return reply.code(201).send({ issue: buildIssueResponse(issue) })
    },
  )
}

export default linesRoutes
