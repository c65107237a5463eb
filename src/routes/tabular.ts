import type { FastifyInstance } from 'fastify'
import { Type } from '@sinclair/typebox'
import type { Static } from '@sinclair/typebox'
import { DELIMITERS } from '../lib/tabular'
import type { TabularResource } from '../resources'
import { TabularService } from '../services/tabularService'

export const TSV_CONTENT_TYPE = 'text/tab-separated-values'
export const CSV_CONTENT_TYPE = 'text/csv'

const ExportQuery = Type.Object({
  format: Type.Optional(Type.Union([Type.Literal('csv'), Type.Literal('tsv')])),
})

const ImportQuery = Type.Object({
  dryRun: Type.Optional(Type.Boolean()),
})

/** Adds `GET /export` and `POST /import` for one tabular resource under the caller's prefix. */
export const registerTabularRoutes = <T>(fastify: FastifyInstance, resource: TabularResource<T>) => {
  fastify.get<{ Querystring: Static<typeof ExportQuery> }>(
    '/export',
    { schema: { querystring: ExportQuery } },
    async (request, reply) => {
      const format = request.query.format ?? 'csv'
      const text = await TabularService.exportTable(
        request.user,
        resource,
        format === 'tsv' ? DELIMITERS.tab : DELIMITERS.comma,
      )

      return reply
        .header('Content-Type', `${format === 'tsv' ? TSV_CONTENT_TYPE : CSV_CONTENT_TYPE}; charset=utf-8`)
        .header('Content-Disposition', `attachment; filename="${resource.name}.${format}"`)
        .send(text)
    },
  )

  fastify.post<{ Querystring: Static<typeof ImportQuery>; Body: string }>(
    '/import',
    { schema: { querystring: ImportQuery } },
    async (request) => {
      if (typeof request.body !== 'string') {
        throw fastify.httpErrors.unsupportedMediaType(`Send the table as ${CSV_CONTENT_TYPE} or ${TSV_CONTENT_TYPE}.`)
      }

      const delimiter = request.headers['content-type']?.startsWith(TSV_CONTENT_TYPE) ? DELIMITERS.tab : DELIMITERS.comma
      return TabularService.importTable(request.user, resource, request.body, delimiter, request.query.dryRun ?? false)
    },
  )
}
