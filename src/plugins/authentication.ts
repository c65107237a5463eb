import fp from 'fastify-plugin'
import type { FastifyPluginCallback } from 'fastify'
import { extractUserFromRequest } from '../utils/authentication'

const authenticationPlugin: FastifyPluginCallback = (fastify, _opts, done) => {
  fastify.decorateRequest('user', null)

  fastify.addHook('preHandler', async (request) => {
    if (request.routeOptions.config.public) {
      return
    }

    const user = extractUserFromRequest(request)
    if (!user) {
      throw fastify.httpErrors.unauthorized('Missing or invalid bearer token')
    }

    request.user = user
  })

  done()
}

export default fp(authenticationPlugin)
