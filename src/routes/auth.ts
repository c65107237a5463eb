import type { FastifyPluginAsync } from 'fastify'
import { Type } from '@sinclair/typebox'
import type { Static } from '@sinclair/typebox'
import { AuthService } from '../services/authService'

const LoginBody = Type.Object({
  username: Type.Optional(Type.String()),
  password: Type.Optional(Type.String()),
})

const authRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.post<{ Body: Static<typeof LoginBody> }>(
    '/login',
    { schema: { body: LoginBody }, config: { public: true } },
    async (request) => AuthService.login(request.body, request.ip),
  )

  fastify.post('/logout', async (request, reply) => {
    await AuthService.logout(request.user, request.ip)
    return reply.code(204).send()
  })
}

export default authRoutes
