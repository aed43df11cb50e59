import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'

export default async function (this: FastifyInstance, req: FastifyRequest, reply: FastifyReply) {
  const userId = req.session.userId
  if (!userId) {
    return reply.redirect('/login')
  }

  const user = await this.accounts.getUser(userId)
  if (!user) {
    req.session.userId = undefined
    return reply.redirect('/login')
  }

  req.user = user
}
