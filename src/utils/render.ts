import type { FastifyReply, FastifyRequest } from 'fastify'

import { consumeFlashes } from './flash'

/**
 * Renders a page from `views/`, handing it the session user and any pending
 * flash notifications.
 */
export const render = (req: FastifyRequest, reply: FastifyReply, page: string, data: Record<string, unknown> = {}) => {
  return reply.view(page, {
    user: req.user ?? null,
    flashes: consumeFlashes(req),
    ...data
  })
}
