import type { FastifyRequest } from 'fastify'
import type { Flash, FlashCategory } from '@/types'

export const flash = (req: FastifyRequest, category: FlashCategory, message: string): void => {
  req.session.flashes = [...(req.session.flashes ?? []), { category, message }]
}

// Errors raised before the session hook ran leave the request without a session.
export const consumeFlashes = (req: FastifyRequest): Flash[] => {
  const flashes = req.session?.flashes ?? []
  if (flashes.length > 0) req.session.flashes = []

  return flashes
}
