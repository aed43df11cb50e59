import type { FastifyInstance, RegisterOptions } from 'fastify'

import { Route } from '@/structures'

export default class Health extends Route {
  constructor() {
    super({
      position: 4,
      path: '/health'
    })
  }

  routes(app: FastifyInstance, _options: RegisterOptions, done: (err?: Error) => void) {
    app.get('/', async (_req, reply) => {
      reply.header('Cache-Control', [
        'private',
        'max-age=0',
        'no-cache',
        'no-store',
        'must-revalidate'
      ].join(', '))

      reply.header('Expires', new Date(Date.now() - 1000).toUTCString())

      return {
        status: 'OK',
        latestCheck: Date.now()
      }
    })

    done()
  }
}
