import type { FastifyInstance, RegisterOptions } from 'fastify'

import { Route } from '@/structures'
import { NotFoundError, flash } from '@/utils'

interface IParams {
  id: string
}

export default class QRCodes extends Route {
  constructor() {
    super({
      position: 3,
      path: '/qr'
    })
  }

  routes(app: FastifyInstance, _options: RegisterOptions, done: (err?: Error) => void) {
    app.get<{
      Params: IParams
    }>('/download/:id', {
      schema: {
        params: {
          type: 'object',
          properties: {
            id: { type: 'string', maxLength: 100 }
          }
        }
      }
    }, async (req, reply) => {
      try {
        const { path, filename } = await app.gallery.qrCode(req.params.id)

        return reply.download(path, filename)
      } catch (error) {
        if (!(error instanceof NotFoundError && error.resource === 'qr')) throw error

        flash(req, 'warning', error.message)
        return reply.redirect('/dashboard')
      }
    })

    done()
  }
}
