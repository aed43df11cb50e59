import type { FastifyInstance, RegisterOptions } from 'fastify'

import dayjs from 'dayjs'
import { Route } from '@/structures'
import { render } from '@/utils'

export default class Dashboard extends Route {
  constructor() {
    super({
      position: 2,
      path: '/dashboard',
      middlewares: ['auth']
    })
  }

  routes(app: FastifyInstance, _options: RegisterOptions, done: (err?: Error) => void) {
    app.get('/', async (req, reply) => {
      if (!req.user) return reply.redirect('/login')

      const albums = await app.gallery.listForUser(req.user._id)

      return render(req, reply, 'dashboard', {
        albums: albums.map((album) => ({
          id: album._id.toHexString(),
          name: album.name,
          hasQRCode: album.qrPath !== null,
          createdAt: dayjs(album.createdAt).format('YYYY-MM-DD HH:mm')
        }))
      })
    })

    done()
  }
}
