import type { FastifyInstance, RegisterOptions } from 'fastify'

import { Route } from '@/structures'
import { render } from '@/utils'

export default class Home extends Route {
  constructor() {
    super({
      position: 0,
      path: ''
    })
  }

  routes(app: FastifyInstance, _options: RegisterOptions, done: (err?: Error) => void) {
    app.get('/', async (req, reply) => {
      if (req.session.userId) {
        req.user = await app.accounts.getUser(req.session.userId) ?? undefined
      }

      return render(req, reply, 'index')
    })

    done()
  }
}
