import type { FastifyInstance, RegisterOptions } from 'fastify'

export interface RouteOptions {
  position: number
  path: string
  middlewares?: string[]
}

export class Route {
  position: number
  path: string
  middlewares: string[]

  constructor(options: RouteOptions) {
    this.position = options.position
    this.path = options.path
    this.middlewares = options.middlewares || []
  }

  routes(_app: FastifyInstance, _options: RegisterOptions, done: (err?: Error) => void) {
    done()
  }
}
