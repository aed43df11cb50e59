import type { FastifyError, FastifyInstance, preHandlerAsyncHookHandler } from 'fastify'
import type { Repository } from '@/types'
import type { Config } from '@/config'
import type { Route } from './Route'
import type { Task } from './Task'

import { dirname, extname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { readdir, stat } from 'node:fs/promises'

import Fastify from 'fastify'
import cookie from '@fastify/cookie'
import formbody from '@fastify/formbody'
import helmet from '@fastify/helmet'
import multipart from '@fastify/multipart'
import rateLimit from '@fastify/rate-limit'
import session from '@fastify/session'
import fstatic from '@fastify/static'
import view from '@fastify/view'
import ejs from 'ejs'

import { loadConfig } from '@/config'
import { Accounts, Database, Gallery, Storage } from '@/services'
import { Logger, NotFoundError, render } from '@/utils'

const __dirname = dirname(fileURLToPath(import.meta.url))
const SOURCE_EXTENSIONS = new Set(['.ts', '.js'])

export interface ServerOptions {
  config?: Config
  /** Replaces the MongoDB-backed repository. */
  database?: Repository
  /** Enables Fastify's request logger. */
  requestLogging?: boolean
  /** Starts the cron tasks once they are loaded. */
  tasks?: boolean
}

export class Server {
  public app: FastifyInstance
  public config: Config
  public logger: Logger
  public database: Repository
  public storage: Storage
  public accounts: Accounts
  public gallery: Gallery
  private readonly routers: Array<Route>
  public readonly tasks: Array<Task>
  private readonly startTasks: boolean

  constructor(options: ServerOptions = {}) {
    this.config = options.config ?? loadConfig()

    this.app = Fastify({
      ignoreTrailingSlash: true,
      trustProxy: true,
      logger: options.requestLogging ?? true
    })

    this.routers = []
    this.tasks = []
    this.startTasks = options.tasks ?? true

    this.logger = new Logger('Server', this.config.logLevel)
    this.database = options.database ?? new Database(this.config.mongo)
    this.storage = new Storage(this.config.storageDir)
    this.accounts = new Accounts(this.database)
    this.gallery = new Gallery(this.database, this.storage, this.logger.child('Gallery'))
  }

  /**
   * @description Registers the plugins, the error handlers, the routes and the tasks, and connects to the database.
   * Does not start listening.
   */
  public async setup(): Promise<FastifyInstance> {
    this.app.decorate('config', this.config)
    this.app.decorate('logger', this.logger)
    this.app.decorate('storage', this.storage)
    this.app.decorate('accounts', this.accounts)
    this.app.decorate('gallery', this.gallery)

    await this.app.register(helmet, {
      crossOriginResourcePolicy: false
    })

    await this.app.register(cookie)

    await this.app.register(session, {
      secret: this.config.secret,
      cookie: {
        httpOnly: true,
        sameSite: 'lax',
        secure: this.config.environment === 'production'
      }
    })

    await this.app.register(formbody)

    await this.app.register(multipart, {
      limits: {
        fileSize: 16777216
      }
    })

    await this.app.register(rateLimit, {
      global: true,
      max: this.config.rateLimitMax,
      timeWindow: '1 minute',
      keyGenerator: (req) => req.session?.userId ?? req.ip,
      errorResponseBuilder: () => ({ statusCode: 429, message: 'Too many requests, please you need to slow down, try again later.' })
    })

    await this.app.register(view, {
      engine: { ejs },
      root: join(__dirname, '..', '..', 'views'),
      viewExt: 'ejs'
    })

    await this.storage.initialize()

    await this.app.register(fstatic, {
      root: this.storage.root,
      prefix: '/static/'
    })

    this.app.setNotFoundHandler((req, reply) => {
      return render(req, reply.code(404), 'not_found', { message: 'Page not found' })
    })

    this.app.setErrorHandler((error: FastifyError, req, reply) => {
      if (error instanceof NotFoundError) {
        return render(req, reply.code(404), 'not_found', { message: error.message })
      }

      const statusCode = error.statusCode ?? 500

      if (statusCode >= 500) {
        this.logger.error(`Something went wrong.\nError: ${error.stack ?? error.message}`)
      }

      return render(req, reply.code(statusCode), 'error', {
        status: statusCode,
        message: statusCode >= 500 ? 'Oops! Something went wrong. Try again later.' : error.message
      })
    })

    await this.initializeDatabase()
    await this.loadRoutes(join(__dirname, '..', 'routes'))
    await this.registerRoutes()
    await this.loadTasks(join(__dirname, '..', 'tasks'))

    return this.app
  }

  /**
   * @description A method to create a connection to the database
   * @private
   */
  private async initializeDatabase(): Promise<void> {
    await this.database.connect()

    this.app.decorate('database', this.database)

    this.app.addHook('onClose', async () => {
      await this.database.close()
    })

    this.logger.log('Successfully connected to database.')
  }

  /**
   * Lists the source modules of a directory, skipping test files and declarations.
   */
  private async listModules(directory: string): Promise<string[]> {
    const entries = await readdir(directory)

    return entries
      .filter((entry) => SOURCE_EXTENSIONS.has(extname(entry)) && !/\.(test|spec|d)\.[jt]s$/.test(entry))
      .sort()
  }

  /**
   * @description Loads the routes on the HTTP Server instance
   * @param directory The path to the routes directory
   * @param prefix Prefix used load the routes following the file structure
   * @private
   */
  private async loadRoutes(directory: string, prefix: string | false = false): Promise<void> {
    const entries = await readdir(directory)

    for (const entry of entries) {
      const stats = await stat(join(directory, entry))

      if (stats.isDirectory()) {
        await this.loadRoutes(join(directory, entry), entry)
      }
    }

    for (const route of await this.listModules(directory)) {
      const routeImport: { default: new (server: Server) => Route } = await import(join(directory, route))
      const routeInstance = new routeImport.default(this)

      if (prefix) {
        routeInstance.path = `/${prefix}${routeInstance.path}`
      }

      this.routers.push(routeInstance)
    }
  }

  /**
   * @description Loads the specified middlewares dynamically.
   * @param middlewares - The names of the middlewares to load.
   */
  private async loadMiddlewares(middlewares: string[]): Promise<preHandlerAsyncHookHandler[]> {
    const directory = join(__dirname, '..', 'middlewares')
    const available = await this.listModules(directory)
    const importedMiddlewares: preHandlerAsyncHookHandler[] = []

    for (const middleware of middlewares) {
      const file = available.find((entry) => entry.slice(0, -extname(entry).length) === middleware)
      if (!file) throw new Error(`Unknown middleware "${middleware}".`)

      const importedMiddleware: { default: preHandlerAsyncHookHandler } = await import(join(directory, file))
      importedMiddlewares.push(importedMiddleware.default)
    }

    return importedMiddlewares
  }

  /**
   * @description Registers the routes on the Fastify instance
   * @private
   */
  private async registerRoutes(): Promise<void> {
    this.routers.sort((a, b) => a.position - b.position)

    for (const router of this.routers) {
      const middlewares = router.middlewares.length ? await this.loadMiddlewares(router.middlewares) : []

      await this.app.register((app, options, done) => {
        app.addHook('onRoute', (routeOptions) => {
          if (routeOptions.config?.auth === false) return

          if (middlewares.length > 0) {
            const preHandlers = routeOptions.preHandler ? [routeOptions.preHandler].flat() : []
            routeOptions.preHandler = [...middlewares, ...preHandlers]
          }
        })

        router.routes(app, options, done)
      }, { prefix: router.path })
    }

    this.logger.log(`Loaded ${this.routers.length} routes.`)
  }

  /**
   * @description Loads the tasks and starts their jobs unless the server was built without tasks
   * @param directory
   * @private
   */
  private async loadTasks(directory: string) {
    const start = process.hrtime()
    const tasks = await this.listModules(directory)

    for (const task of tasks) {
      try {
        const jobImport: { default: new (server: Server) => Task } = await import(join(directory, task))
        const job = new jobImport.default(this)

        if (this.startTasks) {
          job.start()
          this.logger.log(`[Task] ${job.name} scheduled, next run ${job.timeUntil()}.`)
        }

        this.tasks.push(job)
      } catch (error) {
        this.logger.error(`Unable to load task ${task}: ${error instanceof Error ? error.stack ?? error.message : String(error)}`)
      }
    }

    const end = process.hrtime(start)
    this.logger.log(`Loaded ${this.tasks.length}/${tasks.length} tasks (took ${end[1] / 1000000}ms)`)
  }

  /**
   * @description Listens for incoming requests on the configured host and port.
   * @returns The address the server is bound to.
   */
  public async listen(): Promise<string> {
    const address = await this.app.listen({ port: this.config.port, host: this.config.host })
    this.logger.log(`Running on ${address}`)

    return address
  }

  public async close(): Promise<void> {
    for (const task of this.tasks) {
      task.stop()
    }

    await this.app.close()
  }
}
