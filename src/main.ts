import { Server } from '@/structures'

const server = new Server()

const handleError = (error: unknown) => {
  server.logger.error(error instanceof Error ? error.stack ?? error.message : String(error))
}

const shutdown = async (signal: NodeJS.Signals) => {
  server.logger.warn(`Received ${signal}, shutting down.`)
  await server.close()
  process.exit(0)
}

try {
  await server.setup()
  await server.listen()
} catch (error) {
  handleError(error)
  process.exit(1)
}

process.on('uncaughtException', handleError)
process.on('unhandledRejection', handleError)
process.once('SIGINT', (signal) => void shutdown(signal).catch(handleError))
process.once('SIGTERM', (signal) => void shutdown(signal).catch(handleError))
