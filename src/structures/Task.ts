import type { Server } from './Server'

import { CronJob } from 'cron'
import dayjs from 'dayjs'
import duration from 'dayjs/plugin/duration.js'
import relativeTime from 'dayjs/plugin/relativeTime.js'

dayjs.extend(duration)
dayjs.extend(relativeTime)

export interface TaskOptions {
  name: string
  interval: string
  noDevelopment?: boolean
}

export abstract class Task {
  name: string
  noDevelopment: boolean
  job: CronJob<null, null>

  protected constructor(protected readonly server: Server, options: TaskOptions) {
    this.name = options.name
    this.noDevelopment = options.noDevelopment || false

    this.job = new CronJob<null, null>(options.interval, () => {
      if (this.server.config.environment === 'development' && this.noDevelopment) return

      this.server.logger.log(`[Task] ${this.name} was executed.`)
      this.execute().catch((error: unknown) => {
        this.server.logger.error(`[Task] ${this.name} failed:`, error instanceof Error ? error.stack ?? error.message : String(error))
      })
    }, null, false)
  }

  abstract execute(): Promise<unknown>

  start() {
    this.job.start()
  }

  stop() {
    this.job.stop()
  }

  timeUntil() {
    return dayjs.duration(this.job.nextDate().valueOf() - Date.now()).humanize(true)
  }
}
