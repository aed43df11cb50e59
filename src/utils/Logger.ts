import type { ConsolaInstance, LogType } from 'consola'

import { inspect } from 'node:util'
import chalk from 'chalk'
import { createConsola, LogLevels } from 'consola'

/**
 * Provides some logs for info, errors and warns
 * @class Logger
 */
export class Logger {
  private readonly consola: ConsolaInstance

  /**
   * @param {string} scope Prefix shown in front of every line
   * @param {LogType} level Lowest level that is printed
   */
  constructor(private readonly scope: string = 'Server', level: LogType = 'info') {
    this.consola = createConsola({ level: LogLevels[level] })
  }

  /**
   * Returns a logger sharing this one's level, printing under another scope.
   */
  child(scope: string): Logger {
    const logger = new Logger(scope)
    logger.consola.level = this.consola.level

    return logger
  }

  /**
   * Used to format arguments.
   * @param {(string | object)[]} args - Message(s) to be shown in the log.
   */
  formatInput(args: (string | object)[]): string[] {
    return args.map((arg) => typeof arg === 'string' ? arg : inspect(arg, { depth: 4 }))
  }

  log(...args: (string | object)[]): void {
    this.consola.info(`${chalk.cyan(`[${this.scope}]`)} | ${this.formatInput(args).join(' ')}`)
  }

  debug(...args: (string | object)[]): void {
    this.consola.debug(`${chalk.green(`[${this.scope}]`)} | [${chalk.green('DEBUG')}] - ${this.formatInput(args).join(' ')}`)
  }

  warn(...args: (string | object)[]): void {
    this.consola.warn(`${chalk.yellow(`[${this.scope}]`)} | ${this.formatInput(args).join(' ')}`)
  }

  error(...args: (string | object)[]): void {
    this.consola.error(`${chalk.red(`[${this.scope}]`)} | ${this.formatInput(args).join(' ')}`)
  }
}
