/**
 * CLI output
 *
 * Coloured console lines; debug lines only appear with --verbose.
 */

import chalk from 'chalk'

export interface Logger {
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
  debug(message: string): void
}

export interface LoggerOptions {
  verbose?: boolean
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return {
    info: (message) => console.log(message),
    success: (message) => console.log(chalk.green(message)),
    warn: (message) => console.warn(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
    debug: (message) => {
      if (options.verbose) console.log(chalk.gray(message))
    },
  }
}
