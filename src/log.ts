import chalk from 'chalk'

type Colour = (text: string) => string

export function debug(message: string) {
  return log('DEBUG', message, chalk.gray)
}

export function info(message: string) {
  return log('INFO', message, chalk.blue)
}

export function warn(message: string) {
  return log('WARN', message, chalk.yellow)
}

export function error(message: string) {
  return log('ERROR', message, chalk.red)
}

function log(prefix: string, message: string, colour: Colour) {
  const timestamp = new Date().toTimeString().slice(0, 8)

  const logLevel = getLogLevel(process.env.LOG_LEVEL || 'info')
  const targetLevel = getLogLevel(prefix)

  // stdout carries task results
  if (targetLevel >= logLevel) {
    console.error('[%s] %s: %s', timestamp, colour(prefix), message)
  }
}

export function getLogLevel(level: string): number {
  switch (level.toLowerCase()) {
    case 'debug':
      return 10
    case 'info':
      return 20
    case 'warn':
      return 30
    case 'error':
      return 40
    case 'silent':
      return 50
    default:
      return 0
  }
}

export function stringify(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2)
  } catch (ex) {
    return String(value)
  }
}
