import chalk from 'chalk'

/**
 * Color theme for the neo4j-server CLI
 */
export const theme = {
  version: chalk.yellow,
  port: chalk.green,
  path: chalk.gray,

  icons: {
    success: chalk.green('✔'),
    warning: chalk.yellow('⚠'),
    info: chalk.blue('ℹ'),
  },
}

export function uiSuccess(message: string): string {
  return `${theme.icons.success} ${message}`
}

export function uiWarning(message: string): string {
  return `${theme.icons.warning} ${chalk.yellow(message)}`
}

export function uiInfo(message: string): string {
  return `${theme.icons.info} ${message}`
}

export function keyValue(key: string, value: string): string {
  return `${chalk.gray(key + ':')} ${value}`
}
