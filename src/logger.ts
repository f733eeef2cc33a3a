import { LogLevel, loadConfig } from './config'

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 }

let currentLevel: LogLevel = loadConfig().logLevel

export function setLogLevel(level: LogLevel) {
  currentLevel = level
}

const enabled = (level: Exclude<LogLevel, 'silent'>) => RANK[level] >= RANK[currentLevel]

export function debug(...args: unknown[]) {
  if (enabled('debug')) console.debug('[debug]', ...args)
}

export function info(...args: unknown[]) {
  if (enabled('info')) console.info('[info]', ...args)
}

export function warn(...args: unknown[]) {
  if (enabled('warn')) console.warn('[warn]', ...args)
}

export function error(...args: unknown[]) {
  if (enabled('error')) console.error('[error]', ...args)
}
