import appRootPath from 'app-root-path'
import * as dotenv from 'dotenv-flow'
import path from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

export interface DramatexConfig {
  logLevel: LogLevel
  // decimals used when printing speech density
  densityDecimals: number
}

export const defaultConfig: DramatexConfig = {
  logLevel: 'info',
  densityDecimals: 2
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

function parseDecimals(raw: string | undefined, fallback: number) {
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n < 0 || n > 20) return fallback
  return n
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DramatexConfig {
  const requested = env.LOG_LEVEL?.trim().toLowerCase()
  const devLog = env.NODE_ENV === 'development' || env.DEV_LOG === '1' || env.DEV_LOG === 'true'

  let logLevel = defaultConfig.logLevel
  if (requested && isLogLevel(requested)) logLevel = requested
  else if (devLog) logLevel = 'debug'

  return {
    logLevel,
    densityDecimals: parseDecimals(env.DENSITY_DECIMALS, defaultConfig.densityDecimals)
  }
}

let loaded = false

/** Reads `.env*` files from the project root once, then builds the config from the environment. */
export function loadEnvConfig(): DramatexConfig {
  if (!loaded) {
    dotenv.config({ path: path.resolve(appRootPath.path), silent: true })
    loaded = true
  }
  return loadConfig(process.env)
}

export default defaultConfig
