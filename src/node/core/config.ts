import dotenv from 'dotenv'
import type { ColorMode, Configuration, OutputLayout } from '../../shared/types'
import { COLOR_MODES, OUTPUT_LAYOUTS } from '../../shared/types'
import { LOG_LEVELS, type LogLevel } from '../../shared/logger'
import { ConfigError } from '../shared/errors'

export const DEFAULT_CONFIGURATION: Configuration = {
  layout: 'table',
  delimiter: '\t',
  color: 'auto',
  logLevel: 'warn'
}

/**
 * Loads `.env` from the working directory into process.env.
 * Variables already set in the environment win.
 */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : undefined)
}

function pickOne<T extends string>(
  env: NodeJS.ProcessEnv,
  variable: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = env[variable]
  if (raw === undefined || raw === '') return fallback
  const match = allowed.find((value) => value === raw)
  if (match === undefined) {
    throw new ConfigError(
      `Invalid ${variable}: ${raw} (allowed: ${allowed.join(', ')})`,
      variable
    )
  }
  return match
}

export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): Configuration {
  const layout: OutputLayout = pickOne(env, 'GIT_BR_LAYOUT', OUTPUT_LAYOUTS, DEFAULT_CONFIGURATION.layout)
  const color: ColorMode = pickOne(env, 'GIT_BR_COLOR', COLOR_MODES, DEFAULT_CONFIGURATION.color)
  const logLevel: LogLevel = pickOne(env, 'GIT_BR_LOG_LEVEL', LOG_LEVELS, DEFAULT_CONFIGURATION.logLevel)
  const delimiter = env.GIT_BR_DELIMITER || DEFAULT_CONFIGURATION.delimiter

  return { layout, delimiter, color, logLevel }
}

/**
 * Decides whether the table layout is colored.
 * `auto` colors only an interactive terminal, and honors NO_COLOR.
 */
export function resolveColor(
  mode: ColorMode,
  isTTY: boolean,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (mode === 'always') return true
  if (mode === 'never') return false
  return isTTY && !env.NO_COLOR
}
