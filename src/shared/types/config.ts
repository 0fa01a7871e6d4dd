import type { LogLevel } from '../logger'
import type { ColorMode, OutputLayout } from './branch'

export type Configuration = {
  layout: OutputLayout
  /** Field separator for the `fields` layout. */
  delimiter: string
  color: ColorMode
  logLevel: LogLevel
}
