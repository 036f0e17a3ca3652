import { ValidationError } from './errors.js'

export interface Logger {
  warn(message: string): void
}

/**
 * Either logs the error as a warning or throws it, depending on strictness.
 */
export type WarnOrError = (error: ValidationError) => void

export interface WarnOrErrorOptions {
  warnError?: boolean
  logger?: Logger
}

export function createWarnOrError(options: WarnOrErrorOptions = {}): WarnOrError {
  const logger = options.logger ?? console
  return (error) => {
    if (options.warnError) {
      throw error
    }
    logger.warn(`Warning: ${error.message}`)
  }
}

/**
 * Strictness from the environment: DOCBLOCKS_WARN_ERROR=1 or =true.
 */
export function warnErrorFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.DOCBLOCKS_WARN_ERROR?.trim().toLowerCase()
  return value === '1' || value === 'true'
}
