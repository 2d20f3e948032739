import { Logger, LogLevel } from './logger.js'

// Priority: POWERBI_EXPORT_DEBUG > POWERBI_EXPORT_LOG_LEVEL > NODE_ENV > INFO
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.POWERBI_EXPORT_DEBUG === 'true') {
    return LogLevel.DEBUG
  }

  const level = env.POWERBI_EXPORT_LOG_LEVEL?.toLowerCase()

  switch (level) {
    case 'error':
      return LogLevel.ERROR
    case 'warn':
      return LogLevel.WARN
    case 'info':
      return LogLevel.INFO
    case 'debug':
      return LogLevel.DEBUG
    default:
      return env.NODE_ENV === 'development' ? LogLevel.DEBUG : LogLevel.INFO
  }
}

/**
 * Process default, used when no logger is injected
 */
export const sharedLogger = new Logger({
  minLevel: getLogLevel(),
  includeStackTraces: true,
  prettyPrint:
    process.env.POWERBI_EXPORT_DEBUG === 'true' || process.env.POWERBI_EXPORT_LOG_PRETTY === 'true'
})
