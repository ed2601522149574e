import process from 'node:process'

export interface Logger {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
}

/**
 * Console logger. Debug lines only show when SVG_LANGS_DEBUG is set.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const debugEnabled = Boolean(env.SVG_LANGS_DEBUG)
  return {
    debug: (message) => {
      if (debugEnabled) {
        console.debug(`🔍 ${message}`)
      }
    },
    info: message => console.log(message),
    warn: message => console.warn(`⚠️  ${message}`),
    error: message => console.error(`❌ ${message}`),
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}

export const defaultLogger: Logger = createLogger()
