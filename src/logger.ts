import pino from 'pino'

/**
 * Process-wide structured logger. Services log through {@link LogService}; this
 * instance is used directly only before a registry exists (configuration loading).
 */
export const logger = pino({
    name: 'family-match-engine',
    level: 'info',
})

export type Logger = typeof logger
