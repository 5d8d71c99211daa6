import { logger as rootLogger, Logger } from '../logger'
import { MatchingError, MatchingErrorType } from '../model/error'

/**
 * Log levels in order of priority (lowest to highest)
 * debug < info < warn < error
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export type LogConfig = {
    debug?: boolean
    logLevel?: LogLevel
}

/**
 * Public entry points, shown in brackets when they appear as a log origin
 */
const OPERATION_NAMES = new Set([
    'getMatchingRecommendations',
    'findMatches',
    'generateResponse',
    'exportResults',
])

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Extracts the caller service and method name from the stack trace
 * @param skipFrames Number of stack frames to skip (default: 2 to skip this function and the logging method)
 * @returns An object with origin (formatted string) and isOperation (boolean)
 */
export function getCallerInfo(skipFrames: number = 2): { origin: string; isOperation: boolean } {
    try {
        const stack = new Error().stack
        if (!stack) return { origin: 'unknown', isOperation: false }

        const lines = stack.split('\n')
        // Skip Error constructor, this function, and the logging method
        const callerLine = lines[skipFrames + 1]
        if (!callerLine) return { origin: 'unknown', isOperation: false }

        // "    at ClassName.methodName (file:line:col)"
        const classMethodMatch = callerLine.match(/at\s+(?:async\s+)?(\w+)\.(\w+)\s*\(/)
        if (classMethodMatch) {
            const className = classMethodMatch[1]
            const methodName = classMethodMatch[2]
            if (className !== 'Object') {
                const isOperation = OPERATION_NAMES.has(methodName)
                return {
                    origin: isOperation ? `${className}>[${methodName}]` : `${className}>${methodName}`,
                    isOperation,
                }
            }
            return { origin: methodName, isOperation: OPERATION_NAMES.has(methodName) }
        }

        // "    at functionName (file:line:col)"
        const functionMatch = callerLine.match(/at\s+(?:async\s+)?(?:new\s+)?(\w+)\s*\(/)
        if (functionMatch) {
            const functionName = functionMatch[1]
            if (OPERATION_NAMES.has(functionName)) {
                return { origin: `[${functionName}]`, isOperation: true }
            }
            return { origin: functionName, isOperation: false }
        }

        // Anonymous frames: fall back to the file name
        const fileMatch = callerLine.match(/[/\\]([^/\\]+)\.(?:ts|js)/)
        if (fileMatch) {
            return { origin: fileMatch[1], isOperation: false }
        }

        return { origin: 'unknown', isOperation: false }
    } catch {
        return { origin: 'unknown', isOperation: false }
    }
}

export function getCallerFunctionName(skipFrames: number = 2): string {
    return getCallerInfo(skipFrames).origin
}

/**
 * Formats a log message with caller origin and optional data payload.
 * Handles Error objects, primitives, and JSON-serializable objects.
 *
 * @param message - The base log message
 * @param data - Optional data to append (Error, primitive, or object)
 * @param origin - The caller origin string (e.g. "MatchingService>scoreFamily")
 */
export function formatLogMessage(message: string, data?: unknown, origin?: string): string {
    const prefix = origin ? `${origin}: ` : ''

    if (data === undefined || data === null) {
        return `${prefix}${message}`
    }

    if (data instanceof Error) {
        return `${prefix}${message} [Error: ${data.name}: ${data.message}]`
    }

    if (['string', 'number', 'boolean', 'bigint', 'symbol'].includes(typeof data)) {
        return `${prefix}${message} ${String(data)}`
    }

    try {
        return `${prefix}${message} ${JSON.stringify(data)}`
    } catch {
        return `${prefix}${message} [Unserializable data]`
    }
}

/**
 * Structured logging service wrapping the process logger.
 *
 * Features:
 * - Configurable log levels (debug, info, warn, error)
 * - Caller origin detection via stack trace analysis (debug level only)
 * - Assertion-style logging (similar to `console.assert`)
 * - Crash method that logs and throws a MatchingError
 */
export class LogService {
    private logger: Logger
    private configuredLevel: LogLevel

    /**
     * @param config - Logging configuration: explicit level, or the debug flag
     * @param logger - Parent logger, defaults to the process logger; a child of it is used
     */
    constructor(config: LogConfig, logger: Logger = rootLogger) {
        // Own child so that levels set here never reach other services sharing the root
        this.logger = logger.child({})
        // explicit logLevel > debug flag > default 'info'
        if (config.logLevel) {
            this.configuredLevel = config.logLevel
        } else if (config.debug) {
            this.configuredLevel = 'debug'
        } else {
            this.configuredLevel = 'info'
        }
        this.logger.level = this.configuredLevel
    }

    /**
     * Stack trace capture is only paid for when debug output is configured.
     */
    private log(level: LogLevel, message: string, data?: unknown): void {
        const origin = this.configuredLevel === 'debug' ? getCallerInfo(3).origin : undefined
        this.logger[level](formatLogMessage(message, data, origin))
    }

    /**
     * Logs an informational message. Used for significant operational milestones.
     */
    info(message: string, data?: unknown): void {
        this.log('info', message, data)
    }

    /**
     * Logs a debug message. Only output when log level is "debug".
     */
    debug(message: string, data?: unknown): void {
        this.log('debug', message, data)
    }

    warn(message: string, data?: unknown): void {
        this.log('warn', message, data)
    }

    /**
     * Logs an error message. Used for failures that don't warrant an exception.
     */
    error(message: string, data?: unknown): void {
        this.log('error', message, data)
    }

    /**
     * Logs a message at the specified level only if the condition is false.
     * Similar to console.assert()
     * @param condition If false, the message will be logged
     * @param message The message to log
     * @param data Optional data to include
     * @param level The log level to use (default: 'error')
     */
    assert(condition: boolean, message: string, data?: unknown, level: LogLevel = 'error'): void {
        if (!condition) {
            const { origin } = getCallerInfo(2)
            this.logger[level](formatLogMessage(`Assertion failed: ${message}`, data, origin))
        }
    }

    /**
     * Logs an error message and immediately throws a {@link MatchingError}.
     * Used for unrecoverable failures that should halt the current operation.
     *
     * @throws {MatchingError} Always thrown after logging
     */
    crash(message: string, data?: unknown, type: MatchingErrorType = MatchingErrorType.Generic): never {
        const { origin } = getCallerInfo(2)
        this.logger.error(formatLogMessage(message, data, origin))
        throw new MatchingError(message, type)
    }

    getLogLevel(): LogLevel {
        return this.configuredLevel
    }

    /**
     * Sets the log level at runtime
     */
    setLogLevel(level: LogLevel): void {
        this.configuredLevel = level
        this.logger.level = level
    }
}
