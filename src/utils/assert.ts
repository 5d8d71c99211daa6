import { ServiceRegistry } from '../services/serviceRegistry'
import { MatchingError, MatchingErrorType } from '../model/error'
import { getCallerFunctionName } from '../services/logService'

/**
 * Hard assertion - throws an error if condition is false or value is null/undefined
 * Automatically detects the caller function name for logging context
 *
 * Supports two patterns:
 * 1. Direct value: assert(value, 'message') - narrows value to non-null/non-undefined
 * 2. Boolean expression: assert(condition, 'message') - checks condition is true
 */
export function assert<T>(value: T | null | undefined, message: string): asserts value is T
export function assert(condition: boolean, message: string): asserts condition
export function assert<T>(
    valueOrCondition: T | null | undefined | boolean,
    message: string
): asserts valueOrCondition is T {
    const isNullish = valueOrCondition === null || valueOrCondition === undefined
    const isFalse = valueOrCondition === false

    if (isNullish || isFalse) {
        const serviceRegistry = ServiceRegistry.getCurrent()

        if (serviceRegistry?.log) {
            serviceRegistry.log.crash(message)
        }
        // Fallback if service registry not available
        const functionName = getCallerFunctionName(2)
        throw new MatchingError(`${functionName}: ${message}`, MatchingErrorType.Generic)
    }
}
