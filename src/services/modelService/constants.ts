export const GENERATE_HEADERS = {
    'Content-Type': 'application/json',
}

/**
 * HTTP status treated as success; any other status ends the chain without fallback
 */
export const SUCCESS_STATUS = 200

/**
 * A call tries the first model and at most two substitutes; later chain entries are never reached
 */
export const MAX_FALLBACKS = 2

export const MAX_CHAIN_LENGTH = MAX_FALLBACKS + 1
