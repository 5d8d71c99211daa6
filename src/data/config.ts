import { logger } from '../logger'
import { InternalConfig, MatcherConfig, SourceConfig } from '../model/config'
import { MatchingError, MatchingErrorType } from '../model/error'
import { isLogLevel } from '../services/logService'
import { MAX_CHAIN_LENGTH } from '../services/modelService/constants'
import { DEFAULT_CHAT_MODEL, DEFAULT_MODEL_CHAIN } from './models'

export type Environment = Readonly<Record<string, string | undefined>>

/**
 * Hard assertion - throws a configuration error if condition is false or value is null/undefined
 * Uses the process logger since no registry exists yet while configuration is read
 */
function assert<T>(value: T | null | undefined, message: string): asserts value is T
function assert(condition: boolean, message: string): asserts condition
function assert<T>(valueOrCondition: T | null | undefined | boolean, message: string): asserts valueOrCondition is T {
    const isNullish = valueOrCondition === null || valueOrCondition === undefined
    const isFalse = valueOrCondition === false

    if (isNullish || isFalse) {
        logger.error(`readConfig: ${message}`)
        throw new MatchingError(message, MatchingErrorType.Configuration)
    }
}

/**
 * Soft assertion - logs a warning but doesn't throw
 * @returns true if assertion passed, false if it failed
 */
function softAssert(condition: boolean, message: string): boolean {
    if (!condition) {
        logger.warn(`readConfig: ${message}`)
    }
    return condition
}

export const INTERNAL_CONFIG: InternalConfig = {
    neutralScore: 50,
    minScore: 0,
    maxScore: 100,
    exportFilePrefix: 'match_results',
    exportDateFormat: 'yyyyMMdd_HHmmss',
}

export const DEFAULT_SOURCE_CONFIG: SourceConfig = {
    endpoint: 'http://127.0.0.1:11434/api/generate',
    modelChain: [...DEFAULT_MODEL_CHAIN],
    chatModel: DEFAULT_CHAT_MODEL,
    matchTimeout: 60,
    chatTimeout: 120,
    temperature: 0.7,
    matchNumPredict: 2000,
    chatNumPredict: 500,
    matchConcurrency: 1,
    exportTopN: 5,
    displayTopN: 10,
    exportDir: '.',
    debug: false,
}

type NumberRule = {
    integer?: boolean
    min?: number
}

/**
 * Parses a numeric setting, keeping the default when the value is missing or out of range
 */
const readNumber = (env: Environment, name: string, fallback: number, rule: NumberRule = {}): number => {
    const raw = env[name]
    if (raw === undefined || raw.trim() === '') return fallback

    const value = Number(raw)
    const valid =
        Number.isFinite(value) &&
        (!rule.integer || Number.isInteger(value)) &&
        (rule.min === undefined || value >= rule.min)

    return softAssert(valid, `Invalid ${name} [${raw}], using default ${fallback}`) ? value : fallback
}

const readString = (env: Environment, name: string): string | undefined => {
    const raw = env[name]?.trim()
    return raw ? raw : undefined
}

const readList = (env: Environment, name: string): string[] | undefined => {
    const raw = env[name]
    if (raw === undefined) return undefined
    return raw
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
}

const isUrl = (value: string): boolean => {
    try {
        const url = new URL(value)
        return url.protocol === 'http:' || url.protocol === 'https:'
    } catch {
        return false
    }
}

/**
 * Builds the matcher configuration from environment values over the defaults.
 * Call after `.env` has been loaded.
 *
 * @throws {MatchingError} When the endpoint is not an http(s) URL, or the model chain is empty or longer than three
 */
export const readConfig = (env: Environment = process.env): MatcherConfig => {
    logger.debug('Reading matcher configuration')
    const defaults = DEFAULT_SOURCE_CONFIG

    const endpoint = readString(env, 'OLLAMA_ENDPOINT') ?? defaults.endpoint
    assert(isUrl(endpoint), `Inference endpoint must be an http(s) URL, got [${endpoint}]`)

    const modelChain = readList(env, 'MODEL_CHAIN') ?? defaults.modelChain
    assert(modelChain.length > 0, 'Model chain must name at least one model')
    assert(
        modelChain.length <= MAX_CHAIN_LENGTH,
        `Model chain names ${modelChain.length} models, at most ${MAX_CHAIN_LENGTH} are allowed`
    )

    const logLevel = readString(env, 'LOG_LEVEL')
    softAssert(logLevel === undefined || isLogLevel(logLevel), `Unknown LOG_LEVEL [${logLevel}], ignoring`)

    const config: MatcherConfig = {
        endpoint,
        apiKey: readString(env, 'OLLAMA_API_KEY'),
        modelChain,
        chatModel: readString(env, 'CHAT_MODEL') ?? defaults.chatModel,
        matchTimeout: readNumber(env, 'MATCH_TIMEOUT_SECONDS', defaults.matchTimeout, { min: 1 }),
        chatTimeout: readNumber(env, 'CHAT_TIMEOUT_SECONDS', defaults.chatTimeout, { min: 1 }),
        temperature: readNumber(env, 'TEMPERATURE', defaults.temperature, { min: 0 }),
        matchNumPredict: readNumber(env, 'MATCH_NUM_PREDICT', defaults.matchNumPredict, { integer: true, min: 1 }),
        chatNumPredict: readNumber(env, 'CHAT_NUM_PREDICT', defaults.chatNumPredict, { integer: true, min: 1 }),
        matchConcurrency: readNumber(env, 'MATCH_CONCURRENCY', defaults.matchConcurrency, { integer: true, min: 1 }),
        exportTopN: readNumber(env, 'EXPORT_TOP_N', defaults.exportTopN, { integer: true, min: 1 }),
        displayTopN: readNumber(env, 'DISPLAY_TOP_N', defaults.displayTopN, { integer: true, min: 1 }),
        exportDir: readString(env, 'EXPORT_DIR') ?? defaults.exportDir,
        logLevel: isLogLevel(logLevel) ? logLevel : undefined,
        debug: env.DEBUG === 'true',
        ...INTERNAL_CONFIG, // Internal constants always take precedence
    }

    logger.debug(`Configuration loaded: endpoint ${config.endpoint}, chain [${config.modelChain.join(' -> ')}]`)
    return config
}
