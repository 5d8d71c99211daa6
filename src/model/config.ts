import { LogLevel } from '../services/logService'

/**
 * Settings read from the environment (see `.env.example`).
 */
export interface SourceConfig {
    /** Full URL of the Ollama-compatible generate endpoint */
    endpoint: string
    /** Sent as `api_key` in the request body when present */
    apiKey?: string
    /** Ordered fallback chain for matching calls */
    modelChain: string[]
    /** Model used by the support chat */
    chatModel: string
    /** Matching call timeout in seconds */
    matchTimeout: number
    /** Chat call timeout in seconds */
    chatTimeout: number
    temperature: number
    matchNumPredict: number
    chatNumPredict: number
    /** Number of families scored at once; 1 keeps the calls sequential */
    matchConcurrency: number
    /** How many ranked matches the export keeps */
    exportTopN: number
    /** How many ranked matches the match list shows */
    displayTopN: number
    /** Directory the export files are written to */
    exportDir: string
    logLevel?: LogLevel
    debug: boolean
}

/**
 * Constants that are not exposed through the environment.
 */
export interface InternalConfig {
    /** Score assigned when the model output carries no readable score */
    neutralScore: number
    minScore: number
    maxScore: number
    exportFilePrefix: string
    exportDateFormat: string
}

export type MatcherConfig = SourceConfig & InternalConfig
