import dotenv from 'dotenv'
import { Environment, readConfig } from './data/config'
import { ServiceOverrides, ServiceRegistry } from './services/serviceRegistry'

export type CreateMatcherOptions = {
    /** Settings to read instead of `.env` and `process.env` */
    env?: Environment
    overrides?: ServiceOverrides
}

/**
 * Reads the configuration and builds the service registry, making it the current one.
 *
 * @throws {MatchingError} When the configuration is invalid
 */
export const createMatcher = (options: CreateMatcherOptions = {}): ServiceRegistry => {
    if (!options.env) {
        dotenv.config()
    }
    const config = readConfig(options.env ?? process.env)
    const registry = new ServiceRegistry(config, options.overrides)
    ServiceRegistry.setCurrent(registry)
    return registry
}

export { readConfig, DEFAULT_SOURCE_CONFIG } from './data/config'
export type { Environment } from './data/config'
export { SEED_FAMILIES } from './data/roster'
export { MODEL_CATALOG, DEFAULT_MODEL_CHAIN, DEFAULT_CHAT_MODEL } from './data/models'
export * from './model/profile'
export type { MatchRecommendation, ExportedMatch, ExportedResults } from './model/recommendation'
export type { MatcherConfig, SourceConfig, InternalConfig } from './model/config'
export { MatchingError, MatchingErrorType } from './model/error'
export { CHAT_CONTEXTS } from './model/messages'
export type { ChatContext } from './model/messages'
export { ServiceRegistry } from './services/serviceRegistry'
export type { ServiceOverrides } from './services/serviceRegistry'
export { LogService } from './services/logService'
export type { LogLevel } from './services/logService'
export * from './services/privacyService'
export * from './services/modelService'
export * from './services/matchingService'
export { RosterService } from './services/rosterService'
export { ChatService } from './services/chatService'
export type { ChatExchange } from './services/chatService'
export { ReportService } from './services/reportService'
export type { MatchListEntry } from './services/reportService'
export { ExportService } from './services/exportService'
