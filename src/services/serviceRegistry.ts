import { MatcherConfig } from '../model/config'
import { FamilyProfile } from '../model/profile'
import { ChatService } from './chatService'
import { ExportService } from './exportService'
import { LogService } from './logService'
import { MatchingService } from './matchingService'
import { ModelService } from './modelService'
import { ReportService } from './reportService'
import { RosterService } from './rosterService'

/**
 * Pre-built services that replace the defaults, plus an optional roster to load
 */
export interface ServiceOverrides {
    logService?: LogService
    modelService?: ModelService
    rosterService?: RosterService
    matchingService?: MatchingService
    chatService?: ChatService
    reportService?: ReportService
    exportService?: ExportService
    families?: readonly FamilyProfile[]
}

/**
 * Central dependency container for the matching library.
 *
 * Instantiates and wires together all services in dependency order during construction.
 * Each service can be overridden (useful for testing). A static reference tracks the
 * "current" registry so that assertion helpers can log through it.
 */
export class ServiceRegistry {
    private static current?: ServiceRegistry
    public log: LogService
    public models: ModelService
    public roster: RosterService
    public matching: MatchingService
    public chat: ChatService
    public reports: ReportService
    public exports: ExportService

    /**
     * @param config - The resolved matcher configuration
     * @param overrides - Services to use instead of the defaults
     */
    constructor(
        public config: MatcherConfig,
        overrides: ServiceOverrides = {}
    ) {
        this.log = overrides.logService ?? new LogService(config)
        this.models = overrides.modelService ?? new ModelService(this.config, this.log)
        this.roster = overrides.rosterService ?? new RosterService(this.log, overrides.families)

        this.matching =
            overrides.matchingService ?? new MatchingService(this.config, this.log, this.models, this.roster)
        this.chat = overrides.chatService ?? new ChatService(this.config, this.log, this.models)
        this.reports = overrides.reportService ?? new ReportService(this.config, this.log, this.roster)
        this.exports = overrides.exportService ?? new ExportService(this.config, this.log)
    }

    /**
     * Sets the active registry.
     */
    static setCurrent(reg: ServiceRegistry): void {
        this.current = reg
    }

    /**
     * @returns The active registry, or undefined before {@link setCurrent} was called
     */
    static getCurrent(): ServiceRegistry | undefined {
        return this.current
    }

    /**
     * Clears the active registry, releasing all service references.
     */
    static clear(): void {
        this.current = undefined
    }
}
