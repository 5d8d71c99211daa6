import { format } from 'date-fns'
import { mkdir, writeFile } from 'fs/promises'
import path from 'path'
import { MatcherConfig } from '../model/config'
import { ExportedResults, MatchRecommendation } from '../model/recommendation'
import { LogService } from './logService'

/**
 * Writes the top of a ranked recommendation list to a JSON file.
 * Only family ids, scores and timestamps are exported; reasoning and profile data stay in memory.
 */
export class ExportService {
    private readonly exportDir: string
    private readonly topN: number
    private readonly filePrefix: string
    private readonly dateFormat: string

    constructor(
        config: MatcherConfig,
        private log: LogService
    ) {
        this.exportDir = config.exportDir
        this.topN = config.exportTopN
        this.filePrefix = config.exportFilePrefix
        this.dateFormat = config.exportDateFormat
    }

    public buildExport(recommendations: readonly MatchRecommendation[], now: Date = new Date()): ExportedResults {
        return {
            timestamp: now.toISOString(),
            matches: recommendations.length,
            topMatches: recommendations.slice(0, this.topN).map((recommendation, index) => ({
                rank: index + 1,
                familyId: recommendation.familyId,
                score: recommendation.matchScore,
                timestamp: recommendation.timestamp,
            })),
        }
    }

    public fileName(now: Date = new Date()): string {
        return `${this.filePrefix}_${format(now, this.dateFormat)}.json`
    }

    /**
     * @param recommendations - Ranked list, best first
     * @param directory - Overrides the configured export directory
     * @returns Path of the written file, or undefined when there was nothing to export
     */
    public async exportResults(
        recommendations: readonly MatchRecommendation[],
        directory: string = this.exportDir,
        now: Date = new Date()
    ): Promise<string | undefined> {
        if (recommendations.length === 0) {
            this.log.info('No matching results to export')
            return undefined
        }

        const filePath = path.join(directory, this.fileName(now))
        await mkdir(directory, { recursive: true })
        await writeFile(filePath, JSON.stringify(this.buildExport(recommendations, now), null, 2), 'utf8')
        this.log.info(`Results exported to ${filePath}`)
        return filePath
    }
}
