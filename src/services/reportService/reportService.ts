import type { TemplateDelegate as HandlebarsTemplateDelegate } from 'handlebars'
import { MatcherConfig } from '../../model/config'
import { FOLLOW_UP_RECOMMENDATIONS } from '../../model/messages'
import { ChildProfile, FamilyProfile } from '../../model/profile'
import { MatchRecommendation } from '../../model/recommendation'
import { assert } from '../../utils/assert'
import { LogService } from '../logService'
import { RosterService } from '../rosterService'
import { compileReportTemplates, ReportTemplate } from './helpers'

export interface MatchListEntry {
    rank: number
    familyId: string
    familyType: string
    score: number
}

/**
 * Plain-text views of the roster and of matching results for the presentation layer.
 */
export class ReportService {
    private readonly templates: Map<ReportTemplate, HandlebarsTemplateDelegate>
    private readonly displayTopN: number

    constructor(
        config: MatcherConfig,
        private log: LogService,
        private roster: RosterService
    ) {
        this.templates = compileReportTemplates()
        this.displayTopN = config.displayTopN
    }

    private render(name: ReportTemplate, data: object): string {
        const template = this.templates.get(name)
        assert(template, `Report template [${name}] not found`)
        return template(data)
    }

    /**
     * Top entries of a ranked list. Ranks count every displayed recommendation;
     * ids that are not on the roster are skipped.
     */
    public matchList(recommendations: readonly MatchRecommendation[]): MatchListEntry[] {
        const entries: MatchListEntry[] = []
        recommendations.slice(0, this.displayTopN).forEach((recommendation, index) => {
            const family = this.roster.get(recommendation.familyId)
            if (!family) {
                this.log.debug(`Skipping family [${recommendation.familyId}], not on the roster`)
                return
            }
            entries.push({
                rank: index + 1,
                familyId: family.id,
                familyType: family.familyType,
                score: recommendation.matchScore,
            })
        })
        return entries
    }

    /**
     * One line per displayed match: `Match #1: Married Couple - Score: 92%`
     */
    public renderMatchList(recommendations: readonly MatchRecommendation[]): string {
        return this.render('match-list', { matches: this.matchList(recommendations) })
    }

    public familyLabel(family: FamilyProfile): string {
        return this.render('family-label', family)
    }

    public rosterLabels(): string[] {
        return this.roster.list().map((family) => this.familyLabel(family))
    }

    public renderFamilyDetails(family: FamilyProfile): string {
        return this.render('family-details', family)
    }

    /**
     * Side-by-side summary of a child and a matched family with the model's reasoning
     *
     * @throws {MatchingError} When the recommendation belongs to another family
     */
    public renderCompatibilityAnalysis(
        child: ChildProfile,
        family: FamilyProfile,
        recommendation: MatchRecommendation
    ): string {
        assert(
            recommendation.familyId === family.id,
            `Recommendation for [${recommendation.familyId}] does not belong to family [${family.id}]`
        )
        return this.render('compatibility-analysis', {
            child,
            family,
            recommendation,
            followUps: FOLLOW_UP_RECOMMENDATIONS,
        })
    }
}
