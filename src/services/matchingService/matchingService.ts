import { v4 as uuidv4 } from 'uuid'
import { MatcherConfig } from '../../model/config'
import { ChildProfile, FamilyProfile } from '../../model/profile'
import { MatchRecommendation } from '../../model/recommendation'
import { batch } from '../../utils/batch'
import { LogService } from '../logService'
import { matchingCallOptions, ModelCallOptions, ModelService } from '../modelService'
import {
    AnonymizedProfile,
    anonymizeProfile,
    CHILD_REQUIRED_FIELDS,
    isCompleteChildProfile,
    missingFields,
} from '../privacyService'
import { RosterService } from '../rosterService'
import { buildMatchingPrompt } from './prompt'
import { rankRecommendations } from './ranking'
import { extractScore, ScoreBounds } from './score'
import { MatchOutcome } from './types'

const UNKNOWN_FAMILY_ID = 'unknown'

/**
 * Scores a child against prospective families with the inference model and ranks the results.
 *
 * Failures degrade instead of halting the batch: a family whose model call fails is
 * left out, an unreadable score becomes the neutral score, and any unexpected error
 * yields an empty list.
 */
export class MatchingService {
    private readonly callOptions: ModelCallOptions
    private readonly scoreBounds: ScoreBounds

    constructor(
        private config: MatcherConfig,
        private log: LogService,
        private models: ModelService,
        private roster: RosterService
    ) {
        this.callOptions = matchingCallOptions(config)
        this.scoreBounds = { neutral: config.neutralScore, min: config.minScore, max: config.maxScore }
    }

    /**
     * Intake flow: checks the child profile for its required fields, then matches it against the roster.
     *
     * @param child - Profile entered by the caseworker, possibly incomplete
     * @param chain - Model fallback chain for this request
     */
    public async findMatches(
        child: Partial<ChildProfile>,
        chain: readonly string[] = this.config.modelChain
    ): Promise<MatchOutcome> {
        if (!isCompleteChildProfile(child)) {
            const missing = missingFields(child, CHILD_REQUIRED_FIELDS)
            this.log.warn(`Child profile is missing required fields [${missing.join(', ')}]`)
            return { status: 'incomplete', missing }
        }

        const recommendations = await this.getMatchingRecommendations(child, this.roster.list(), chain)
        return { status: 'ok', recommendations }
    }

    /**
     * Asks the model for a compatibility score per family and returns every scored
     * family ranked by score, highest first.
     *
     * @param child - Profile to match; anonymized before it is sent
     * @param families - Candidate families; anonymized before they are sent
     * @param chain - Model fallback chain, walked independently for each family
     * @returns Ranked recommendations, or an empty list when the run failed unexpectedly
     */
    public async getMatchingRecommendations(
        child: ChildProfile,
        families: readonly FamilyProfile[],
        chain: readonly string[] = this.config.modelChain
    ): Promise<MatchRecommendation[]> {
        const runId = uuidv4()
        try {
            this.log.info(`Matching run ${runId}: ${families.length} families, chain [${chain.join(' -> ')}]`)
            const anonymizedChild = anonymizeProfile(child)

            const results = await batch(
                families,
                (family) => this.scoreFamily(anonymizedChild, family, chain),
                this.config.matchConcurrency,
                (processed, total) => this.log.debug(`Matching run ${runId}: ${processed}/${total} families scored`)
            )

            const recommendations: MatchRecommendation[] = []
            for (const recommendation of results) {
                if (recommendation) recommendations.push(recommendation)
            }

            this.log.info(`Matching run ${runId}: ${recommendations.length}/${families.length} families scored`)
            return rankRecommendations(recommendations)
        } catch (error) {
            this.log.error(`Matching run ${runId} failed`, error)
            return []
        }
    }

    /**
     * Undefined when no model produced text for this family
     */
    private async scoreFamily(
        child: AnonymizedProfile,
        family: FamilyProfile,
        chain: readonly string[]
    ): Promise<MatchRecommendation | undefined> {
        const familyId = family.id ?? UNKNOWN_FAMILY_ID
        const prompt = buildMatchingPrompt(child, anonymizeProfile(family))
        const text = await this.models.generate(prompt, chain, this.callOptions)

        if (!text) {
            this.log.warn(`No recommendation for family [${familyId}]`)
            return undefined
        }

        return {
            familyId,
            matchScore: extractScore(text, this.scoreBounds),
            reasoning: text,
            timestamp: new Date().toISOString(),
        }
    }
}
