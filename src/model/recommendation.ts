/**
 * Score and rationale for one child/family pair, produced fresh per matching request.
 */
export interface MatchRecommendation {
    familyId: string
    /** Integer 0-100; 50 when the model output carries no score */
    matchScore: number
    /** Raw model output */
    reasoning: string
    /** ISO-8601 generation time */
    timestamp: string
}

/**
 * Entry of an exported result file. Carries no profile data or reasoning.
 */
export interface ExportedMatch {
    rank: number
    familyId: string
    score: number
    timestamp: string
}

export interface ExportedResults {
    timestamp: string
    /** Total number of recommendations in the run */
    matches: number
    topMatches: ExportedMatch[]
}
