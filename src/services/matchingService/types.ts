import { MatchRecommendation } from '../../model/recommendation'

/**
 * Result of the intake flow. A missing field is an outcome for the caller to
 * act on, not an error.
 */
export type MatchOutcome =
    | { status: 'incomplete'; missing: string[] }
    | { status: 'ok'; recommendations: MatchRecommendation[] }
