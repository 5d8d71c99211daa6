export { MatchingService } from './matchingService'
export { buildMatchingPrompt } from './prompt'
export { extractScore, SCORE_PATTERN, NEUTRAL_SCORE } from './score'
export type { ScoreBounds } from './score'
export { rankRecommendations } from './ranking'
export type { MatchOutcome } from './types'
