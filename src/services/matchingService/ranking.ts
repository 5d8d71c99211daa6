/**
 * New list ordered by score, highest first. The sort is stable: equal scores keep
 * their input order, which is the only tie-break.
 */
export const rankRecommendations = <T extends { matchScore: number }>(recommendations: readonly T[]): T[] =>
    [...recommendations].sort((a, b) => b.matchScore - a.matchScore)
