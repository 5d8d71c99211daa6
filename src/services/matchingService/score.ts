/**
 * "score", then any run of colons and whitespace, then digits. First match wins.
 * Also matches inside longer words such as "compatibility_score: 80".
 */
export const SCORE_PATTERN = /score[:\s]*(\d+)/i

export const NEUTRAL_SCORE = 50

export type ScoreBounds = {
    neutral: number
    min: number
    max: number
}

const DEFAULT_BOUNDS: ScoreBounds = { neutral: NEUTRAL_SCORE, min: 0, max: 100 }

/**
 * Best-effort score read from free model text. Falls back to the neutral score
 * when no score is found; never throws.
 *
 * The first integer found is clamped into the bounds instead of being returned as
 * read, so `score: 150` gives the maximum.
 */
export const extractScore = (text: string, bounds: ScoreBounds = DEFAULT_BOUNDS): number => {
    try {
        const match = SCORE_PATTERN.exec(text)
        if (!match) return bounds.neutral

        const score = Number.parseInt(match[1], 10)
        if (Number.isNaN(score)) return bounds.neutral
        return Math.min(bounds.max, Math.max(bounds.min, score))
    } catch {
        return bounds.neutral
    }
}
