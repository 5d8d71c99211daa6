import { DEFAULT_SOURCE_CONFIG, INTERNAL_CONFIG } from '../../data/config'
import { MatcherConfig } from '../../model/config'
import { ChildProfile, FamilyProfile } from '../../model/profile'
import { MatchRecommendation } from '../../model/recommendation'

export const TEST_ENDPOINT = 'http://127.0.0.1:11434/api/generate'

export const testConfig = (overrides: Partial<MatcherConfig> = {}): MatcherConfig => ({
    ...DEFAULT_SOURCE_CONFIG,
    ...INTERNAL_CONFIG,
    endpoint: TEST_ENDPOINT,
    modelChain: ['M1', 'M2', 'M3'],
    ...overrides,
})

export const testChild = (overrides: Partial<ChildProfile> = {}): ChildProfile => ({
    age: 9,
    interests: 'drawing, football',
    specialNeeds: 'Mild dyslexia',
    personality: 'Creative and artistic',
    locationRegion: 'Western Massachusetts',
    ...overrides,
})

export const testFamily = (id: string, overrides: Partial<FamilyProfile> = {}): FamilyProfile => ({
    id,
    familyType: 'Married Couple',
    ageRange: '30-45',
    interests: ['hiking'],
    specializations: ['teens'],
    location: 'Boston Metro',
    homeType: 'Townhouse',
    pets: 'None',
    values: 'Patience',
    ...overrides,
})

export const recommendation = (familyId: string, matchScore: number): MatchRecommendation => ({
    familyId,
    matchScore,
    reasoning: `Reasoning for ${familyId}`,
    timestamp: '2026-01-15T09:05:07.000Z',
})
