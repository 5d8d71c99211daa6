import { FamilyProfile } from '../model/profile'

/**
 * Families available to match against until a data-entry surface supplies real ones.
 */
export const SEED_FAMILIES: readonly FamilyProfile[] = [
    {
        id: 'F001',
        familyType: 'Married Couple',
        ageRange: '30-45',
        interests: ['outdoor activities', 'education', 'community service'],
        specializations: ['children with learning differences', 'teens'],
        location: 'Boston Metro',
        homeType: 'Single family home with yard',
        pets: 'Two friendly dogs',
        values: 'Education, creativity, outdoor activities',
    },
    {
        id: 'F002',
        familyType: 'Single Parent',
        ageRange: '35-50',
        interests: ['art', 'music', 'cooking'],
        specializations: ['young children', 'artistic development'],
        location: 'Western Massachusetts',
        homeType: 'Cozy apartment with art studio',
        pets: 'One cat',
        values: 'Creativity, self-expression, academic achievement',
    },
    {
        id: 'F003',
        familyType: 'Same-Sex Couple',
        ageRange: '28-42',
        interests: ['sports', 'travel', 'volunteering'],
        specializations: ['athletic children', 'cultural diversity'],
        location: 'Central Massachusetts',
        homeType: 'Suburban home with sports facilities',
        pets: 'None',
        values: 'Physical activity, cultural awareness, community involvement',
    },
]
