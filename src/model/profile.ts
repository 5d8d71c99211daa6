// ============================================================================
// Profile Enumerations
// ============================================================================

export const PERSONALITIES = [
    'Outgoing and social',
    'Quiet and thoughtful',
    'Active and energetic',
    'Creative and artistic',
    'Academic and studious',
] as const

export type Personality = (typeof PERSONALITIES)[number]

export const LOCATION_REGIONS = [
    'Boston Metro',
    'Western Massachusetts',
    'Central Massachusetts',
    'Southeastern Massachusetts',
    'Northeastern Massachusetts',
] as const

export type LocationRegion = (typeof LOCATION_REGIONS)[number]

// ============================================================================
// Profiles
// ============================================================================

/**
 * Child profile entered by a caseworker. Immutable for the duration of one matching request.
 */
export interface ChildProfile {
    /** Age in whole years, 0-18 */
    readonly age: number
    readonly interests: string
    readonly specialNeeds: string
    readonly personality: Personality
    readonly locationRegion: LocationRegion
}

/**
 * Prospective family on the roster.
 */
export interface FamilyProfile {
    /** Unique within the roster */
    readonly id: string
    readonly familyType: string
    /** Free text, e.g. "30-45" */
    readonly ageRange: string
    readonly interests: readonly string[]
    readonly specializations: readonly string[]
    readonly location: string
    readonly homeType: string
    readonly pets: string
    readonly values: string
}

// ============================================================================
// Field Schemas
// ============================================================================

export type FieldTag = {
    /** Hashed by the anonymizer before the record leaves the process */
    sensitive: boolean
}

/**
 * Declares every field of a profile type together with its sensitivity tag.
 * The compiler rejects a schema that misses or invents a field.
 */
export type FieldSchema<T> = { readonly [K in keyof Required<T>]: FieldTag }

export const CHILD_PROFILE_SCHEMA = {
    age: { sensitive: false },
    interests: { sensitive: false },
    specialNeeds: { sensitive: false },
    personality: { sensitive: false },
    locationRegion: { sensitive: false },
} as const satisfies FieldSchema<ChildProfile>

export const FAMILY_PROFILE_SCHEMA = {
    id: { sensitive: false },
    familyType: { sensitive: false },
    ageRange: { sensitive: false },
    interests: { sensitive: false },
    specializations: { sensitive: false },
    location: { sensitive: false },
    homeType: { sensitive: false },
    pets: { sensitive: false },
    values: { sensitive: false },
} as const satisfies FieldSchema<FamilyProfile>

/**
 * Names of the fields a schema tags as sensitive
 */
export const sensitiveFieldsOf = (schema: Readonly<Record<string, FieldTag>>): string[] =>
    Object.entries(schema)
        .filter(([, tag]) => tag.sensitive)
        .map(([field]) => field)

/**
 * Names of every field a schema declares
 */
export const fieldsOf = (schema: Readonly<Record<string, FieldTag>>): string[] => Object.keys(schema)
