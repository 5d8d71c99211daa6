import { createHash } from 'crypto'
import { CHILD_PROFILE_SCHEMA, FAMILY_PROFILE_SCHEMA, sensitiveFieldsOf } from '../../model/profile'
import { AnonymizedProfile } from './types'

/**
 * Field names hashed regardless of schema
 */
export const PII_FIELDS: readonly string[] = ['name', 'address', 'phone', 'email', 'ssn']

export const DIGEST_LENGTH = 8

/**
 * Static union of the fixed PII names and every field a profile schema tags as sensitive.
 * Never derived from record contents.
 */
export const SENSITIVE_FIELDS: ReadonlySet<string> = new Set([
    ...PII_FIELDS,
    ...sensitiveFieldsOf(CHILD_PROFILE_SCHEMA),
    ...sensitiveFieldsOf(FAMILY_PROFILE_SCHEMA),
])

/**
 * First 8 hex characters of the unsalted SHA-256 of the value's string form.
 * Known values can be re-identified by hashing candidates.
 */
export const digest = (value: unknown): string =>
    createHash('sha256').update(String(value)).digest('hex').slice(0, DIGEST_LENGTH)

/**
 * Plain key/value records only: object literals, parsed JSON and null-prototype objects.
 * Arrays, Maps, Dates and class instances are not mappings.
 */
export const isMapping = (value: unknown): value is object => {
    if (typeof value !== 'object' || value === null) return false
    const prototype = Object.getPrototypeOf(value)
    return prototype === Object.prototype || prototype === null
}

/**
 * Copies a profile, replacing every sensitive field with its digest.
 * Other fields are passed through by reference; the input is not modified.
 */
export const anonymizeProfile = (
    profile: object,
    sensitiveFields: ReadonlySet<string> = SENSITIVE_FIELDS
): AnonymizedProfile => {
    const anonymized: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(profile)) {
        anonymized[key] = sensitiveFields.has(key) ? digest(value) : value
    }
    return anonymized
}

/**
 * Anonymizes a flat mapping. Anything that is not a mapping is returned unchanged.
 */
export const anonymize = (data: unknown, sensitiveFields: ReadonlySet<string> = SENSITIVE_FIELDS): unknown =>
    isMapping(data) ? anonymizeProfile(data, sensitiveFields) : data
