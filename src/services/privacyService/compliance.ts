import { CHILD_PROFILE_SCHEMA, ChildProfile, fieldsOf } from '../../model/profile'
import { isMapping } from './anonymizer'

export const REQUIRED_FIELDS: readonly string[] = ['age_range', 'preferences', 'location_region']

/**
 * Equivalent required set for the child intake form: every field the child schema declares
 */
export const CHILD_REQUIRED_FIELDS: readonly string[] = fieldsOf(CHILD_PROFILE_SCHEMA)

/**
 * Required fields that are not present as keys. Presence only: empty strings,
 * zero and null all count as present.
 */
export const missingFields = (data: unknown, requiredFields: readonly string[] = REQUIRED_FIELDS): string[] => {
    if (!isMapping(data)) return [...requiredFields]
    return requiredFields.filter((field) => !Object.prototype.hasOwnProperty.call(data, field))
}

/**
 * True only if every required field is present as a key, whatever its value
 */
export const validateCompliance = (data: unknown, requiredFields: readonly string[] = REQUIRED_FIELDS): boolean =>
    missingFields(data, requiredFields).length === 0

/**
 * Presence-only guard for intake forms: every child field is present as a key
 */
export const isCompleteChildProfile = (child: Partial<ChildProfile>): child is ChildProfile =>
    validateCompliance(child, CHILD_REQUIRED_FIELDS)
