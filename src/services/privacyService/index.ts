export { anonymize, anonymizeProfile, digest, isMapping, PII_FIELDS, SENSITIVE_FIELDS, DIGEST_LENGTH } from './anonymizer'
export { validateCompliance, missingFields, REQUIRED_FIELDS, CHILD_REQUIRED_FIELDS, isCompleteChildProfile } from './compliance'
export type { AnonymizedProfile } from './types'
