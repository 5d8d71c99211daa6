import { createHash } from 'crypto'
import { anonymize, anonymizeProfile, digest, PII_FIELDS, SENSITIVE_FIELDS } from '../anonymizer'

const sha8 = (value: string) => createHash('sha256').update(value).digest('hex').slice(0, 8)

describe('anonymizer', () => {
    const record = {
        name: 'Jordan Example',
        address: '1 Test Lane',
        phone: '555-0100',
        email: 'jordan@example.org',
        ssn: '000-00-0000',
        age_range: '30-45',
        interests: ['art', 'music'],
    }

    describe('digest', () => {
        it('should return the first 8 hex characters of the SHA-256 of the string form', () => {
            expect(digest('Jordan Example')).toBe(sha8('Jordan Example'))
            expect(digest(42)).toBe(sha8('42'))
            expect(digest(null)).toBe(sha8('null'))
        })

        it('should be deterministic', () => {
            expect(digest('same value')).toBe(digest('same value'))
        })
    })

    describe('anonymize', () => {
        it('should hash every fixed PII field', () => {
            const result = anonymizeProfile(record)
            for (const field of PII_FIELDS) {
                expect(result[field]).toMatch(/^[0-9a-f]{8}$/)
            }
            expect(result.name).toBe(sha8('Jordan Example'))
            expect(result.email).not.toBe('jordan@example.org')
        })

        it('should pass other fields through by reference', () => {
            const result = anonymizeProfile(record)
            expect(result.age_range).toBe('30-45')
            expect(result.interests).toBe(record.interests)
        })

        it('should not modify the input', () => {
            const copy = { ...record }
            anonymizeProfile(record)
            expect(record).toEqual(copy)
        })

        it('should give the same digests when run twice', () => {
            expect(anonymizeProfile(record)).toEqual(anonymizeProfile(record))
        })

        it('should leave non-sensitive fields unchanged when re-applied to its own output', () => {
            const once = anonymizeProfile(record)
            const twice = anonymizeProfile(once)
            expect(twice.age_range).toBe(once.age_range)
            expect(twice.interests).toBe(once.interests)
        })

        it('should hash only fields in the given set', () => {
            const result = anonymizeProfile(record, new Set(['age_range']))
            expect(result.age_range).toBe(sha8('30-45'))
            expect(result.name).toBe('Jordan Example')
        })

        it('should return non-mapping input unchanged', () => {
            const list = ['a', 'b']
            expect(anonymize('plain text')).toBe('plain text')
            expect(anonymize(7)).toBe(7)
            expect(anonymize(null)).toBeNull()
            expect(anonymize(list)).toBe(list)
        })

        it('should return maps, dates and class instances unchanged', () => {
            class Household {
                name = 'Jordan Example'
            }
            const map = new Map([['name', 'Jordan Example']])
            const date = new Date(0)
            const household = new Household()

            expect(anonymize(map)).toBe(map)
            expect(anonymize(date)).toBe(date)
            expect(anonymize(household)).toBe(household)
            expect(map.get('name')).toBe('Jordan Example')
        })

        it('should anonymize records without a prototype', () => {
            const bare: Record<string, unknown> = Object.create(null)
            bare.email = 'jordan@example.org'

            expect(anonymize(bare)).toEqual({ email: sha8('jordan@example.org') })
        })

        it('should anonymize mappings', () => {
            expect(anonymize({ phone: '555-0100', pets: 'One cat' })).toEqual({
                phone: sha8('555-0100'),
                pets: 'One cat',
            })
        })
    })

    describe('SENSITIVE_FIELDS', () => {
        it('should contain the fixed PII field names', () => {
            expect([...SENSITIVE_FIELDS].sort()).toEqual(['address', 'email', 'name', 'phone', 'ssn'])
        })
    })
})
