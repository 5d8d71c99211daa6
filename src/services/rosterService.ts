import { SEED_FAMILIES } from '../data/roster'
import { MatchingErrorType } from '../model/error'
import { FamilyProfile } from '../model/profile'
import { LogService } from './logService'

/**
 * Read-only, in-memory roster of prospective families.
 * Adding, editing and removing families is not supported.
 */
export class RosterService {
    private readonly families: readonly FamilyProfile[]
    private readonly familiesById: ReadonlyMap<string, FamilyProfile>

    constructor(
        private log: LogService,
        families: readonly FamilyProfile[] = SEED_FAMILIES
    ) {
        this.families = [...families]
        this.familiesById = new Map(this.families.map((family) => [family.id, family]))
        this.log.assert(
            this.familiesById.size === this.families.length,
            'Roster contains duplicate family identifiers',
            undefined,
            'warn'
        )
        this.log.debug(`Roster loaded with ${this.families.length} families`)
    }

    public list(): readonly FamilyProfile[] {
        return this.families
    }

    public get size(): number {
        return this.families.length
    }

    public get(id: string): FamilyProfile | undefined {
        return this.familiesById.get(id)
    }

    /**
     * @throws {MatchingError} NotFound when the id is not on the roster
     */
    public require(id: string): FamilyProfile {
        const family = this.familiesById.get(id)
        if (!family) {
            return this.log.crash(`Family [${id}] is not on the roster`, undefined, MatchingErrorType.NotFound)
        }
        return family
    }
}
