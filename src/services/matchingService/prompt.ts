import Handlebars from 'handlebars'
import { MATCHING_PROMPT_TEMPLATE } from '../../model/messages'
import { AnonymizedProfile } from '../privacyService'

const matchingPrompt = Handlebars.compile(MATCHING_PROMPT_TEMPLATE, { noEscape: true })

/**
 * Renders the fixed matching prompt for one anonymized child/family pair
 */
export const buildMatchingPrompt = (child: AnonymizedProfile, family: AnonymizedProfile): string =>
    matchingPrompt({
        childProfile: JSON.stringify(child, null, 2),
        familyProfile: JSON.stringify(family, null, 2),
    })
