import Handlebars from 'handlebars'
import type { TemplateDelegate as HandlebarsTemplateDelegate } from 'handlebars'
import {
    COMPATIBILITY_ANALYSIS_TEMPLATE,
    FAMILY_DETAILS_TEMPLATE,
    FAMILY_LABEL_TEMPLATE,
    MATCH_LIST_TEMPLATE,
} from '../../model/messages'

export type ReportTemplate = 'match-list' | 'family-label' | 'family-details' | 'compatibility-analysis'

/**
 * Register Handlebars helpers used by the report templates
 */
export const registerReportHelpers = (): void => {
    // Comma separated list, or the value itself when it is not a list
    Handlebars.registerHelper('join', (value: unknown) => {
        if (Array.isArray(value)) {
            return value.map((item) => String(item)).join(', ')
        }
        return value === null || value === undefined ? '' : String(value)
    })
}

/**
 * Compiles the plain-text report templates. Output is not HTML-escaped.
 */
export const compileReportTemplates = (): Map<ReportTemplate, HandlebarsTemplateDelegate> => {
    registerReportHelpers()
    const options = { noEscape: true }
    const templates = new Map<ReportTemplate, HandlebarsTemplateDelegate>()
    templates.set('match-list', Handlebars.compile(MATCH_LIST_TEMPLATE, options))
    templates.set('family-label', Handlebars.compile(FAMILY_LABEL_TEMPLATE, options))
    templates.set('family-details', Handlebars.compile(FAMILY_DETAILS_TEMPLATE, options))
    templates.set('compatibility-analysis', Handlebars.compile(COMPATIBILITY_ANALYSIS_TEMPLATE, options))
    return templates
}
