export { ReportService } from './reportService'
export type { MatchListEntry } from './reportService'
export { compileReportTemplates, registerReportHelpers } from './helpers'
export type { ReportTemplate } from './helpers'
