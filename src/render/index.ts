// pattern: Functional Core (barrel export)

export type { ReportBuilder, HeadingLevel, FieldValue } from './report.ts';
export { createReportBuilder, formatTimestamp, enabledLabel, yesNo } from './report.ts';
