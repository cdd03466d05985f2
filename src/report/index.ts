/**
 * @entry Report 运行结果汇总
 */

export { formatDriveResult, formatSummary, formatFailures } from './formatSummary.js'
export { reportSummary, type ReportOptions, type ReportResult } from './reportSummary.js'
