/**
 * Report Module
 */

export { renderReport, parseSeverityList, type RenderReportOptions } from './render-report';
