export { ROW_COLUMNS, flattenRow, rowValues, fmtFixed, fmtCount } from "./columns.js";
export { renderCsv, csvHeader, csvLine } from "./csv.js";
export type { CsvRenderOptions } from "./csv.js";
export { explainRow, renderTextReport } from "./text-report.js";
export type { ReportLine } from "./text-report.js";
