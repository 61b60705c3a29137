import type { AggregateRow } from "../../analyze/src/aggregate.js";
import { AGE_BUCKETS } from "../../analyze/src/age.js";
import { SIZE_CLASSES } from "../../schema/src/schema.js";

/* ----------------------------- Formatting ---------------------------- */

export function fmtFixed(n: number, digits: number): string {
  if (!Number.isFinite(n)) return n > 0 ? "inf" : n < 0 ? "-inf" : "nan";
  return n.toFixed(digits);
}

export function fmtCount(n: number): string {
  if (!Number.isFinite(n)) return n > 0 ? "inf" : n < 0 ? "-inf" : "nan";
  return String(n);
}

/* ------------------------------ Columns ------------------------------ */

type Column = { name: string; value: (r: AggregateRow) => string };

function classColumns(prefix: string, suffix: string, value: (r: AggregateRow, cls: 22 | 23 | 24) => string): Column[] {
  return SIZE_CLASSES.map((cls) => ({ name: `${prefix}${cls}${suffix}`, value: (r) => value(r, cls) }));
}

const COLUMNS: Column[] = [
  { name: "timestamp", value: (r) => r.timestamp },
  { name: "total_requests", value: (r) => fmtCount(r.total_requests) },
  ...classColumns("requests_", "", (r, c) => fmtCount(r.requests[c])),
  ...classColumns("avg_", "_cleared_per_quarter", (r, c) => fmtFixed(r.cleared_per_quarter[c], 1)),
  ...SIZE_CLASSES.flatMap((c): Column[] => [
    { name: `estimated_quarters_${c}`, value: (r) => fmtCount(r.estimates[c].quarters) },
    { name: `estimated_years_${c}`, value: (r) => fmtFixed(r.estimates[c].years, 1) },
  ]),
  ...classColumns("added_", "", (r, c) => fmtCount(r.churn.added[c])),
  { name: "added_total", value: (r) => fmtCount(r.churn.added_total) },
  ...classColumns("removed_", "", (r, c) => fmtCount(r.churn.removed[c])),
  { name: "removed_total", value: (r) => fmtCount(r.churn.removed_total) },
  { name: "net_change", value: (r) => fmtCount(r.churn.net_change) },
  { name: "exact_requests", value: (r) => fmtCount(r.flexibility.exact_count) },
  { name: "flexible_requests", value: (r) => fmtCount(r.flexibility.flexible_count) },
  { name: "avg_flexibility", value: (r) => fmtFixed(r.flexibility.avg_flexibility, 2) },
  { name: "size_changes", value: (r) => fmtCount(r.size_changes.size_changes) },
  { name: "upsize_changes", value: (r) => fmtCount(r.size_changes.upsize_changes) },
  { name: "downsize_changes", value: (r) => fmtCount(r.size_changes.downsize_changes) },
  { name: "flexibility_changes", value: (r) => fmtCount(r.size_changes.flexibility_changes) },
  ...AGE_BUCKETS.map((b): Column => ({ name: `age_${b}`, value: (r) => fmtCount(r.ages.overall[b]) })),
  ...SIZE_CLASSES.flatMap((c) =>
    AGE_BUCKETS.map((b): Column => ({ name: `age_${b}_${c}`, value: (r) => fmtCount(r.ages.by_class[c][b]) }))
  ),
  { name: "avg_age_days", value: (r) => fmtFixed(r.ages.summary.mean_days, 1) },
  { name: "median_age_days", value: (r) => fmtFixed(r.ages.summary.median_days, 1) },
  { name: "min_age_days", value: (r) => fmtFixed(r.ages.summary.min_days, 1) },
  { name: "max_age_days", value: (r) => fmtFixed(r.ages.summary.max_days, 1) },
];

export const ROW_COLUMNS: readonly string[] = COLUMNS.map((c) => c.name);

/** Every statistic of the row as one flat, ordered record of strings. */
export function flattenRow(row: AggregateRow): Record<string, string> {
  const out: Record<string, string> = {};
  for (const c of COLUMNS) out[c.name] = c.value(row);
  return out;
}

export function rowValues(row: AggregateRow): string[] {
  return COLUMNS.map((c) => c.value(row));
}
