// ---------- Snapshot diff (stable public API) ----------
export {
  diffSnapshots,
  flexibilityStats,
  countByMaxCidr,
  countFor,
  isExact,
  isFlexible,
  flexibilityOf,
} from "./diff.js";

export type { SnapshotDiff, FlexibilityStats, SizeChangeStats } from "./diff.js";

// ---------- Age distribution ----------
export { ageDistribution, bucketForAge, emptyBuckets, summarize, AGE_BUCKETS, DAYS_PER_MONTH } from "./age.js";

export type { AgeBucket, AgeBuckets, AgeDistribution, AgeSummary } from "./age.js";

// ---------- Clearance rates + projection ----------
export { clearanceRates, quarterKey, rateFor } from "./rates.js";
export type { ClearanceRates } from "./rates.js";

export { parseLedgerCsv, parseReissueDate, sizeClassFromPrefix } from "./ledger.js";

export { estimateWait, projectWaitTimes } from "./projection.js";
export type { WaitEstimate, WaitProjection } from "./projection.js";

// ---------- Aggregate row ----------
export { analyzeSnapshot } from "./aggregate.js";
export type { AggregateRow, AnalyzeOptions, PerClass } from "./aggregate.js";
