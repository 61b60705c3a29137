import { SIZE_CLASSES, type Snapshot, type SizeClass } from "../../schema/src/schema.js";
import { parseInstant } from "../../schema/src/validate.js";

export const DAYS_PER_MONTH = 30.44;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type AgeBucket = "0_3mo" | "3_6mo" | "6_12mo" | "12_24mo" | "24plus";

export const AGE_BUCKETS: readonly AgeBucket[] = ["0_3mo", "3_6mo", "6_12mo", "12_24mo", "24plus"];

export type AgeBuckets = Record<AgeBucket, number>;

export type AgeSummary = {
  mean_days: number;
  median_days: number;
  min_days: number;
  max_days: number;
};

export type AgeDistribution = {
  reference_instant: string;
  // records whose action_timestamp parsed
  counted: number;
  skipped: number;
  overall: AgeBuckets;
  by_class: Record<SizeClass, AgeBuckets>;
  summary: AgeSummary;
};

export function emptyBuckets(): AgeBuckets {
  return { "0_3mo": 0, "3_6mo": 0, "6_12mo": 0, "12_24mo": 0, "24plus": 0 };
}

// Negative ages (action after reference) land in the youngest bucket.
export function bucketForAge(ageDays: number): AgeBucket {
  const months = ageDays / DAYS_PER_MONTH;
  if (months < 3) return "0_3mo";
  if (months < 6) return "3_6mo";
  if (months < 12) return "6_12mo";
  if (months < 24) return "12_24mo";
  return "24plus";
}

function isSizeClass(n: number | null): n is SizeClass {
  return n != null && SIZE_CLASSES.some((c) => c === n);
}

/**
 * Ages every record relative to referenceInstant.
 * Per-class breakdown keys on min_cidr (the smallest block the requester accepts).
 */
export function ageDistribution(snapshot: Snapshot, referenceInstant: string | Date): AgeDistribution {
  const ref = parseInstant(referenceInstant);

  const overall = emptyBuckets();
  const by_class: Record<SizeClass, AgeBuckets> = {
    22: emptyBuckets(),
    23: emptyBuckets(),
    24: emptyBuckets(),
  };
  const ages: number[] = [];
  let skipped = 0;

  for (const r of snapshot.records) {
    const t = Date.parse(r.action_timestamp);
    if (Number.isNaN(t)) {
      skipped++;
      continue;
    }

    const days = (ref - t) / MS_PER_DAY;
    const bucket = bucketForAge(days);
    ages.push(days);
    overall[bucket]++;
    if (isSizeClass(r.min_cidr)) by_class[r.min_cidr][bucket]++;
  }

  return {
    reference_instant: new Date(ref).toISOString(),
    counted: ages.length,
    skipped,
    overall,
    by_class,
    summary: summarize(ages),
  };
}

export function summarize(ages: readonly number[]): AgeSummary {
  if (ages.length === 0) return { mean_days: 0, median_days: 0, min_days: 0, max_days: 0 };

  const sorted = [...ages].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, x) => acc + x, 0);

  return {
    mean_days: sum / sorted.length,
    median_days: sorted[Math.floor(sorted.length / 2)] ?? 0,
    min_days: sorted[0] ?? 0,
    max_days: sorted[sorted.length - 1] ?? 0,
  };
}
