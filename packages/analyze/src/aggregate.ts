import type { ClassCounts, LedgerEntry, SizeClass, Snapshot } from "../../schema/src/schema.js";
import type { RecordIdentity } from "../../snapshot/src/identity.js";
import { ageDistribution, type AgeBuckets, type AgeSummary } from "./age.js";
import {
  countByMaxCidr,
  countFor,
  diffSnapshots,
  type FlexibilityStats,
  type SizeChangeStats,
} from "./diff.js";
import { projectWaitTimes, type WaitProjection } from "./projection.js";
import { clearanceRates, rateFor } from "./rates.js";

export type PerClass<T> = Record<SizeClass, T>;

export type AggregateRow = {
  timestamp: string;

  total_requests: number;
  requests: PerClass<number>;

  // 0 for every class when the ledger is unavailable
  cleared_per_quarter: PerClass<number>;
  estimates: WaitProjection;

  churn: {
    added: PerClass<number>;
    removed: PerClass<number>;
    added_total: number;
    removed_total: number;
    net_change: number;
  };

  flexibility: FlexibilityStats;
  size_changes: SizeChangeStats;

  ages: {
    overall: AgeBuckets;
    by_class: PerClass<AgeBuckets>;
    summary: AgeSummary;
  };
};

export type AnalyzeOptions = {
  identity?: RecordIdentity;
};

function perClass(counts: ClassCounts): PerClass<number> {
  return { 22: countFor(counts, 22), 23: countFor(counts, 23), 24: countFor(counts, 24) };
}

/**
 * One row of the time series. Depends only on (current, previous, referenceInstant,
 * ledger); nothing is carried between calls.
 */
export function analyzeSnapshot(
  current: Snapshot,
  previous: Snapshot | null,
  referenceInstant: string,
  ledger: readonly LedgerEntry[] | null,
  opts: AnalyzeOptions = {}
): AggregateRow {
  const diff = diffSnapshots(current, previous, opts.identity);
  const ages = ageDistribution(current, referenceInstant);

  const requests = perClass(countByMaxCidr(current.records));

  const rates = ledger ? clearanceRates(ledger, referenceInstant) : null;
  const cleared_per_quarter: PerClass<number> = {
    22: rates ? rateFor(rates, 22) : 0,
    23: rates ? rateFor(rates, 23) : 0,
    24: rates ? rateFor(rates, 24) : 0,
  };

  const estimates = projectWaitTimes(
    { "22": requests[22], "23": requests[23], "24": requests[24] },
    { "22": cleared_per_quarter[22], "23": cleared_per_quarter[23], "24": cleared_per_quarter[24] }
  );

  return {
    timestamp: referenceInstant,
    total_requests: current.records.length,
    requests,
    cleared_per_quarter,
    estimates,
    churn: {
      added: perClass(diff.added),
      removed: perClass(diff.removed),
      added_total: diff.added_total,
      removed_total: diff.removed_total,
      net_change: diff.added_total - diff.removed_total,
    },
    flexibility: diff.flexibility,
    size_changes: diff.size_changes,
    ages: {
      overall: ages.overall,
      by_class: ages.by_class,
      summary: ages.summary,
    },
  };
}
