import { getQuarter, getYear, isValid, parseISO } from "date-fns";
import type { ClassCounts, LedgerEntry } from "../../schema/src/schema.js";
import { parseInstant } from "../../schema/src/validate.js";

export type ClearanceRates = {
  cutoff: string;
  quarters_observed: number;
  // average blocks cleared per observed quarter, keyed like ClassCounts
  per_quarter: ClassCounts;
};

export function quarterKey(resolvedDate: string): string | null {
  const d = parseISO(resolvedDate);
  if (!isValid(d)) return null;
  return `${getYear(d)}-Q${getQuarter(d)}`;
}

/**
 * Average clearances per quarter, per size class, over ledger entries resolved
 * on or before cutoff.
 *
 * The denominator is the number of distinct quarters that hold at least one
 * entry of any class. A class absent from a populated quarter counts 0 there;
 * calendar quarters with no entries at all are not counted.
 */
export function clearanceRates(ledger: readonly LedgerEntry[], cutoff: string | Date): ClearanceRates {
  const cut = parseInstant(cutoff);

  const quarters = new Set<string>();
  const totals: ClassCounts = {};

  for (const e of ledger) {
    const t = Date.parse(e.resolved_date);
    if (Number.isNaN(t) || t > cut) continue;

    const q = quarterKey(e.resolved_date);
    if (q == null) continue;

    quarters.add(q);
    const k = String(e.size_class);
    totals[k] = (totals[k] ?? 0) + 1;
  }

  const per_quarter: ClassCounts = {};
  if (quarters.size > 0) {
    for (const [k, n] of Object.entries(totals)) per_quarter[k] = n / quarters.size;
  }

  return {
    cutoff: new Date(cut).toISOString(),
    quarters_observed: quarters.size,
    per_quarter,
  };
}

export function rateFor(rates: ClearanceRates, cls: number): number {
  return rates.per_quarter[String(cls)] ?? 0;
}
