import type { ClassCounts, RequestRecord, Snapshot } from "../../schema/src/schema.js";
import {
  byActionTimestamp,
  indexByIdentity,
  type RecordIdentity,
} from "../../snapshot/src/identity.js";

export type FlexibilityStats = {
  exact_count: number;
  flexible_count: number;
  // exact_count + flexible_count covers every record
  // mean |max_cidr - min_cidr| over records carrying both bounds; 0 when none do
  avg_flexibility: number;
};

export type SizeChangeStats = {
  size_changes: number;
  upsize_changes: number; // max_cidr went down: wants a larger block
  downsize_changes: number;
  flexibility_changes: number; // exact <-> flexible flips
};

export type SnapshotDiff = {
  added: ClassCounts;
  removed: ClassCounts;
  added_total: number;
  removed_total: number;

  flexibility: FlexibilityStats;
  size_changes: SizeChangeStats;
};

export function isExact(r: RequestRecord): boolean {
  return r.min_cidr != null && r.min_cidr === r.max_cidr;
}

// No minimum means "exact only when explicitly equal", so it is flexible.
export function isFlexible(r: RequestRecord): boolean {
  return !isExact(r);
}

export function flexibilityOf(r: RequestRecord): number | null {
  return r.min_cidr == null ? null : Math.abs(r.max_cidr - r.min_cidr);
}

export function countFor(counts: ClassCounts, cls: number): number {
  return counts[String(cls)] ?? 0;
}

/**
 * Churn and change statistics between two snapshots.
 * previous = null means first observation: everything counts as added.
 */
export function diffSnapshots(
  current: Snapshot,
  previous: Snapshot | null,
  identity: RecordIdentity = byActionTimestamp
): SnapshotDiff {
  const cur = indexByIdentity(current.records, identity);
  const prev = indexByIdentity(previous?.records ?? [], identity);

  const added: ClassCounts = {};
  const removed: ClassCounts = {};
  let added_total = 0;
  let removed_total = 0;

  for (const [k, r] of cur) {
    if (prev.has(k)) continue;
    bump(added, r.max_cidr);
    added_total++;
  }
  for (const [k, r] of prev) {
    if (cur.has(k)) continue;
    bump(removed, r.max_cidr);
    removed_total++;
  }

  const size_changes: SizeChangeStats = {
    size_changes: 0,
    upsize_changes: 0,
    downsize_changes: 0,
    flexibility_changes: 0,
  };

  for (const [k, now] of cur) {
    const before = prev.get(k);
    if (!before) continue;

    if (now.min_cidr !== before.min_cidr || now.max_cidr !== before.max_cidr) {
      size_changes.size_changes++;
    }
    if (now.max_cidr < before.max_cidr) size_changes.upsize_changes++;
    else if (now.max_cidr > before.max_cidr) size_changes.downsize_changes++;

    if (isExact(now) !== isExact(before)) size_changes.flexibility_changes++;
  }

  return {
    added,
    removed,
    added_total,
    removed_total,
    flexibility: flexibilityStats(current.records),
    size_changes,
  };
}

export function flexibilityStats(records: readonly RequestRecord[]): FlexibilityStats {
  let exact_count = 0;
  let flexible_count = 0;
  let sum = 0;
  let n = 0;

  for (const r of records) {
    if (isExact(r)) exact_count++;
    else flexible_count++;

    const f = flexibilityOf(r);
    if (f == null) continue;
    sum += f;
    n++;
  }

  return { exact_count, flexible_count, avg_flexibility: n > 0 ? sum / n : 0 };
}

export function countByMaxCidr(records: readonly RequestRecord[]): ClassCounts {
  const out: ClassCounts = {};
  for (const r of records) bump(out, r.max_cidr);
  return out;
}

function bump(counts: ClassCounts, cls: number): void {
  const k = String(cls);
  counts[k] = (counts[k] ?? 0) + 1;
}
