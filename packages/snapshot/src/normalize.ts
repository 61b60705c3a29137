import type { RequestRecord, Snapshot } from "../../schema/src/schema.js";
import {
  RawRecordSchema,
  parseCidr,
  parseJsonText,
  parseSnapshotArray,
  parseTimestamp,
  type RawRecord,
} from "../../schema/src/validate.js";

// Naming conventions seen across live API responses and archived page extracts.
export const TIMESTAMP_KEYS = [
  "waitListActionDate",
  "waitlistActionDate",
  "waitlistactiondate",
  "actionDate",
  "action_date",
] as const;

export const MAX_CIDR_KEYS = ["maximumCidr", "maximumcidr", "maxCidr", "max_cidr"] as const;

export const MIN_CIDR_KEYS = ["minimumCidr", "minimumcidr", "minCidr", "min_cidr"] as const;

export type NormalizeStats = {
  received: number;
  kept: number;
  dropped: number;
};

export function parseSnapshotPayload(text: string): Snapshot {
  return normalizeSnapshot(parseJsonText(text, "SNAPSHOT"));
}

export function normalizeSnapshot(input: unknown): Snapshot {
  return normalizeSnapshotWithStats(input).snapshot;
}

export function normalizeSnapshotWithStats(input: unknown): {
  snapshot: Snapshot;
  stats: NormalizeStats;
} {
  const raw = parseSnapshotArray(input);
  const records: RequestRecord[] = [];

  for (const item of raw) {
    const rec = normalizeRecord(item);
    if (rec) records.push(rec);
  }

  return {
    snapshot: { records, reference_instant: latestInstant(records) },
    stats: { received: raw.length, kept: records.length, dropped: raw.length - records.length },
  };
}

/**
 * Returns null for records that cannot be retained: not an object, no usable
 * max_cidr, or no timestamp string at all. An unparseable timestamp string is kept.
 */
export function normalizeRecord(item: unknown): RequestRecord | null {
  const r = RawRecordSchema.safeParse(item);
  if (!r.success) return null;
  const raw = r.data;

  const max_cidr = parseCidr(firstPresent(raw, MAX_CIDR_KEYS));
  if (max_cidr == null) return null;

  const action_timestamp = parseTimestamp(firstPresent(raw, TIMESTAMP_KEYS));
  if (action_timestamp == null) return null;

  const min_cidr = parseCidr(firstPresent(raw, MIN_CIDR_KEYS));

  return { action_timestamp, min_cidr, max_cidr };
}

function firstPresent(raw: RawRecord, keys: readonly string[]): unknown {
  for (const k of keys) {
    const v = raw[k];
    if (v !== undefined && v !== null) return v;
  }
  return undefined;
}

function latestInstant(records: RequestRecord[]): string | null {
  let best: { t: number; ts: string } | null = null;
  for (const r of records) {
    const t = Date.parse(r.action_timestamp);
    if (Number.isNaN(t)) continue;
    if (!best || t > best.t) best = { t, ts: r.action_timestamp };
  }
  return best ? best.ts : null;
}
