// Canonical waitlist schema v1
// Types only. No functions.

export type ISO8601 = string;

/* ---------------------------- Size classes --------------------------- */

// Smaller prefix length = larger block.
export type SizeClass = 22 | 23 | 24;

export const SIZE_CLASSES: readonly SizeClass[] = [22, 23, 24] as const;

// Counter keyed by the class integer rendered as a string ("22", "24", ...).
// Only classes that occurred are present.
export type ClassCounts = Record<string, number>;

/* --------------------------- Request record -------------------------- */

export interface RequestRecord {
  // Source string, kept verbatim. Doubles as the record identity within a snapshot.
  action_timestamp: ISO8601;

  // null = absent. 0 is a present value.
  min_cidr: number | null;

  max_cidr: number;
}

/* ------------------------------ Snapshot ----------------------------- */

export interface Snapshot {
  records: RequestRecord[];

  // action_timestamp of the latest parseable record, or null when none parse.
  reference_instant: ISO8601 | null;
}

/* --------------------------- Clearance ledger ------------------------ */

export interface LedgerEntry {
  resolved_date: string; // YYYY-MM-DD
  size_class: number;
}
