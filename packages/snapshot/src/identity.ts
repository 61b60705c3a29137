import type { RequestRecord } from "../../schema/src/schema.js";

/**
 * How a record is recognised across two snapshots.
 *
 * The registry exposes no request id, so the default keys on the action
 * timestamp. Two requests actioned at the same instant collide; swap the
 * identity here once a stronger key exists.
 */
export type RecordIdentity = {
  name: string;
  keyOf(record: RequestRecord): string;
};

export const byActionTimestamp: RecordIdentity = {
  name: "action_timestamp",
  keyOf: (r) => r.action_timestamp,
};

// Later records win on duplicate keys.
export function indexByIdentity(
  records: readonly RequestRecord[],
  identity: RecordIdentity = byActionTimestamp
): Map<string, RequestRecord> {
  const m = new Map<string, RequestRecord>();
  for (const r of records) m.set(identity.keyOf(r), r);
  return m;
}
