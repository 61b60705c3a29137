// packages/timeseries/src/replay.ts
import type { LedgerEntry, Snapshot } from "../../schema/src/schema.js";
import { parseInstant } from "../../schema/src/validate.js";
import { parseSnapshotPayload } from "../../snapshot/src/normalize.js";
import type { RecordIdentity } from "../../snapshot/src/identity.js";
import { analyzeSnapshot, type AggregateRow } from "../../analyze/src/aggregate.js";
import { silentLogger, type Logger } from "./log.js";

/**
 * Time-series replay over an ordered history of waitlist snapshots.
 *
 * The only state carried between elements is the last successfully processed
 * snapshot, and it is passed in and out explicitly. A row therefore depends on
 * nothing but its own element, that previous snapshot and the ledger, so any
 * suffix of the history can be recomputed from an injected state.
 */

export type ReplayElement = {
  // commit sha, file name, ... (used in progress messages)
  ref: string;
  reference_instant: string;
  // raw JSON text; may throw when the revision no longer resolves
  load: () => string;
};

export type ReplayState = {
  previous: Snapshot | null;
};

export type ReplayContext = {
  // null when the ledger could not be fetched: rates 0, waits infinite
  ledger: readonly LedgerEntry[] | null;
  identity?: RecordIdentity;
  log?: Logger;
};

export type ReplayStepResult =
  | { ok: true; ref: string; row: AggregateRow; state: ReplayState }
  | { ok: false; ref: string; error: string; state: ReplayState };

export const initialReplayState: ReplayState = { previous: null };

export function replayStep(
  state: ReplayState,
  element: ReplayElement,
  ctx: ReplayContext
): ReplayStepResult {
  let current: Snapshot;
  try {
    parseInstant(element.reference_instant);
    current = parseSnapshotPayload(element.load());
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    // baseline stays where it was
    return { ok: false, ref: element.ref, error: msg, state };
  }

  const row = analyzeSnapshot(current, state.previous, element.reference_instant, ctx.ledger, {
    identity: ctx.identity,
  });

  return { ok: true, ref: element.ref, row, state: { previous: current } };
}

/**
 * Lazily yields one row per element that loads and parses, in input order.
 * Each call starts from `initial`; nothing is cached between calls.
 */
export function* replaySnapshots(
  elements: Iterable<ReplayElement>,
  ctx: ReplayContext,
  initial: ReplayState = initialReplayState
): Generator<AggregateRow, ReplayState, undefined> {
  const log = ctx.log ?? silentLogger;
  let state = initial;
  let i = 0;

  for (const el of elements) {
    i++;
    const r = replayStep(state, el, ctx);
    state = r.state;

    if (!r.ok) {
      log.warn(`skipping ${r.ref} (${i}): ${r.error}`);
      continue;
    }

    log.info(`processed ${r.ref} (${i}) at ${el.reference_instant}: ${r.row.total_requests} requests`);
    yield r.row;
  }

  return state;
}

/** Eager fold; same rows as replaySnapshots plus the final state. */
export function replayAll(
  elements: Iterable<ReplayElement>,
  ctx: ReplayContext,
  initial: ReplayState = initialReplayState
): { rows: AggregateRow[]; skipped: Array<{ ref: string; error: string }>; state: ReplayState } {
  const rows: AggregateRow[] = [];
  const skipped: Array<{ ref: string; error: string }> = [];

  let state = initial;
  for (const el of elements) {
    const r = replayStep(state, el, ctx);
    state = r.state;
    if (r.ok) rows.push(r.row);
    else skipped.push({ ref: r.ref, error: r.error });
  }

  return { rows, skipped, state };
}
