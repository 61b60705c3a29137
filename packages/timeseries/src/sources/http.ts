import { fetch } from "undici";
import type { LedgerEntry, Snapshot } from "../../../schema/src/schema.js";
import { parseSnapshotPayload } from "../../../snapshot/src/normalize.js";
import { parseLedgerCsv } from "../../../analyze/src/ledger.js";

export class FetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, status: number | null, message: string) {
    super(message);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }
}

export type TextFetcher = (url: string, timeoutMs: number) => Promise<string>;

// No retries: a failure surfaces to the caller.
export const fetchText: TextFetcher = async (url, timeoutMs) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const resp = await fetch(url, {
      signal: controller.signal,
      headers: { Accept: "application/json, text/csv, */*" },
    });
    if (!resp.ok) {
      throw new FetchError(url, resp.status, `GET ${url} failed: HTTP ${resp.status}`);
    }
    return await resp.text();
  } catch (e) {
    if (e instanceof FetchError) throw e;
    const msg = controller.signal.aborted
      ? `timed out after ${timeoutMs}ms`
      : e instanceof Error
      ? e.message
      : String(e);
    throw new FetchError(url, null, `GET ${url} failed: ${msg}`);
  } finally {
    clearTimeout(timer);
  }
};

export async function fetchWaitlist(
  url: string,
  timeoutMs: number,
  fetcher: TextFetcher = fetchText
): Promise<Snapshot> {
  return parseSnapshotPayload(await fetcher(url, timeoutMs));
}

export async function fetchLedger(
  url: string,
  timeoutMs: number,
  fetcher: TextFetcher = fetchText
): Promise<LedgerEntry[]> {
  return parseLedgerCsv(await fetcher(url, timeoutMs));
}
