// packages/timeseries/src/cli/waitq.ts
import * as fs from "node:fs";
import * as path from "node:path";

import type { LedgerEntry, Snapshot } from "../../../schema/src/schema.js";
import { parseSnapshotPayload } from "../../../snapshot/src/normalize.js";
import { parseLedgerCsv } from "../../../analyze/src/ledger.js";
import { analyzeSnapshot } from "../../../analyze/src/aggregate.js";
import { csvHeader, csvLine, renderCsv } from "../../../report/src/csv.js";
import { renderTextReport } from "../../../report/src/text-report.js";

import { createLogger, type LogSink, type Logger } from "../log.js";
import { loadSettings, type Settings } from "../settings.js";
import { replaySnapshots } from "../replay.js";
import { fetchLedger, fetchText, fetchWaitlist, type TextFetcher } from "../sources/http.js";
import { historyElements, listFileHistory, spawnGit, type GitRunner } from "../sources/git-history.js";
import { extractWaitlistFromHtml } from "../sources/html.js";

export const VERSION = "1.0.0";

export type CliIo = {
  stdout: LogSink;
  stderr: LogSink;
  cwd: string;
  env: Record<string, string | undefined>;
  now: () => Date;
  fetcher: TextFetcher;
  git: GitRunner;
};

export function defaultIo(): CliIo {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
    env: process.env,
    now: () => new Date(),
    fetcher: fetchText,
    git: spawnGit,
  };
}

export function usage(): string {
  return `waitq - waitlist queue statistics and time series

Usage:
  waitq --help
  waitq version

  waitq snapshot [--input <file.json>] [--previous <file.json>] [--ledger <file.csv>]
                 [--at <iso>] [--csv] [--no-header]
  waitq replay --file <tracked.json> [--repo <dir>] [--ledger <file.csv>] [--no-header]
  waitq extract-html <page.html> [--out <file.json>]

Without --input / --ledger the live waitlist and ledger are fetched
(override with WAITQ_WAITLIST_URL, WAITQ_LEDGER_URL, WAITQ_TIMEOUT_MS).

Examples:
  waitq snapshot --csv >> waitlist_data.csv
  waitq snapshot --input waitlist.json --previous waitlist.prev.json --ledger issued.csv
  waitq replay --file data/waitlist.json --ledger issued.csv > history.csv
  waitq extract-html archive/2022-06-23.html
`;
}

// -------------------- argv helpers --------------------

export function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

class UsageError extends Error {}

function requireFlag(args: string[], flag: string): string {
  const v = getFlagValue(args, flag);
  if (!v) throw new UsageError(`Missing ${flag} <value>`);
  return v;
}

// -------------------- file helpers --------------------

function readTextFile(io: CliIo, filePath: string): string {
  const abs = path.resolve(io.cwd, filePath);
  try {
    return fs.readFileSync(abs, "utf8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`cannot read ${filePath}: ${msg}`);
  }
}

async function loadCurrent(io: CliIo, settings: Settings, input: string | null): Promise<Snapshot> {
  if (input) return parseSnapshotPayload(readTextFile(io, input));
  return fetchWaitlist(settings.sources.waitlistUrl, settings.http.timeoutMs, io.fetcher);
}

async function loadLedger(io: CliIo, settings: Settings, file: string | null): Promise<LedgerEntry[]> {
  if (file) return parseLedgerCsv(readTextFile(io, file));
  return fetchLedger(settings.sources.ledgerUrl, settings.http.timeoutMs, io.fetcher);
}

// -------------------- commands --------------------

async function cmdSnapshot(args: string[], io: CliIo): Promise<number> {
  const settings = loadSettings(io.env);

  const input = getFlagValue(args, "--input");
  const previousFile = getFlagValue(args, "--previous");
  const ledgerFile = getFlagValue(args, "--ledger");
  const at = getFlagValue(args, "--at") ?? io.now().toISOString();
  const asCsv = args.includes("--csv");
  const header = !args.includes("--no-header");

  // single-shot: any source failure aborts
  const ledger = await loadLedger(io, settings, ledgerFile);
  const current = await loadCurrent(io, settings, input);
  const previous = previousFile ? parseSnapshotPayload(readTextFile(io, previousFile)) : null;

  const row = analyzeSnapshot(current, previous, at, ledger);

  io.stdout.write(asCsv ? renderCsv([row], { header }) : renderTextReport(row));
  return 0;
}

async function cmdReplay(args: string[], io: CliIo, log: Logger): Promise<number> {
  const settings = loadSettings(io.env);

  const file = requireFlag(args, "--file");
  const repo = path.resolve(io.cwd, getFlagValue(args, "--repo") ?? ".");
  const ledgerFile = getFlagValue(args, "--ledger");
  const header = !args.includes("--no-header");

  const history = listFileHistory(file, { cwd: repo, git: io.git });
  if (!history.ok) {
    log.error(history.error);
    return 1;
  }
  if (history.commits.length === 0) {
    log.error(`no history for ${file} in ${repo}`);
    return 1;
  }

  // replay degrades instead of aborting: no ledger -> rates 0, waits inf
  let ledger: LedgerEntry[] | null = null;
  try {
    ledger = await loadLedger(io, settings, ledgerFile);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    log.warn(`ledger unavailable, rates default to 0: ${msg}`);
  }

  log.info(`replaying ${history.commits.length} revisions of ${file}`);

  if (header) io.stdout.write(csvHeader() + "\n");

  let written = 0;
  const elements = historyElements(history.commits, { cwd: repo, git: io.git });
  for (const row of replaySnapshots(elements, { ledger, log })) {
    io.stdout.write(csvLine(row) + "\n");
    written++;
  }

  log.info(`wrote ${written} of ${history.commits.length} rows`);
  return 0;
}

function cmdExtractHtml(args: string[], io: CliIo, log: Logger): number {
  const file = args[1];
  if (!file || file.startsWith("--")) throw new UsageError("Missing file.");

  const out = getFlagValue(args, "--out") ?? `${file.replace(/\.[^./\\]+$/, "")}.json`;

  log.info(`Extracting data from '${file}'...`);
  const records = extractWaitlistFromHtml(readTextFile(io, file));
  log.info(`Extracted ${records.length} records`);

  if (records.length === 0) {
    log.error("No data extracted");
    return 1;
  }

  fs.writeFileSync(path.resolve(io.cwd, out), JSON.stringify(records, null, 2) + "\n", "utf8");
  log.info(`Data written to '${out}'`);
  return 0;
}

// -------------------- entry --------------------

export async function main(argv: string[] = process.argv, io: CliIo = defaultIo()): Promise<number> {
  const args = argv.slice(2);
  const log = createLogger("waitq", io.stderr);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.stdout.write(usage());
    return 0;
  }

  const cmd = args[0];

  try {
    if (cmd === "version") {
      io.stdout.write(`waitq cli v${VERSION}\n`);
      return 0;
    }
    if (cmd === "snapshot") return await cmdSnapshot(args, io);
    if (cmd === "replay") return await cmdReplay(args, io, log);
    if (cmd === "extract-html") return cmdExtractHtml(args, io, log);

    throw new UsageError(`Unknown command: ${cmd}`);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    log.error(msg);
    if (e instanceof UsageError) io.stderr.write("\n" + usage());
    return 1;
  }
}
