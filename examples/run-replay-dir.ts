import { readdirSync, readFileSync } from "node:fs";
import * as path from "node:path";
import { parseLedgerCsv } from "../packages/analyze/src/ledger.js";
import { csvHeader, csvLine } from "../packages/report/src/csv.js";
import { createLogger } from "../packages/timeseries/src/log.js";
import { replaySnapshots, type ReplayElement } from "../packages/timeseries/src/replay.js";

// Replays a directory of snapshots named <ISO instant with ':' as '-'>.json,
// e.g. 2024-03-15T12-00-00Z.json, instead of a git history.

const dir = process.argv[2] ?? "examples/data/history";
const ledgerPath = process.argv[3] ?? "examples/data/issued.csv";

function instantFromName(name: string): string {
  return name.replace(/\.json$/, "").replace(/T(\d{2})-(\d{2})-(\d{2})/, "T$1:$2:$3");
}

const elements: ReplayElement[] = readdirSync(dir)
  .filter((f) => f.endsWith(".json"))
  .sort()
  .map((f) => ({
    ref: f,
    reference_instant: instantFromName(f),
    load: () => readFileSync(path.join(dir, f), "utf-8"),
  }));

const ledger = parseLedgerCsv(readFileSync(ledgerPath, "utf-8"));
const log = createLogger("replay-dir");

console.log(csvHeader());
for (const row of replaySnapshots(elements, { ledger, log })) {
  console.log(csvLine(row));
}
