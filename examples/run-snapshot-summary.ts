import { readFileSync } from "node:fs";
import { parseSnapshotPayload } from "../packages/snapshot/src/normalize.js";
import { parseLedgerCsv } from "../packages/analyze/src/ledger.js";
import { analyzeSnapshot } from "../packages/analyze/src/aggregate.js";
import { renderTextReport } from "../packages/report/src/text-report.js";

function fail(msg: string): never {
  console.error("❌", msg);
  process.exit(1);
}

const currentPath = process.argv[2] ?? "examples/data/history/2024-03-15T12-00-00Z.json";
const previousPath = process.argv[3] ?? "examples/data/history/2024-02-15T12-00-00Z.json";
const ledgerPath = process.argv[4] ?? "examples/data/issued.csv";

const current = parseSnapshotPayload(readFileSync(currentPath, "utf-8"));
const previous = parseSnapshotPayload(readFileSync(previousPath, "utf-8"));
const ledger = parseLedgerCsv(readFileSync(ledgerPath, "utf-8"));

if (current.reference_instant == null) fail(`${currentPath} has no parseable action dates`);

const row = analyzeSnapshot(current, previous, current.reference_instant, ledger);

if (row.total_requests !== current.records.length) fail("total_requests does not match record count");
if (row.churn.net_change !== row.churn.added_total - row.churn.removed_total) fail("net_change mismatch");

process.stdout.write(renderTextReport(row));
console.log("✅ snapshot summary OK");
