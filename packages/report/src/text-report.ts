import type { AggregateRow } from "../../analyze/src/aggregate.js";
import type { AgeBucket } from "../../analyze/src/age.js";
import { AGE_BUCKETS } from "../../analyze/src/age.js";
import { SIZE_CLASSES } from "../../schema/src/schema.js";
import { fmtCount, fmtFixed } from "./columns.js";

export type ReportLine = {
  kind: "HEADING" | "TEXT" | "ITEM" | "SUBITEM" | "RULE";
  text: string;
};

const AGE_LABELS: Record<AgeBucket, string> = {
  "0_3mo": "0-3 months",
  "3_6mo": "3-6 months",
  "6_12mo": "6-12 months",
  "12_24mo": "12-24 months",
  "24plus": "24+ months",
};

function signed(n: number): string {
  return n > 0 ? `+${n}` : String(n);
}

export function explainRow(row: AggregateRow): ReportLine[] {
  const lines: ReportLine[] = [];
  const heading = (text: string) => lines.push({ kind: "HEADING", text });
  const text = (t: string) => lines.push({ kind: "TEXT", text: t });
  const item = (t: string) => lines.push({ kind: "ITEM", text: t });
  const sub = (t: string) => lines.push({ kind: "SUBITEM", text: t });
  const rule = () => lines.push({ kind: "RULE", text: "---" });

  // ---- Queue
  heading("Current Waitlist Summary");
  text(`As of the most recent data, the waitlist has **${row.total_requests} requests**.`);
  text("The requests are for the following network sizes:");
  for (const c of SIZE_CLASSES) item(`**/${c}:** ${row.requests[c]} requests`);
  rule();

  // ---- Rates
  heading("Historical Analysis");
  text("Over the analyzed period, the registry has cleared an average of:");
  for (const c of SIZE_CLASSES) item(`**${fmtFixed(row.cleared_per_quarter[c], 1)}** /${c} blocks per quarter`);
  rule();

  // ---- Projection
  heading("Estimated Wait Time");
  text("Based on the current queue and historical rates, here are the estimated wait times:");
  for (const c of SIZE_CLASSES) {
    const est = row.estimates[c];
    item(`**For a /${c} network:**`);
    sub(`There are **${row.requests[c]} requests** in the queue.`);
    sub(
      `At a rate of **${fmtFixed(row.cleared_per_quarter[c], 1)} blocks cleared per quarter**, ` +
        `the estimated wait time is approximately **${fmtCount(est.quarters)} quarters**, ` +
        `or **${fmtFixed(est.years, 1)} years**.`
    );
  }
  rule();

  // ---- Churn
  const { churn } = row;
  const turnover =
    row.total_requests > 0 ? ((churn.added_total + churn.removed_total) / row.total_requests) * 100 : 0;
  heading("Recent Activity");
  item(`**Added:** +${churn.added_total}`);
  item(`**Removed:** ${churn.removed_total}`);
  item(`**Net change:** ${signed(churn.net_change)}`);
  item(`**Turnover:** ${fmtFixed(turnover, 1)}% of the waitlist`);
  rule();

  // ---- Flexibility
  const sc = row.size_changes;
  heading("Flexibility");
  item(`**Exact requests:** ${row.flexibility.exact_count}`);
  item(`**Flexible requests:** ${row.flexibility.flexible_count}`);
  item(`**Average flexibility:** ${fmtFixed(row.flexibility.avg_flexibility, 2)} CIDR levels`);
  item(
    `**Size changes:** ${sc.size_changes} (${sc.upsize_changes} upsize, ` +
      `${sc.downsize_changes} downsize, ${sc.flexibility_changes} flexibility flips)`
  );
  rule();

  // ---- Ages
  const s = row.ages.summary;
  heading("Age Distribution");
  for (const b of AGE_BUCKETS) item(`**${AGE_LABELS[b]}:** ${row.ages.overall[b]} requests`);
  item(
    `**Mean age:** ${fmtFixed(s.mean_days, 1)} days ` +
      `(median ${fmtFixed(s.median_days, 1)}, min ${fmtFixed(s.min_days, 1)}, max ${fmtFixed(s.max_days, 1)})`
  );

  return lines;
}

export function renderTextReport(row: AggregateRow): string {
  const out: string[] = [];
  for (const l of explainRow(row)) {
    if (l.kind === "HEADING") out.push(`### ${l.text} ###`);
    else if (l.kind === "ITEM") out.push(`* ${l.text}`);
    else if (l.kind === "SUBITEM") out.push(`    * ${l.text}`);
    else if (l.kind === "RULE") out.push("", l.text);
    else out.push(l.text);
  }
  return out.join("\n") + "\n";
}
