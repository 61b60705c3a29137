import type { AggregateRow } from "../../analyze/src/aggregate.js";
import { toCsvLine } from "../../schema/src/csv.js";
import { ROW_COLUMNS, rowValues } from "./columns.js";

export type CsvRenderOptions = {
  // false when appending to an existing time-series file
  header?: boolean;
};

export function csvHeader(): string {
  return toCsvLine(ROW_COLUMNS);
}

export function csvLine(row: AggregateRow): string {
  return toCsvLine(rowValues(row));
}

export function renderCsv(rows: Iterable<AggregateRow>, opts: CsvRenderOptions = {}): string {
  const lines: string[] = [];
  if (opts.header ?? true) lines.push(csvHeader());
  for (const r of rows) lines.push(csvLine(r));
  return lines.length ? lines.join("\n") + "\n" : "";
}
