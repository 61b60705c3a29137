import { format, isValid, parse } from "date-fns";
import type { LedgerEntry } from "../../schema/src/schema.js";
import { ParseError } from "../../schema/src/errors.js";
import { parseCsvObjects } from "../../schema/src/csv.js";
import { LedgerRowSchema } from "../../schema/src/validate.js";

// Two-digit years resolve to the century closest to this date.
const TWO_DIGIT_YEAR_REFERENCE = new Date(2000, 0, 1);

/** "192.0.2.0/24" -> 24. Takes what follows the final "/". */
export function sizeClassFromPrefix(prefix: string): number | null {
  const slash = prefix.lastIndexOf("/");
  if (slash < 0) return null;
  const tail = prefix.slice(slash + 1).trim();
  if (!/^\d+$/.test(tail)) return null;
  return Number.parseInt(tail, 10);
}

/** "04/15/23" or "4/5/23" -> "2023-04-15", "2023-04-05". */
export function parseReissueDate(value: string): string | null {
  const m = /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/.exec(value.trim());
  if (!m) return null;
  const [, month = "", day = "", year = ""] = m;

  const d = parse(`${month.padStart(2, "0")}/${day.padStart(2, "0")}/${year}`, "MM/dd/yy", TWO_DIGIT_YEAR_REFERENCE);
  return isValid(d) ? format(d, "yyyy-MM-dd") : null;
}

/**
 * Reads the "blocks issued from the waiting list" CSV.
 * Rows whose prefix or date do not parse are dropped.
 */
export function parseLedgerCsv(text: string): LedgerEntry[] {
  const { header, rows } = parseCsvObjects(text);
  if (!header.includes("CIDR Prefix") || !header.includes("Date Reissued")) {
    throw new ParseError(
      "LEDGER",
      `Ledger CSV must have "CIDR Prefix" and "Date Reissued" columns (got: ${header.join(", ")})`
    );
  }

  const out: LedgerEntry[] = [];
  for (const raw of rows) {
    const r = LedgerRowSchema.safeParse(raw);
    if (!r.success) continue;

    const size_class = sizeClassFromPrefix(r.data["CIDR Prefix"]);
    const resolved_date = parseReissueDate(r.data["Date Reissued"]);
    if (size_class == null || resolved_date == null) continue;

    out.push({ resolved_date, size_class });
  }
  return out;
}
