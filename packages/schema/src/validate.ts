import { z } from "zod";
import { ParseError } from "./errors.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const ISO8601 = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), "Invalid ISO-8601 timestamp");

// 24, "24" and "/24" all read as 24.
export const CidrValueSchema = z
  .union([
    z.number().int().nonnegative(),
    z
      .string()
      .trim()
      .regex(/^\/?\d+$/, "Invalid CIDR prefix length")
      .transform((v) => Number.parseInt(v.replace(/^\//, ""), 10)),
  ]);

export const TimestampValueSchema = z.string().trim().min(1);

/* ------------------------------------------------------------------ */
/*                               Payloads                             */
/* ------------------------------------------------------------------ */

// Records are heterogeneous key-value bags; field resolution happens in the normalizer.
export const RawRecordSchema = z.record(z.string(), z.unknown());

export const SnapshotPayloadSchema = z.array(z.unknown());

export const LedgerRowSchema = z.object({
  "CIDR Prefix": z.string(),
  "Date Reissued": z.string(),
});

export type RawRecord = z.infer<typeof RawRecordSchema>;
export type LedgerRow = z.infer<typeof LedgerRowSchema>;

/* ------------------------------------------------------------------ */
/*                               Parsers                              */
/* ------------------------------------------------------------------ */

export function parseSnapshotArray(input: unknown): unknown[] {
  const r = SnapshotPayloadSchema.safeParse(input);
  if (!r.success) {
    throw new ParseError("SNAPSHOT", "Waitlist payload must be a JSON array of records");
  }
  return r.data;
}

export function parseJsonText(text: string, source: "SNAPSHOT" | "LEDGER" = "SNAPSHOT"): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ParseError(source, `Payload is not valid JSON: ${msg}`);
  }
}

export function parseCidr(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const r = CidrValueSchema.safeParse(value);
  return r.success ? r.data : null;
}

export function parseTimestamp(value: unknown): string | null {
  const r = TimestampValueSchema.safeParse(value);
  return r.success ? r.data : null;
}

/** Epoch millis of an ISO-8601 instant; throws ParseError when it does not parse. */
export function parseInstant(value: string | Date): number {
  if (value instanceof Date) {
    const t = value.getTime();
    if (Number.isNaN(t)) throw new ParseError("INSTANT", "Invalid Date instance");
    return t;
  }
  const r = ISO8601.safeParse(value);
  if (!r.success) throw new ParseError("INSTANT", `Invalid ISO-8601 timestamp '${value}'`);
  return Date.parse(r.data);
}
