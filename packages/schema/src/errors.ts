export type ParseErrorSource = "SNAPSHOT" | "LEDGER" | "INSTANT" | "HTML";

/**
 * Structural failure of a whole payload (not of a single record).
 * Per-record problems never raise this; they are dropped by the normalizer.
 */
export class ParseError extends Error {
  readonly code = "PARSE_ERROR";
  readonly source: ParseErrorSource;

  constructor(source: ParseErrorSource, message: string) {
    super(message);
    this.name = "ParseError";
    this.source = source;
  }
}

export function isParseError(e: unknown): e is ParseError {
  return e instanceof ParseError;
}
