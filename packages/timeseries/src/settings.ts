import { z } from "zod";

export const defaults = {
  sources: {
    waitlistUrl: "https://accountws.arin.net/public/rest/waitingList",
    ledgerUrl:
      "https://www.arin.net/resources/guide/ipv4/blocks_cleared/waiting_list_blocks_issued.csv",
  },
  http: {
    timeoutMs: 30_000,
  },
} as const;

export type Settings = {
  sources: { waitlistUrl: string; ledgerUrl: string };
  http: { timeoutMs: number };
};

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

const EnvSchema = z.object({
  WAITQ_WAITLIST_URL: z.string().url().optional(),
  WAITQ_LEDGER_URL: z.string().url().optional(),
  WAITQ_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

/** Defaults, overridden by WAITQ_* environment variables. */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const r = EnvSchema.safeParse({
    WAITQ_WAITLIST_URL: env.WAITQ_WAITLIST_URL || undefined,
    WAITQ_LEDGER_URL: env.WAITQ_LEDGER_URL || undefined,
    WAITQ_TIMEOUT_MS: env.WAITQ_TIMEOUT_MS || undefined,
  });

  if (!r.success) {
    const issue = r.error.issues[0];
    const variable = issue ? String(issue.path[0] ?? "environment") : "environment";
    throw new ConfigError(variable, issue?.message ?? "invalid value");
  }

  return {
    sources: {
      waitlistUrl: r.data.WAITQ_WAITLIST_URL ?? defaults.sources.waitlistUrl,
      ledgerUrl: r.data.WAITQ_LEDGER_URL ?? defaults.sources.ledgerUrl,
    },
    http: {
      timeoutMs: r.data.WAITQ_TIMEOUT_MS ?? defaults.http.timeoutMs,
    },
  };
}
