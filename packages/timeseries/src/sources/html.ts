import { format, isValid, parse } from "date-fns";

/**
 * Archived copies of the public waitlist page predate the JSON endpoint.
 * These helpers lift the `<tbody id="wait_list">` table into records the
 * snapshot normalizer accepts (lowercase keys, string prefixes).
 */

export type ArchivedRecord = {
  waitlistactiondate: string;
  maximumcidr: string;
  minimumcidr: string;
};

const ZONE_OFFSETS: Record<string, string> = {
  EDT: "-04:00",
  EST: "-05:00",
};

// Pages without a zone suffix were published in summer time.
const DEFAULT_OFFSET = "-04:00";

/** "Thu, 23 Jun 2022, 14:17:46 EDT" -> "2022-06-23T14:17:46-04:00" */
export function parseArchiveDate(value: string): string | null {
  let s = value.trim().replace(/^[A-Za-z]+,\s*/, "").replace("Sept", "Sep");

  let offset = DEFAULT_OFFSET;
  const zone = /\s([A-Z]{3})$/.exec(s);
  if (zone?.[1]) {
    const known = ZONE_OFFSETS[zone[1]];
    if (!known) return null;
    offset = known;
    s = s.slice(0, -4);
  }

  // "5 Dec" and "05 Dec" both occur
  s = s.replace(/^(\d)\s/, "0$1 ");
  const d = parse(s, "dd MMM yyyy, HH:mm:ss", new Date(2000, 0, 1));
  if (!isValid(d)) return null;
  return `${format(d, "yyyy-MM-dd'T'HH:mm:ss")}${offset}`;
}

function cellText(html: string): string {
  return html.replace(/<[^>]+>/g, "").trim();
}

function prefixLength(text: string): string | null {
  const m = /^\/(\d+)$/.exec(text);
  return m?.[1] ? String(Number.parseInt(m[1], 10)) : null;
}

export function extractWaitlistFromHtml(html: string): ArchivedRecord[] {
  const tbody = /<tbody id="wait_list"[^>]*>([\s\S]*?)<\/tbody>/.exec(html);
  if (!tbody?.[1]) return [];

  const out: ArchivedRecord[] = [];
  for (const tr of tbody[1].matchAll(/<tr[^>]*>([\s\S]*?)<\/tr>/g)) {
    const cells = [...(tr[1] ?? "").matchAll(/<td[^>]*>([\s\S]*?)<\/td>/g)].map((m) => cellText(m[1] ?? ""));
    if (cells.length < 4) continue;

    // cells: position, action date, maximum prefix, minimum prefix
    const [, dateText = "", maxText = "", minText = ""] = cells;
    const waitlistactiondate = parseArchiveDate(dateText);
    const maximumcidr = prefixLength(maxText);
    const minimumcidr = prefixLength(minText);
    if (!waitlistactiondate || !maximumcidr || !minimumcidr) continue;

    out.push({ waitlistactiondate, maximumcidr, minimumcidr });
  }
  return out;
}
