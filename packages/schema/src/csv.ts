// Minimal RFC 4180 reader/writer: quoted cells, doubled quotes, CRLF or LF.

export function escapeCsvCell(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  const s = typeof value === "string" ? value : String(value);
  if (/[",\n\r]/.test(s)) return `"${s.replace(/"/g, '""')}"`;
  return s;
}

export function toCsvLine(cells: ReadonlyArray<string | number | null | undefined>): string {
  return cells.map(escapeCsvCell).join(",");
}

export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        cell += ch;
      }
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(cell);
      cell = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      row.push(cell);
      rows.push(row);
      row = [];
      cell = "";
    } else {
      cell += ch;
    }
  }

  if (cell !== "" || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }

  // blank lines
  return rows.filter((r) => !(r.length === 1 && r[0]?.trim() === ""));
}

/** Header row becomes object keys (trimmed). Short rows are padded with "". */
export function parseCsvObjects(text: string): { header: string[]; rows: Record<string, string>[] } {
  const [head, ...body] = parseCsv(text);
  if (!head) return { header: [], rows: [] };

  const header = head.map((h) => h.trim());
  const rows = body.map((cells) => {
    const o: Record<string, string> = {};
    header.forEach((h, i) => {
      o[h] = cells[i] ?? "";
    });
    return o;
  });
  return { header, rows };
}
