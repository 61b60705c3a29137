// packages/timeseries/__tests__/sources.test.ts
import { describe, it, expect } from "vitest";
import { normalizeSnapshot } from "../../snapshot/src/normalize.js";
import { replayAll } from "../src/replay.js";
import {
  historyElements,
  listFileHistory,
  parseGitLog,
  readFileAtRevision,
  worktreeRelative,
} from "../src/sources/git-history.js";
import { extractWaitlistFromHtml, parseArchiveDate } from "../src/sources/html.js";
import { fetchLedger, fetchWaitlist, type TextFetcher } from "../src/sources/http.js";
import { LEDGER_CSV, SNAPSHOT_A, SNAPSHOT_B, fakeRepo } from "./_helpers/fixtures.js";

const SHA_OLD = "1111111aaaaaaa1111111aaaaaaa1111111aaaaa";
const SHA_NEW = "2222222bbbbbbb2222222bbbbbbb2222222bbbbb";

// data/old-list.json was renamed to data/waitlist.json in the second commit
const renamedRepo = () =>
  fakeRepo({
    root: "/repo",
    commits: [
      { sha: SHA_OLD, committed_at: "2024-02-15T09:00:00+00:00", files: { "data/old-list.json": SNAPSHOT_A } },
      { sha: SHA_NEW, committed_at: "2024-03-15T09:00:00+00:00", files: { "data/waitlist.json": SNAPSHOT_B } },
    ],
    renames: { "data/waitlist.json": "data/old-list.json" },
  });

describe("git history", () => {
  it("orders commits oldest first with the path each one had", () => {
    const out = [
      `commit ${SHA_NEW} 2024-03-15T09:00:00+00:00`,
      "",
      "data/waitlist.json",
      "commit deadbeef not-a-date",
      "",
      "data/junk.json",
      `commit ${SHA_OLD} 2024-02-15T09:00:00+00:00`,
      "",
      "data/old-list.json",
      "",
    ].join("\n");

    expect(parseGitLog(out, "./waitlist.json")).toEqual([
      { sha: SHA_OLD, committed_at: "2024-02-15T09:00:00+00:00", path: "data/old-list.json" },
      { sha: SHA_NEW, committed_at: "2024-03-15T09:00:00+00:00", path: "data/waitlist.json" },
    ]);
  });

  it("falls back to the working-tree path for commits listed without names", () => {
    expect(parseGitLog(`commit ${SHA_OLD} 2024-02-15T09:00:00+00:00\n`, "./waitlist.json")).toEqual([
      { sha: SHA_OLD, committed_at: "2024-02-15T09:00:00+00:00", path: "./waitlist.json" },
    ]);
  });

  it("anchors paths to the working directory", () => {
    expect(worktreeRelative("waitlist.json", "/repo/data")).toBe("./waitlist.json");
    expect(worktreeRelative("../waitlist.json", "/repo/data")).toBe("../waitlist.json");
    expect(worktreeRelative("/repo/data/waitlist.json", "/repo")).toBe("./data/waitlist.json");
  });

  it("replays every revision from a subdirectory and across a rename", () => {
    const git = renamedRepo();
    const r = listFileHistory("waitlist.json", { cwd: "/repo/data", git });
    if (!r.ok) throw new Error(r.error);

    expect(git.calls[0]).toEqual({
      args: ["log", "--follow", "--name-only", "--format=commit %H %cI", "--", "waitlist.json"],
      cwd: "/repo/data",
    });
    expect(r.commits.map((c) => c.path)).toEqual(["data/old-list.json", "data/waitlist.json"]);

    const { rows, skipped } = replayAll(historyElements(r.commits, { cwd: "/repo/data", git }), { ledger: null });
    expect(skipped).toEqual([]);
    expect(rows.map((row) => row.timestamp)).toEqual(["2024-02-15T09:00:00+00:00", "2024-03-15T09:00:00+00:00"]);
    expect(rows[1]?.churn.added_total).toBe(1);
  });

  it("reads a cwd-relative fallback path from the working directory", () => {
    const git = renamedRepo();
    expect(readFileAtRevision(SHA_NEW, "./waitlist.json", { cwd: "/repo/data", git })).toBe(SNAPSHOT_B);
    expect(() => readFileAtRevision(SHA_NEW, "waitlist.json", { cwd: "/repo/data", git })).toThrow(
      `git show 2222222b:waitlist.json failed: fatal: path 'waitlist.json' does not exist in '${SHA_NEW}'`
    );
  });

  it("reports git failures", () => {
    expect(listFileHistory("w.json", { cwd: "/tmp", git: renamedRepo() })).toEqual({
      ok: false,
      error: "git log failed (128): fatal: not a git repository (or any of the parent directories): .git",
    });
  });

  it("reads payloads lazily per revision", () => {
    const git = fakeRepo({
      root: "/repo",
      commits: [{ sha: SHA_OLD, committed_at: "2024-02-15T09:00:00+00:00", files: { "w.json": SNAPSHOT_A } }],
    });
    const els = historyElements(
      [
        { sha: SHA_OLD, committed_at: "2024-02-15T09:00:00+00:00", path: "w.json" },
        { sha: SHA_NEW, committed_at: "2024-03-15T09:00:00+00:00", path: "w.json" },
      ],
      { cwd: "/repo", git }
    );

    expect(els.map((e) => e.ref)).toEqual(["1111111a", "2222222b"]);
    expect(git.calls).toEqual([]);

    expect(els[0]?.load()).toBe(SNAPSHOT_A);
    expect(git.calls).toEqual([{ args: ["show", `${SHA_OLD}:w.json`], cwd: "/repo" }]);
    expect(() => els[1]?.load()).toThrow(
      `git show 2222222b:w.json failed: fatal: invalid object name '${SHA_NEW}'.`
    );
  });
});

describe("archived html pages", () => {
  it("reads the page's date format", () => {
    expect(parseArchiveDate("Thu, 23 Jun 2022, 14:17:46 EDT")).toBe("2022-06-23T14:17:46-04:00");
    expect(parseArchiveDate("Mon, 5 Dec 2022, 09:03:00 EST")).toBe("2022-12-05T09:03:00-05:00");
    expect(parseArchiveDate("Fri, 02 Sept 2022, 10:00:00")).toBe("2022-09-02T10:00:00-04:00");
  });

  it("rejects dates it cannot place", () => {
    expect(parseArchiveDate("garbage")).toBeNull();
    expect(parseArchiveDate("Thu, 23 Jun 2022, 14:17:46 PST")).toBeNull();
  });

  it("lifts rows out of the wait_list table", () => {
    const html = `
<html><body>
<table><tbody id="other"><tr><td>9</td><td>Thu, 23 Jun 2022, 14:17:46 EDT</td><td>/20</td><td>/20</td></tr></tbody></table>
<table class="list"><tbody id="wait_list" class="rows">
  <tr><td>1</td><td>Thu, 23 Jun 2022, 14:17:46 EDT</td><td>/22</td><td>/24</td></tr>
  <tr><td>2</td><td><span>Mon, 5 Dec 2022, 09:03:00 EST</span></td><td> /24 </td><td>/24</td></tr>
  <tr><td>3</td><td>bad date</td><td>/24</td><td>/24</td></tr>
  <tr><td>4</td><td>Thu, 23 Jun 2022, 14:17:46 EDT</td><td>none</td><td>/24</td></tr>
  <tr><td>short</td></tr>
</tbody></table>
</body></html>`;

    const records = extractWaitlistFromHtml(html);
    expect(records).toEqual([
      { waitlistactiondate: "2022-06-23T14:17:46-04:00", maximumcidr: "22", minimumcidr: "24" },
      { waitlistactiondate: "2022-12-05T09:03:00-05:00", maximumcidr: "24", minimumcidr: "24" },
    ]);

    expect(normalizeSnapshot(records).records[0]).toEqual({
      action_timestamp: "2022-06-23T14:17:46-04:00",
      min_cidr: 24,
      max_cidr: 22,
    });
  });

  it("returns nothing without the table", () => {
    expect(extractWaitlistFromHtml("<html><body>maintenance</body></html>")).toEqual([]);
  });
});

describe("http sources", () => {
  it("parses fetched bodies", async () => {
    const seen: Array<[string, number]> = [];
    const fetcher: TextFetcher = async (url, timeoutMs) => {
      seen.push([url, timeoutMs]);
      return url.endsWith(".csv") ? LEDGER_CSV : SNAPSHOT_A;
    };

    const snap = await fetchWaitlist("https://example.test/waitlist", 500, fetcher);
    const ledger = await fetchLedger("https://example.test/issued.csv", 500, fetcher);

    expect(snap.records).toHaveLength(2);
    expect(ledger).toHaveLength(4);
    expect(seen).toEqual([
      ["https://example.test/waitlist", 500],
      ["https://example.test/issued.csv", 500],
    ]);
  });

  it("propagates fetch failures", async () => {
    const fetcher: TextFetcher = async (url) => {
      throw new Error(`GET ${url} failed: HTTP 503`);
    };
    await expect(fetchWaitlist("https://example.test/waitlist", 500, fetcher)).rejects.toThrow(
      "GET https://example.test/waitlist failed: HTTP 503"
    );
  });
});
