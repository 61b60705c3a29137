// packages/timeseries/__tests__/_helpers/fixtures.ts
import * as path from "node:path";
import type { LogSink } from "../../src/log.js";
import type { GitResult, GitRunner } from "../../src/sources/git-history.js";

export const SNAPSHOT_A = JSON.stringify([
  { waitListActionDate: "2024-01-01T00:00:00Z", maximumCidr: 24, minimumCidr: 24 },
  { waitListActionDate: "2024-02-01T00:00:00Z", maximumCidr: 23, minimumCidr: 22 },
]);

export const SNAPSHOT_B = JSON.stringify([
  { waitListActionDate: "2024-01-01T00:00:00Z", maximumCidr: 24, minimumCidr: 24 },
  { waitListActionDate: "2024-03-01T00:00:00Z", maximumCidr: 24, minimumCidr: 24 },
]);

// four /24s over two quarters: 2.0 per quarter
export const LEDGER_CSV = [
  "CIDR Prefix,Date Reissued,Organization",
  "192.0.2.0/24,01/15/23,Example A",
  "192.0.2.128/24,02/10/23,Example B",
  "198.51.100.0/24,04/05/23,Example C",
  "198.51.100.128/24,05/20/23,Example D",
  "",
].join("\n");

export type CollectingSink = LogSink & { chunks: string[]; text(): string; lines(): string[] };

export function collectingSink(): CollectingSink {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(""),
    lines: () => chunks.join("").split("\n").filter((l) => l.length > 0),
  };
}

export type FakeCommit = {
  sha: string;
  committed_at: string;
  // repository-root paths -> contents at this commit
  files: Record<string, string>;
};

export type FakeRepoOptions = {
  root: string;
  // oldest first
  commits: FakeCommit[];
  // new root path -> previous root path, for `log --follow`
  renames?: Record<string, string>;
};

export type FakeGit = GitRunner & { calls: Array<{ args: string[]; cwd: string }> };

const fail = (stderr: string): GitResult => ({ status: 128, stdout: "", stderr });

/**
 * In-memory repository answering `log --follow --name-only` and `show <sha>:<path>`
 * with git's path rules: log pathspecs resolve against cwd, `show` paths against the
 * root unless they start with ./ or ../.
 */
export function fakeRepo(opts: FakeRepoOptions): FakeGit {
  const calls: Array<{ args: string[]; cwd: string }> = [];

  const fromRoot = (cwd: string, p: string) => path.posix.relative(opts.root, path.posix.resolve(cwd, p));

  const runner = (args: string[], cwd: string): GitResult => {
    calls.push({ args, cwd });
    if (fromRoot(cwd, ".").startsWith("..")) {
      return fail("fatal: not a git repository (or any of the parent directories): .git\n");
    }

    if (args[0] === "log") {
      let tracked = fromRoot(cwd, args[args.length - 1] ?? "");
      const out: string[] = [];
      for (const c of [...opts.commits].reverse()) {
        const previous = opts.renames?.[tracked];
        if (c.files[tracked] === undefined && previous !== undefined && c.files[previous] !== undefined) {
          tracked = previous;
        }
        if (c.files[tracked] === undefined) continue;
        out.push(`commit ${c.sha} ${c.committed_at}`, "", tracked, "");
      }
      return { status: 0, stdout: out.join("\n"), stderr: "" };
    }

    if (args[0] === "show") {
      const spec = args[1] ?? "";
      const sep = spec.indexOf(":");
      const sha = spec.slice(0, sep);
      const rev = spec.slice(sep + 1);
      const commit = opts.commits.find((c) => c.sha === sha);
      if (!commit) return fail(`fatal: invalid object name '${sha}'.\n`);

      const rel = rev.startsWith("./") || rev.startsWith("../") ? fromRoot(cwd, rev) : rev;
      const body = commit.files[rel];
      if (body === undefined) return fail(`fatal: path '${rel}' does not exist in '${sha}'\n`);
      return { status: 0, stdout: body, stderr: "" };
    }

    return fail(`unexpected git ${args.join(" ")}\n`);
  };

  return Object.assign(runner, { calls });
}
