import { spawnSync } from "node:child_process";
import * as path from "node:path";
import type { ReplayElement } from "../replay.js";

export type GitResult = { status: number; stdout: string; stderr: string };

export type GitRunner = (args: string[], cwd: string) => GitResult;

export type HistoryCommit = {
  sha: string;
  committed_at: string; // ISO-8601 with offset, as git prints %cI
  // what `git show sha:<path>` needs for this revision
  path: string;
};

export type HistoryOptions = {
  cwd: string;
  git?: GitRunner;
};

export const spawnGit: GitRunner = (args, cwd) => {
  const r = spawnSync("git", args, { cwd, encoding: "utf8", maxBuffer: 512 * 1024 * 1024 });
  if (r.error) return { status: 127, stdout: "", stderr: r.error.message };
  return { status: r.status ?? 1, stdout: r.stdout ?? "", stderr: r.stderr ?? "" };
};

const COMMIT_LINE = /^commit ([0-9a-f]{7,64}) (\S+)$/;

// `sha:./x` resolves against the working directory, `sha:x` against the repository root.
export function worktreeRelative(filePath: string, cwd: string): string {
  const rel = (path.isAbsolute(filePath) ? path.relative(cwd, filePath) : filePath).split(path.sep).join("/");
  return rel.startsWith("./") || rel.startsWith("../") ? rel : `./${rel}`;
}

/**
 * `git log --name-only --format="commit %H %cI"` output, newest first, into commits
 * oldest first. Each commit carries the file's root-relative path at that revision,
 * which differs from today's name before a rename. Commits listed without a name
 * (merges) fall back to `fallbackPath`.
 */
export function parseGitLog(stdout: string, fallbackPath: string): HistoryCommit[] {
  const out: HistoryCommit[] = [];
  let current: HistoryCommit | null = null;
  let named = false;

  for (const raw of stdout.split("\n")) {
    const line = raw.trim();
    if (!line) continue;

    const m = COMMIT_LINE.exec(line);
    if (m) {
      const [, sha, committed_at] = m;
      current = null;
      if (!sha || !committed_at || Number.isNaN(Date.parse(committed_at))) continue;
      current = { sha, committed_at, path: fallbackPath };
      named = false;
      out.push(current);
      continue;
    }

    if (current && !named) {
      current.path = line;
      named = true;
    }
  }
  return out.reverse();
}

export function listFileHistory(
  filePath: string,
  opts: HistoryOptions
): { ok: true; commits: HistoryCommit[] } | { ok: false; error: string } {
  const git = opts.git ?? spawnGit;
  const r = git(["log", "--follow", "--name-only", "--format=commit %H %cI", "--", filePath], opts.cwd);
  if (r.status !== 0) {
    return { ok: false, error: `git log failed (${r.status}): ${r.stderr.trim()}` };
  }
  return { ok: true, commits: parseGitLog(r.stdout, worktreeRelative(filePath, opts.cwd)) };
}

export function readFileAtRevision(sha: string, revisionPath: string, opts: HistoryOptions): string {
  const git = opts.git ?? spawnGit;
  const r = git(["show", `${sha}:${revisionPath}`], opts.cwd);
  if (r.status !== 0) {
    throw new Error(`git show ${sha.slice(0, 8)}:${revisionPath} failed: ${r.stderr.trim()}`);
  }
  return r.stdout;
}

/** One replay element per commit; payloads are read lazily as the replay reaches them. */
export function historyElements(commits: readonly HistoryCommit[], opts: HistoryOptions): ReplayElement[] {
  return commits.map((c) => ({
    ref: c.sha.slice(0, 8),
    reference_instant: c.committed_at,
    load: () => readFileAtRevision(c.sha, c.path, opts),
  }));
}
