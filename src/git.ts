import { runChecked } from './exec';
import type { CommandRunner, GitlinkChange } from './types';

const GITLINK_MODE = '160000';

/**
 * Submodule pointer changes from `git diff --raw` output. A line looks like
 * `:160000 160000 <old> <new> M\tbenchmarks/TDD`.
 */
export function parseRawDiff(raw: string): GitlinkChange[] {
  const seen = new Set<string>();
  const changes: GitlinkChange[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const tab = line.indexOf('\t');
    if (tab === -1) continue;
    const meta = line.slice(0, tab).trim().split(/\s+/);
    const path = line.slice(tab + 1).trim();
    if (meta.length < 3 || !path) continue;

    const oldMode = meta[0].replace(/^:+/, '');
    const newMode = meta[1];
    if (oldMode === GITLINK_MODE && newMode === GITLINK_MODE && !seen.has(path)) {
      seen.add(path);
      changes.push({ path });
    }
  }
  return changes;
}

export function parseNameOnly(raw: string): Set<string> {
  return new Set(
    raw
      .split(/\r?\n/)
      .map((p) => p.trim())
      .filter(Boolean)
  );
}

export type GitClient = {
  changedGitlinks(base: string, head: string): Promise<GitlinkChange[]>;
  changedPaths(base: string, head: string): Promise<Set<string>>;
  // throws CommandError when the working tree differs from the index
  assertClean(): Promise<void>;
};

export function createGitClient(runner: CommandRunner, cwd: string): GitClient {
  const git = (...args: string[]) => runChecked(runner, ['git', ...args], { cwd });
  return {
    async changedGitlinks(base, head) {
      return parseRawDiff(await git('diff', '--raw', base, head));
    },
    async changedPaths(base, head) {
      return parseNameOnly(await git('diff', '--name-only', base, head));
    },
    async assertClean() {
      await git('diff', '--exit-code');
    },
  };
}
