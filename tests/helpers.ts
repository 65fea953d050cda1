import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import type { GitClient } from '../src/git';
import type { CommandOpts, CommandOutput, CommandRunner } from '../src/types';

export async function makeTree(files: Record<string, string>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-results-'));
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content, 'utf8');
  }
  return root;
}

export async function removeTree(root: string) {
  await fs.rm(root, { recursive: true, force: true });
}

export async function exists(p: string) {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

export type RecordedCall = { cmd: string[]; opts?: CommandOpts };

/**
 * Records every command. `python3` calls write a stub RESULTS.md to the
 * `--output` path, standing in for a benchmark's aggregator.
 */
export function fakeRunner(
  respond: (cmd: string[]) => CommandOutput = () => ({ code: 0, stdout: '', stderr: '' })
): CommandRunner & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner = async (cmd: string[], opts?: CommandOpts) => {
    calls.push({ cmd, opts });
    const out = respond(cmd);
    const outIdx = cmd.indexOf('--output');
    if (cmd[0] === 'python3' && outIdx !== -1 && out.code === 0) {
      await fs.writeFile(cmd[outIdx + 1], '# stub\n', 'utf8');
    }
    return out;
  };
  return Object.assign(runner, { calls });
}

export function fakeGit(
  gitlinks: string[] = [],
  changed: string[] = []
): GitClient {
  return {
    changedGitlinks: vi.fn(async () => gitlinks.map((p) => ({ path: p }))),
    changedPaths: vi.fn(async () => new Set(changed)),
    assertClean: vi.fn(async () => undefined),
  };
}

export function silenceConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
    error: vi.spyOn(console, 'error').mockImplementation(() => undefined),
  };
}
