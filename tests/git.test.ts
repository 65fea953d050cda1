import { describe, it, expect } from 'vitest';
import { createGitClient, parseNameOnly, parseRawDiff } from '../src/git';
import { parseGitmodules } from '../src/gitmodules';
import { CommandError } from '../src/errors';
import { fakeRunner } from './helpers';

const RAW = [
  ':160000 160000 1111111 2222222 M\tbenchmarks/TDD',
  ':100644 100644 aaaaaaa bbbbbbb M\trules/TDD/python/RESULTS.md',
  ':000000 160000 0000000 3333333 A\tbenchmarks/New',
  ':160000 160000 4444444 5555555 M\t_metrics',
  'garbage line',
  ':160000 M\tbenchmarks/Short',
  ':160000 160000 1111111 2222222 M\tbenchmarks/TDD',
].join('\n');

describe('parseRawDiff', () => {
  it('keeps only gitlink-to-gitlink changes, once each', () => {
    expect(parseRawDiff(RAW)).toEqual([
      { path: 'benchmarks/TDD' },
      { path: '_metrics' },
    ]);
  });

  it('returns nothing for empty output', () => {
    expect(parseRawDiff('')).toEqual([]);
  });
});

describe('parseNameOnly', () => {
  it('trims and drops blank lines', () => {
    expect([...parseNameOnly('a\n\n b \n')]).toEqual(['a', 'b']);
  });
});

describe('createGitClient', () => {
  it('runs git diff in the repository root', async () => {
    const runner = fakeRunner(() => ({ code: 0, stdout: RAW, stderr: '' }));
    const git = createGitClient(runner, '/repo');

    const links = await git.changedGitlinks('base1', 'head1');

    expect(links.map((l) => l.path)).toEqual(['benchmarks/TDD', '_metrics']);
    expect(runner.calls).toEqual([
      { cmd: ['git', 'diff', '--raw', 'base1', 'head1'], opts: { cwd: '/repo' } },
    ]);
  });

  it('reports a dirty tree as a command failure', async () => {
    const runner = fakeRunner(() => ({ code: 1, stdout: 'diff --git a/x b/x', stderr: '' }));
    const git = createGitClient(runner, '/repo');

    const err = await git.assertClean().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CommandError);
    expect(err).toHaveProperty(
      'message',
      'Command failed (1): git diff --exit-code\ndiff --git a/x b/x'
    );
  });
});

describe('parseGitmodules', () => {
  it('reads submodule sections and ignores the rest', () => {
    const text = [
      '# pinned benchmarks',
      '[submodule "benchmarks/TDD"]',
      '\tpath = benchmarks/TDD',
      '\turl = https://github.com/CursorCult/_benchmark_TDD.git',
      '[submodule "_metrics"]',
      '\tpath = _metrics',
      '\turl = "https://github.com/CursorCult/_metrics.git"',
      '[core]',
      '\tbare = false',
    ].join('\n');

    expect(parseGitmodules(text)).toEqual([
      {
        name: 'benchmarks/TDD',
        path: 'benchmarks/TDD',
        url: 'https://github.com/CursorCult/_benchmark_TDD.git',
      },
      {
        name: '_metrics',
        path: '_metrics',
        url: 'https://github.com/CursorCult/_metrics.git',
      },
    ]);
  });
});
