import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { renderMarkdownReport, slugify, writePrettyReport } from '../src/reporters';
import type { Summary } from '../src/types';
import { makeTree, removeTree, silenceConsole } from './helpers';

const SUMMARY: Summary = {
  root: '/repo',
  checked: 2,
  passed: 1,
  failed: 1,
  files: [
    {
      file: 'rules/TDD/python/RESULTS.md',
      overall_pass: true,
      checks: [
        {
          id: 'RESULTS_LINK',
          severity: 'error',
          pass: true,
          rationale: 'Found 1 link(s).',
          suggested_fixes: [],
        },
      ],
    },
    {
      file: 'rules/TDD/RESULTS.md',
      overall_pass: false,
      checks: [
        {
          id: 'RESULTS_PATH',
          severity: 'error',
          pass: false,
          rationale: 'bad | path',
          suggested_fixes: ['a', 'b', 'c', 'd', 'e', 'f'],
        },
      ],
    },
  ],
};

describe('renderMarkdownReport', () => {
  const lines = renderMarkdownReport(SUMMARY).split('\n');

  it('renders the totals and the summary table', () => {
    expect(lines).toContain('| 2 | 1 | 1 |');
    expect(lines).toContain(
      '| [`rules/TDD/python/RESULTS.md`](#rules-tdd-python-results-md) | ✅ | 1 | 0 | — |'
    );
    expect(lines).toContain(
      '| [`rules/TDD/RESULTS.md`](#rules-tdd-results-md) | ❌ | 0 | 1 | `RESULTS_PATH` |'
    );
  });

  it('details failures with escaped rationale and capped fixes', () => {
    const start = lines.indexOf('- ❌ **RESULTS_PATH**');
    expect(lines.slice(start, start + 9)).toEqual([
      '- ❌ **RESULTS_PATH**',
      '  - **rationale:** bad \\| path',
      '  - **suggested fixes:**',
      '    - a',
      '    - b',
      '    - c',
      '    - d',
      '    - e',
      '    - _+1 more_',
    ]);
  });

  it('lists passing checks without details by default', () => {
    const start = lines.indexOf('- ✅ **RESULTS_LINK**');
    expect(start).toBeGreaterThan(-1);
    expect(lines[start + 1]).toBe('');
  });

  it('ends with the overall result', () => {
    expect(renderMarkdownReport(SUMMARY).endsWith('❌ **Result: FAIL**\n')).toBe(true);
  });
});

describe('slugify', () => {
  it('turns paths into anchors', () => {
    expect(slugify('.gitmodules')).toBe('gitmodules');
    expect(slugify('rulesets/Core/ts/RESULTS.md')).toBe('rulesets-core-ts-results-md');
  });
});

describe('writePrettyReport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes nothing for format none', async () => {
    expect(await writePrettyReport(SUMMARY, { format: 'none' })).toBeNull();
  });

  it('writes the markdown next to the given base path', async () => {
    silenceConsole();
    const root = await makeTree({});
    const base = path.join(root, 'out', 'lint');

    const written = await writePrettyReport(SUMMARY, { outBasePath: base });

    expect(written).toBe(`${base}.md`);
    const md = await fs.readFile(`${base}.md`, 'utf8');
    expect(md.split('\n')[0]).toBe('# Benchmark Results Lint Report');
    await removeTree(root);
  });
});
