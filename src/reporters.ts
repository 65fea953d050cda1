// src/reporters.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import type { CheckResult, PrettyReportOptions, Summary } from './types';

const niceDate = (d: Date) =>
  d.toLocaleString('en-US', {
    year: 'numeric',
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
  });

/* ----------------------------- Markdown report ----------------------------- */

export function slugify(id: string) {
  return id
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/(^-|-$)/g, '');
}

const safe = (s: string) => s.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');

function checkBlock(c: CheckResult, withDetails: boolean, maxFixes: number) {
  const mark = c.pass ? '✅' : c.severity === 'warn' ? '⚠️' : '❌';
  const lines = [`- ${mark} **${c.id}**`];
  if (withDetails) {
    if (c.rationale) lines.push(`  - **rationale:** ${safe(c.rationale)}`);
    if (c.suggested_fixes.length) {
      lines.push(`  - **suggested fixes:**`);
      for (const fx of c.suggested_fixes.slice(0, maxFixes)) {
        lines.push(`    - ${safe(fx)}`);
      }
      if (c.suggested_fixes.length > maxFixes) {
        lines.push(`    - _+${c.suggested_fixes.length - maxFixes} more_`);
      }
    }
  }
  return lines.join('\n');
}

export function renderMarkdownReport(
  summary: Summary,
  opts: PrettyReportOptions = {}
): string {
  const { checked, passed, failed, files } = summary;
  const showPassDetails = !!opts.showPassDetails;
  const generated = niceDate(opts.generatedAt ?? new Date());

  const header = [
    `# Benchmark Results Lint Report`,
    ``,
    `**Generated:** ${generated}`,
    ``,
    `| Files | Passed | Failed |`,
    `| ---: | ---: | ---: |`,
    `| ${checked} | ${passed} | ${failed} |`,
    ``,
    `## Summary`,
    ``,
    `| File | Status | Passed | Failed | Failed Checks |`,
    `|:-----|:------:|------:|------:|:--------------|`,
  ].join('\n');

  const rows = files
    .map((f) => {
      const passCount = f.checks.filter((c) => c.pass).length;
      const failedIds =
        f.checks
          .filter((c) => !c.pass)
          .map((c) => `\`${c.id}\``)
          .join(', ') || '—';
      return `| [\`${f.file}\`](#${slugify(f.file)}) | ${
        f.overall_pass ? '✅' : '❌'
      } | ${passCount} | ${f.checks.length - passCount} | ${failedIds} |`;
    })
    .join('\n');

  const details = files
    .map((f) => {
      const failing = f.checks.filter((c) => !c.pass);
      const passing = f.checks.filter((c) => c.pass);
      return [
        `\n---\n`,
        `### ${f.overall_pass ? '✅' : '❌'} \`${f.file}\``,
        `<a id="${slugify(f.file)}"></a>`,
        ``,
        failing.length
          ? `**Failed checks**\n\n${failing.map((c) => checkBlock(c, true, 5)).join('\n')}`
          : `_No failed checks for this file._`,
        ``,
        `**Passed checks**`,
        ``,
        passing.map((c) => checkBlock(c, showPassDetails, 3)).join('\n') ||
          '_No passed checks._',
        ``,
        `[Back to summary](#summary)`,
      ].join('\n');
    })
    .join('\n');

  const footer = [
    `\n---`,
    failed ? '❌ **Result: FAIL**' : '✅ **Result: PASS**',
    '',
  ].join('\n');

  return [header, rows, details, footer].join('\n');
}

/* ------------------------------ Write to disk ------------------------------ */

export async function writeJsonReport(summary: Summary, reportPath: string) {
  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, JSON.stringify(summary, null, 2), 'utf8');
  console.log(`Wrote JSON summary to ${reportPath}`);
}

export async function writePrettyReport(
  summary: Summary,
  opts: PrettyReportOptions = {}
): Promise<string | null> {
  if ((opts.format ?? 'md') === 'none') return null;

  const base =
    opts.outBasePath || path.resolve(process.cwd(), 'reports/results-lint');
  await fs.mkdir(path.dirname(base), { recursive: true });
  const p = `${base}.md`;
  await fs.writeFile(p, renderMarkdownReport(summary, opts), 'utf8');
  console.log(`Wrote Markdown report to ${p}`);
  return p;
}
