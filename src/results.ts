import matter from 'gray-matter';
import { marked, type Token, type Tokens } from 'marked';
import { benchmarkRepoUrl, DEFAULT_OWNER, sameRepoUrl } from './layout';
import type {
  CheckDef,
  CheckOutcome,
  CheckResult,
  MarkdownLink,
  MarkdownTable,
  ResultsDocument,
  ResultsLocation,
} from './types';

export const VERSION_LABEL_RE = /^v\d+$/;

const HTTP_RE = /^https?:\/\//i;
// a paragraph needs this many words outside links to count as a description
const MIN_DESCRIPTION_WORDS = 3;

export function isVersionLabel(s: string): boolean {
  return VERSION_LABEL_RE.test(s.trim());
}

function isLink(t: Token): t is Tokens.Link {
  return t.type === 'link';
}

function isTable(t: Token): t is Tokens.Table {
  return t.type === 'table';
}

function isParagraph(t: Token): t is Tokens.Paragraph {
  return t.type === 'paragraph';
}

function cleanCell(cell: string) {
  return cell.trim().replace(/^[`*]+|[`*]+$/g, '').trim();
}

function toTable(t: Tokens.Table): MarkdownTable {
  return {
    header: t.header.map((c) => cleanCell(c.text)),
    rows: t.rows.map((row) => row.map((c) => cleanCell(c.text))),
  };
}

/** Every http(s) link under the given tokens, including autolinked bare URLs. */
export function extractLinks(tokens: Token[]): MarkdownLink[] {
  const links: MarkdownLink[] = [];
  marked.walkTokens(tokens, (t) => {
    if (!isLink(t) || !HTTP_RE.test(t.href)) return;
    links.push({ text: t.text === t.href ? null : t.text, url: t.href });
  });
  return links;
}

function proseWords(p: Tokens.Paragraph): number {
  let text = p.text;
  marked.walkTokens(p.tokens, (t) => {
    if (isLink(t)) text = text.replace(t.raw, ' ');
  });
  return text.split(/\s+/).filter((w) => /\w/.test(w)).length;
}

export function parseResultsDocument(markdown: string): ResultsDocument {
  const { content } = matter(markdown);
  const tokens = marked.lexer(content, { gfm: true });

  const tables = tokens.filter(isTable).map(toTable);
  const described = tokens
    .filter(isParagraph)
    .find((p) => proseWords(p) >= MIN_DESCRIPTION_WORDS);

  const versionTable =
    tables.find(
      (t) =>
        t.header[0]?.toLowerCase() === 'version' ||
        (t.rows[0] !== undefined && isVersionLabel(t.rows[0][0] ?? ''))
    ) ?? null;

  return {
    links: extractLinks(tokens),
    description: described ? described.text.replace(/\s+/g, ' ').trim() : null,
    tables,
    versionTable,
  };
}

function checkVersionLabels(table: MarkdownTable | null): CheckOutcome {
  if (!table) {
    return { pass: true, rationale: 'No results table.' };
  }
  const labels = table.rows.map((r) => r[0] ?? '');
  const bad = labels.filter((l) => !isVersionLabel(l));
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const l of labels.filter(isVersionLabel)) {
    if (seen.has(l)) dupes.add(l);
    seen.add(l);
  }

  const problems: string[] = [];
  if (bad.length) {
    problems.push(
      `Rows not keyed by a version label: ${bad.map((b) => b || '(empty)').join(', ')}`
    );
  }
  if (dupes.size) {
    problems.push(`Duplicate version labels: ${[...dupes].join(', ')}`);
  }
  if (problems.length) {
    return {
      pass: false,
      rationale: problems.join('; '),
      suggested_fixes: ['Key each row by a unique version label (v0, v1, v2, ...).'],
    };
  }
  return { pass: true, rationale: `Labels: ${labels.join(', ')}` };
}

/**
 * Content checks for a RESULTS.md at a conventional location: a link to the
 * benchmark repository, a description of what was measured, and a results
 * table keyed by version label.
 */
export function resultsChecks(
  doc: ResultsDocument,
  location: ResultsLocation,
  owner = DEFAULT_OWNER
): CheckDef[] {
  const expectedUrl = benchmarkRepoUrl(location.name, owner);

  return [
    {
      id: 'RESULTS_LINK',
      severity: 'error',
      run: () =>
        doc.links.length
          ? { pass: true, rationale: `Found ${doc.links.length} link(s).` }
          : {
              pass: false,
              rationale: 'No link to the benchmark repository.',
              suggested_fixes: [
                location.kind === 'rule'
                  ? `Add a link to ${expectedUrl}`
                  : 'Add a link to the benchmark repository.',
              ],
            },
    },
    {
      id: 'RESULTS_LINK_TARGET',
      severity: 'warn',
      run: () => {
        if (location.kind === 'ruleset') {
          return { pass: true, rationale: 'Not checked for rulesets.' };
        }
        return doc.links.some((l) => sameRepoUrl(l.url, expectedUrl))
          ? { pass: true, rationale: `Links to ${expectedUrl}` }
          : {
              pass: false,
              rationale: `No link points at ${expectedUrl}`,
              suggested_fixes: [`Link to ${expectedUrl}`],
            };
      },
    },
    {
      id: 'RESULTS_DESCRIPTION',
      severity: 'error',
      run: () =>
        doc.description
          ? { pass: true, rationale: 'Description present.' }
          : {
              pass: false,
              rationale: 'No description of what was measured.',
              suggested_fixes: [
                'Add a paragraph describing what the benchmark measures.',
              ],
            },
    },
    {
      id: 'RESULTS_VERSION_TABLE',
      severity: 'error',
      run: () => {
        const t = doc.versionTable;
        if (!t) {
          return {
            pass: false,
            rationale: 'No results table keyed by version label (v0, v1, ...).',
            suggested_fixes: ['Add a table whose first column is the version label.'],
          };
        }
        if (!t.rows.length) {
          return { pass: false, rationale: 'Results table has no rows.' };
        }
        return { pass: true, rationale: `${t.rows.length} version row(s).` };
      },
    },
    {
      id: 'RESULTS_VERSION_LABELS',
      severity: 'error',
      run: () => checkVersionLabels(doc.versionTable),
    },
  ];
}

export async function evaluateCheck(def: CheckDef): Promise<CheckResult> {
  const out = await def.run();
  return {
    id: def.id,
    severity: def.severity,
    pass: out.pass,
    rationale: out.rationale,
    suggested_fixes: out.suggested_fixes ?? [],
  };
}

export async function validateResultsDocument(
  doc: ResultsDocument,
  location: ResultsLocation,
  owner = DEFAULT_OWNER
): Promise<CheckResult[]> {
  const out: CheckResult[] = [];
  for (const def of resultsChecks(doc, location, owner)) {
    out.push(await evaluateCheck(def));
  }
  return out;
}

export function overallPass(checks: CheckResult[]): boolean {
  return checks.every((c) => c.pass || c.severity === 'warn');
}
