import type { ResultsKind, ResultsLocation } from './types';

export const RESULTS_FILE = 'RESULTS.md';
export const BENCHMARKS_DIR = 'benchmarks';
export const METRICS_SUBMODULE = '_metrics';
export const DEFAULT_OWNER = 'CursorCult';

const KINDS: ResultsKind[] = ['rule', 'ruleset'];
const KIND_ROOTS: Record<ResultsKind, string> = {
  rule: 'rules',
  ruleset: 'rulesets',
};

export function kindRoot(kind: ResultsKind): string {
  return KIND_ROOTS[kind];
}

export function resultsPath(
  kind: ResultsKind,
  name: string,
  language: string
): string {
  return [KIND_ROOTS[kind], name, language, RESULTS_FILE].join('/');
}

function validSegment(s: string) {
  return s.length > 0 && !s.startsWith('.');
}

export function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Match a repo-relative path against
 * `rules/<RULE>/<language>/RESULTS.md` or `rulesets/<RULESET>/<language>/RESULTS.md`.
 */
export function classifyResultsPath(relPath: string): ResultsLocation | null {
  const p = toPosix(relPath);
  const parts = p.split('/');
  if (parts.length !== 4) return null;
  const [rootDir, name, language, file] = parts;
  if (file !== RESULTS_FILE) return null;
  if (!validSegment(name) || !validSegment(language)) return null;

  const kind = KINDS.find((k) => KIND_ROOTS[k] === rootDir);
  if (!kind) return null;
  return { kind, name, language, path: p };
}

export function benchmarkRepoUrl(name: string, owner = DEFAULT_OWNER): string {
  return `https://github.com/${owner}/_benchmark_${name}.git`;
}

export function metricsRepoUrl(owner = DEFAULT_OWNER): string {
  return `https://github.com/${owner}/${METRICS_SUBMODULE}.git`;
}

/** `benchmarks/TDD` -> `TDD`; null for anything that is not a direct child. */
export function benchmarkNameFromPath(submodulePath: string): string | null {
  const name = benchmarkTargetFromPath(submodulePath);
  return name && !name.includes('/') ? name : null;
}

/** Anything below `benchmarks/`: `benchmarks/a/b` -> `a/b`. */
export function benchmarkTargetFromPath(submodulePath: string): string | null {
  const p = toPosix(submodulePath).replace(/\/+$/, '');
  const prefix = `${BENCHMARKS_DIR}/`;
  return p.startsWith(prefix) && p.length > prefix.length ? p.slice(prefix.length) : null;
}

export function expectedSubmoduleUrl(
  submodulePath: string,
  owner = DEFAULT_OWNER
): string | null {
  if (toPosix(submodulePath) === METRICS_SUBMODULE) return metricsRepoUrl(owner);
  const name = benchmarkNameFromPath(submodulePath);
  return name ? benchmarkRepoUrl(name, owner) : null;
}

/** Compare repository URLs ignoring a trailing `.git` or slash. */
export function sameRepoUrl(a: string, b: string): boolean {
  const norm = (u: string) =>
    u
      .trim()
      .replace(/\/+$/, '')
      .replace(/\.git$/i, '')
      .toLowerCase();
  return norm(a) === norm(b);
}

export function isResultsUpdate(changedPath: string, name?: string): boolean {
  const p = toPosix(changedPath);
  if (!p.endsWith(`/${RESULTS_FILE}`)) return false;
  return Object.values(KIND_ROOTS).some((rootDir) =>
    p.startsWith(name ? `${rootDir}/${name}/` : `${rootDir}/`)
  );
}
