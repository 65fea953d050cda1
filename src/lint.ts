import fs from 'node:fs/promises';
import path from 'node:path';
import { errorMessage, isNotFound } from './errors';
import { parseGitmodules } from './gitmodules';
import {
  benchmarkNameFromPath,
  classifyResultsPath,
  DEFAULT_OWNER,
  expectedSubmoduleUrl,
  isResultsUpdate,
  sameRepoUrl,
} from './layout';
import { overallPass, parseResultsDocument, resultsChecks } from './results';
import { getTargets, runCheckWithLogs, color } from './utils';
import type {
  CheckDef,
  CheckResult,
  FileResult,
  ResultsDocument,
  Submodule,
  Summary,
} from './types';

export const GITMODULES_FILE = '.gitmodules';

export type LintOptions = {
  root: string;
  owner?: string;
  showPassDetails?: boolean;
};

function pathCheck(rel: string): CheckDef {
  return {
    id: 'RESULTS_PATH',
    severity: 'error',
    run: () =>
      classifyResultsPath(rel)
        ? { pass: true, rationale: 'Path follows the results layout.' }
        : {
            pass: false,
            rationale: `${rel} is not at rules/<RULE>/<language>/RESULTS.md or rulesets/<RULESET>/<language>/RESULTS.md`,
            suggested_fixes: [
              'Move the file under rules/<RULE>/<language>/ or rulesets/<RULESET>/<language>/.',
            ],
          },
  };
}

async function lintResultsFile(
  root: string,
  rel: string,
  opts: LintOptions
): Promise<FileResult> {
  console.log(color.bold(`\n${rel}`));
  const logOpts = { filePath: rel, showPassDetails: opts.showPassDetails };

  const checks: CheckResult[] = [await runCheckWithLogs(pathCheck(rel), logOpts)];
  const location = classifyResultsPath(rel);
  if (location) {
    // content checks only run once the file has been read and parsed
    const parsed: { doc?: ResultsDocument } = {};
    const parse = await runCheckWithLogs(
      {
        id: 'RESULTS_PARSE',
        severity: 'error',
        run: async () => {
          const raw = await fs.readFile(path.join(root, rel), 'utf8');
          parsed.doc = parseResultsDocument(raw);
          return { pass: true, rationale: 'Front matter and markdown parsed.' };
        },
      },
      logOpts
    );
    checks.push(parse);

    if (parsed.doc) {
      for (const def of resultsChecks(parsed.doc, location, opts.owner ?? DEFAULT_OWNER)) {
        checks.push(await runCheckWithLogs(def, logOpts));
      }
    }
  }
  return { file: rel, overall_pass: overallPass(checks), checks };
}

function engineError(rel: string, e: unknown): FileResult {
  return {
    file: rel,
    overall_pass: false,
    checks: [
      {
        id: 'ENGINE_ERROR',
        severity: 'error',
        pass: false,
        rationale: `Engine error: ${errorMessage(e)}`,
        suggested_fixes: [],
      },
    ],
  };
}

/**
 * One URL check per `benchmarks/*` or `_metrics` submodule, plus a warning
 * for benchmark submodules without any committed RESULTS.md.
 */
export function submoduleChecks(
  submodules: Submodule[],
  resultsFiles: string[],
  owner = DEFAULT_OWNER
): CheckDef[] {
  const defs: CheckDef[] = [];
  for (const sm of submodules) {
    const smPath = sm.path ?? sm.name;
    const expected = expectedSubmoduleUrl(smPath, owner);
    if (!expected) continue;

    defs.push({
      id: `SUBMODULE_URL:${smPath}`,
      severity: 'error',
      run: () =>
        sm.url && sameRepoUrl(sm.url, expected)
          ? { pass: true, rationale: `Points at ${expected}` }
          : {
              pass: false,
              rationale: sm.url
                ? `URL ${sm.url} does not match ${expected}`
                : 'Submodule has no url.',
              suggested_fixes: [`git submodule set-url ${smPath} ${expected}`],
            },
    });

    const name = benchmarkNameFromPath(smPath);
    if (!name) continue;
    defs.push({
      id: `SUBMODULE_RESULTS:${smPath}`,
      severity: 'warn',
      run: () =>
        resultsFiles.some((f) => isResultsUpdate(f, name))
          ? { pass: true, rationale: `Results committed for ${name}.` }
          : {
              pass: false,
              rationale: `No RESULTS.md under rules/${name}/ or rulesets/${name}/`,
              suggested_fixes: [`Run: bench-results generate --bench ${name}`],
            },
    });
  }
  return defs;
}

async function lintGitmodules(
  root: string,
  resultsFiles: string[],
  opts: LintOptions
): Promise<FileResult | null> {
  let text: string;
  try {
    text = await fs.readFile(path.join(root, GITMODULES_FILE), 'utf8');
  } catch (e) {
    if (isNotFound(e)) return null;
    throw e;
  }

  const defs = submoduleChecks(parseGitmodules(text), resultsFiles, opts.owner);
  if (!defs.length) return null;

  console.log(color.bold(`\n${GITMODULES_FILE}`));
  const checks: CheckResult[] = [];
  for (const def of defs) {
    checks.push(
      await runCheckWithLogs(def, {
        filePath: GITMODULES_FILE,
        showPassDetails: opts.showPassDetails,
      })
    );
  }
  return { file: GITMODULES_FILE, overall_pass: overallPass(checks), checks };
}

export async function runLint(opts: LintOptions): Promise<Summary> {
  const root = path.resolve(opts.root);
  const targets = await getTargets(root);

  const files: FileResult[] = [];
  for (const rel of targets) {
    try {
      files.push(await lintResultsFile(root, rel, opts));
    } catch (e) {
      files.push(engineError(rel, e));
    }
  }
  const modules = await lintGitmodules(root, targets, opts);
  if (modules) files.push(modules);

  return {
    root,
    checked: files.length,
    passed: files.filter((f) => f.overall_pass).length,
    failed: files.filter((f) => !f.overall_pass).length,
    files,
  };
}
