import type { GitClient } from './git';
import {
  benchmarkTargetFromPath,
  isResultsUpdate,
  METRICS_SUBMODULE,
} from './layout';
import type { GitlinkChange } from './types';

export type VerifyResult = {
  exitCode: 0 | 1 | 2;
  failures: string[];
};

/**
 * Policy: a bumped `benchmarks/<NAME>` pointer needs a RESULTS.md change under
 * `rules/<NAME>/` or `rulesets/<NAME>/`; a bumped `_metrics` pointer needs at
 * least one RESULTS.md change anywhere under `rules/` or `rulesets/`.
 */
export function checkResultsUpdated(
  gitlinks: GitlinkChange[],
  changed: Iterable<string>
): string[] {
  const paths = [...changed];
  const failures: string[] = [];

  for (const gl of gitlinks) {
    if (gl.path === METRICS_SUBMODULE) {
      if (!paths.some((p) => isResultsUpdate(p))) {
        failures.push(
          `Changed ${METRICS_SUBMODULE} submodule but did not update any rules/**/RESULTS.md`
        );
      }
      continue;
    }

    // nested gitlinks keep their full remainder: benchmarks/a/b -> a/b
    const name = benchmarkTargetFromPath(gl.path);
    if (name && !paths.some((p) => isResultsUpdate(p, name))) {
      failures.push(
        `Changed ${gl.path} submodule but did not update any rules/${name}/*/RESULTS.md`
      );
    }
  }
  return failures;
}

export async function runVerify(opts: {
  base?: string | null;
  head?: string | null;
  git: GitClient;
}): Promise<VerifyResult> {
  const base = (opts.base ?? '').trim();
  const head = (opts.head ?? '').trim();
  if (!base || !head) {
    console.error('Missing BASE_SHA/HEAD_SHA');
    return { exitCode: 2, failures: [] };
  }

  const gitlinks = await opts.git.changedGitlinks(base, head);
  if (!gitlinks.length) {
    console.log('No submodule pointer changes detected.');
    return { exitCode: 0, failures: [] };
  }

  const changed = await opts.git.changedPaths(base, head);
  const failures = checkResultsUpdated(gitlinks, changed);

  if (failures.length) {
    console.error('PR must update results when submodule pointers change:');
    for (const f of failures) console.error(`- ${f}`);
    return { exitCode: 1, failures };
  }

  console.log('OK: submodule changes accompanied by RESULTS.md updates.');
  return { exitCode: 0, failures };
}
