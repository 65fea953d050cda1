import fs from 'node:fs/promises';
import path from 'node:path';
import { runChecked } from './exec';
import type { GitClient } from './git';
import {
  BENCHMARKS_DIR,
  benchmarkNameFromPath,
  kindRoot,
  METRICS_SUBMODULE,
  resultsPath,
  toPosix,
} from './layout';
import type { CommandRunner, ResultsKind, Toolchain } from './types';

export const RUNS_DIR = '.runs';
const RUNNER_NAMES = ['run_all.sh', 'run_all'];
const AGGREGATOR_NAME = 'generate_results.py';

export type Benchmark = {
  name: string;
  dir: string; // absolute
};

export type GenerateOptions = {
  root: string;
  base?: string | null;
  head?: string | null;
  all?: boolean;
  bench?: string[];
  runs?: number;
  check?: boolean;
  runner: CommandRunner;
  git: GitClient;
};

export type GenerateResult = {
  processed: string[];
  written: string[]; // repo-relative RESULTS.md paths
};

async function exists(p: string) {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

async function isDir(p: string) {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function sortedSubdirs(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((d) => d.isDirectory())
    .map((d) => d.name)
    .sort();
}

/** Checked-out benchmark submodules: `benchmarks/<NAME>` holding a `.git` entry. */
export async function listRuleBenchmarks(root: string): Promise<Benchmark[]> {
  const benchRoot = path.join(root, BENCHMARKS_DIR);
  if (!(await isDir(benchRoot))) return [];

  const out: Benchmark[] = [];
  for (const name of await sortedSubdirs(benchRoot)) {
    const dir = path.join(benchRoot, name);
    if (await exists(path.join(dir, '.git'))) out.push({ name, dir });
  }
  return out;
}

export async function findToolchains(benchmarkDir: string): Promise<Toolchain[]> {
  const toolchains: Toolchain[] = [];
  for (const language of await sortedSubdirs(benchmarkDir)) {
    const langDir = path.join(benchmarkDir, language);

    let runner: string | null = null;
    for (const candidate of RUNNER_NAMES) {
      if (await exists(path.join(langDir, candidate))) {
        runner = path.join(langDir, candidate);
        break;
      }
    }
    const aggregator = path.join(langDir, AGGREGATOR_NAME);

    if (runner && (await exists(aggregator))) {
      toolchains.push({ language, runner, aggregator });
    }
  }
  return toolchains;
}

export async function selectBenchmarks(
  opts: Pick<GenerateOptions, 'root' | 'all' | 'bench' | 'base' | 'head' | 'git'>
): Promise<Benchmark[]> {
  if (opts.all) return listRuleBenchmarks(opts.root);

  if (opts.bench?.length) {
    const byName = new Map(
      (await listRuleBenchmarks(opts.root)).map((b) => [b.name, b])
    );
    const picked: Benchmark[] = [];
    for (const name of opts.bench) {
      const b = byName.get(name);
      if (b) picked.push(b);
      else console.error(`Benchmark not found: ${name}`);
    }
    return picked;
  }

  if (!opts.base || !opts.head) return [];

  const changed = await opts.git.changedGitlinks(opts.base, opts.head);
  if (changed.some((c) => c.path === METRICS_SUBMODULE)) {
    return listRuleBenchmarks(opts.root);
  }

  const out: Benchmark[] = [];
  for (const p of changed.map((c) => c.path).sort()) {
    const name = benchmarkNameFromPath(p);
    if (name) out.push({ name, dir: path.join(opts.root, BENCHMARKS_DIR, name) });
  }
  return out;
}

/** Rulesets are recognised by an existing `rulesets/<NAME>` directory. */
export async function resultsKindFor(
  root: string,
  name: string
): Promise<ResultsKind> {
  return (await isDir(path.join(root, kindRoot('ruleset'), name)))
    ? 'ruleset'
    : 'rule';
}

export async function ensureResultsPath(
  root: string,
  name: string,
  language: string
): Promise<string> {
  const rel = resultsPath(await resultsKindFor(root, name), name, language);
  const out = path.join(root, rel);
  await fs.mkdir(path.dirname(out), { recursive: true });
  return out;
}

export async function executeRuns(opts: {
  root: string;
  name: string;
  toolchain: Toolchain;
  runs: number;
  runner: CommandRunner;
}): Promise<string> {
  const { root, name, toolchain, runs } = opts;
  const storage = path.join(root, RUNS_DIR, name, toolchain.language);
  await fs.rm(storage, { recursive: true, force: true });
  await fs.mkdir(storage, { recursive: true });

  console.log(`Running ${name}/${toolchain.language} x${runs}...`);
  const cwd = path.dirname(toolchain.runner);
  for (let i = 1; i <= runs; i++) {
    const runDir = path.join(storage, `run_${i}`);
    await fs.mkdir(runDir);
    console.log(`  Iteration ${i}/${runs}`);
    await runChecked(opts.runner, ['bash', toolchain.runner, runDir], { cwd });
  }
  return storage;
}

export async function aggregateResults(opts: {
  root: string;
  toolchain: Toolchain;
  inputDir: string;
  outPath: string;
  runner: CommandRunner;
}): Promise<void> {
  const { root, toolchain, inputDir, outPath } = opts;
  console.log(
    `Aggregating ${inputDir} -> ${toPosix(path.relative(root, outPath))}`
  );
  // runs in the language dir so the aggregator finds its own data files
  await runChecked(
    opts.runner,
    [
      'python3',
      toolchain.aggregator,
      '--input-dir',
      inputDir,
      '--output',
      outPath,
    ],
    { cwd: path.dirname(toolchain.aggregator) }
  );
}

export async function processBenchmarks(
  root: string,
  benchmarks: Benchmark[],
  runs: number,
  runner: CommandRunner
): Promise<GenerateResult> {
  const result: GenerateResult = { processed: [], written: [] };

  for (const bench of benchmarks) {
    const toolchains = (await isDir(bench.dir))
      ? await findToolchains(bench.dir)
      : [];
    if (!toolchains.length) {
      console.error(
        `skip: ${bench.name} (no run_all.sh + generate_results.py found)`
      );
      continue;
    }

    for (const toolchain of toolchains) {
      const inputDir = await executeRuns({
        root,
        name: bench.name,
        toolchain,
        runs,
        runner,
      });
      const outPath = await ensureResultsPath(root, bench.name, toolchain.language);
      await aggregateResults({ root, toolchain, inputDir, outPath, runner });
      result.written.push(toPosix(path.relative(root, outPath)));
    }
    result.processed.push(bench.name);
  }
  return result;
}

export async function runGenerate(opts: GenerateOptions): Promise<GenerateResult> {
  const benchmarks = await selectBenchmarks(opts);

  let result: GenerateResult = { processed: [], written: [] };
  if (benchmarks.length) {
    result = await processBenchmarks(
      opts.root,
      benchmarks,
      opts.runs ?? 1,
      opts.runner
    );
  } else if (!opts.all && !opts.bench?.length) {
    console.log(
      'No benchmark submodule changes detected. Use --all or --bench to force run.'
    );
  }

  if (opts.check) await opts.git.assertClean();
  return result;
}
