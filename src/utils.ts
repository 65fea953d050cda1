import path from 'node:path';
import fg from 'fast-glob';
import { UsageError, errorMessage } from './errors';
import { DEFAULT_OWNER, RESULTS_FILE } from './layout';
import { evaluateCheck } from './results';
import type {
  CheckDef,
  CheckLogOpts,
  CheckResult,
  CLIOpts,
  Command,
  ReportFormat,
  Summary,
  SummaryRenderOptions,
} from './types';

// ---------- Pretty logging ----------
const paint = (code: string) => (s: string) =>
  process.env.NO_COLOR ? s : `\x1b[${code}m${s}\x1b[0m`;

export const color = {
  dim: paint('2'),
  gray: paint('90'),
  red: paint('31'),
  green: paint('32'),
  yellow: paint('33'),
  cyan: paint('36'),
  bold: paint('1'),
};

function ms(t: number) {
  return `${t} ms`;
}

// ---------- Helpers ----------

const COMMANDS: Command[] = ['generate', 'verify', 'lint'];

function isCommand(s: string): s is Command {
  return COMMANDS.some((c) => c === s);
}

function isReportFormat(s: string): s is ReportFormat {
  return s === 'md' || s === 'none';
}

function parseRuns(raw: string, source = '--runs'): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`${source} expects a positive integer, got: ${raw}`);
  }
  return n;
}

export function parseCLI(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): CLIOpts {
  const envFormat = env.REPORT_FORMAT ?? 'md';
  const opts: CLIOpts = {
    command: null,
    root: env.RESULTS_ROOT || process.cwd(),
    base: env.BASE_SHA?.trim() || null,
    head: env.HEAD_SHA?.trim() || null,
    all: false,
    bench: [],
    runs: 1,
    check: false,
    reportPath: env.REPORT_PATH || null,
    format: isReportFormat(envFormat) ? envFormat : 'md',
    outBase: env.REPORT_OUT || null,
    owner: env.BENCHMARK_OWNER || DEFAULT_OWNER,
    showPassDetails: false,
    noReport: false,
    help: false,
  };

  const value = (i: number, flag: string) => {
    const v = argv[i];
    if (v === undefined || v.startsWith('--')) {
      throw new UsageError(`${flag} expects a value`);
    }
    return v;
  };

  let runsFlag = false;
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    switch (a) {
      case '--root':
        opts.root = value(++i, a);
        break;
      case '--base':
        opts.base = value(++i, a).trim();
        break;
      case '--head':
        opts.head = value(++i, a).trim();
        break;
      case '--all':
        opts.all = true;
        break;
      case '--bench':
        opts.bench.push(value(++i, a));
        break;
      case '--runs':
        opts.runs = parseRuns(value(++i, a));
        runsFlag = true;
        break;
      case '--check':
        opts.check = true;
        break;
      case '--report':
        opts.reportPath = value(++i, a);
        break;
      case '--no-report':
        opts.noReport = true;
        break;
      case '--format': {
        const f = value(++i, a);
        if (!isReportFormat(f)) throw new UsageError(`Unknown report format: ${f}`);
        opts.format = f;
        break;
      }
      case '--out':
        opts.outBase = value(++i, a);
        break;
      case '--owner':
        opts.owner = value(++i, a);
        break;
      case '--show-pass-details':
        opts.showPassDetails = true;
        break;
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        if (a.startsWith('-')) {
          throw new UsageError(`Unknown flag: ${a}`);
        }
        if (opts.command) {
          throw new UsageError(`Unexpected argument: ${a}`);
        }
        if (!isCommand(a)) {
          throw new UsageError(`Unknown command: ${a}`);
        }
        opts.command = a;
    }
  }
  // BENCH_RUNS only matters to generate
  if (opts.command === 'generate' && !runsFlag && env.BENCH_RUNS) {
    opts.runs = parseRuns(env.BENCH_RUNS, 'BENCH_RUNS');
  }
  opts.root = path.resolve(opts.root);
  return opts;
}

export const USAGE = `Usage: bench-results <command> [flags]

Commands:
  generate   Regenerate RESULTS.md for changed (or selected) benchmark submodules
  verify     Fail when a submodule pointer bump has no matching RESULTS.md update
  lint       Check RESULTS.md layout and content conventions

Flags:
  --root DIR            repository root (env RESULTS_ROOT, default cwd)
  --base SHA / --head SHA
                        diff range (env BASE_SHA / HEAD_SHA)
  --all                 generate: every benchmark
  --bench NAME          generate: a named benchmark (repeatable)
  --runs N              generate: iterations per toolchain (default 1)
  --check               generate: fail if regeneration changed tracked files
  --report PATH         lint: JSON summary path
  --no-report           lint: skip the JSON summary
  --format md|none      lint: pretty report format
  --out BASE            lint: pretty report base path
  --owner ORG           lint: benchmark repository owner
  --show-pass-details   lint: print rationale for passing checks too`;

function detailLines(res: CheckResult, maxFixes: number, indent = '      ') {
  const lines: string[] = [];
  if (res.rationale) {
    lines.push(
      `${indent}${color.yellow('•')} ${color.yellow('rationale:')} ${res.rationale}`
    );
  }
  const show = res.suggested_fixes.slice(0, maxFixes);
  for (const fx of show) {
    lines.push(`${indent}${color.cyan('•')} ${color.cyan('fix:')} ${fx}`);
  }
  const extra = res.suggested_fixes.length - show.length;
  if (extra > 0) {
    lines.push(
      `${indent}${color.cyan(`(+${extra} more suggestion${extra > 1 ? 's' : ''})`)}`
    );
  }
  return lines;
}

function statusLabel(res: CheckResult) {
  if (res.pass) return color.green('PASS');
  return res.severity === 'warn' ? color.yellow('WARN') : color.red('FAIL');
}

// compact check-level log; a throwing check becomes a failing result
export async function runCheckWithLogs(
  def: CheckDef,
  opts: CheckLogOpts = {}
): Promise<CheckResult> {
  const start = Date.now();
  const fileLabel = opts.filePath
    ? color.dim(`[${opts.filePath}]`)
    : color.dim('[check]');

  let res: CheckResult;
  try {
    res = await evaluateCheck(def);
  } catch (e) {
    res = {
      id: def.id,
      severity: def.severity,
      pass: false,
      rationale: errorMessage(e),
      suggested_fixes: [],
    };
  }

  // one block so lines don't interleave
  const lines = [
    `  ${fileLabel} ${color.bold('▶')} ${color.bold(def.id)}  ${statusLabel(
      res
    )}  ${color.gray(`(${ms(Date.now() - start)})`)}`,
  ];
  if (!res.pass || opts.showPassDetails) {
    lines.push(...detailLines(res, 3));
  }
  console.log(lines.join('\n'));
  return res;
}

export function renderConsoleReport(
  summary: Summary,
  opts: SummaryRenderOptions = {}
) {
  const { root, checked, passed, failed, files } = summary;
  const { showPassDetails = false } = opts;

  const hr = color.dim('─'.repeat(70));
  console.log('\n' + hr);
  console.log(color.bold('Benchmark Results Lint Report'));
  console.log(
    `${color.dim('Root')}: ${color.bold(root)}  ${color.dim('•')} ` +
      `${color.dim('Files')}: ${color.bold(String(checked))}  ${color.dim('•')} ` +
      `${color.green(`${passed} passed`)}  ${color.dim('•')} ${color.red(
        `${failed} failed`
      )}`
  );
  console.log(hr);

  for (const f of files) {
    const icon = f.overall_pass ? color.green('✔') : color.red('✖');
    const passedCount = f.checks.filter((c) => c.pass).length;
    console.log(
      `\n${icon} ${color.bold(f.file)}  ` +
        color.dim(`(${passedCount} passed, ${f.checks.length - passedCount} failed)`)
    );

    const failing = f.checks.filter((c) => !c.pass);
    if (failing.length) {
      console.log(`  ${color.red('Failed checks:')}`);
      for (const c of failing) {
        const mark = c.severity === 'warn' ? color.yellow('!') : color.red('✖');
        console.log(`    ${mark} ${color.bold(c.id)}`);
        console.log(detailLines(c, 3).join('\n'));
      }
    }

    const passing = f.checks.filter((c) => c.pass);
    if (passing.length) {
      console.log(`  ${color.green('Passed checks:')}`);
      for (const c of passing) {
        console.log(`    ${color.green('✔')} ${color.bold(c.id)}`);
        if (showPassDetails) console.log(detailLines(c, 2).join('\n'));
      }
    }
  }

  console.log('\n' + hr);
  console.log(failed ? color.red('Result: FAIL') : color.green('Result: PASS'));
  console.log(hr + '\n');
}

const TARGET_IGNORE = [
  '**/node_modules/**',
  'benchmarks/**',
  '_metrics/**',
  '.runs/**',
  'reports/**',
  'dist/**',
];

/** Every RESULTS.md under root, repo-relative with POSIX separators, sorted. */
export async function getTargets(root: string): Promise<string[]> {
  const files = await fg(`**/${RESULTS_FILE}`, {
    cwd: root,
    dot: false,
    onlyFiles: true,
    ignore: TARGET_IGNORE,
  });
  return files.sort();
}
