import path from 'node:path';
import { UsageError } from './errors';
import { runCommand } from './exec';
import { runGenerate } from './generate';
import { createGitClient, type GitClient } from './git';
import { runLint } from './lint';
import { writeJsonReport, writePrettyReport } from './reporters';
import type { CLIOpts, CommandRunner } from './types';
import { color, parseCLI, renderConsoleReport, USAGE } from './utils';
import { runVerify } from './verify';

export type CLIDeps = {
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  git?: GitClient;
};

const DEFAULT_REPORT_PATH = 'reports/results-lint.json';
const DEFAULT_REPORT_OUT = 'reports/results-lint';

function parseOrUsage(argv: string[], env: NodeJS.ProcessEnv): CLIOpts | null {
  try {
    return parseCLI(argv, env);
  } catch (e) {
    if (e instanceof UsageError) {
      console.error(color.red(e.message));
      console.error(USAGE);
      return null;
    }
    throw e;
  }
}

/** Parses argv, runs one command and resolves to the process exit code. */
export async function run(argv: string[], deps: CLIDeps = {}): Promise<number> {
  const cli = parseOrUsage(argv, deps.env ?? process.env);
  if (!cli) return 2;

  if (cli.help) {
    console.log(USAGE);
    return 0;
  }
  if (!cli.command) {
    console.error(USAGE);
    return 2;
  }

  const runner = deps.runner ?? runCommand;
  const git = deps.git ?? createGitClient(runner, cli.root);

  switch (cli.command) {
    case 'verify': {
      const res = await runVerify({ base: cli.base, head: cli.head, git });
      return res.exitCode;
    }

    case 'generate': {
      await runGenerate({
        root: cli.root,
        base: cli.base,
        head: cli.head,
        all: cli.all,
        bench: cli.bench,
        runs: cli.runs,
        check: cli.check,
        runner,
        git,
      });
      return 0;
    }

    case 'lint': {
      const summary = await runLint({
        root: cli.root,
        owner: cli.owner,
        showPassDetails: cli.showPassDetails,
      });

      if (summary.checked === 0) {
        console.log('No RESULTS.md files or benchmark submodules found.');
        return 0;
      }

      const reportPath = cli.noReport
        ? null
        : path.resolve(cli.root, cli.reportPath || DEFAULT_REPORT_PATH);
      if (reportPath) await writeJsonReport(summary, reportPath);

      renderConsoleReport(summary, { showPassDetails: cli.showPassDetails });
      await writePrettyReport(summary, {
        format: cli.format,
        outBasePath: path.resolve(cli.root, cli.outBase || DEFAULT_REPORT_OUT),
        showPassDetails: cli.showPassDetails,
      });
      return summary.failed > 0 ? 1 : 0;
    }
  }
}
