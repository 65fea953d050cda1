export type Command = 'generate' | 'verify' | 'lint';

export type ReportFormat = 'md' | 'none';

export type CLIOpts = {
  command: Command | null;
  root: string;
  base?: string | null;
  head?: string | null;
  all: boolean;
  bench: string[];
  runs: number;
  check: boolean;
  reportPath?: string | null;
  format: ReportFormat;
  outBase?: string | null;
  owner: string;
  showPassDetails: boolean;
  noReport: boolean;
  help: boolean;
};

export type ResultsKind = 'rule' | 'ruleset';

export type ResultsLocation = {
  kind: ResultsKind;
  name: string; // RULE or RULESET
  language: string;
  path: string; // repo-relative, POSIX separators
};

export type Severity = 'error' | 'warn';

export type CheckResult = {
  id: string;
  severity: Severity;
  pass: boolean;
  rationale: string;
  suggested_fixes: string[];
};

export type CheckOutcome = {
  pass: boolean;
  rationale: string;
  suggested_fixes?: string[];
};

export type CheckDef = {
  id: string;
  severity: Severity;
  run: () => CheckOutcome | Promise<CheckOutcome>;
};

export type FileResult = {
  file: string; // repo-relative
  overall_pass: boolean;
  checks: CheckResult[];
};

export type Summary = {
  root: string;
  checked: number;
  passed: number;
  failed: number;
  files: FileResult[];
};

export type CheckLogOpts = {
  filePath?: string;
  showPassDetails?: boolean; // if true, show rationale/fixes even on PASS
};

export type SummaryRenderOptions = {
  showPassDetails?: boolean;
};

export type PrettyReportOptions = {
  format?: ReportFormat;
  // file basename, extension will be added per format
  outBasePath?: string;
  showPassDetails?: boolean;
  generatedAt?: Date;
};

export type MarkdownLink = {
  text: string | null; // null for bare URLs
  url: string;
};

export type MarkdownTable = {
  header: string[];
  rows: string[][];
};

export type ResultsDocument = {
  links: MarkdownLink[];
  description: string | null;
  tables: MarkdownTable[];
  versionTable: MarkdownTable | null;
};

export type GitlinkChange = {
  path: string;
};

export type Submodule = {
  name: string;
  path?: string;
  url?: string;
};

export type Toolchain = {
  language: string;
  runner: string;
  aggregator: string;
};

export type CommandOpts = {
  cwd?: string;
  env?: Record<string, string>;
};

export type CommandOutput = {
  code: number;
  stdout: string;
  stderr: string;
};

/** Runs a command to completion; never rejects on a non-zero exit. */
export type CommandRunner = (
  cmd: string[],
  opts?: CommandOpts
) => Promise<CommandOutput>;
