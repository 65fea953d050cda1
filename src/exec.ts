import { spawn } from 'node:child_process';
import { CommandError } from './errors';
import type { CommandOpts, CommandOutput, CommandRunner } from './types';

// Captures stdout/stderr; spawn errors (e.g. ENOENT) reject.
export const runCommand: CommandRunner = (cmd, opts = {}) =>
  new Promise<CommandOutput>((resolve, reject) => {
    const [bin, ...args] = cmd;
    if (!bin) {
      reject(new Error('Empty command'));
      return;
    }
    const child = spawn(bin, args, {
      cwd: opts.cwd,
      env: { ...process.env, ...opts.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => (stdout += chunk));
    child.stderr.on('data', (chunk: string) => (stderr += chunk));

    child.on('error', reject);
    child.on('close', (code) => resolve({ code: code ?? 1, stdout, stderr }));
  });

/**
 * Run a command and throw a CommandError when it exits non-zero.
 * Returns stdout on success.
 */
export async function runChecked(
  runner: CommandRunner,
  cmd: string[],
  opts?: CommandOpts
): Promise<string> {
  const out = await runner(cmd, opts);
  if (out.code !== 0) {
    throw new CommandError(
      cmd,
      out.code,
      out.stderr.trim() || out.stdout.trim()
    );
  }
  return out.stdout;
}
