import type { Submodule } from './types';

const SECTION_RE = /^\[\s*submodule\s+"([^"]+)"\s*\]$/;
const KEY_RE = /^([A-Za-z][\w-]*)\s*=\s*(.*)$/;

// Minimal git-config reader: only `[submodule "..."]` sections are kept.
export function parseGitmodules(text: string): Submodule[] {
  const out: Submodule[] = [];
  let current: Submodule | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    if (line.startsWith('[')) {
      const m = SECTION_RE.exec(line);
      current = m ? { name: m[1] } : null;
      if (current) out.push(current);
      continue;
    }

    const kv = KEY_RE.exec(line);
    if (!current || !kv) continue;
    const key = kv[1].toLowerCase();
    const value = kv[2].trim().replace(/^"(.*)"$/, '$1');
    if (key === 'path') current.path = value;
    else if (key === 'url') current.url = value;
  }
  return out;
}
