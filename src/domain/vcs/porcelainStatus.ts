// Porcelain Status - parse `git status --porcelain` (v1) output
// Lines look like `XY path` or `XY orig -> path` for renames and copies

import { StatusEntry, StatusEntryKind } from '../types/types';

const RENAME_SEPARATOR = ' -> ';

const C_ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  '\\': 0x5c,
};

/**
 * True when the status output reports no change at all.
 * Any non-blank output (even a line we cannot parse) counts as dirty.
 */
export function isWorkingTreeClean(porcelainOutput: string): boolean {
  return porcelainOutput.trim().length === 0;
}

function classify(index: string, workTree: string): StatusEntryKind {
  if (index === '?' && workTree === '?') return 'untracked';
  if (index === '!' && workTree === '!') return 'ignored';

  const staged = index !== ' ';
  const unstaged = workTree !== ' ';
  if (staged && unstaged) return 'staged+unstaged';
  return staged ? 'staged' : 'unstaged';
}

/**
 * Read one git C-quoted path starting at `start` (which must be a `"`).
 * Octal escapes are UTF-8 bytes, so the result is decoded as a byte sequence.
 */
function readQuoted(text: string, start: number): { value: string; end: number } {
  const bytes: number[] = [];
  let i = start + 1;

  while (i < text.length) {
    const ch = text[i];
    if (ch === '"') {
      return { value: Buffer.from(bytes).toString('utf8'), end: i + 1 };
    }
    if (ch === '\\' && i + 1 < text.length) {
      const next = text[i + 1];
      const octal = /^[0-7]{3}/.exec(text.slice(i + 1, i + 4));
      if (octal) {
        bytes.push(parseInt(octal[0], 8));
        i += 4;
        continue;
      }
      const escaped = C_ESCAPES[next];
      if (escaped !== undefined) {
        bytes.push(escaped);
        i += 2;
        continue;
      }
    }
    const char = String.fromCodePoint(text.codePointAt(i) ?? 0);
    bytes.push(...Buffer.from(char, 'utf8'));
    i += char.length;
  }

  // Unterminated quote: keep the raw text
  return { value: text.slice(start), end: text.length };
}

function readPath(text: string, start: number, untilSeparator: boolean): { value: string; end: number } {
  if (text[start] === '"') {
    return readQuoted(text, start);
  }
  if (untilSeparator) {
    const separatorAt = text.indexOf(RENAME_SEPARATOR, start);
    if (separatorAt !== -1) {
      return { value: text.slice(start, separatorAt), end: separatorAt };
    }
  }
  return { value: text.slice(start), end: text.length };
}

export function parsePorcelainLine(line: string): StatusEntry | null {
  if (line.trim().length === 0 || line.length < 4) {
    return null;
  }

  const index = line[0];
  const workTree = line[1];
  const isRenameOrCopy = index === 'R' || index === 'C' || workTree === 'R' || workTree === 'C';

  const first = readPath(line, 3, isRenameOrCopy);
  const kind = classify(index, workTree);

  if (isRenameOrCopy && line.startsWith(RENAME_SEPARATOR, first.end)) {
    const second = readPath(line, first.end + RENAME_SEPARATOR.length, false);
    return { path: second.value, origPath: first.value, index, workTree, kind };
  }

  return { path: first.value, index, workTree, kind };
}

export function parsePorcelainStatus(porcelainOutput: string): StatusEntry[] {
  const entries: StatusEntry[] = [];
  for (const line of porcelainOutput.split(/\r?\n/)) {
    const entry = parsePorcelainLine(line);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}
