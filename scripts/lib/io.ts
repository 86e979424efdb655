import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

export function repoPath(...parts: string[]): string {
  return path.join(process.cwd(), ...parts);
}

export function resolveFromCwd(target: string): string {
  return path.isAbsolute(target) ? target : repoPath(target);
}

export function toPosixRelative(filePath: string): string {
  return path.relative(process.cwd(), filePath).split(path.sep).join('/');
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
}

export function stableJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

/**
 * Writes through a sibling temp file and a rename, so a reader never sees a
 * half-written document.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureParentDir(filePath);
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, stableJson(data), 'utf8');
  await fs.rename(tempPath, filePath);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  return fs.readJson(filePath);
}

export interface FileEntry {
  filePath: string;
  mtimeMs: number;
}

/** Matching files under rootDir, most recently modified first. */
export async function listFilesByRecency(rootDir: string, pattern: string): Promise<FileEntry[]> {
  if (!(await fs.pathExists(rootDir))) {
    return [];
  }

  const files = await fg(pattern, {
    cwd: rootDir,
    dot: false,
    onlyFiles: true,
    deep: 1
  });

  const entries = await Promise.all(
    files.map(async (file) => {
      const filePath = path.join(rootDir, file);
      const stat = await fs.stat(filePath);
      return { filePath, mtimeMs: stat.mtimeMs };
    })
  );

  // Names carry a creation timestamp and a sequence suffix, so they break mtime ties.
  return entries.sort((a, b) => {
    if (a.mtimeMs !== b.mtimeMs) {
      return b.mtimeMs - a.mtimeMs;
    }
    const left = splitSequence(a.filePath);
    const right = splitSequence(b.filePath);
    if (left.base !== right.base) {
      return left.base < right.base ? 1 : -1;
    }
    return right.sequence - left.sequence;
  });
}

const SEQUENCE_NAME = /^(.*?)(?:_(\d+))?\.json$/;

/** `<base>_<n>.json` -> base and n; a name without a suffix is sequence 1. */
function splitSequence(filePath: string): { base: string; sequence: number } {
  const name = path.basename(filePath);
  const match = SEQUENCE_NAME.exec(name);
  if (!match) {
    return { base: name, sequence: 1 };
  }
  return { base: match[1], sequence: match[2] === undefined ? 1 : Number(match[2]) };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** UTC stamp used in record and export file names, e.g. 20261019T083015123. */
export function fileTimestamp(date: Date): string {
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    'T',
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
    pad(date.getUTCMilliseconds(), 3)
  ].join('');
}

/**
 * `<dir>/<base>.json`, or `<base>_2.json`, `<base>_3.json`... when a file of
 * that name already exists.
 */
export async function uniqueJsonPath(dir: string, base: string): Promise<string> {
  let candidate = path.join(dir, `${base}.json`);
  for (let suffix = 2; await fs.pathExists(candidate); suffix += 1) {
    candidate = path.join(dir, `${base}_${suffix}.json`);
  }
  return candidate;
}
