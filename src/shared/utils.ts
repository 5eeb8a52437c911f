import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function nowISO(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Compact UTC stamp used in result file names, e.g. 20250301_0915.
 */
export function fileStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 4)}${iso.slice(5, 7)}${iso.slice(8, 10)}_${iso.slice(11, 13)}${iso.slice(14, 16)}`;
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory containing package.json.
  // Works for both tsx (src/shared/utils.ts) and the tsc build (dist/src/shared/utils.js).
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getScoutDir(): string {
  return resolvePath('~/.gridscout');
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run fn over items with at most `concurrency` calls in flight.
 */
export async function withConcurrency<T>(
  items: T[],
  concurrency: number,
  fn: (item: T) => Promise<void>,
): Promise<void> {
  const queue = [...items];
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(Math.max(1, concurrency), queue.length); i++) {
    workers.push(
      (async () => {
        while (queue.length > 0) {
          const item = queue.shift();
          if (item !== undefined) {
            await fn(item);
          }
        }
      })(),
    );
  }

  await Promise.all(workers);
}
