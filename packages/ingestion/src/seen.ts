import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Identifiers of listings that have already been notified.
 * Immutable: `union` returns a new set.
 */
export class SeenSet {
  private readonly ids: ReadonlySet<string>;

  constructor(ids: Iterable<string> = []) {
    this.ids = new Set(ids);
  }

  get size(): number {
    return this.ids.size;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  union(ids: Iterable<string>): SeenSet {
    return new SeenSet([...this.ids, ...ids]);
  }

  toArray(): string[] {
    return [...this.ids].sort();
  }
}

/**
 * Persistence for the seen set between runs.
 */
export interface SeenStore {
  load(): Promise<SeenSet>;
  save(seen: SeenSet): Promise<void>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function parseSeenFile(contents: string): SeenSet {
  return new SeenSet(
    contents
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean),
  );
}

export function serializeSeenSet(seen: SeenSet): string {
  return seen.toArray().join('\n');
}

/**
 * Flat text file, one identifier per line, sorted.
 * Saves go through a sibling temp file renamed over the target, so a crash mid-write
 * leaves the previous contents in place.
 */
export class FileSeenStore implements SeenStore {
  constructor(readonly path: string) {}

  async load(): Promise<SeenSet> {
    let contents: string;
    try {
      contents = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return new SeenSet();
      }
      throw error;
    }

    return parseSeenFile(contents);
  }

  async save(seen: SeenSet): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });

    const tempPath = `${this.path}.tmp`;
    await writeFile(tempPath, serializeSeenSet(seen), 'utf-8');
    await rename(tempPath, this.path);
  }
}
