/**
 * Entity storage - flat directory of <id>.json documents
 */

import { mkdir, readFile, readdir, unlink, writeFile } from 'fs/promises';
import { join } from 'path';

export interface EntityStore {
  /** Document text, or undefined when no document exists */
  read(id: string): Promise<string | undefined>;
  write(id: string, text: string): Promise<void>;
  /** Ids of every stored document */
  list(): Promise<string[]>;
  /** Remove a document; missing documents are ignored */
  remove(id: string): Promise<void>;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileEntityStore implements EntityStore {
  constructor(readonly dir: string) {}

  async read(id: string): Promise<string | undefined> {
    try {
      return await readFile(this.pathOf(id), 'utf-8');
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw error;
    }
  }

  async write(id: string, text: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.pathOf(id), text, 'utf-8');
  }

  async list(): Promise<string[]> {
    try {
      const files = await readdir(this.dir);
      return files
        .filter((file) => file.toLowerCase().endsWith('.json'))
        .map((file) => file.slice(0, -'.json'.length));
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  async remove(id: string): Promise<void> {
    try {
      await unlink(this.pathOf(id));
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
  }

  private pathOf(id: string): string {
    return join(this.dir, `${id}.json`);
  }
}

/**
 * In-memory store, for ephemeral runs and tests
 */
export class MemoryEntityStore implements EntityStore {
  readonly documents = new Map<string, string>();

  async read(id: string): Promise<string | undefined> {
    return this.documents.get(id);
  }

  async write(id: string, text: string): Promise<void> {
    this.documents.set(id, text);
  }

  async list(): Promise<string[]> {
    return [...this.documents.keys()];
  }

  async remove(id: string): Promise<void> {
    this.documents.delete(id);
  }
}
