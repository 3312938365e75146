/**
 * File loading for include/import
 *
 * The resolver only ever calls `load` and `canonicalize`; everything that
 * touches a real file system lives in NodeFileLoader.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface FileLoader {
  /** Contents of the file, or throw when it cannot be read */
  load(filePath: string): string | Uint8Array;
  /** Stable identity for a path; defaults to the absolute path */
  canonicalize?(filePath: string): string;
}

/**
 * Loader backed by the local file system
 */
export class NodeFileLoader implements FileLoader {
  load(filePath: string): Uint8Array {
    return fs.readFileSync(filePath);
  }

  canonicalize(filePath: string): string {
    const absolute = path.resolve(filePath);
    return fs.existsSync(absolute) ? fs.realpathSync(absolute) : absolute;
  }
}

/**
 * In-memory loader for tests and embedding
 */
export class MemoryFileLoader implements FileLoader {
  private files: Map<string, string> = new Map();
  private reads: Map<string, number> = new Map();

  constructor(files: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(files)) {
      this.add(filePath, content);
    }
  }

  add(filePath: string, content: string): this {
    this.files.set(path.resolve(filePath), content);
    return this;
  }

  load(filePath: string): string {
    const absolute = path.resolve(filePath);
    const content = this.files.get(absolute);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file '${absolute}'`);
    }
    this.reads.set(absolute, (this.reads.get(absolute) ?? 0) + 1);
    return content;
  }

  /** How many times a file has been loaded */
  readCount(filePath: string): number {
    return this.reads.get(path.resolve(filePath)) ?? 0;
  }
}
