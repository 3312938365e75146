/**
 * Include/import resolution
 *
 * Paths resolve against the directory of the file issuing the call. Each
 * canonical path is parsed at most once per compile run; every call site
 * still evaluates the shared AST itself. A stack of in-progress paths
 * catches cycles before they recurse.
 */

import * as path from 'path';
import type { Expr, Location } from '../syntax/expr.js';
import { parse } from '../syntax/parser.js';
import { CircularImportError, FileIOError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { FileLoader } from './loader.js';

const logger = createLogger('resolver');

const decoder = new TextDecoder('utf-8');

export class Resolver {
  private cache: Map<string, readonly Expr[]> = new Map();
  private stack: string[] = [];

  constructor(private readonly loader: FileLoader) {}

  /**
   * Canonical path for `request` as written in `fromFile`.
   * Pseudo-files such as `<input>` resolve against the working directory.
   */
  resolvePath(request: string, fromFile: string): string {
    const baseDir = isPseudoFile(fromFile) ? process.cwd() : path.dirname(path.resolve(fromFile));
    const absolute = path.resolve(baseDir, request);
    return this.loader.canonicalize ? this.loader.canonicalize(absolute) : absolute;
  }

  /**
   * Parsed AST of a canonical path, from cache when possible
   */
  load(canonical: string, site?: Location): readonly Expr[] {
    const cached = this.cache.get(canonical);
    if (cached) {
      logger.debug('Parse cache hit', { path: canonical });
      return cached;
    }

    let raw: string | Uint8Array;
    try {
      raw = this.loader.load(canonical);
    } catch (e) {
      throw new FileIOError(canonical, { location: site, cause: e });
    }

    const text = typeof raw === 'string' ? raw : decoder.decode(raw);
    const exprs = Object.freeze(parse(text, canonical));
    this.cache.set(canonical, exprs);
    logger.debug('Parsed and cached', { path: canonical, expressions: exprs.length });
    return exprs;
  }

  /**
   * Mark `canonical` in progress for the duration of `fn`.
   * Re-entering a path already in progress is a cycle.
   */
  enter<T>(canonical: string, site: Location | undefined, fn: () => T): T {
    if (this.stack.includes(canonical)) {
      const chain = [...this.stack, canonical];
      logger.debug('Circular import detected', { chain });
      throw new CircularImportError(chain, site);
    }

    this.stack.push(canonical);
    logger.debug('Entering document', { path: canonical, depth: this.stack.length });
    try {
      return fn();
    } finally {
      this.stack.pop();
    }
  }

  /** Paths currently being resolved, outermost first */
  get activeStack(): readonly string[] {
    return [...this.stack];
  }

  isCached(canonical: string): boolean {
    return this.cache.has(canonical);
  }
}

export function isPseudoFile(file: string): boolean {
  return file.startsWith('<') && file.endsWith('>');
}
