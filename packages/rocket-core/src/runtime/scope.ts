/**
 * Lexical scopes
 *
 * Scopes live in an arena and are addressed by `{ index, generation }`
 * handles. A child refers to its parent by handle, never by object reference.
 * Releasing a scope bumps the slot's generation and returns it to the free
 * list; any handle still pointing at the old generation is stale and fails.
 */

import type { Expr } from '../syntax/expr.js';
import { NotFoundError } from '../errors.js';
import type { TemplateDef } from './templates.js';

/**
 * Binding stored under a name
 */
export type Binding =
  | { kind: 'value'; value: string }
  | { kind: 'macro'; body: Expr }
  | { kind: 'template'; templates: readonly TemplateDef[] };

export interface ScopeRef {
  readonly index: number;
  readonly generation: number;
}

interface ScopeRecord {
  generation: number;
  live: boolean;
  parent: ScopeRef | null;
  table: Map<string, Binding>;
}

export class StaleScopeError extends Error {
  constructor(ref: ScopeRef) {
    super(`Scope #${ref.index} (generation ${ref.generation}) has been released`);
    this.name = 'StaleScopeError';
  }
}

/**
 * Arena of scope records
 */
export class ScopeArena {
  private records: ScopeRecord[] = [];
  private free: number[] = [];

  /**
   * Create a root scope (no parent)
   */
  createRoot(): ScopeRef {
    return this.allocate(null);
  }

  /**
   * Create a child of `parent`
   */
  createChild(parent: ScopeRef): ScopeRef {
    this.record(parent);
    return this.allocate(parent);
  }

  /**
   * Release a scope. Its slot may be reused by a later scope.
   */
  release(ref: ScopeRef): void {
    const record = this.record(ref);
    record.live = false;
    record.generation++;
    record.parent = null;
    record.table = new Map();
    this.free.push(ref.index);
  }

  /**
   * Run `fn` in a new child scope, releasing it afterwards whether `fn`
   * returns or throws.
   */
  withChild<T>(parent: ScopeRef, fn: (scope: ScopeRef) => T): T {
    const scope = this.createChild(parent);
    try {
      return fn(scope);
    } finally {
      this.release(scope);
    }
  }

  /**
   * Insert or overwrite a binding in this scope only
   */
  define(ref: ScopeRef, name: string, binding: Binding): void {
    this.record(ref).table.set(name, binding);
  }

  /**
   * Walk outward from `ref`; the innermost binding wins
   */
  lookup(ref: ScopeRef, name: string): Binding {
    const binding = this.find(ref, name);
    if (!binding) {
      throw new NotFoundError(name);
    }
    return binding;
  }

  /**
   * Like lookup, but returns undefined at the root instead of failing
   */
  find(ref: ScopeRef, name: string): Binding | undefined {
    for (const scope of this.chain(ref)) {
      const binding = this.record(scope).table.get(name);
      if (binding) {
        return binding;
      }
    }
    return undefined;
  }

  /**
   * The scope itself, then each ancestor up to the root
   */
  *chain(ref: ScopeRef): Generator<ScopeRef> {
    let current: ScopeRef | null = ref;
    while (current) {
      yield current;
      current = this.record(current).parent;
    }
  }

  /**
   * This scope's own definition table
   */
  entries(ref: ScopeRef): Array<[string, Binding]> {
    return Array.from(this.record(ref).table.entries());
  }

  /**
   * Own binding of this scope, ignoring ancestors
   */
  own(ref: ScopeRef, name: string): Binding | undefined {
    return this.record(ref).table.get(name);
  }

  parentOf(ref: ScopeRef): ScopeRef | null {
    return this.record(ref).parent;
  }

  isLive(ref: ScopeRef): boolean {
    const record = this.records[ref.index];
    return record !== undefined && record.live && record.generation === ref.generation;
  }

  /** Number of scopes currently alive */
  get liveCount(): number {
    return this.records.length - this.free.length;
  }

  private allocate(parent: ScopeRef | null): ScopeRef {
    const index = this.free.pop();
    if (index !== undefined) {
      const record = this.records[index];
      record.live = true;
      record.parent = parent;
      return { index, generation: record.generation };
    }

    this.records.push({ generation: 0, live: true, parent, table: new Map() });
    return { index: this.records.length - 1, generation: 0 };
  }

  private record(ref: ScopeRef): ScopeRecord {
    const record = this.records[ref.index];
    if (!record || !record.live || record.generation !== ref.generation) {
      throw new StaleScopeError(ref);
    }
    return record;
  }
}
