/**
 * Cross-references within one document
 *
 * `(:ref id)` may come before the `(:define-ref id ...)` it points at, so ref
 * writes a placeholder and the placeholders are replaced once the whole
 * document has been evaluated.
 */

import type { Location } from '../syntax/expr.js';
import { InvalidArgumentError, UndefinedReferenceError } from '../errors.js';

export interface Reference {
  id: string;
  title: string;
  href: string;
  location: Location;
}

export type ReferencePart = 'href' | 'title';

interface PendingReference {
  id: string;
  part: ReferencePart;
  location: Location;
}

/** Private-use characters, left alone by the markdown renderer and escaping */
const OPEN = '\uE000';
const CLOSE = '\uE001';
const PLACEHOLDER = /\uE000ref:(\d+)\uE001/g;

export class ReferenceTable {
  private readonly defined: Map<string, Reference> = new Map();
  private readonly pending: PendingReference[] = [];

  define(reference: Reference): void {
    const existing = this.defined.get(reference.id);
    if (existing) {
      throw new InvalidArgumentError(`Reference '${reference.id}' is already defined`, {
        location: reference.location,
      });
    }
    this.defined.set(reference.id, reference);
  }

  get(id: string): Reference | undefined {
    return this.defined.get(id);
  }

  /**
   * Stand-in for a part of a reference that may not be defined yet
   */
  placeholder(id: string, part: ReferencePart, location: Location): string {
    this.pending.push({ id, part, location });
    return `${OPEN}ref:${this.pending.length - 1}${CLOSE}`;
  }

  /**
   * Replace every placeholder in `text`
   */
  resolve(text: string): string {
    return text.replace(PLACEHOLDER, (match: string, index: string) => {
      const pending = this.pending[Number(index)];
      if (!pending) {
        return match;
      }
      const reference = this.defined.get(pending.id);
      if (!reference) {
        throw new UndefinedReferenceError(pending.id, pending.location);
      }
      return pending.part === 'href' ? reference.href : reference.title;
    });
  }
}
