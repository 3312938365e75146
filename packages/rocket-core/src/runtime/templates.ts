/**
 * Template matching
 *
 * `(:define-template name slot... body)` registers a TemplateDef. A slot is
 * either a literal token or a regex written `/pattern/flags`. At call time the
 * evaluated arguments are matched against every same-named template, newest
 * first, innermost scope first; the first full match wins.
 */

import type { Expr, Location } from '../syntax/expr.js';
import { InvalidArgumentError, NoMatchingTemplateError } from '../errors.js';
import type { ScopeArena, ScopeRef } from './scope.js';

export type Slot =
  | { kind: 'literal'; text: string }
  | { kind: 'pattern'; source: string; regex: RegExp };

export interface TemplateDef {
  name: string;
  slots: readonly Slot[];
  body: Expr;
  location: Location;
}

export interface TemplateMatch {
  template: TemplateDef;
  /** `$1`..`$n` across slots in order, plus named groups */
  captures: Map<string, string>;
}

const REGEX_SLOT = /^\/(.*)\/([imsu]*)$/s;

/**
 * Turn a slot's text into a literal or compiled pattern slot
 */
export function compileSlot(text: string, location?: Location): Slot {
  const match = REGEX_SLOT.exec(text);
  if (!match) {
    return { kind: 'literal', text };
  }

  const [, source, flags] = match;
  try {
    return { kind: 'pattern', source, regex: new RegExp(`^(?:${source})$`, flags) };
  } catch (e) {
    throw new InvalidArgumentError(`Invalid template pattern ${text}`, { location, cause: e });
  }
}

/**
 * Try one template against the argument texts
 */
export function matchTemplate(template: TemplateDef, args: readonly string[]): Map<string, string> | null {
  if (template.slots.length !== args.length) {
    return null;
  }

  const captures = new Map<string, string>();
  let groupNumber = 1;

  for (let i = 0; i < args.length; i++) {
    const slot = template.slots[i];
    const arg = args[i];

    if (slot.kind === 'literal') {
      if (slot.text !== arg) {
        return null;
      }
      continue;
    }

    const m = slot.regex.exec(arg);
    if (!m || m.index !== 0 || m[0].length !== arg.length) {
      return null;
    }

    for (let g = 1; g < m.length; g++) {
      captures.set(`$${groupNumber++}`, m[g] ?? '');
    }
    if (m.groups) {
      for (const [name, value] of Object.entries(m.groups)) {
        captures.set(name, value ?? '');
      }
    }
  }

  return captures;
}

/**
 * Resolves template calls against the templates visible from a scope
 */
export class TemplateMatcher {
  constructor(private readonly arena: ScopeArena) {}

  /**
   * Register a template in `scope`, ahead of any same-named ones already there
   */
  define(scope: ScopeRef, template: TemplateDef): void {
    const existing = this.arena.own(scope, template.name);
    const shadowed = existing?.kind === 'template' ? existing.templates : [];
    this.arena.define(scope, template.name, { kind: 'template', templates: [template, ...shadowed] });
  }

  /**
   * Every template named `name` visible from `scope`, in trial order.
   * A macro or value of the same name hides anything further out.
   */
  candidates(scope: ScopeRef, name: string): TemplateDef[] {
    const found: TemplateDef[] = [];
    for (const ref of this.arena.chain(scope)) {
      const binding = this.arena.own(ref, name);
      if (!binding) continue;
      if (binding.kind !== 'template') break;
      found.push(...binding.templates);
    }
    return found;
  }

  match(scope: ScopeRef, name: string, args: readonly string[], location?: Location): TemplateMatch {
    for (const template of this.candidates(scope, name)) {
      const captures = matchTemplate(template, args);
      if (captures) {
        return { template, captures };
      }
    }
    throw new NoMatchingTemplateError(name, args, location);
  }
}
