/**
 * Directive registry
 *
 * Built-in directives are plain handler functions looked up by name. They
 * receive their arguments unevaluated and decide what to evaluate, when, and
 * in which scope.
 */

import type { Expr, ListExpr } from '../syntax/expr.js';
import type { Evaluator } from '../runtime/evaluator.js';
import type { ScopeRef } from '../runtime/scope.js';
import { ArityError } from '../errors.js';

export interface DirectiveContext {
  evaluator: Evaluator;
  /** Scope active at the call site */
  scope: ScopeRef;
  /** The whole call, for its location */
  call: ListExpr;
  /** Name the call dispatched on */
  name: string;
}

export type DirectiveHandler = (args: readonly Expr[], ctx: DirectiveContext) => string;

export class DirectiveRegistry {
  private handlers: Map<string, DirectiveHandler> = new Map();

  register(name: string, handler: DirectiveHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  registerAll(table: Record<string, DirectiveHandler>): this {
    for (const [name, handler] of Object.entries(table)) {
      this.register(name, handler);
    }
    return this;
  }

  get(name: string): DirectiveHandler | undefined {
    return this.handlers.get(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  names(): string[] {
    return Array.from(this.handlers.keys()).sort();
  }

  /**
   * Independent copy, so a caller can add handlers without touching the original
   */
  clone(): DirectiveRegistry {
    const copy = new DirectiveRegistry();
    for (const [name, handler] of this.handlers) {
      copy.register(name, handler);
    }
    return copy;
  }
}

/**
 * Fail unless `args.length` is within [min, max]
 */
export function expectArgs(args: readonly Expr[], ctx: DirectiveContext, min: number, max: number = min): void {
  if (args.length >= min && args.length <= max) {
    return;
  }
  let expected: string;
  if (min === max) {
    expected = `${min} argument${min === 1 ? '' : 's'}`;
  } else if (max === Infinity) {
    expected = `at least ${min} argument${min === 1 ? '' : 's'}`;
  } else {
    expected = `${min} to ${max} arguments`;
  }
  throw new ArityError(ctx.name, expected, args.length, ctx.call.location);
}

/**
 * Name written in a binding position: a symbol's name without its colon,
 * a string's value, otherwise the evaluated text.
 */
export function bindingName(expr: Expr, ctx: DirectiveContext): string {
  const symbol = expr.asSymbol();
  if (symbol) {
    return symbol.directiveName();
  }
  return ctx.evaluator.evaluate(expr, ctx.scope);
}

export function escapeHtml(text: string): string {
  let result = '';
  for (const ch of text) {
    switch (ch) {
      case '"': result += '&#34;'; break;
      case '\'': result += '&#39;'; break;
      case '<': result += '&lt;'; break;
      case '>': result += '&gt;'; break;
      case '&': result += '&amp;'; break;
      default: result += ch; break;
    }
  }
  return result;
}
