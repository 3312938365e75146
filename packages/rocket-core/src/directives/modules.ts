/**
 * include and import
 *
 * Both evaluate the target document in a fresh child of the root scope.
 * include splices the text and drops the scope; import drops the text and
 * merges the scope's definitions into the caller's scope. Imported templates
 * join a template set of the same name ahead of the caller's own.
 */

import type { Expr, Location } from '../syntax/expr.js';
import { isRocketError } from '../errors.js';
import type { ScopeRef } from '../runtime/scope.js';
import { type DirectiveContext, type DirectiveHandler, expectArgs } from './registry.js';

/**
 * Load and evaluate the document named by the single argument
 */
function evaluateDocument(
  args: readonly Expr[],
  ctx: DirectiveContext,
  withScope: (documentScope: ScopeRef, output: string) => string
): string {
  expectArgs(args, ctx, 1);
  const { evaluator } = ctx;
  const site = ctx.call.location;

  const request = evaluator.evaluate(args[0], ctx.scope);
  const canonical = evaluator.resolver.resolvePath(request, site.file);

  return withIncludeFrame(site, () =>
    evaluator.resolver.enter(canonical, site, () =>
      evaluator.nested(site, () => {
        const exprs = evaluator.resolver.load(canonical, site);
        return evaluator.arena.withChild(evaluator.root, documentScope =>
          withScope(documentScope, evaluator.evaluateAll(exprs, documentScope))
        );
      })
    )
  );
}

/**
 * Errors raised inside the target document pick up this call site
 */
function withIncludeFrame<T>(site: Location, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (isRocketError(e) && e.location !== site) {
      e.addFrame(site);
    }
    throw e;
  }
}

export const include: DirectiveHandler = (args, ctx) =>
  evaluateDocument(args, ctx, (_documentScope, output) => output);

export const importDirective: DirectiveHandler = (args, ctx) =>
  evaluateDocument(args, ctx, documentScope => {
    const { arena } = ctx.evaluator;
    for (const [name, binding] of arena.entries(documentScope)) {
      const existing = arena.own(ctx.scope, name);
      if (binding.kind === 'template' && existing?.kind === 'template') {
        arena.define(ctx.scope, name, { kind: 'template', templates: [...binding.templates, ...existing.templates] });
      } else {
        arena.define(ctx.scope, name, binding);
      }
    }
    return '';
  });
