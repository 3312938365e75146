/**
 * Core directives: text assembly, bindings, definitions and metadata
 */

import { ArityError, InvalidArgumentError } from '../errors.js';
import { compileSlot } from '../runtime/templates.js';
import { type DirectiveHandler, bindingName, escapeHtml, expectArgs } from './registry.js';

const VERSION_MASK = /^[a-z](\.[a-z])*$/i;

export const nullDirective: DirectiveHandler = () => '';

export const concat: DirectiveHandler = (args, { evaluator, scope }) =>
  evaluator.evaluateAll(args, scope);

/**
 * `(:let (name expr ...) body...)`
 * Binds sequentially into one child scope: each value sees the ones before it.
 */
export const letDirective: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 1, Infinity);
  const { evaluator } = ctx;

  const pairs = args[0].asList();
  if (!pairs) {
    throw new InvalidArgumentError('let expects a list of name/value pairs as its first argument', {
      location: args[0].location,
    });
  }
  if (pairs.items.length % 2 !== 0) {
    throw new ArityError('let', 'an even number of binding forms', pairs.items.length, pairs.location);
  }

  return evaluator.arena.withChild(ctx.scope, child => {
    const inner = { ...ctx, scope: child };
    for (let i = 0; i < pairs.items.length; i += 2) {
      const name = bindingName(pairs.items[i], inner);
      const value = evaluator.evaluate(pairs.items[i + 1], child);
      evaluator.arena.define(child, name, { kind: 'value', value });
    }
    return evaluator.evaluateAll(args.slice(1), child);
  });
};

/**
 * `(:define name body)` - body kept unevaluated, re-evaluated at each call
 * `(:define evaluate name value)` - value evaluated once, here
 */
export const define: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 2, 3);
  const { evaluator, scope } = ctx;

  if (args.length === 2) {
    const name = bindingName(args[0], ctx);
    evaluator.arena.define(scope, name, { kind: 'macro', body: args[1] });
    return '';
  }

  const mode = bindingName(args[0], ctx);
  if (mode !== 'evaluate') {
    throw new InvalidArgumentError(`define expects 'evaluate' before the name, got '${mode}'`, {
      location: args[0].location,
    });
  }
  const name = bindingName(args[1], ctx);
  const value = evaluator.evaluate(args[2], scope);
  evaluator.arena.define(scope, name, { kind: 'value', value });
  return '';
};

/**
 * `(:define-template name slot... body)`
 */
export const defineTemplate: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 2, Infinity);
  const { evaluator, scope } = ctx;

  const name = bindingName(args[0], ctx);
  const slots = args.slice(1, -1).map(slot => {
    const text = slot.atomText() ?? evaluator.evaluate(slot, scope);
    return compileSlot(text, slot.location);
  });

  evaluator.templates.define(scope, {
    name,
    slots,
    body: args[args.length - 1],
    location: ctx.call.location,
  });
  return '';
};

/**
 * `(:version)` or `(:version format)`
 *
 * The format is evaluated with version, major, minor and patch bound. A
 * result like `x.y` is a component mask and selects that many components.
 */
export const version: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 0, 1);
  const { evaluator } = ctx;
  const full = evaluator.version();
  if (args.length === 0) {
    return full;
  }

  const parts = full.split('.');
  const formatted = evaluator.arena.withChild(ctx.scope, child => {
    evaluator.arena.define(child, 'version', { kind: 'value', value: full });
    evaluator.arena.define(child, 'major', { kind: 'value', value: parts[0] ?? '' });
    evaluator.arena.define(child, 'minor', { kind: 'value', value: parts[1] ?? '' });
    evaluator.arena.define(child, 'patch', { kind: 'value', value: parts[2] ?? '' });
    return evaluator.evaluate(args[0], child);
  });

  if (formatted === '') {
    return '';
  }
  if (VERSION_MASK.test(formatted)) {
    return parts.slice(0, formatted.split('.').length).join('.');
  }
  return formatted;
};

export const markdown: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 1);
  const { evaluator, scope } = ctx;
  return evaluator.renderer.render(evaluator.evaluate(args[0], scope));
};

/**
 * `(:theme-config key value ...)` - last write per key wins
 */
export const themeConfig: DirectiveHandler = (args, ctx) => {
  const { evaluator, scope } = ctx;
  if (args.length % 2 !== 0) {
    throw new ArityError(ctx.name, 'key/value pairs', args.length, ctx.call.location);
  }

  for (let i = 0; i < args.length; i += 2) {
    const key = evaluator.evaluate(args[i], scope);
    const value = evaluator.evaluate(args[i + 1], scope);
    evaluator.metadata.set(key, value);
  }
  return '';
};

/**
 * `(:define-ref id title)` - anchor that `(:ref id)` links to
 */
export const defineRef: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 2);
  const { evaluator, scope } = ctx;
  const id = bindingName(args[0], ctx);
  const title = evaluator.evaluate(args[1], scope);
  const anchor = escapeHtml(id);

  evaluator.references.define({ id, title, href: `#${anchor}`, location: ctx.call.location });
  return `<a id="${anchor}"></a>`;
};

/**
 * `(:ref id)` or `(:ref id title)`
 *
 * The target may be defined further down; the link is completed when the
 * document is finished.
 */
export const ref: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 1, 2);
  const { evaluator, scope } = ctx;
  const { references } = evaluator;
  const location = ctx.call.location;
  const id = bindingName(args[0], ctx);

  const href = references.placeholder(id, 'href', location);
  const title = args.length === 2 ? evaluator.evaluate(args[1], scope) : references.placeholder(id, 'title', location);
  return `<a href="${href}">${title}</a>`;
};
