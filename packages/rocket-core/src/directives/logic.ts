/**
 * Conditionals. Empty text is false, anything else is true; predicates
 * return "true" or "".
 */

import { type DirectiveHandler, expectArgs } from './registry.js';

const TRUE = 'true';
const FALSE = '';

/**
 * `(:if condition then else?)` - only the chosen branch is evaluated
 */
export const ifDirective: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 2, 3);
  const { evaluator, scope } = ctx;

  if (evaluator.evaluate(args[0], scope) !== '') {
    return evaluator.evaluate(args[1], scope);
  }
  return args.length === 3 ? evaluator.evaluate(args[2], scope) : '';
};

export const not: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 1);
  return ctx.evaluator.evaluate(args[0], ctx.scope) === '' ? TRUE : FALSE;
};

export const eq: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 2, Infinity);
  const [initial, ...rest] = ctx.evaluator.evaluateEach(args, ctx.scope);
  return rest.every(value => value === initial) ? TRUE : FALSE;
};

export const ne: DirectiveHandler = (args, ctx) => (eq(args, ctx) === TRUE ? FALSE : TRUE);
