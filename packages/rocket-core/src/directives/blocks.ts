/**
 * Block directives that emit HTML structure
 */

import { InvalidArgumentError } from '../errors.js';
import { type DirectiveHandler, escapeHtml, expectArgs } from './registry.js';

/**
 * `(:definition-list (term body...) ...)`
 */
export const definitionList: DirectiveHandler = (args, { evaluator, scope }) => {
  const segments = args.map(arg => {
    const entry = arg.asList();
    if (!entry || entry.items.length === 0) {
      throw new InvalidArgumentError('definition-list entries must be (term definition...) lists', {
        location: arg.location,
      });
    }
    const term = evaluator.evaluate(entry.items[0], scope);
    const definition = evaluator.evaluateAll(entry.items.slice(1), scope);
    return `<dt>${term}</dt><dd>${definition}</dd>`;
  });
  return `<dl>${segments.join('')}</dl>`;
};

/**
 * Admonition block: `(:note body)` or `(:note title body)`
 */
export function admonition(kind: string, defaultTitle: string): DirectiveHandler {
  return (args, ctx) => {
    expectArgs(args, ctx, 1, 2);
    const { evaluator, scope } = ctx;

    let title = defaultTitle;
    let body: string;
    if (args.length === 2) {
      title = evaluator.evaluate(args[0], scope);
      body = evaluator.evaluate(args[1], scope);
    } else {
      body = evaluator.evaluate(args[0], scope);
    }

    return (
      `<div class="admonition admonition-${kind}">` +
      `<span class="admonition-title admonition-title-${kind}">${title}</span>` +
      `${body}</div>\n`
    );
  };
}

/**
 * Anchor id for a heading title: alphanumerics lowercased, `-` and `_` kept,
 * spaces become `-`, anything else becomes its code point.
 */
export function titleToId(title: string): string {
  let result = '';
  for (const ch of title) {
    if (/^[\p{L}\p{N}]$/u.test(ch)) {
      result += ch.toLowerCase();
    } else if (ch === '-' || ch === '_') {
      result += ch;
    } else if (ch === ' ') {
      result += '-';
    } else {
      result += String(ch.codePointAt(0));
    }
  }
  return result;
}

/**
 * `(:hN title)` or `(:hN id title)`. The first heading also names the document.
 */
export function heading(level: number): DirectiveHandler {
  return (args, ctx) => {
    expectArgs(args, ctx, 1, 2);
    const { evaluator, scope } = ctx;

    const [first, second] = evaluator.evaluateEach(args, scope);
    const title = second ?? first;
    const id = second === undefined ? titleToId(first) : first;

    if (!evaluator.metadata.has('title')) {
      evaluator.metadata.set('title', title);
    }

    return `<h${level} id="${escapeHtml(id)}">${title}</h${level}>`;
  };
}

/**
 * `(:link href body...)`
 */
export const link: DirectiveHandler = (args, ctx) => {
  expectArgs(args, ctx, 1, Infinity);
  const { evaluator, scope } = ctx;
  const href = escapeHtml(evaluator.evaluate(args[0], scope));
  const body = evaluator.evaluateEach(args.slice(1), scope).join(' ');
  return `<a href="${href}">${body === '' ? href : body}</a>`;
};

export function list(tag: 'ul' | 'ol'): DirectiveHandler {
  return (args, { evaluator, scope }) => {
    const items = evaluator.evaluateEach(args, scope).map(item => `<li>${item}</li>`);
    return `<${tag}>${items.join('')}</${tag}>`;
  };
}

/**
 * `(:steps (step title body) ...)` - numbered procedure
 */
export const steps: DirectiveHandler = (args, { evaluator, scope }) => {
  let result = '<div class="steps">';

  args.forEach((arg, i) => {
    const step = arg.asList();
    if (!step || step.items.length !== 3) {
      throw new InvalidArgumentError('steps entries must be (step title body) lists', {
        location: arg.location,
      });
    }
    const title = evaluator.evaluate(step.items[1], scope);
    const body = evaluator.evaluate(step.items[2], scope);

    result +=
      '<div class="steps__step"><div class="steps__bullet">' +
      `<div class="steps__stepnumber">${i + 1}</div></div>` +
      `<h4>${title}</h4><div>${body}</div></div>`;
  });

  return result + '</div>';
};
