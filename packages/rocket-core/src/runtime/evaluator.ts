/**
 * Rocket Evaluator
 *
 * Tree-walking interpreter. Every expression evaluates to a string. Lists are
 * dispatched by name: built-in handler first, then a user binding found by
 * scope lookup, otherwise UnknownDirective.
 */

import { type Expr, type ListExpr, type Location } from '../syntax/expr.js';
import { parse } from '../syntax/parser.js';
import { ArityError, RecursionLimitError, UnknownDirectiveError } from '../errors.js';
import { createLogger } from '../logger.js';
import { type Binding, ScopeArena, type ScopeRef } from './scope.js';
import { TemplateMatcher } from './templates.js';
import { Resolver } from './resolver.js';
import { ReferenceTable } from './references.js';
import { type FileLoader, NodeFileLoader } from './loader.js';
import type { DirectiveRegistry } from '../directives/registry.js';
import { createBuiltinRegistry } from '../directives/index.js';

const logger = createLogger('evaluator');

export interface MarkdownRenderer {
  render(markdown: string): string;
}

export type VersionProvider = () => string;

export const DEFAULT_MAX_DEPTH = 64;
export const DEFAULT_VERSION = '0.0.0';

/**
 * Renderer used when none is supplied: returns the text unchanged
 */
export const passthroughRenderer: MarkdownRenderer = {
  render: (markdown: string) => markdown,
};

export interface EvaluatorOptions {
  registry?: DirectiveRegistry;
  renderer?: MarkdownRenderer;
  loader?: FileLoader;
  version?: string | VersionProvider;
  maxDepth?: number;
}

export class Evaluator {
  readonly arena: ScopeArena = new ScopeArena();
  readonly root: ScopeRef;
  readonly templates: TemplateMatcher;
  readonly resolver: Resolver;
  readonly registry: DirectiveRegistry;
  readonly renderer: MarkdownRenderer;
  readonly maxDepth: number;

  /** Document metadata written by theme-config and headings */
  readonly metadata: Map<string, string> = new Map();

  /** Targets declared by define-ref, linked by ref once the run ends */
  readonly references: ReferenceTable = new ReferenceTable();

  private readonly versionProvider: VersionProvider;
  private depth: number = 0;

  constructor(options: EvaluatorOptions = {}) {
    this.root = this.arena.createRoot();
    this.templates = new TemplateMatcher(this.arena);
    this.resolver = new Resolver(options.loader ?? new NodeFileLoader());
    this.registry = options.registry ?? createBuiltinRegistry();
    this.renderer = options.renderer ?? passthroughRenderer;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

    const version = options.version ?? DEFAULT_VERSION;
    this.versionProvider = typeof version === 'string' ? () => version : version;
  }

  version(): string {
    return this.versionProvider();
  }

  /** Current nesting of user invocations, re-evaluations and includes */
  get currentDepth(): number {
    return this.depth;
  }

  /**
   * Evaluate one expression to a string
   */
  evaluate(expr: Expr, scope: ScopeRef): string {
    const list = expr.asList();
    if (!list) {
      return expr.atomText() ?? '';
    }
    return this.evaluateList(list, scope);
  }

  /**
   * Evaluate expressions left to right and concatenate
   */
  evaluateAll(exprs: readonly Expr[], scope: ScopeRef): string {
    let result = '';
    for (const expr of exprs) {
      result += this.evaluate(expr, scope);
    }
    return result;
  }

  /**
   * Evaluate each expression, keeping the results separate
   */
  evaluateEach(exprs: readonly Expr[], scope: ScopeRef): string[] {
    return exprs.map(expr => this.evaluate(expr, scope));
  }

  /**
   * Name a list dispatches on: a head symbol without its colon, otherwise
   * the evaluated head.
   */
  directiveName(list: ListExpr, scope: ScopeRef): string {
    const head = list.head;
    if (!head) {
      return '';
    }
    const symbol = head.asSymbol();
    return symbol ? symbol.directiveName() : this.evaluate(head, scope);
  }

  /**
   * Run `fn` one level deeper, failing past maxDepth
   */
  nested<T>(location: Location, fn: () => T): T {
    if (this.depth >= this.maxDepth) {
      throw new RecursionLimitError(this.maxDepth, location);
    }
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  private evaluateList(list: ListExpr, scope: ScopeRef): string {
    if (list.items.length === 0) {
      return '';
    }

    const name = this.directiveName(list, scope);
    const args = list.args;

    const handler = this.registry.get(name);
    if (handler) {
      if (logger.isDebugEnabled()) {
        logger.debug('Dispatch built-in', { name, at: list.location });
      }
      return handler(args, { evaluator: this, scope, call: list, name });
    }

    const binding = this.arena.find(scope, name);
    if (binding) {
      return this.invokeBinding(name, binding, args, scope, list.location);
    }

    throw new UnknownDirectiveError(name, list.location);
  }

  private invokeBinding(
    name: string,
    binding: Binding,
    args: readonly Expr[],
    scope: ScopeRef,
    location: Location
  ): string {
    if (logger.isDebugEnabled()) {
      logger.debug('Dispatch user binding', { name, kind: binding.kind, at: location });
    }

    switch (binding.kind) {
      case 'value':
        if (args.length > 0) {
          throw new ArityError(name, 'no arguments', args.length, location);
        }
        return binding.value;

      case 'macro': {
        if (args.length > 0) {
          throw new ArityError(name, 'no arguments', args.length, location);
        }
        const body = binding.body;
        return this.nested(location, () =>
          this.arena.withChild(scope, child => this.reenter(this.evaluate(body, child), child, body, location))
        );
      }

      case 'template': {
        const texts = this.evaluateEach(args, scope);
        const { template, captures } = this.templates.match(scope, name, texts, location);
        return this.nested(location, () =>
          this.arena.withChild(scope, child => {
            for (const [key, value] of captures) {
              this.arena.define(child, key, { kind: 'value', value });
            }
            return this.reenter(this.evaluate(template.body, child), child, template.body, location);
          })
        );
      }
    }
  }

  /**
   * Macro and template output that still holds directive syntax is parsed
   * again and evaluated in the same scope. It belongs to the file that
   * defined the body, so relative includes resolve from there.
   */
  private reenter(text: string, scope: ScopeRef, body: Expr, location: Location): string {
    if (!text.includes('(:')) {
      return text;
    }
    return this.nested(location, () => this.evaluateAll(parse(text, body.location.file), scope));
  }
}
