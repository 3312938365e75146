/**
 * rocket-core - parse and evaluate Rocket documents
 */

// Syntax
export {
  Expr,
  SymbolExpr,
  StringExpr,
  NumberExpr,
  ListExpr,
  makeSymbol,
  makeString,
  makeNumber,
  makeList,
  formatLocation,
  unknownLocation,
} from './syntax/expr.js';
export type { Location } from './syntax/expr.js';
export { Parser, parse, parseOne } from './syntax/parser.js';

// Runtime
export { ScopeArena, StaleScopeError } from './runtime/scope.js';
export type { Binding, ScopeRef } from './runtime/scope.js';
export { TemplateMatcher, compileSlot, matchTemplate } from './runtime/templates.js';
export type { Slot, TemplateDef, TemplateMatch } from './runtime/templates.js';
export { Resolver, isPseudoFile } from './runtime/resolver.js';
export { NodeFileLoader, MemoryFileLoader } from './runtime/loader.js';
export { ReferenceTable } from './runtime/references.js';
export type { Reference, ReferencePart } from './runtime/references.js';
export type { FileLoader } from './runtime/loader.js';
export {
  Evaluator,
  DEFAULT_MAX_DEPTH,
  DEFAULT_VERSION,
  passthroughRenderer,
} from './runtime/evaluator.js';
export type { EvaluatorOptions, MarkdownRenderer, VersionProvider } from './runtime/evaluator.js';

// Directives
export {
  createBuiltinRegistry,
  DirectiveRegistry,
  expectArgs,
  bindingName,
  escapeHtml,
  titleToId,
} from './directives/index.js';
export type { DirectiveContext, DirectiveHandler } from './directives/index.js';

// Errors
export {
  RocketError,
  ParseError,
  UnknownDirectiveError,
  NotFoundError,
  ArityError,
  InvalidArgumentError,
  NoMatchingTemplateError,
  CircularImportError,
  FileIOError,
  RecursionLimitError,
  UndefinedReferenceError,
  isRocketError,
  formatError,
} from './errors.js';
export type { ErrorKind, RocketErrorOptions } from './errors.js';

// Compile entry points, configuration, logging
export { compile, compileFile } from './compile.js';
export type { CompileOptions, CompileResult } from './compile.js';
export { CONFIG_FILE, loadProjectConfig, parseProjectConfig } from './config.js';
export type { ProjectConfig } from './config.js';
export { createLogger, setLogLevel, resolveLogLevel } from './logger.js';
export type { LogService } from './logger.js';
