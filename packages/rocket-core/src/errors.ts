/**
 * Rocket error hierarchy
 *
 * Every failure during a compile is one of these. Errors are never downgraded
 * inside the evaluator; include/import sites only append themselves to
 * `trace` on the way out.
 */

import { type Location, formatLocation } from './syntax/expr.js';

export type ErrorKind =
  | 'SyntaxError'
  | 'UnknownDirective'
  | 'NotFound'
  | 'ArityError'
  | 'InvalidArgument'
  | 'NoMatchingTemplate'
  | 'CircularImport'
  | 'FileIOError'
  | 'RecursionLimitExceeded'
  | 'UndefinedReference';

export interface RocketErrorOptions {
  location?: Location;
  cause?: unknown;
}

/**
 * Base class for all Rocket errors
 */
export abstract class RocketError extends Error {
  abstract readonly kind: ErrorKind;

  /** Where the error originated */
  public readonly location?: Location;

  /** Include/import sites the error passed through, innermost first */
  public readonly trace: Location[] = [];

  constructor(message: string, options: RocketErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.location = options.location;
  }

  /**
   * Record an include/import call site the error propagated through
   */
  addFrame(location: Location): this {
    this.trace.push(location);
    return this;
  }
}

export class ParseError extends RocketError {
  readonly kind = 'SyntaxError';

  constructor(message: string, location: Location) {
    super(message, { location });
  }
}

export class UnknownDirectiveError extends RocketError {
  readonly kind = 'UnknownDirective';

  constructor(public readonly directive: string, location?: Location) {
    super(`Unknown directive: ${directive}`, { location });
  }
}

export class NotFoundError extends RocketError {
  readonly kind = 'NotFound';

  constructor(public readonly bindingName: string, location?: Location) {
    super(`No binding named '${bindingName}' in scope`, { location });
  }
}

export class ArityError extends RocketError {
  readonly kind = 'ArityError';

  constructor(directive: string, expected: string, received: number, location?: Location) {
    super(`${directive} expects ${expected}, got ${received}`, { location });
  }
}

export class InvalidArgumentError extends RocketError {
  readonly kind = 'InvalidArgument';
}

export class NoMatchingTemplateError extends RocketError {
  readonly kind = 'NoMatchingTemplate';

  constructor(public readonly template: string, args: readonly string[], location?: Location) {
    super(`No template '${template}' matches arguments (${args.map(a => JSON.stringify(a)).join(', ')})`, { location });
  }
}

export class CircularImportError extends RocketError {
  readonly kind = 'CircularImport';

  constructor(public readonly chain: readonly string[], location?: Location) {
    super(`Circular import: ${chain.join(' -> ')}`, { location });
  }
}

export class FileIOError extends RocketError {
  readonly kind = 'FileIOError';

  constructor(public readonly path: string, options: RocketErrorOptions = {}) {
    const reason = options.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to load ${path}${reason}`, options);
  }
}

export class RecursionLimitError extends RocketError {
  readonly kind = 'RecursionLimitExceeded';

  constructor(public readonly limit: number, location?: Location) {
    super(`Recursion limit of ${limit} exceeded`, { location });
  }
}

export class UndefinedReferenceError extends RocketError {
  readonly kind = 'UndefinedReference';

  constructor(public readonly id: string, location?: Location) {
    super(`Undefined reference: ${id}`, { location });
  }
}

export function isRocketError(error: unknown): error is RocketError {
  return error instanceof RocketError;
}

/**
 * Render an error with its location chain
 */
export function formatError(error: RocketError): string {
  const lines = [`${error.kind}: ${error.message}`];
  if (error.location) {
    lines.push(`  --> ${formatLocation(error.location)}`);
  }
  for (const frame of error.trace) {
    lines.push(`  included from ${formatLocation(frame)}`);
  }
  return lines.join('\n');
}
