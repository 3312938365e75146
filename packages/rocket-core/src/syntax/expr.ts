/**
 * Rocket expression tree
 *
 * A parsed document is a sequence of Expr nodes. Each node is one of four
 * variants (symbol, string, number, list) and is immutable once built.
 * Callers narrow with the `asX()` predicates, which return the variant or null.
 */

/**
 * Source location
 */
export interface Location {
  file: string;
  line: number;
  column: number;
}

export const unknownLocation: Location = Object.freeze({ file: '<unknown>', line: 0, column: 0 });

/**
 * Base class for all expression nodes
 */
export abstract class Expr {
  constructor(public readonly location: Location) {}

  /** Type predicates - return specific subclass or null */
  asSymbol(): SymbolExpr | null { return null; }
  asString(): StringExpr | null { return null; }
  asNumber(): NumberExpr | null { return null; }
  asList(): ListExpr | null { return null; }

  /** Text of an atom as written, or null for lists */
  abstract atomText(): string | null;

  /** Re-serialize the node in source syntax */
  abstract toSource(): string;
}

/**
 * Symbol - bare token, `:name` when it heads a directive list
 */
export class SymbolExpr extends Expr {
  constructor(public readonly name: string, location: Location) {
    super(location);
  }

  asSymbol(): SymbolExpr { return this; }
  atomText(): string { return this.name; }
  toSource(): string { return this.name; }

  /** Name with a leading directive colon removed */
  directiveName(): string {
    return this.name.replace(/^:+/, '');
  }
}

/**
 * String literal
 */
export class StringExpr extends Expr {
  constructor(public readonly value: string, location: Location) {
    super(location);
  }

  asString(): StringExpr { return this; }
  atomText(): string { return this.value; }

  toSource(): string {
    const escaped = this.value
      .replace(/\\/g, '\\\\')
      .replace(/"/g, '\\"')
      .replace(/\n/g, '\\n')
      .replace(/\t/g, '\\t');
    return `"${escaped}"`;
  }
}

/**
 * Number literal. Keeps the source text so `1.50` stringifies as written.
 */
export class NumberExpr extends Expr {
  constructor(
    public readonly value: number,
    public readonly text: string,
    location: Location
  ) {
    super(location);
  }

  asNumber(): NumberExpr { return this; }
  atomText(): string { return this.text; }
  toSource(): string { return this.text; }
}

/**
 * List - `(head args...)`
 */
export class ListExpr extends Expr {
  public readonly items: readonly Expr[];

  constructor(items: Expr[], location: Location) {
    super(location);
    this.items = Object.freeze([...items]);
  }

  asList(): ListExpr { return this; }
  atomText(): null { return null; }

  get head(): Expr | undefined {
    return this.items[0];
  }

  get args(): readonly Expr[] {
    return this.items.slice(1);
  }

  toSource(): string {
    return `(${this.items.map(item => item.toSource()).join(' ')})`;
  }
}

export function makeSymbol(name: string, location: Location = unknownLocation): SymbolExpr {
  return new SymbolExpr(name, location);
}

export function makeString(value: string, location: Location = unknownLocation): StringExpr {
  return new StringExpr(value, location);
}

export function makeNumber(text: string, location: Location = unknownLocation): NumberExpr {
  return new NumberExpr(parseFloat(text), text, location);
}

export function makeList(items: Expr[], location: Location = unknownLocation): ListExpr {
  return new ListExpr(items, location);
}

export function formatLocation(location: Location): string {
  return `${location.file}:${location.line}:${location.column}`;
}
