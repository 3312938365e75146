/**
 * Rocket Parser
 *
 * Recursive descent over document text. Two modes:
 *
 * - text mode: the document top level and list bodies opened by `=>`.
 *   Characters accumulate into string nodes until `(:` opens a directive.
 * - expression mode: inside a list. Strings, numbers, symbols and nested lists.
 *
 * `(:note "Title" => Some *markdown* (:b here))` parses the part after `=>`
 * in text mode and wraps it in a trailing `(:concat ...)` argument.
 *
 * A `=>` at the end of a line opens an indented body instead:
 *
 *   (:note "Title" =>
 *     First paragraph.
 *
 *     Second paragraph.
 *   back in the document
 *
 * The body is every following line indented deeper than the line holding the
 * `=>`, with that indentation removed. The first line indented less closes
 * both the body and its directive; a `)` at paren depth zero also closes it.
 *
 * A head written with more colons, `(::define ...)`, keeps lists with fewer
 * colons in its `=>` body as literal text, so they run when the body is
 * evaluated again rather than when it is defined.
 */

import {
  type Expr,
  type Location,
  makeList,
  makeNumber,
  makeString,
  makeSymbol,
} from './expr.js';
import { ParseError } from '../errors.js';
import { createLogger } from '../logger.js';

const logger = createLogger('parser');

const TEXT_ESCAPES = '()\\';

/** Where a run of text stops */
type TextEnd =
  | { kind: 'document' }
  | { kind: 'inline'; list: Location }
  | { kind: 'block'; list: Location; indent: number };

interface TextRun {
  items: Expr[];
  /** The run stopped at a `)` that closes the enclosing list */
  closedByParen: boolean;
}

interface LineScan {
  indent: number;
  blank: boolean;
  /** Offset just past the line's newline */
  next: number;
}

/**
 * Nesting level of a directive head: `:name` is 0, `::name` is 1
 */
function colonDepthOf(expr: Expr): number {
  const symbol = expr.asSymbol();
  const colons = symbol ? /^:+/.exec(symbol.name) : null;
  return colons ? colons[0].length - 1 : 0;
}

/**
 * Rocket Parser
 */
export class Parser {
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(
    private readonly input: string,
    private readonly file: string = '<unknown>'
  ) {}

  /**
   * Parse a whole document into its top-level expressions
   */
  parse(): Expr[] {
    return this.parseText({ kind: 'document' }).items;
  }

  /**
   * Parse expression-mode source (no surrounding text)
   */
  parseExpression(): Expr[] {
    const datums: Expr[] = [];
    while (true) {
      this.skipWhitespace();
      if (this.isAtEnd()) break;
      if (this.peek() === ')') {
        throw this.error("Unmatched ')'");
      }
      datums.push(this.parseDatum());
    }
    return datums;
  }

  /**
   * Text mode. Inside a list body a `)` at paren depth zero ends the text and
   * is left for the caller; at document level it is unmatched. Block bodies
   * also end at the first line indented less than the body.
   */
  private parseText(end: TextEnd, colonDepth: number = 0): TextRun {
    const items: Expr[] = [];
    let buffer = '';
    let bufferStart: Location | null = null;
    const parenStack: Location[] = [];

    const flush = () => {
      if (buffer.length > 0 && bufferStart) {
        items.push(makeString(buffer, bufferStart));
      }
      buffer = '';
      bufferStart = null;
    };

    const take = (text: string, start: Location) => {
      if (bufferStart === null) {
        bufferStart = start;
      }
      buffer += text;
    };

    const finish = (closedByParen: boolean): TextRun => {
      const unclosed = parenStack.pop();
      if (unclosed) {
        throw new ParseError("Unmatched '('", unclosed);
      }
      flush();
      return { items, closedByParen };
    };

    while (!this.isAtEnd()) {
      if (end.kind === 'block' && this.column === 1) {
        const loc = this.currentLocation();
        const blankLines = this.continueBlock(end.indent);
        if (blankLines === null) {
          return finish(false);
        }
        if (blankLines.length > 0) {
          take(blankLines, loc);
        }
        continue;
      }

      const c = this.peek();
      const loc = this.currentLocation();

      if (c === '\\' && TEXT_ESCAPES.includes(this.peekAhead(1))) {
        this.advance();
        take(this.advance(), loc);
        continue;
      }

      if (c === '(' && this.peekAhead(1) === ':') {
        if (this.headColonDepth() < colonDepth) {
          take(this.readRawList(), loc);
        } else {
          flush();
          items.push(this.parseList());
        }
        continue;
      }

      if (c === '(') {
        parenStack.push(loc);
        take(this.advance(), loc);
        continue;
      }

      if (c === ')') {
        if (parenStack.length > 0) {
          parenStack.pop();
          take(this.advance(), loc);
          continue;
        }
        if (end.kind !== 'document') {
          return finish(true);
        }
        throw this.error("Unmatched ')'");
      }

      take(this.advance(), loc);
    }

    if (end.kind === 'inline') {
      throw new ParseError('Unterminated list', end.list);
    }
    return finish(false);
  }

  /**
   * Parse a single datum in expression mode
   */
  private parseDatum(): Expr {
    const c = this.peek();

    if (c === '(') {
      return this.parseList();
    }

    if (c === '"') {
      return this.parseString();
    }

    if (this.isDigit(c) || (c === '-' && this.isDigit(this.peekAhead(1)))) {
      const number = this.tryParseNumber();
      if (number) {
        return number;
      }
    }

    return this.parseSymbol();
  }

  /**
   * Parse list: `(` expr* `)`, optionally ending in a `=>` text body
   */
  private parseList(): Expr {
    const listLoc = this.currentLocation();
    const openerIndent = this.lineIndent();
    this.expect('(');
    const items: Expr[] = [];
    let colonDepth = 0;

    while (true) {
      this.skipWhitespace();

      if (this.isAtEnd()) {
        throw new ParseError('Unterminated list', listLoc);
      }

      const c = this.peek();
      if (c === ')') {
        this.advance();
        break;
      }

      if (c === '=' && this.peekAhead(1) === '>' && this.isDelimiter(this.peekAhead(2))) {
        this.advance();
        this.advance();
        this.skipSpaces();
        const bodyLoc = this.currentLocation();

        let body: TextRun;
        if (this.isAtEnd() || this.peek() === '\n') {
          if (!this.isAtEnd()) {
            this.advance();
          }
          const indent = this.blockIndent(openerIndent);
          body =
            indent === null
              ? { items: [], closedByParen: false }
              : this.parseText({ kind: 'block', list: listLoc, indent }, colonDepth);
        } else {
          body = this.parseText({ kind: 'inline', list: listLoc }, colonDepth);
        }

        if (body.closedByParen) {
          this.expect(')');
        }
        items.push(makeList([makeSymbol(':concat', bodyLoc), ...body.items], bodyLoc));
        break;
      }

      const datum = this.parseDatum();
      if (items.length === 0) {
        colonDepth = colonDepthOf(datum);
      }
      items.push(datum);
    }

    return makeList(items, listLoc);
  }

  /**
   * Copy a list verbatim, up to its matching `)`
   */
  private readRawList(): string {
    const start = this.currentLocation();
    let text = '';
    let depth = 0;

    while (!this.isAtEnd()) {
      const c = this.advance();
      text += c;

      if (c === '"') {
        while (!this.isAtEnd() && this.peek() !== '"') {
          if (this.peek() === '\\') {
            text += this.advance();
          }
          if (!this.isAtEnd()) {
            text += this.advance();
          }
        }
        if (this.isAtEnd()) {
          break;
        }
        text += this.advance();
      } else if (c === '(') {
        depth++;
      } else if (c === ')') {
        depth--;
        if (depth === 0) {
          return text;
        }
      }
    }

    throw new ParseError('Unterminated list', start);
  }

  /**
   * Parse string literal
   */
  private parseString(): Expr {
    const start = this.currentLocation();
    this.expect('"');
    let str = '';

    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === '\\') {
        this.advance();
        if (this.isAtEnd()) {
          break;
        }
        const c = this.advance();
        switch (c) {
          case 'n': str += '\n'; break;
          case 't': str += '\t'; break;
          case '\\': str += '\\'; break;
          case '"': str += '"'; break;
          default: str += c; break;
        }
      } else {
        str += this.advance();
      }
    }

    if (this.isAtEnd()) {
      throw new ParseError('Unterminated string', start);
    }

    this.expect('"');
    return makeString(str, start);
  }

  /**
   * Parse `-?digit+(.digit+)?` followed by a delimiter.
   * Returns null and rewinds when the token turns out to be a symbol (`3rd`).
   */
  private tryParseNumber(): Expr | null {
    const start = this.currentLocation();
    const saved = { pos: this.pos, line: this.line, column: this.column };
    let numStr = '';

    if (this.peek() === '-') {
      numStr += this.advance();
    }

    while (this.isDigit(this.peek())) {
      numStr += this.advance();
    }

    if (this.peek() === '.' && this.isDigit(this.peekAhead(1))) {
      numStr += this.advance();
      while (this.isDigit(this.peek())) {
        numStr += this.advance();
      }
    }

    if (!this.isDelimiter(this.peek())) {
      this.pos = saved.pos;
      this.line = saved.line;
      this.column = saved.column;
      return null;
    }

    return makeNumber(numStr, start);
  }

  /**
   * Parse symbol: any run of non-whitespace, non-paren, non-quote characters
   */
  private parseSymbol(): Expr {
    const start = this.currentLocation();
    let name = '';

    while (!this.isDelimiter(this.peek())) {
      name += this.advance();
    }

    if (name.length === 0) {
      throw this.error(`Unexpected character: ${this.peek()}`);
    }

    return makeSymbol(name, start);
  }

  // ============ Indentation helpers ============

  /**
   * Indentation of the line containing the current position
   */
  private lineIndent(): number {
    const lineStart = this.input.lastIndexOf('\n', this.pos - 1) + 1;
    return this.scanLine(lineStart).indent;
  }

  private scanLine(from: number): LineScan {
    let i = from;
    let indent = 0;
    while (this.input[i] === ' ') {
      indent++;
      i++;
    }
    let blank = true;
    while (i < this.input.length && this.input[i] !== '\n') {
      const c = this.input[i];
      if (c !== ' ' && c !== '\t' && c !== '\r') {
        blank = false;
      }
      i++;
    }
    return { indent, blank, next: Math.min(i + 1, this.input.length) };
  }

  /**
   * Indentation of the first non-blank line ahead, or null when there is none
   * deeper than `openerIndent` (the body is empty).
   */
  private blockIndent(openerIndent: number): number | null {
    let i = this.pos;
    while (i < this.input.length) {
      const line = this.scanLine(i);
      if (!line.blank) {
        return line.indent > openerIndent ? line.indent : null;
      }
      i = line.next;
    }
    return null;
  }

  /**
   * At the start of a line inside a block body: if the next non-blank line
   * still belongs to the body, consume the blank lines before it and its
   * indentation, returning one newline per blank line. Null ends the body and
   * consumes nothing.
   */
  private continueBlock(indent: number): string | null {
    let i = this.pos;
    let blankLines = '';
    while (i < this.input.length) {
      const line = this.scanLine(i);
      if (!line.blank) {
        if (line.indent < indent) {
          return null;
        }
        while (this.pos < i + indent) {
          this.advance();
        }
        return blankLines;
      }
      if (this.input[line.next - 1] === '\n') {
        blankLines += '\n';
      }
      i = line.next;
    }
    return null;
  }

  /**
   * Colon depth of the `(:` list starting at the current position
   */
  private headColonDepth(): number {
    let colons = 0;
    while (this.peekAhead(1 + colons) === ':') {
      colons++;
    }
    return colons - 1;
  }

  // ============ Tokenizer helpers ============

  private skipSpaces(): void {
    while (this.peek() === ' ' || this.peek() === '\t' || this.peek() === '\r') {
      this.advance();
    }
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd() && this.isWhitespace(this.peek())) {
      this.advance();
    }
  }

  private isWhitespace(c: string): boolean {
    return c === ' ' || c === '\t' || c === '\r' || c === '\n' || c === '\f';
  }

  private isDelimiter(c: string): boolean {
    return c === '\0' || c === '(' || c === ')' || c === '"' || this.isWhitespace(c);
  }

  private isDigit(c: string): boolean {
    return c >= '0' && c <= '9';
  }

  private isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.pos];
  }

  private peekAhead(n: number): string {
    if (this.pos + n >= this.input.length) return '\0';
    return this.input[this.pos + n];
  }

  private advance(): string {
    const c = this.input[this.pos++];
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private expect(expected: string): void {
    const c = this.peek();
    if (c !== expected) {
      throw this.error(`Expected '${expected}', got '${c}'`);
    }
    this.advance();
  }

  private currentLocation(): Location {
    return { file: this.file, line: this.line, column: this.column };
  }

  private error(message: string): ParseError {
    return new ParseError(message, this.currentLocation());
  }
}

/**
 * Parse a Rocket document
 */
export function parse(source: string, file: string = '<unknown>'): Expr[] {
  const exprs = new Parser(source, file).parse();
  logger.debug('Parsed document', { file, expressions: exprs.length });
  return exprs;
}

/**
 * Parse a single expression
 */
export function parseOne(source: string, file: string = '<unknown>'): Expr {
  const datums = new Parser(source, file).parseExpression();
  if (datums.length === 0) {
    throw new ParseError('No expression to parse', { file, line: 1, column: 1 });
  }
  if (datums.length > 1) {
    throw new ParseError('Multiple expressions found, expected one', datums[1].location);
  }
  return datums[0];
}
