/**
 * HCL Parser
 *
 * Parses the subset of HCL2 needed to read resource definitions out of
 * Terraform `.tf` files: attributes, labelled blocks, comments, quoted
 * strings, heredocs, numbers, booleans, null, tuples and objects.
 *
 * Anything that needs evaluation (references, function calls, operators,
 * interpolated templates, `for` expressions) is consumed structurally and
 * returned as an unresolved expression, since it has no value without a
 * Terraform evaluation context.
 */

import { ParseError } from '../../core/errors.js';
import {
  type ConfigValue,
  boolValue,
  listValue,
  mapValue,
  nullValue,
  numberValue,
  stringValue
} from '../../models/config-value.js';

/**
 * Result of reading one expression
 */
export type HclExpression =
  | { readonly resolved: true; readonly value: ConfigValue }
  | { readonly resolved: false; readonly line: number; readonly column: number };

export interface HclAttribute {
  name: string;
  expression: HclExpression;
  line: number;
}

export interface HclBlock {
  type: string;
  labels: string[];
  body: HclBody;
  line: number;
}

export interface HclBody {
  attributes: Map<string, HclAttribute>;
  blocks: HclBlock[];
}

type TokenType = 'ident' | 'number' | 'string' | 'heredoc' | 'punct' | 'newline' | 'eof';

interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
  /** Set on strings and heredocs that contain interpolation or directives */
  template?: boolean;
}

interface ExpressionContext {
  /** Whether a newline at nesting depth 0 ends the expression */
  newlineTerminates: boolean;
}

const PUNCTUATION_3 = ['...'];
const PUNCTUATION_2 = ['==', '!=', '<=', '>=', '&&', '||', '=>'];
const PUNCTUATION_1 = '{}[]()=:,.?!+-*/%<>';
const OPENERS = new Set(['{', '[', '(']);
const CLOSERS = new Set(['}', ']', ')']);

/**
 * Parses HCL source into its attributes and blocks.
 *
 * @throws ParseError with file, line and column on syntax errors
 */
export function parseHcl(source: string, file = '<input>'): HclBody {
  const tokens = new Lexer(source, file).tokenize();
  return new Parser(tokens, file).parseFile();
}

class Lexer {
  private pos = 0;
  private line = 1;
  private column = 1;
  private tokens: Token[] = [];

  constructor(private readonly src: string, private readonly file: string) {}

  tokenize(): Token[] {
    while (this.pos < this.src.length) {
      const ch = this.src[this.pos];

      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.advance();
      } else if (ch === '\n') {
        this.push('newline', '\n', this.line, this.column);
        this.advance();
      } else if (ch === '#' || this.startsWith('//')) {
        this.skipLineComment();
      } else if (this.startsWith('/*')) {
        this.skipBlockComment();
      } else if (ch === '"') {
        this.readString();
      } else if (this.startsWith('<<') && /^<<-?[A-Za-z_]/.test(this.src.slice(this.pos, this.pos + 4))) {
        this.readHeredoc();
      } else if (isDigit(ch)) {
        this.readNumber();
      } else if (isIdentStart(ch)) {
        this.readIdent();
      } else {
        this.readPunct();
      }
    }

    this.push('eof', '', this.line, this.column);
    return this.tokens;
  }

  private error(message: string, line = this.line, column = this.column): ParseError {
    return new ParseError(message, this.file, line, column);
  }

  private push(type: TokenType, value: string, line: number, column: number, template?: boolean): void {
    this.tokens.push(template ? { type, value, line, column, template } : { type, value, line, column });
  }

  private startsWith(text: string): boolean {
    return this.src.startsWith(text, this.pos);
  }

  private advance(count = 1): void {
    for (let i = 0; i < count && this.pos < this.src.length; i++) {
      if (this.src[this.pos] === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.pos++;
    }
  }

  private skipLineComment(): void {
    while (this.pos < this.src.length && this.src[this.pos] !== '\n') {
      this.advance();
    }
  }

  private skipBlockComment(): void {
    const line = this.line;
    const column = this.column;
    const end = this.src.indexOf('*/', this.pos + 2);
    if (end === -1) {
      throw this.error('Unterminated block comment', line, column);
    }
    this.advance(end + 2 - this.pos);
  }

  private readNumber(): void {
    const line = this.line;
    const column = this.column;
    const match = /^\d+(\.\d+)?([eE][+-]?\d+)?/.exec(this.src.slice(this.pos));
    const text = match ? match[0] : this.src[this.pos];
    this.advance(text.length);
    this.push('number', text, line, column);
  }

  private readIdent(): void {
    const line = this.line;
    const column = this.column;
    const start = this.pos;
    while (this.pos < this.src.length && isIdentPart(this.src[this.pos])) {
      this.advance();
    }
    this.push('ident', this.src.slice(start, this.pos), line, column);
  }

  private readPunct(): void {
    const line = this.line;
    const column = this.column;
    for (const candidate of [...PUNCTUATION_3, ...PUNCTUATION_2]) {
      if (this.startsWith(candidate)) {
        this.advance(candidate.length);
        this.push('punct', candidate, line, column);
        return;
      }
    }
    const ch = this.src[this.pos];
    if (PUNCTUATION_1.includes(ch)) {
      this.advance();
      this.push('punct', ch, line, column);
      return;
    }
    throw this.error(`Unexpected character ${JSON.stringify(ch)}`);
  }

  private readString(): void {
    const line = this.line;
    const column = this.column;
    this.advance(); // opening quote
    let value = '';
    let template = false;

    for (;;) {
      if (this.pos >= this.src.length || this.src[this.pos] === '\n') {
        throw this.error('Unterminated string', line, column);
      }

      const ch = this.src[this.pos];
      if (ch === '"') {
        this.advance();
        break;
      }

      if (ch === '\\') {
        value += this.readEscape();
      } else if (this.startsWith('$${') || this.startsWith('%%{')) {
        value += `${ch}{`;
        this.advance(3);
      } else if (this.startsWith('${') || this.startsWith('%{')) {
        template = true;
        value += this.readInterpolation();
      } else {
        value += ch;
        this.advance();
      }
    }

    this.push('string', value, line, column, template);
  }

  private readEscape(): string {
    const line = this.line;
    const column = this.column;
    const code = this.src[this.pos + 1];
    const simple: Record<string, string> = { n: '\n', t: '\t', r: '\r', '"': '"', '\\': '\\' };
    if (code !== undefined && code in simple) {
      this.advance(2);
      return simple[code];
    }
    if (code === 'u' || code === 'U') {
      const length = code === 'u' ? 4 : 8;
      const hex = this.src.slice(this.pos + 2, this.pos + 2 + length);
      if (!new RegExp(`^[0-9A-Fa-f]{${length}}$`).test(hex)) {
        throw this.error('Invalid unicode escape', line, column);
      }
      this.advance(2 + length);
      return String.fromCodePoint(parseInt(hex, 16));
    }
    throw this.error(`Invalid escape sequence \\${code ?? ''}`, line, column);
  }

  /**
   * Consumes `${ ... }` or `%{ ... }` including nested braces and strings,
   * returning the raw text
   */
  private readInterpolation(): string {
    const line = this.line;
    const column = this.column;
    const start = this.pos;
    this.advance(2);
    let depth = 1;

    while (depth > 0) {
      if (this.pos >= this.src.length) {
        throw this.error('Unterminated template interpolation', line, column);
      }
      const ch = this.src[this.pos];
      if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
      } else if (ch === '"') {
        this.skipNestedString(line, column);
        continue;
      }
      this.advance();
    }

    return this.src.slice(start, this.pos);
  }

  private skipNestedString(line: number, column: number): void {
    this.advance();
    while (this.pos < this.src.length && this.src[this.pos] !== '"') {
      this.advance(this.src[this.pos] === '\\' ? 2 : 1);
    }
    if (this.pos >= this.src.length) {
      throw this.error('Unterminated string in template interpolation', line, column);
    }
    this.advance();
  }

  private readHeredoc(): void {
    const line = this.line;
    const column = this.column;
    const header = /^<<(-?)([A-Za-z_][A-Za-z0-9_-]*)[ \t]*\r?\n/.exec(this.src.slice(this.pos));
    if (!header) {
      throw this.error('Heredoc marker must be followed by a newline', line, column);
    }
    const indented = header[1] === '-';
    const marker = header[2];
    this.advance(header[0].length);

    const lines: string[] = [];
    for (;;) {
      if (this.pos >= this.src.length) {
        throw this.error(`Unterminated heredoc, expected ${marker}`, line, column);
      }
      const lineEnd = this.src.indexOf('\n', this.pos);
      const end = lineEnd === -1 ? this.src.length : lineEnd;
      const text = this.src.slice(this.pos, end).replace(/\r$/, '');
      if (text.trim() === marker) {
        // leave the newline after the closing marker for the parser
        this.advance(end - this.pos);
        break;
      }
      lines.push(text);
      this.advance(end - this.pos + 1);
    }

    const body = indented ? stripCommonIndent(lines) : lines;
    const raw = body.map(l => `${l}\n`).join('');
    const template = /(^|[^$])\$\{/.test(raw) || /(^|[^%])%\{/.test(raw);
    const value = raw.replace(/\$\$\{/g, '${').replace(/%%\{/g, '%{');
    this.push('heredoc', value, line, column, template);
  }
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[], private readonly file: string) {}

  parseFile(): HclBody {
    return this.parseBody(false);
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (this.index < this.tokens.length - 1) {
      this.index++;
    }
    return token;
  }

  private isPunct(token: Token, value: string): boolean {
    return token.type === 'punct' && token.value === value;
  }

  private skipNewlines(): void {
    while (this.peek().type === 'newline') {
      this.next();
    }
  }

  private error(message: string, token: Token): ParseError {
    return new ParseError(message, this.file, token.line, token.column);
  }

  private expect(value: string): Token {
    const token = this.next();
    if (!this.isPunct(token, value)) {
      throw this.error(`Expected '${value}' but found ${describeToken(token)}`, token);
    }
    return token;
  }

  private parseBody(insideBraces: boolean): HclBody {
    const body: HclBody = { attributes: new Map(), blocks: [] };

    for (;;) {
      this.skipNewlines();
      const token = this.peek();

      if (token.type === 'eof') {
        if (insideBraces) {
          throw this.error("Expected '}' to close block", token);
        }
        return body;
      }

      if (this.isPunct(token, '}')) {
        if (!insideBraces) {
          throw this.error("Unexpected '}'", token);
        }
        this.next();
        return body;
      }

      if (token.type !== 'ident') {
        throw this.error(`Expected an attribute or block but found ${describeToken(token)}`, token);
      }

      const name = this.next();
      if (this.isPunct(this.peek(), '=')) {
        this.next();
        if (body.attributes.has(name.value)) {
          throw this.error(`Duplicate attribute "${name.value}"`, name);
        }
        const expression = this.parseExpression({ newlineTerminates: true });
        body.attributes.set(name.value, { name: name.value, expression, line: name.line });
      } else {
        body.blocks.push(this.parseBlock(name));
      }

      this.expectItemEnd(insideBraces);
    }
  }

  private parseBlock(type: Token): HclBlock {
    const labels: string[] = [];
    for (;;) {
      const token = this.peek();
      if (token.type === 'ident' || (token.type === 'string' && !token.template)) {
        labels.push(this.next().value);
      } else {
        break;
      }
    }
    this.expect('{');
    const body = this.parseBody(true);
    return { type: type.value, labels, body, line: type.line };
  }

  private expectItemEnd(insideBraces: boolean): void {
    const token = this.peek();
    if (token.type === 'newline' || token.type === 'eof') {
      return;
    }
    if (insideBraces && this.isPunct(token, '}')) {
      return;
    }
    throw this.error(`Expected a newline but found ${describeToken(token)}`, token);
  }

  private parseExpression(context: ExpressionContext): HclExpression {
    const start = this.peek();
    let expression = this.parsePrimary();
    if (!this.atExpressionEnd(context)) {
      this.skipRest(context);
      expression = unresolved(start);
    }
    return expression;
  }

  private atExpressionEnd(context: ExpressionContext): boolean {
    if (!context.newlineTerminates) {
      this.skipNewlines();
    }
    const token = this.peek();
    if (token.type === 'eof') return true;
    if (token.type === 'newline') return context.newlineTerminates;
    return token.type === 'punct' && (token.value === ',' || CLOSERS.has(token.value));
  }

  /**
   * Consumes the remainder of an expression that cannot be evaluated
   */
  private skipRest(context: ExpressionContext): void {
    let depth = 0;
    for (;;) {
      const token = this.peek();
      if (token.type === 'eof') {
        if (depth > 0) {
          throw this.error('Unexpected end of file inside expression', token);
        }
        return;
      }
      if (depth === 0) {
        if (token.type === 'newline' && context.newlineTerminates) return;
        if (this.isPunct(token, ',')) return;
        if (token.type === 'punct' && CLOSERS.has(token.value)) return;
      }
      if (token.type === 'punct' && OPENERS.has(token.value)) depth++;
      if (token.type === 'punct' && CLOSERS.has(token.value)) depth--;
      this.next();
    }
  }

  /**
   * Consumes tokens up to and including the closer matching an opener
   * that has already been consumed
   */
  private skipBalanced(): void {
    let depth = 1;
    while (depth > 0) {
      const token = this.next();
      if (token.type === 'eof') {
        throw this.error('Unexpected end of file inside expression', token);
      }
      if (token.type === 'punct' && OPENERS.has(token.value)) depth++;
      if (token.type === 'punct' && CLOSERS.has(token.value)) depth--;
    }
  }

  private parsePrimary(): HclExpression {
    const token = this.next();

    switch (token.type) {
      case 'number':
        return resolved(numberValue(Number(token.value)));
      case 'string':
      case 'heredoc':
        return token.template ? unresolved(token) : resolved(stringValue(token.value));
      case 'ident':
        if (token.value === 'true') return resolved(boolValue(true));
        if (token.value === 'false') return resolved(boolValue(false));
        if (token.value === 'null') return resolved(nullValue());
        return unresolved(token);
      case 'punct':
        return this.parsePunctPrimary(token);
      default:
        throw this.error(`Expected an expression but found ${describeToken(token)}`, token);
    }
  }

  private parsePunctPrimary(token: Token): HclExpression {
    switch (token.value) {
      case '[':
        return this.parseTuple(token);
      case '{':
        return this.parseObject(token);
      case '(': {
        const inner = this.parseExpression({ newlineTerminates: false });
        this.skipNewlines();
        this.expect(')');
        return inner;
      }
      case '-': {
        const operand = this.peek();
        if (operand.type === 'number') {
          this.next();
          return resolved(numberValue(-Number(operand.value)));
        }
        return unresolved(token);
      }
      case '!':
        return unresolved(token);
      default:
        throw this.error(`Expected an expression but found ${describeToken(token)}`, token);
    }
  }

  private parseTuple(open: Token): HclExpression {
    this.skipNewlines();
    if (this.isKeyword(this.peek(), 'for')) {
      this.skipBalanced();
      return unresolved(open);
    }

    const items: ConfigValue[] = [];
    let complete = true;

    for (;;) {
      this.skipNewlines();
      if (this.isPunct(this.peek(), ']')) {
        this.next();
        break;
      }

      const item = this.parseExpression({ newlineTerminates: false });
      if (item.resolved) {
        items.push(item.value);
      } else {
        complete = false;
      }

      this.skipNewlines();
      const separator = this.next();
      if (this.isPunct(separator, ']')) break;
      if (!this.isPunct(separator, ',')) {
        throw this.error(`Expected ',' or ']' but found ${describeToken(separator)}`, separator);
      }
    }

    return complete ? resolved(listValue(items)) : unresolved(open);
  }

  private parseObject(open: Token): HclExpression {
    this.skipNewlines();
    if (this.isKeyword(this.peek(), 'for')) {
      this.skipBalanced();
      return unresolved(open);
    }

    const entries = new Map<string, ConfigValue>();
    let complete = true;

    for (;;) {
      this.skipNewlines();
      if (this.isPunct(this.peek(), '}')) {
        this.next();
        break;
      }

      const key = this.parseObjectKey();
      const assign = this.next();
      if (!this.isPunct(assign, '=') && !this.isPunct(assign, ':')) {
        throw this.error(`Expected '=' or ':' but found ${describeToken(assign)}`, assign);
      }

      const value = this.parseExpression({ newlineTerminates: true });
      if (key !== null && value.resolved) {
        entries.set(key, value.value);
      } else {
        complete = false;
      }

      const separator = this.peek();
      if (this.isPunct(separator, ',')) {
        this.next();
      } else if (separator.type !== 'newline' && !this.isPunct(separator, '}')) {
        throw this.error(`Expected ',', newline or '}' but found ${describeToken(separator)}`, separator);
      }
    }

    return complete ? resolved(mapValue(entries)) : unresolved(open);
  }

  /**
   * Returns the key text, or null for a key that needs evaluation
   */
  private parseObjectKey(): string | null {
    const token = this.next();
    if (token.type === 'ident' || token.type === 'number') {
      return token.value;
    }
    if (token.type === 'string') {
      return token.template ? null : token.value;
    }
    if (this.isPunct(token, '(')) {
      const inner = this.parseExpression({ newlineTerminates: false });
      this.skipNewlines();
      this.expect(')');
      return inner.resolved && inner.value.kind === 'string' ? inner.value.value : null;
    }
    throw this.error(`Expected an object key but found ${describeToken(token)}`, token);
  }

  private isKeyword(token: Token, word: string): boolean {
    return token.type === 'ident' && token.value === word;
  }
}

function resolved(value: ConfigValue): HclExpression {
  return { resolved: true, value };
}

function unresolved(token: Token): HclExpression {
  return { resolved: false, line: token.line, column: token.column };
}

function describeToken(token: Token): string {
  switch (token.type) {
    case 'eof':
      return 'end of file';
    case 'newline':
      return 'newline';
    case 'string':
    case 'heredoc':
      return 'string';
    default:
      return `'${token.value}'`;
  }
}

function stripCommonIndent(lines: string[]): string[] {
  let indent = Infinity;
  for (const line of lines) {
    if (line.trim() === '') continue;
    const leading = /^[ \t]*/.exec(line);
    indent = Math.min(indent, leading ? leading[0].length : 0);
  }
  if (!Number.isFinite(indent)) return lines;
  return lines.map(line => line.slice(Math.min(indent, line.length)));
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_-]/.test(ch);
}
