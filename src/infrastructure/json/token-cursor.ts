import { DecodeError, JsonSyntaxError } from '../../domain/errors.js';
import type { CharSource } from './char-source.js';

export type TokenKind =
  | 'START_OBJECT'
  | 'END_OBJECT'
  | 'START_ARRAY'
  | 'END_ARRAY'
  | 'FIELD_NAME'
  | 'VALUE_STRING'
  | 'VALUE_NUMBER'
  | 'VALUE_TRUE'
  | 'VALUE_FALSE'
  | 'VALUE_NULL';

type State =
  | 'EXPECT_ROOT'
  | 'EXPECT_VALUE_OR_CLOSE_ARRAY'
  | 'EXPECT_KEY_OR_CLOSE_OBJECT'
  | 'EXPECT_COLON'
  | 'EXPECT_COMMA_OR_CLOSE'
  | 'DONE';

type Frame = 'object' | 'array';

const EOF = -1;

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const BOM = 0xfeff;

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

function isWhitespace(code: number): boolean {
  return code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d;
}

function isDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

function isHexDigit(char: string): boolean {
  return /^[0-9a-fA-F]$/.test(char);
}

function isScalar(token: TokenKind): boolean {
  return (
    token === 'VALUE_STRING' ||
    token === 'VALUE_NUMBER' ||
    token === 'VALUE_TRUE' ||
    token === 'VALUE_FALSE' ||
    token === 'VALUE_NULL'
  );
}

/**
 * Pull-based JSON tokenizer.
 *
 * Each `nextToken()` call consumes exactly one token from the source and
 * validates it against the JSON grammar. Offsets count UTF-16 code units
 * from the start of the document, so `text.slice(tokenOffset, offset)` is
 * the current token's source text.
 *
 * The cursor is a single-owner resource: it is not safe to interleave
 * callers, and `close()` must be called once the document is done with.
 */
export class TokenCursor {
  private chunk = '';
  private index = 0;
  /** Offset of `chunk[0]` within the document. */
  private base = 0;
  private exhausted = false;
  private closed = false;

  private state: State = 'EXPECT_ROOT';
  private readonly stack: Frame[] = [];

  private token: TokenKind | null = null;
  private tokenText = '';
  private name: string | null = null;
  private start = 0;
  private end = 0;

  constructor(private readonly source: CharSource) {}

  /** Kind of the current token, `null` before the first token and at end of input. */
  get currentToken(): TokenKind | null {
    return this.token;
  }

  /**
   * Field name of the current token: set on a FIELD_NAME token and on the
   * value token that directly follows it, otherwise `null`.
   */
  get currentName(): string | null {
    return this.name;
  }

  /** Source-independent text of the current token (decoded for strings). */
  get text(): string {
    return this.tokenText;
  }

  /** Offset of the first character of the current token. */
  get tokenOffset(): number {
    return this.start;
  }

  /** Offset just past the last character of the current token. */
  get offset(): number {
    return this.end;
  }

  nextToken(): TokenKind | null {
    if (this.closed) {
      throw new DecodeError('Token cursor is closed');
    }

    const previous = this.token;
    this.skipWhitespace();
    this.start = this.position();

    switch (this.state) {
      case 'DONE':
        if (this.peek() !== EOF) {
          throw new JsonSyntaxError('Unexpected content after the root value', this.position());
        }
        this.token = null;
        this.tokenText = '';
        break;

      case 'EXPECT_ROOT':
        // An empty document has no tokens at all
        if (this.peek() === EOF) {
          this.state = 'DONE';
          this.token = null;
          this.tokenText = '';
        } else {
          this.readValue();
        }
        break;

      case 'EXPECT_VALUE_OR_CLOSE_ARRAY':
        if (this.peekChar() === ']') {
          this.closeContainer('array');
        } else {
          this.readValue();
        }
        break;

      case 'EXPECT_KEY_OR_CLOSE_OBJECT':
        if (this.peekChar() === '}') {
          this.closeContainer('object');
        } else {
          this.readKey();
        }
        break;

      case 'EXPECT_COLON':
        this.expectChar(':');
        this.skipWhitespace();
        this.start = this.position();
        this.readValue();
        break;

      case 'EXPECT_COMMA_OR_CLOSE': {
        const frame = this.stack[this.stack.length - 1];
        const char = this.peekChar();
        if (frame === 'object' && char === '}') {
          this.closeContainer('object');
        } else if (frame === 'array' && char === ']') {
          this.closeContainer('array');
        } else {
          this.expectChar(',');
          this.skipWhitespace();
          this.start = this.position();
          if (frame === 'object') {
            this.readKey();
          } else {
            this.readValue();
          }
        }
        break;
      }
    }

    if (this.token !== 'FIELD_NAME' && previous !== 'FIELD_NAME') {
      this.name = null;
    }
    this.end = this.position();
    return this.token;
  }

  /** Advances one token and returns its text when it is a string, else `null`. */
  nextTextValue(): string | null {
    return this.nextToken() === 'VALUE_STRING' ? this.tokenText : null;
  }

  getBooleanValue(): boolean {
    if (this.token === 'VALUE_TRUE') return true;
    if (this.token === 'VALUE_FALSE') return false;
    throw new DecodeError(`Current token ${String(this.token)} is not a boolean`, this.start);
  }

  /**
   * Textual form of a scalar or field name; `null` for the JSON null
   * literal and for structural tokens.
   */
  getValueAsString(): string | null {
    switch (this.token) {
      case 'VALUE_STRING':
      case 'VALUE_NUMBER':
      case 'VALUE_TRUE':
      case 'VALUE_FALSE':
      case 'FIELD_NAME':
        return this.tokenText;
      default:
        return null;
    }
  }

  /**
   * Materializes the object or array that starts at the current token as
   * compact JSON. Numbers keep their source text. Leaves the cursor on the
   * matching closing token.
   */
  readSubtreeAsJson(): string {
    if (this.token !== 'START_OBJECT' && this.token !== 'START_ARRAY') {
      throw new DecodeError(`Current token ${String(this.token)} does not start a container`, this.start);
    }

    const targetDepth = this.stack.length - 1;
    let out = '';
    let previous: TokenKind | null = null;
    let token: TokenKind | null = this.token;

    for (;;) {
      if (token === null) {
        throw new JsonSyntaxError('Unexpected end of input', this.position());
      }

      const separated =
        previous !== null &&
        (isScalar(previous) || previous === 'END_OBJECT' || previous === 'END_ARRAY') &&
        token !== 'END_OBJECT' &&
        token !== 'END_ARRAY';
      if (separated) out += ',';

      switch (token) {
        case 'START_OBJECT':
          out += '{';
          break;
        case 'END_OBJECT':
          out += '}';
          break;
        case 'START_ARRAY':
          out += '[';
          break;
        case 'END_ARRAY':
          out += ']';
          break;
        case 'FIELD_NAME':
          out += `${JSON.stringify(this.tokenText)}:`;
          break;
        case 'VALUE_STRING':
          out += JSON.stringify(this.tokenText);
          break;
        case 'VALUE_NUMBER':
        case 'VALUE_TRUE':
        case 'VALUE_FALSE':
        case 'VALUE_NULL':
          out += this.tokenText;
          break;
      }

      if ((token === 'END_OBJECT' || token === 'END_ARRAY') && this.stack.length === targetDepth) {
        return out;
      }

      previous = token;
      token = this.nextToken();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.token = null;
    this.source.close();
  }

  // ---------------------------------------------------------------------------
  // Grammar
  // ---------------------------------------------------------------------------

  private readValue(): void {
    const char = this.peekChar();

    switch (char) {
      case '{':
        this.advance();
        this.stack.push('object');
        this.setToken('START_OBJECT', '{');
        this.state = 'EXPECT_KEY_OR_CLOSE_OBJECT';
        return;
      case '[':
        this.advance();
        this.stack.push('array');
        this.setToken('START_ARRAY', '[');
        this.state = 'EXPECT_VALUE_OR_CLOSE_ARRAY';
        return;
      case '"':
        this.setToken('VALUE_STRING', this.readString());
        break;
      case 't':
        this.readKeyword('true');
        this.setToken('VALUE_TRUE', 'true');
        break;
      case 'f':
        this.readKeyword('false');
        this.setToken('VALUE_FALSE', 'false');
        break;
      case 'n':
        this.readKeyword('null');
        this.setToken('VALUE_NULL', 'null');
        break;
      default:
        if (char === '-' || isDigit(this.peek())) {
          this.setToken('VALUE_NUMBER', this.readNumber());
          break;
        }
        throw this.unexpected('a value');
    }

    this.afterValue();
  }

  private readKey(): void {
    if (this.peekChar() !== '"') {
      throw this.unexpected('a field name');
    }
    const key = this.readString();
    this.setToken('FIELD_NAME', key);
    this.name = key;
    this.state = 'EXPECT_COLON';
  }

  private closeContainer(frame: Frame): void {
    this.advance();
    this.stack.pop();
    if (frame === 'object') {
      this.setToken('END_OBJECT', '}');
    } else {
      this.setToken('END_ARRAY', ']');
    }
    this.afterValue();
  }

  private afterValue(): void {
    this.state = this.stack.length === 0 ? 'DONE' : 'EXPECT_COMMA_OR_CLOSE';
  }

  private setToken(kind: TokenKind, text: string): void {
    this.token = kind;
    this.tokenText = text;
  }

  private readString(): string {
    const opening = this.position();
    this.advance();
    let out = '';

    for (;;) {
      if (this.index >= this.chunk.length && !this.fill()) {
        throw new JsonSyntaxError('Unterminated string', opening);
      }

      // Copy the run of plain characters in one slice
      const runStart = this.index;
      while (this.index < this.chunk.length) {
        const code = this.chunk.charCodeAt(this.index);
        if (code === QUOTE || code === BACKSLASH || code < 0x20) break;
        this.index++;
      }
      out += this.chunk.slice(runStart, this.index);
      if (this.index >= this.chunk.length) continue;

      const code = this.chunk.charCodeAt(this.index);
      if (code === QUOTE) {
        this.advance();
        return out;
      }
      if (code < 0x20) {
        throw new JsonSyntaxError('Unescaped control character in string', this.position());
      }

      this.advance();
      out += this.readEscape();
    }
  }

  private readEscape(): string {
    const escapeOffset = this.position() - 1;
    const char = this.peekChar();
    if (char === null) {
      throw new JsonSyntaxError('Unterminated string', escapeOffset);
    }
    this.advance();

    const simple = SIMPLE_ESCAPES[char];
    if (simple !== undefined) return simple;

    if (char !== 'u') {
      throw new JsonSyntaxError(`Invalid escape sequence \\${char}`, escapeOffset);
    }

    let hex = '';
    for (let i = 0; i < 4; i++) {
      const digit = this.peekChar();
      if (digit === null || !isHexDigit(digit)) {
        throw new JsonSyntaxError('Invalid unicode escape', escapeOffset);
      }
      hex += digit;
      this.advance();
    }
    return String.fromCharCode(parseInt(hex, 16));
  }

  private readNumber(): string {
    let out = '';

    if (this.peekChar() === '-') {
      out += '-';
      this.advance();
    }

    if (this.peekChar() === '0') {
      out += '0';
      this.advance();
    } else {
      out += this.readDigits();
    }

    if (this.peekChar() === '.') {
      out += '.';
      this.advance();
      out += this.readDigits();
    }

    const exponent = this.peekChar();
    if (exponent === 'e' || exponent === 'E') {
      out += exponent;
      this.advance();
      const sign = this.peekChar();
      if (sign === '+' || sign === '-') {
        out += sign;
        this.advance();
      }
      out += this.readDigits();
    }

    return out;
  }

  private readDigits(): string {
    let out = '';
    while (isDigit(this.peek())) {
      out += this.peekChar();
      this.advance();
    }
    if (out === '') {
      throw this.unexpected('a digit');
    }
    return out;
  }

  private readKeyword(word: string): void {
    const offset = this.position();
    for (const expected of word) {
      if (this.peekChar() !== expected) {
        throw new JsonSyntaxError(`Invalid literal, expected "${word}"`, offset);
      }
      this.advance();
    }
  }

  private expectChar(expected: string): void {
    if (this.peekChar() !== expected) {
      throw this.unexpected(`"${expected}"`);
    }
    this.advance();
  }

  private unexpected(what: string): JsonSyntaxError {
    const char = this.peekChar();
    const found = char === null ? 'end of input' : JSON.stringify(char);
    return new JsonSyntaxError(`Expected ${what} but found ${found}`, this.position());
  }

  // ---------------------------------------------------------------------------
  // Character access
  // ---------------------------------------------------------------------------

  private position(): number {
    return this.base + this.index;
  }

  private skipWhitespace(): void {
    for (;;) {
      const code = this.peek();
      if (isWhitespace(code) || (code === BOM && this.position() === 0)) {
        this.advance();
      } else {
        return;
      }
    }
  }

  /** Code unit at the read position, or EOF. */
  private peek(): number {
    if (this.index >= this.chunk.length && !this.fill()) return EOF;
    return this.chunk.charCodeAt(this.index);
  }

  private peekChar(): string | null {
    const code = this.peek();
    return code === EOF ? null : String.fromCharCode(code);
  }

  private advance(): void {
    this.index++;
  }

  /** Replaces the consumed chunk with the next non-empty one. */
  private fill(): boolean {
    while (!this.exhausted) {
      const next = this.source.read();
      if (next === null) {
        this.exhausted = true;
        break;
      }
      if (next.length === 0) continue;
      this.base += this.chunk.length;
      this.chunk = next;
      this.index = 0;
      return true;
    }
    return false;
  }
}
