import {
  RDF_TYPE, RDF_FIRST, RDF_REST, RDF_NIL,
  XSD_BOOLEAN, XSD_INTEGER, XSD_DECIMAL, XSD_DOUBLE,
  OWL_SAME_AS, LOG_IMPLIES, LOG_IMPLIED_BY,
  LexError, N3SyntaxError, UnsupportedConstruct, ResolutionError,
  Blank, Formula, Iri, Quad, Triple, Var, DEFAULT_GRAPH,
  internIri, literal, resolveIriRef, traceWriteLine,
} from './core';
import type { GraphName, N3Term, SourcePosition } from './core';
import { TextDecoder } from 'node:util';
import { QuadStore } from './store';

// ===========================================================================
// LEXER
// ===========================================================================

type TokenKind =
  | 'IRIREF'
  | 'PNAME_NS'
  | 'PNAME_LN'
  | 'BLANK_NODE_LABEL'
  | 'STRING_LITERAL'
  | 'LANGTAG'
  | 'INTEGER'
  | 'DECIMAL'
  | 'DOUBLE'
  | 'DOT'
  | 'COMMA'
  | 'SEMICOLON'
  | 'LBRACKET'
  | 'RBRACKET'
  | 'LPAREN'
  | 'RPAREN'
  | 'LBRACE'
  | 'RBRACE'
  | 'HATHAT'
  | 'KEYWORD'
  | 'AT_PREFIX'
  | 'AT_BASE'
  | 'AT_KEYWORD'
  | 'VAR'
  | 'IMPLIES'
  | 'IMPLIED_BY'
  | 'EQUALS'
  | 'INVERT'
  | 'PATH_FWD'
  | 'PATH_REV'
  | 'EOF';

const PUNCTUATION: Record<string, TokenKind> = {
  '.': 'DOT',
  ',': 'COMMA',
  ';': 'SEMICOLON',
  '[': 'LBRACKET',
  ']': 'RBRACKET',
  '(': 'LPAREN',
  ')': 'RPAREN',
  '{': 'LBRACE',
  '}': 'RBRACE',
};

const SYMBOLS: Partial<Record<TokenKind, string>> = {
  DOT: "'.'",
  COMMA: "','",
  SEMICOLON: "';'",
  LBRACKET: "'['",
  RBRACKET: "']'",
  LPAREN: "'('",
  RPAREN: "')'",
  LBRACE: "'{'",
  RBRACE: "'}'",
  HATHAT: "'^^'",
  IMPLIES: "'=>'",
  IMPLIED_BY: "'<='",
  EQUALS: "'='",
  INVERT: "'<-'",
  PATH_FWD: "'!'",
  PATH_REV: "'^'",
  AT_PREFIX: "'@prefix'",
  AT_BASE: "'@base'",
  EOF: 'end of input',
};

class Token {
  constructor(
    readonly kind: TokenKind,
    readonly value: string,
    readonly position: SourcePosition,
    // PNAME_NS / PNAME_LN only: the prefix without its colon; `value` is the local part
    readonly prefix: string = '',
  ) {}

  describe(): string {
    const symbol = SYMBOLS[this.kind];
    if (symbol) return symbol;
    switch (this.kind) {
      case 'IRIREF':
        return `<${this.value}>`;
      case 'PNAME_NS':
      case 'PNAME_LN':
        return `${this.prefix}:${this.value}`;
      case 'BLANK_NODE_LABEL':
        return `_:${this.value}`;
      case 'STRING_LITERAL':
        return JSON.stringify(this.value);
      case 'LANGTAG':
      case 'AT_KEYWORD':
        return `@${this.value}`;
      case 'VAR':
        return `?${this.value}`;
      case 'KEYWORD':
        return `'${this.value}'`;
      default:
        return this.value;
    }
  }

  toString(): string {
    return `Token(${this.kind}@${this.position.line}:${this.position.column}, ${JSON.stringify(this.value)})`;
  }
}

const PN_CHARS_BASE_RE =
  /[A-Za-z\u00C0-\u00D6\u00D8-\u00F6\u00F8-\u02FF\u0370-\u037D\u037F-\u1FFF\u200C-\u200D\u2070-\u218F\u2C00-\u2FEF\u3001-\uD7FF\uF900-\uFDCF\uFDF0-\uFFFD\u{10000}-\u{EFFFF}]/u;
const PN_CHARS_EXTRA_RE = /[-0-9\u00B7\u0300-\u036F\u203F-\u2040]/;
const PN_LOCAL_ESC = "_~.-!$&'()*+,;=/?#@%";
const IRI_FORBIDDEN = '<>"{}|^`\\';

function isWs(c: string): boolean {
  return c === ' ' || c === '\t' || c === '\n' || c === '\r';
}

function isDigit(c: string | null): boolean {
  return c !== null && c >= '0' && c <= '9';
}

function isHex(c: string | null): boolean {
  return c !== null && /^[0-9A-Fa-f]$/.test(c);
}

function isPnCharsBase(c: string): boolean {
  return PN_CHARS_BASE_RE.test(c);
}

function isPnCharsU(c: string): boolean {
  return c === '_' || isPnCharsBase(c);
}

function isPnChars(c: string): boolean {
  return isPnCharsU(c) || PN_CHARS_EXTRA_RE.test(c);
}

function isIriChar(c: string): boolean {
  const cp = c.codePointAt(0) ?? 0;
  return cp > 0x20 && !IRI_FORBIDDEN.includes(c);
}

// after Array.from, a code point string of length 1 in D800-DFFF is unpaired
function isSurrogate(c: string): boolean {
  const cu = c.charCodeAt(0);
  return c.length === 1 && cu >= 0xd800 && cu <= 0xdfff;
}

function decodeInput(input: string | Uint8Array): string {
  let text: string;
  if (typeof input === 'string') {
    text = input;
  } else {
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(input);
    } catch (e) {
      throw new LexError(`Invalid UTF-8 input: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Lazy tokenizer. `next()` returns one token per call and keeps returning EOF
 * once the input is exhausted. The only state is the read offset, the kind of
 * the previous token (LANGTAG vs. @directive) and a line/column cursor.
 */
class Lexer {
  private readonly chars: string[];
  private i = 0;
  private prev: TokenKind | null = null;

  // line/column cursor, only ever moved forward
  private cursorOffset = 0;
  private cursorLine = 1;
  private cursorColumn = 1;

  constructor(input: string | Uint8Array) {
    // Code points, not UTF-16 units: offsets and columns count characters.
    this.chars = Array.from(decodeInput(input));
    const surrogate = this.chars.findIndex(isSurrogate);
    if (surrogate >= 0) {
      const cp = this.chars[surrogate].charCodeAt(0).toString(16).toUpperCase();
      this.fail(`Lone surrogate U+${cp} is not a Unicode scalar value`, surrogate);
    }
  }

  positionAt(offset: number): SourcePosition {
    if (offset < this.cursorOffset) {
      this.cursorOffset = 0;
      this.cursorLine = 1;
      this.cursorColumn = 1;
    }
    const target = Math.min(offset, this.chars.length);
    while (this.cursorOffset < target) {
      const c = this.chars[this.cursorOffset];
      this.cursorOffset++;
      if (c === '\n') {
        this.cursorLine++;
        this.cursorColumn = 1;
      } else if (c === '\r') {
        this.cursorLine++;
        this.cursorColumn = 1;
        if (this.cursorOffset < target && this.chars[this.cursorOffset] === '\n') this.cursorOffset++; // CRLF
      } else {
        this.cursorColumn++;
      }
    }
    return { offset, line: this.cursorLine, column: this.cursorColumn };
  }

  private peek(ahead = 0): string | null {
    const j = this.i + ahead;
    return j < this.chars.length ? this.chars[j] : null;
  }

  private fail(message: string, offset = this.i): never {
    throw new LexError(message, this.positionAt(offset));
  }

  private token(kind: TokenKind, value: string, start: number, prefix = ''): Token {
    this.prev = kind;
    return new Token(kind, value, this.positionAt(start), prefix);
  }

  private skipWhitespaceAndComments(): void {
    const n = this.chars.length;
    while (this.i < n) {
      const c = this.chars[this.i];
      if (isWs(c)) {
        this.i++;
      } else if (c === '#') {
        while (this.i < n && this.chars[this.i] !== '\n' && this.chars[this.i] !== '\r') this.i++;
      } else {
        break;
      }
    }
  }

  next(): Token {
    this.skipWhitespaceAndComments();
    const start = this.i;
    const c = this.peek();
    if (c === null) return this.token('EOF', '', start);

    const punct = PUNCTUATION[c];
    if (punct !== undefined) {
      // '.5' is a decimal, not a dot
      if (c === '.' && isDigit(this.peek(1))) return this.lexNumber();
      this.i++;
      return this.token(punct, c, start);
    }

    switch (c) {
      case '<':
        if (this.peek(1) === '=') {
          this.i += 2;
          return this.token('IMPLIED_BY', '<=', start);
        }
        if (this.peek(1) === '-') {
          this.i += 2;
          return this.token('INVERT', '<-', start);
        }
        return this.lexIriRef();
      case '"':
      case "'":
        return this.lexString(c);
      case '@':
        return this.lexAt();
      case '^':
        if (this.peek(1) === '^') {
          this.i += 2;
          return this.token('HATHAT', '^^', start);
        }
        this.i++;
        return this.token('PATH_REV', '^', start);
      case '!':
        this.i++;
        return this.token('PATH_FWD', '!', start);
      case '=':
        if (this.peek(1) === '>') {
          this.i += 2;
          return this.token('IMPLIES', '=>', start);
        }
        this.i++;
        return this.token('EQUALS', '=', start);
      case '?':
        return this.lexVar();
      case '_':
        if (this.peek(1) === ':') return this.lexBlankLabel();
        break;
      case '+':
      case '-':
        if (isDigit(this.peek(1)) || (this.peek(1) === '.' && isDigit(this.peek(2)))) return this.lexNumber();
        break;
      default:
        if (isDigit(c)) return this.lexNumber();
        if (c === ':' || isPnCharsBase(c)) return this.lexName();
    }
    return this.fail(`Unexpected character ${JSON.stringify(c)}`);
  }

  // Reads the code point of a \u / \U escape; `this.i` is on the 'u' or 'U'.
  private readUnicodeEscape(escStart: number): string {
    const width = this.peek() === 'u' ? 4 : 8;
    this.i++;
    let hex = '';
    for (let k = 0; k < width; k++) {
      const h = this.peek();
      if (!isHex(h)) this.fail(`Invalid \\${width === 4 ? 'u' : 'U'} escape (expected ${width} hex digits)`, escStart);
      hex += h;
      this.i++;
    }
    const cp = parseInt(hex, 16);
    if (cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) {
      this.fail(`Escape \\${width === 4 ? 'u' : 'U'}${hex} does not denote a Unicode scalar value`, escStart);
    }
    return String.fromCodePoint(cp);
  }

  private lexIriRef(): Token {
    const start = this.i;
    this.i++; // '<'
    let iri = '';
    for (;;) {
      const c = this.peek();
      if (c === null) return this.fail('Unterminated IRI <...>', start);
      if (c === '>') {
        this.i++;
        return this.token('IRIREF', iri, start);
      }
      if (c === '\\') {
        const escStart = this.i;
        this.i++;
        const e = this.peek();
        if (e !== 'u' && e !== 'U') this.fail(`Invalid escape sequence in IRI: \\${e ?? ''}`, escStart);
        const decoded = this.readUnicodeEscape(escStart);
        if (!isIriChar(decoded)) this.fail(`Escaped character ${JSON.stringify(decoded)} is not allowed in an IRI`, escStart);
        iri += decoded;
        continue;
      }
      if (!isIriChar(c)) return this.fail(`Character ${JSON.stringify(c)} is not allowed in an IRI`);
      if (c === '%' && !(isHex(this.peek(1)) && isHex(this.peek(2)))) {
        return this.fail('Invalid percent-encoding in IRI (expected %XX)');
      }
      iri += c;
      this.i++;
    }
  }

  private readStringEscape(): string {
    const escStart = this.i;
    this.i++; // '\'
    const e = this.peek();
    switch (e) {
      case 't':
        this.i++;
        return '\t';
      case 'b':
        this.i++;
        return '\b';
      case 'n':
        this.i++;
        return '\n';
      case 'r':
        this.i++;
        return '\r';
      case 'f':
        this.i++;
        return '\f';
      case '"':
      case "'":
      case '\\':
        this.i++;
        return e;
      case 'u':
      case 'U':
        return this.readUnicodeEscape(escStart);
      default:
        return this.fail(`Invalid escape sequence \\${e ?? ''}`, escStart);
    }
  }

  private lexString(quote: string): Token {
    const start = this.i;
    const long = this.peek(1) === quote && this.peek(2) === quote;
    let s = '';

    if (long) {
      this.i += 3;
      for (;;) {
        const c = this.peek();
        if (c === null) return this.fail(`Unterminated long string literal ${quote.repeat(3)}...${quote.repeat(3)}`, start);
        if (c === '\\') {
          s += this.readStringEscape();
          continue;
        }
        if (c === quote) {
          // A run of >= 3 quotes closes the literal; extra leading quotes are content.
          let run = 0;
          while (this.peek(run) === quote) run++;
          if (run >= 3) {
            s += quote.repeat(run - 3);
            this.i += run;
            return this.token('STRING_LITERAL', s, start);
          }
          s += quote.repeat(run);
          this.i += run;
          continue;
        }
        s += c;
        this.i++;
      }
    }

    this.i++;
    for (;;) {
      const c = this.peek();
      if (c === null) return this.fail(`Unterminated string literal ${quote}...${quote}`, start);
      if (c === '\n' || c === '\r') return this.fail('Line break in a short string literal', start);
      if (c === '\\') {
        s += this.readStringEscape();
        continue;
      }
      this.i++;
      if (c === quote) return this.token('STRING_LITERAL', s, start);
      s += c;
    }
  }

  private lexAt(): Token {
    const start = this.i;
    this.i++; // '@'

    if (this.prev === 'STRING_LITERAL') {
      // LANGTAG ::= '@' [a-zA-Z]+ ('-' [a-zA-Z0-9]+)*
      let tag = '';
      if (!/[A-Za-z]/.test(this.peek() ?? '')) this.fail("Invalid language tag (expected [A-Za-z] after '@')", start);
      while (/[A-Za-z]/.test(this.peek() ?? '')) tag += this.chars[this.i++];
      while (this.peek() === '-') {
        this.i++;
        let seg = '';
        while (/[A-Za-z0-9]/.test(this.peek() ?? '')) seg += this.chars[this.i++];
        if (!seg) this.fail("Invalid language tag (expected [A-Za-z0-9]+ after '-')", start);
        tag += '-' + seg;
      }
      return this.token('LANGTAG', tag, start);
    }

    let word = '';
    while (/[A-Za-z]/.test(this.peek() ?? '')) word += this.chars[this.i++];
    if (!word) return this.fail("Expected a directive name after '@'", start);
    if (word === 'prefix') return this.token('AT_PREFIX', word, start);
    if (word === 'base') return this.token('AT_BASE', word, start);
    return this.token('AT_KEYWORD', word, start);
  }

  private lexVar(): Token {
    const start = this.i;
    this.i++; // '?'
    let name = '';
    let c: string | null;
    while ((c = this.peek()) !== null && isPnChars(c)) {
      name += c;
      this.i++;
    }
    if (!name) return this.fail("Expected a variable name after '?'", start);
    return this.token('VAR', name, start);
  }

  private lexBlankLabel(): Token {
    const start = this.i;
    this.i += 2; // '_:'
    const first = this.peek();
    if (first === null || !(isPnCharsU(first) || isDigit(first))) {
      return this.fail('Invalid blank node label', start);
    }
    let label = first;
    this.i++;
    let c: string | null;
    while ((c = this.peek()) !== null && (isPnChars(c) || c === '.')) {
      label += c;
      this.i++;
    }
    // trailing dots end the statement, they are not part of the label
    while (label.endsWith('.')) {
      label = label.slice(0, -1);
      this.i--;
    }
    return this.token('BLANK_NODE_LABEL', label, start);
  }

  private lexNumber(): Token {
    const start = this.i;
    let text = '';
    const sign = this.peek();
    if (sign === '+' || sign === '-') {
      text += sign;
      this.i++;
    }
    let intDigits = 0;
    while (isDigit(this.peek())) {
      text += this.chars[this.i++];
      intDigits++;
    }

    let kind: TokenKind = 'INTEGER';
    if (this.peek() === '.' && isDigit(this.peek(1))) {
      kind = 'DECIMAL';
      text += '.';
      this.i++;
      while (isDigit(this.peek())) text += this.chars[this.i++];
    } else if (this.peek() === '.' && intDigits > 0 && this.exponentAt(1)) {
      // 1.e5
      text += '.';
      this.i++;
    }

    if (this.exponentAt(0)) {
      kind = 'DOUBLE';
      text += this.chars[this.i++];
      const expSign = this.peek();
      if (expSign === '+' || expSign === '-') text += this.chars[this.i++];
      while (isDigit(this.peek())) text += this.chars[this.i++];
    }

    if (!/[0-9]/.test(text)) return this.fail('Invalid numeric literal', start);
    return this.token(kind, text, start);
  }

  private exponentAt(ahead: number): boolean {
    const e = this.peek(ahead);
    if (e !== 'e' && e !== 'E') return false;
    const s = this.peek(ahead + 1);
    return isDigit(s) || ((s === '+' || s === '-') && isDigit(this.peek(ahead + 2)));
  }

  private lexName(): Token {
    const start = this.i;
    let prefix = '';
    if (this.peek() !== ':') {
      let c: string | null;
      while ((c = this.peek()) !== null && (isPnChars(c) || c === '.')) {
        prefix += c;
        this.i++;
      }
      while (prefix.endsWith('.')) {
        prefix = prefix.slice(0, -1);
        this.i--;
      }
      if (this.peek() !== ':') return this.token('KEYWORD', prefix, start);
    }
    this.i++; // ':'

    const local = this.readLocalName();
    if (local === null) return this.token('PNAME_NS', '', start, prefix);
    return this.token('PNAME_LN', local, start, prefix);
  }

  // PN_LOCAL with escapes decoded and %XX kept verbatim; null when empty.
  private readLocalName(): string | null {
    const startOffset = this.i;
    let local = '';
    // offset and value after the last character that may end a name (anything but a raw '.')
    let endOffset = this.i;
    let endValue = '';

    for (;;) {
      const c = this.peek();
      if (c === null) break;
      const first = this.i === startOffset;
      if (c === '\\') {
        const e = this.peek(1);
        if (e === null || !PN_LOCAL_ESC.includes(e)) this.fail(`Invalid escape in local name: \\${e ?? ''}`);
        local += e;
        this.i += 2;
      } else if (c === '%') {
        if (!(isHex(this.peek(1)) && isHex(this.peek(2)))) this.fail('Invalid percent-encoding in local name (expected %XX)');
        local += c + this.chars[this.i + 1] + this.chars[this.i + 2];
        this.i += 3;
      } else if (c === '.' && !first) {
        local += c;
        this.i++;
        continue;
      } else if (isPnCharsU(c) || c === ':' || isDigit(c) || (!first && isPnChars(c))) {
        local += c;
        this.i++;
      } else {
        break;
      }
      endOffset = this.i;
      endValue = local;
    }

    this.i = endOffset;
    return endOffset > startOffset ? endValue : null;
  }
}

function lex(input: string | Uint8Array): Token[] {
  const lexer = new Lexer(input);
  const tokens: Token[] = [];
  for (;;) {
    const tok = lexer.next();
    tokens.push(tok);
    if (tok.kind === 'EOF') return tokens;
  }
}

// ===========================================================================
// PREFIX ENVIRONMENT / PARSE CONTEXT
// ===========================================================================

class PrefixEnv {
  readonly map: Map<string, string>; // prefix (without ':') -> namespace IRI
  baseIri: string | null;

  constructor(map: Record<string, string> = {}, baseIri: string | null = null) {
    this.map = new Map(Object.entries(map));
    this.baseIri = baseIri;
  }

  set(prefix: string, iri: string): void {
    this.map.set(prefix, iri);
  }

  setBase(baseIri: string | null): void {
    this.baseIri = baseIri || null;
  }

  expand(prefix: string, local: string, position: SourcePosition | null = null): string {
    const ns = this.map.get(prefix);
    if (ns === undefined) throw new ResolutionError(`Undeclared prefix '${prefix}:'`, position);
    return ns + local;
  }

  resolve(ref: string, position: SourcePosition | null = null): string {
    return resolveIriRef(ref, this.baseIri, position);
  }

  /** Longest matching namespace; `null` when no prefix covers the IRI. */
  shrinkIri(iri: string): { prefix: string; local: string } | null {
    let best: { prefix: string; local: string } | null = null;
    for (const [prefix, ns] of this.map) {
      if (!ns || !iri.startsWith(ns)) continue;
      const local = iri.slice(ns.length);
      if (best === null || local.length < best.local.length) best = { prefix, local };
    }
    return best;
  }
}

// Blank labels embed a per-process document number, so nodes of different parses never collide.
let documentCounter = 0;

class ParseContext {
  readonly docId: number;
  readonly prefixes: PrefixEnv;
  readonly blankLabels = new Map<string, Blank>();
  blankCounter = 0;
  statementCount = 0;

  constructor(prefixes: PrefixEnv) {
    documentCounter += 1;
    this.docId = documentCounter;
    this.prefixes = prefixes;
  }

  freshBlank(): Blank {
    this.blankCounter += 1;
    return new Blank(`d${this.docId}b${this.blankCounter}`);
  }

  labeledBlank(label: string): Blank {
    let b = this.blankLabels.get(label);
    if (!b) {
      b = this.freshBlank();
      this.blankLabels.set(label, b);
    }
    return b;
  }
}

// ===========================================================================
// PARSER
// ===========================================================================

type InputFormat = 'turtle' | 'trig' | 'n3';

interface ParseOptions {
  format?: InputFormat;
  baseIri?: string | null;
  /** Graph for statements outside any graph block. */
  graph?: GraphName;
  prefixes?: Record<string, string>;
  /** 'warn' skips statements that cannot become quads instead of failing the parse. */
  onUnsupported?: 'error' | 'warn';
  onQuad?: (q: Quad) => void;
}

interface ParseResult {
  store: QuadStore;
  context: ParseContext;
}

type TermRole = 'subject' | 'object' | 'verb';

const IRI_TOKENS: ReadonlySet<TokenKind> = new Set<TokenKind>(['IRIREF', 'PNAME_NS', 'PNAME_LN']);
// [ ... ], ( ... ) and { ... } levels; deeper input is a syntax error, not a stack overflow
const MAX_NESTING = 256;

const STATEMENT_END: ReadonlySet<TokenKind> = new Set<TokenKind>(['DOT', 'RBRACKET', 'RBRACE', 'EOF']);

class Parser {
  readonly context: ParseContext;
  readonly store: QuadStore;
  private readonly lexer: Lexer;
  private readonly format: InputFormat;
  private readonly graph: GraphName;
  private readonly onUnsupported: 'error' | 'warn';
  private readonly onQuad: ((q: Quad) => void) | null;

  private readonly lookahead: Token[] = [];
  // triples of the statement being parsed, inserted only once it is complete
  private pending: Triple[] = [];
  private unsupported: UnsupportedConstruct | null = null;
  private depth = 0;

  constructor(lexer: Lexer, options: ParseOptions = {}, store: QuadStore = new QuadStore()) {
    const { format = 'turtle', baseIri = null, graph = DEFAULT_GRAPH, prefixes = {}, onUnsupported = 'error', onQuad } = options;
    this.lexer = lexer;
    this.store = store;
    this.format = format;
    this.graph = graph;
    this.onUnsupported = onUnsupported;
    this.onQuad = onQuad ?? null;
    this.context = new ParseContext(new PrefixEnv(prefixes));
    if (baseIri) this.context.prefixes.setBase(resolveIriRef(baseIri, null));
  }

  private peek(ahead = 0): Token {
    while (this.lookahead.length <= ahead) this.lookahead.push(this.lexer.next());
    return this.lookahead[ahead];
  }

  private next(): Token {
    const tok = this.peek();
    this.lookahead.shift();
    return tok;
  }

  private fail(expected: string, tok: Token = this.peek(), detail?: string): never {
    throw new N3SyntaxError(expected, tok.describe(), tok.position, detail);
  }

  private expect(kind: TokenKind, expected: string): Token {
    const tok = this.next();
    if (tok.kind !== kind) this.fail(expected, tok);
    return tok;
  }

  private nested(open: Token, role: TermRole, parse: () => N3Term): N3Term {
    if (this.depth >= MAX_NESTING) this.fail(role, open, `Nesting deeper than ${MAX_NESTING} levels`);
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private isKeyword(tok: Token, word: string): boolean {
    if (tok.kind === 'KEYWORD') return tok.value === word;
    // N3 also spells keywords with '@' (@a, @is, @of, @has)
    return this.format === 'n3' && tok.kind === 'AT_KEYWORD' && tok.value === word;
  }

  private requireN3(tok: Token, what: string): void {
    if (this.format !== 'n3') this.fail(what, tok, `${tok.describe()} is only allowed in N3`);
  }

  private markUnsupported(construct: string, message: string, tok: Token): void {
    if (!this.unsupported) this.unsupported = new UnsupportedConstruct(construct, message, tok.position);
  }

  parseDocument(): ParseResult {
    while (this.peek().kind !== 'EOF') this.parseStatement();
    return { store: this.store, context: this.context };
  }

  private parseStatement(): void {
    const tok = this.peek();
    switch (tok.kind) {
      case 'AT_PREFIX':
        this.next();
        this.parsePrefixDirective(false);
        return;
      case 'AT_BASE':
        this.next();
        this.parseBaseDirective(false);
        return;
      case 'AT_KEYWORD':
        if (['forAll', 'forSome', 'keywords'].includes(tok.value)) {
          this.requireN3(tok, 'statement');
          this.parseN3Declaration();
          return;
        }
        break;
      case 'KEYWORD': {
        const word = tok.value.toLowerCase();
        // SPARQL-style directives; the PNAME_NS / IRIREF lookahead keeps a subject named 'prefix' usable
        if (word === 'prefix' && this.peek(1).kind === 'PNAME_NS') {
          this.next();
          this.parsePrefixDirective(true);
          return;
        }
        if (word === 'base' && this.peek(1).kind === 'IRIREF') {
          this.next();
          this.parseBaseDirective(true);
          return;
        }
        if (word === 'graph' && this.format === 'trig') {
          this.next();
          this.parseWrappedGraph(this.parseGraphLabel());
          return;
        }
        break;
      }
      case 'LBRACE':
        if (this.format === 'trig') {
          this.parseWrappedGraph(this.graph);
          return;
        }
        break;
      default:
        if (this.format === 'trig' && this.startsGraphBlock()) {
          this.parseWrappedGraph(this.parseGraphLabel());
          return;
        }
    }

    this.parseTriples();
    this.expect('DOT', "'.'");
    this.flush(this.graph, tok);
  }

  private startsGraphBlock(): boolean {
    const k0 = this.peek().kind;
    if (IRI_TOKENS.has(k0) || k0 === 'BLANK_NODE_LABEL') return this.peek(1).kind === 'LBRACE';
    return k0 === 'LBRACKET' && this.peek(1).kind === 'RBRACKET' && this.peek(2).kind === 'LBRACE';
  }

  // -------------------------------------------------------------------------
  // Directives
  // -------------------------------------------------------------------------

  private parsePrefixDirective(sparql: boolean): void {
    const nameTok = this.next();
    if (nameTok.kind !== 'PNAME_NS') this.fail("prefix name (e.g. 'ex:')", nameTok);
    const iriTok = this.expect('IRIREF', 'IRI');
    const iri = this.context.prefixes.resolve(iriTok.value, iriTok.position);
    if (!sparql) this.expect('DOT', "'.'");
    // SPARQL-style PREFIX takes no '.', but tolerate one
    else if (this.peek().kind === 'DOT') this.next();
    this.context.prefixes.set(nameTok.prefix, iri);
  }

  private parseBaseDirective(sparql: boolean): void {
    const iriTok = this.expect('IRIREF', 'IRI');
    const iri = this.context.prefixes.resolve(iriTok.value, iriTok.position);
    if (!sparql) this.expect('DOT', "'.'");
    else if (this.peek().kind === 'DOT') this.next();
    this.context.prefixes.setBase(iri);
  }

  private parseN3Declaration(): void {
    const tok = this.next();
    if (this.peek().kind !== 'DOT') {
      this.parseTerm('object');
      while (this.peek().kind === 'COMMA') {
        this.next();
        this.parseTerm('object');
      }
    }
    this.expect('DOT', "'.'");
    this.markUnsupported('quantifier', `@${tok.value} declarations cannot be represented as quads`, tok);
    this.flush(this.graph, tok);
  }

  // -------------------------------------------------------------------------
  // Graph blocks (TriG)
  // -------------------------------------------------------------------------

  private parseGraphLabel(): GraphName {
    const tok = this.next();
    if (IRI_TOKENS.has(tok.kind)) return internIri(this.iriOf(tok));
    if (tok.kind === 'BLANK_NODE_LABEL') return this.context.labeledBlank(tok.value);
    if (tok.kind === 'LBRACKET' && this.peek().kind === 'RBRACKET') {
      this.next();
      return this.context.freshBlank();
    }
    return this.fail('graph name', tok);
  }

  private parseWrappedGraph(graph: GraphName): void {
    this.expect('LBRACE', "'{'");
    while (this.peek().kind !== 'RBRACE') {
      const first = this.peek();
      this.parseTriples();
      const sep = this.peek();
      if (sep.kind === 'DOT') this.next();
      else if (sep.kind !== 'RBRACE') this.fail("'.' or '}'", sep);
      this.flush(graph, first);
    }
    this.next(); // '}'
  }

  // -------------------------------------------------------------------------
  // Triples
  // -------------------------------------------------------------------------

  private parseTriples(): void {
    const tok = this.peek();
    if (tok.kind === 'LBRACKET' && this.peek(1).kind !== 'RBRACKET') {
      // [ p o ] alone is a complete statement
      const subject = this.parseTerm('subject');
      if (STATEMENT_END.has(this.peek().kind)) return;
      this.parsePredicateObjectList(subject);
      return;
    }
    const subject = this.parseTerm('subject');
    if (this.format === 'n3' && STATEMENT_END.has(this.peek().kind)) return;
    this.parsePredicateObjectList(subject);
  }

  private parsePredicateObjectList(subject: N3Term): void {
    for (;;) {
      const { verb, inverse } = this.parseVerb();
      for (;;) {
        const object = this.parseTerm('object');
        this.pending.push(inverse ? new Triple(object, verb, subject) : new Triple(subject, verb, object));
        if (this.peek().kind !== 'COMMA') break;
        this.next();
      }
      if (this.peek().kind !== 'SEMICOLON') return;
      while (this.peek().kind === 'SEMICOLON') this.next();
      if (STATEMENT_END.has(this.peek().kind)) return;
    }
  }

  private parseVerb(): { verb: N3Term; inverse: boolean } {
    const tok = this.peek();
    if (this.isKeyword(tok, 'a')) {
      this.next();
      return { verb: internIri(RDF_TYPE), inverse: false };
    }
    if (this.format === 'n3') {
      switch (tok.kind) {
        case 'EQUALS':
          this.next();
          return { verb: internIri(OWL_SAME_AS), inverse: false };
        case 'IMPLIES':
          this.next();
          return { verb: internIri(LOG_IMPLIES), inverse: false };
        case 'IMPLIED_BY':
          this.next();
          return { verb: internIri(LOG_IMPLIED_BY), inverse: false };
        case 'INVERT':
          this.next();
          return { verb: this.parseTerm('verb'), inverse: true };
        default:
      }
      if (this.isKeyword(tok, 'has')) {
        this.next();
        return { verb: this.parseTerm('verb'), inverse: false };
      }
      if (this.isKeyword(tok, 'is')) {
        this.next();
        const verb = this.parseTerm('verb');
        if (!this.isKeyword(this.peek(), 'of')) this.fail("'of'");
        this.next();
        return { verb, inverse: true };
      }
      return { verb: this.parseTerm('verb'), inverse: false };
    }
    if (!IRI_TOKENS.has(tok.kind)) this.fail('predicate', tok);
    return { verb: this.parseTerm('verb'), inverse: false };
  }

  // -------------------------------------------------------------------------
  // Terms
  // -------------------------------------------------------------------------

  private iriOf(tok: Token): string {
    if (tok.kind === 'IRIREF') return this.context.prefixes.resolve(tok.value, tok.position);
    return this.context.prefixes.expand(tok.prefix, tok.value, tok.position);
  }

  private parseTerm(role: TermRole): N3Term {
    let t = this.parsePathItem(role);

    // N3 paths: x!p is the object of (x p ?), x^p the subject of (? p x)
    while (this.peek().kind === 'PATH_FWD' || this.peek().kind === 'PATH_REV') {
      const op = this.next();
      this.requireN3(op, "'.'");
      const pred = this.parsePathItem('verb');
      const bn = this.context.freshBlank();
      this.pending.push(op.kind === 'PATH_FWD' ? new Triple(t, pred, bn) : new Triple(bn, pred, t));
      t = bn;
    }
    return t;
  }

  private parsePathItem(role: TermRole): N3Term {
    const tok = this.next();
    const n3 = this.format === 'n3';

    switch (tok.kind) {
      case 'IRIREF':
      case 'PNAME_NS':
      case 'PNAME_LN':
        return internIri(this.iriOf(tok));
      case 'BLANK_NODE_LABEL':
        if (role === 'verb' && !n3) this.fail('predicate', tok);
        return this.context.labeledBlank(tok.value);
      case 'STRING_LITERAL':
        if (role !== 'object' && !n3) this.fail(role, tok);
        return this.parseLiteralRest(tok);
      case 'INTEGER':
      case 'DECIMAL':
      case 'DOUBLE': {
        if (role !== 'object' && !n3) this.fail(role, tok);
        const dt = tok.kind === 'INTEGER' ? XSD_INTEGER : tok.kind === 'DECIMAL' ? XSD_DECIMAL : XSD_DOUBLE;
        return literal(tok.value, internIri(dt));
      }
      case 'KEYWORD':
        if ((tok.value === 'true' || tok.value === 'false') && (role === 'object' || n3)) {
          return literal(tok.value, internIri(XSD_BOOLEAN));
        }
        return this.fail(role, tok);
      case 'LPAREN':
        if (role === 'verb' && !n3) this.fail('predicate', tok);
        return this.nested(tok, role, () => this.parseCollection());
      case 'LBRACKET':
        if (role === 'verb' && !n3) this.fail('predicate', tok);
        return this.nested(tok, role, () => this.parseBlankPropertyList());
      case 'LBRACE':
        this.requireN3(tok, role);
        return this.nested(tok, role, () => this.parseFormula(tok));
      case 'VAR':
        this.requireN3(tok, role);
        this.markUnsupported('variable', `Variable ?${tok.value} cannot be represented as an RDF term`, tok);
        return new Var(tok.value);
      default:
        return this.fail(role, tok);
    }
  }

  private parseLiteralRest(tok: Token): N3Term {
    const next = this.peek();
    if (next.kind === 'LANGTAG') {
      this.next();
      if (this.peek().kind === 'HATHAT') {
        this.fail("'.'", this.peek(), 'A literal cannot have both a language tag (@...) and a datatype (^^...)');
      }
      return literal(tok.value, next.value);
    }
    if (next.kind === 'HATHAT') {
      this.next();
      const dtTok = this.next();
      if (!IRI_TOKENS.has(dtTok.kind)) this.fail('datatype IRI', dtTok);
      return literal(tok.value, internIri(this.iriOf(dtTok)));
    }
    return literal(tok.value);
  }

  private parseCollection(): N3Term {
    const items: N3Term[] = [];
    while (this.peek().kind !== 'RPAREN') {
      if (this.peek().kind === 'EOF') this.fail("')'");
      items.push(this.parseTerm('object'));
    }
    this.next(); // ')'
    if (items.length === 0) return internIri(RDF_NIL);

    const head = this.context.freshBlank();
    let cell = head;
    items.forEach((item, idx) => {
      this.pending.push(new Triple(cell, internIri(RDF_FIRST), item));
      const rest = idx === items.length - 1 ? internIri(RDF_NIL) : this.context.freshBlank();
      this.pending.push(new Triple(cell, internIri(RDF_REST), rest));
      if (rest instanceof Blank) cell = rest;
    });
    return head;
  }

  private parseBlankPropertyList(): N3Term {
    // [] or [ predicateObjectList ]
    if (this.peek().kind === 'RBRACKET') {
      this.next();
      return this.context.freshBlank();
    }
    const subject = this.context.freshBlank();
    this.parsePredicateObjectList(subject);
    this.expect('RBRACKET', "']' at end of blank node property list");
    return subject;
  }

  private parseFormula(open: Token): N3Term {
    const outer = this.pending;
    this.pending = [];
    while (this.peek().kind !== 'RBRACE') {
      if (this.peek().kind === 'EOF') this.fail("'}'");
      this.parseTriples();
      if (this.peek().kind === 'DOT') this.next();
      else if (this.peek().kind !== 'RBRACE') this.fail("'.' or '}'");
    }
    this.next(); // '}'
    const formula = new Formula(this.pending);
    this.pending = outer;
    this.markUnsupported('formula', 'Quoted formulas { ... } cannot be represented as quads', open);
    return formula;
  }

  // -------------------------------------------------------------------------
  // Projection onto quads
  // -------------------------------------------------------------------------

  private project(t: Triple, graph: GraphName, at: Token): Quad {
    const { s, p, o } = t;
    if (s.termType === 'Literal') {
      throw new UnsupportedConstruct('literal-subject', `Literal ${s.toString()} cannot be a subject`, at.position);
    }
    if (s.termType !== 'Iri' && s.termType !== 'Blank') {
      throw new UnsupportedConstruct(s.termType.toLowerCase(), `${s.termType} terms cannot be represented as quads`, at.position);
    }
    if (!(p instanceof Iri)) {
      throw new UnsupportedConstruct('non-iri-predicate', 'Predicates must be IRIs', at.position);
    }
    if (o.termType === 'Var' || o.termType === 'Formula') {
      throw new UnsupportedConstruct(o.termType.toLowerCase(), `${o.termType} terms cannot be represented as quads`, at.position);
    }
    return new Quad(s, p, o, graph);
  }

  private flush(graph: GraphName, start: Token): void {
    const triples = this.pending;
    this.pending = [];
    let failure = this.unsupported;
    this.unsupported = null;

    const quads: Quad[] = [];
    if (!failure) {
      for (const t of triples) {
        try {
          quads.push(this.project(t, graph, start));
        } catch (e) {
          if (!(e instanceof UnsupportedConstruct)) throw e;
          failure = e;
          break;
        }
      }
    }

    if (failure) {
      if (this.onUnsupported === 'error') throw failure;
      traceWriteLine(`Skipping statement at line ${start.position.line}, column ${start.position.column}: ${failure.detail}`);
      return;
    }

    this.context.statementCount += 1;
    for (const q of quads) {
      if (this.store.add(q) && this.onQuad) this.onQuad(q);
    }
  }
}

export { Token, Lexer, lex, PrefixEnv, ParseContext, Parser, isPnCharsBase, isPnCharsU, isPnChars };
export type { TokenKind, InputFormat, ParseOptions, ParseResult };
