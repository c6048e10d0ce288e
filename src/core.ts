/*
 * n3quads core: term model, namespaces, errors, trace output and IRI
 * reference resolution (RFC 3986).
 */

const version = '0.1.0';

// ===========================================================================
// Namespace constants
// ===========================================================================

const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
const OWL_NS = 'http://www.w3.org/2002/07/owl#';
const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';
const LOG_NS = 'http://www.w3.org/2000/10/swap/log#';

const RDF_TYPE = RDF_NS + 'type';
const RDF_FIRST = RDF_NS + 'first';
const RDF_REST = RDF_NS + 'rest';
const RDF_NIL = RDF_NS + 'nil';
const RDF_LANG_STRING = RDF_NS + 'langString';
const XSD_STRING = XSD_NS + 'string';
const XSD_BOOLEAN = XSD_NS + 'boolean';
const XSD_INTEGER = XSD_NS + 'integer';
const XSD_DECIMAL = XSD_NS + 'decimal';
const XSD_DOUBLE = XSD_NS + 'double';
const OWL_SAME_AS = OWL_NS + 'sameAs';
const LOG_IMPLIES = LOG_NS + 'implies';
const LOG_IMPLIED_BY = LOG_NS + 'impliedBy';

// ===========================================================================
// Errors
// ===========================================================================

interface SourcePosition {
  offset: number; // code point offset
  line: number; // 1-based
  column: number; // 1-based
}

function describePosition(position: SourcePosition | null): string {
  return position ? ` at line ${position.line}, column ${position.column}` : '';
}

/** Malformed token: bad escape, unterminated literal, invalid IRI character, bad UTF-8. */
class LexError extends SyntaxError {
  readonly detail: string; // message without the position suffix
  readonly position: SourcePosition | null;

  constructor(message: string, position: SourcePosition | null = null) {
    super(message + describePosition(position));
    this.name = 'LexError';
    this.detail = message;
    this.position = position;
  }
}

/** The token stream matches no production at the current position. */
class N3SyntaxError extends SyntaxError {
  readonly expected: string;
  readonly found: string;
  readonly detail: string;
  readonly position: SourcePosition | null;

  constructor(expected: string, found: string, position: SourcePosition | null = null, detail?: string) {
    const message = detail ?? `Expected ${expected}, got ${found}`;
    super(message + describePosition(position));
    this.name = 'N3SyntaxError';
    this.detail = message;
    this.expected = expected;
    this.found = found;
    this.position = position;
  }
}

/** A relative IRI with no base in scope, or a prefixed name with an undeclared prefix. */
class ResolutionError extends Error {
  readonly detail: string;
  readonly position: SourcePosition | null;

  constructor(message: string, position: SourcePosition | null = null) {
    super(message + describePosition(position));
    this.name = 'ResolutionError';
    this.detail = message;
    this.position = position;
  }
}

/** Grammatical input that has no representation as RDF quads (formulas, variables, ...). */
class UnsupportedConstruct extends Error {
  readonly construct: string;
  readonly detail: string;
  readonly position: SourcePosition | null;

  constructor(construct: string, message: string, position: SourcePosition | null = null) {
    super(message + describePosition(position));
    this.name = 'UnsupportedConstruct';
    this.detail = message;
    this.construct = construct;
    this.position = position;
  }
}

type ParseFailure = LexError | N3SyntaxError | ResolutionError | UnsupportedConstruct;

function isParseFailure(e: unknown): e is ParseFailure {
  return (
    e instanceof LexError || e instanceof N3SyntaxError || e instanceof ResolutionError || e instanceof UnsupportedConstruct
  );
}

// ===========================================================================
// Trace output
// ===========================================================================

type TraceWriter = (line: string) => void;

function defaultTraceWriter(line: string): void {
  process.stderr.write(line + '\n');
}

let traceWriter: TraceWriter = defaultTraceWriter;

/** Replace the diagnostic sink; `null` restores stderr. Returns the previous writer. */
function setTraceWriter(writer: TraceWriter | null): TraceWriter {
  const previous = traceWriter;
  traceWriter = writer ?? defaultTraceWriter;
  return previous;
}

function traceWriteLine(line: string): void {
  traceWriter(line);
}

// ===========================================================================
// Terms
// ===========================================================================

class Iri {
  readonly termType = 'Iri' as const;

  constructor(readonly value: string) {}

  toString(): string {
    return `<${this.value}>`;
  }
}

class Blank {
  readonly termType = 'Blank' as const;

  constructor(readonly label: string) {}

  toString(): string {
    return `_:${this.label}`;
  }
}

class Literal {
  readonly termType = 'Literal' as const;

  constructor(
    readonly value: string, // lexical form, escapes already decoded
    readonly language: string | null,
    readonly datatype: Iri,
  ) {
    if (language !== null && datatype.value !== RDF_LANG_STRING) {
      throw new TypeError('A literal cannot have both a language tag and a datatype');
    }
    if (language === null && datatype.value === RDF_LANG_STRING) {
      throw new TypeError('rdf:langString literals need a language tag');
    }
  }

  toString(): string {
    return termKey(this);
  }
}

class DefaultGraph {
  readonly termType = 'DefaultGraph' as const;
  readonly value = '';

  toString(): string {
    return '';
  }
}

const DEFAULT_GRAPH = new DefaultGraph();

// N3-only terms. The parser builds them; they never reach a Quad.

class Var {
  readonly termType = 'Var' as const;

  constructor(readonly name: string) {} // without leading '?'
}

class Formula {
  readonly termType = 'Formula' as const;

  constructor(readonly triples: Triple[]) {}
}

type Subject = Iri | Blank;
type Predicate = Iri;
type ObjectTerm = Iri | Blank | Literal;
type GraphName = Iri | Blank | DefaultGraph;
type RdfTerm = Iri | Blank | Literal | DefaultGraph;
type N3Term = Iri | Blank | Literal | Var | Formula;

/** A parsed statement before it is projected onto a graph; any position may hold any N3 term. */
class Triple {
  constructor(
    readonly s: N3Term,
    readonly p: N3Term,
    readonly o: N3Term,
  ) {}
}

class Quad {
  constructor(
    readonly subject: Subject,
    readonly predicate: Predicate,
    readonly object: ObjectTerm,
    readonly graph: GraphName = DEFAULT_GRAPH,
  ) {}

  toString(): string {
    return quadKey(this);
  }
}

// ===========================================================================
// Term construction
// ===========================================================================

// value -> Iri
const iriIntern = new Map<string, Iri>();

function internIri(value: string): Iri {
  let t = iriIntern.get(value);
  if (!t) {
    t = new Iri(value);
    iriIntern.set(value, t);
  }
  return t;
}

/** `languageOrDatatype`: a language tag string, a datatype IRI, or nothing for xsd:string. */
function literal(value: string, languageOrDatatype?: string | Iri): Literal {
  if (typeof languageOrDatatype === 'string') {
    return new Literal(value, languageOrDatatype.toLowerCase(), internIri(RDF_LANG_STRING));
  }
  return new Literal(value, null, languageOrDatatype ?? internIri(XSD_STRING));
}

function quad(subject: Subject, predicate: Predicate, object: ObjectTerm, graph: GraphName = DEFAULT_GRAPH): Quad {
  return new Quad(subject, predicate, object, graph);
}

// ===========================================================================
// Keys and ordering
// ===========================================================================

/** Canonical string form of a term; two terms are equal iff their keys are. */
function termKey(t: RdfTerm): string {
  switch (t.termType) {
    case 'Iri':
      return `<${t.value}>`;
    case 'Blank':
      return `_:${t.label}`;
    case 'Literal': {
      const q = JSON.stringify(t.value);
      if (t.language !== null) return `${q}@${t.language}`;
      if (t.datatype.value === XSD_STRING) return q;
      return `${q}^^<${t.datatype.value}>`;
    }
    case 'DefaultGraph':
      return '';
  }
}

function quadKey(q: Quad): string {
  return termKey(q.graph) + '\t' + termKey(q.subject) + '\t' + termKey(q.predicate) + '\t' + termKey(q.object);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Lexicographic on (graph, subject, predicate, object) keys. */
function compareQuads(a: Quad, b: Quad): number {
  return (
    compareStrings(termKey(a.graph), termKey(b.graph)) ||
    compareStrings(termKey(a.subject), termKey(b.subject)) ||
    compareStrings(termKey(a.predicate), termKey(b.predicate)) ||
    compareStrings(termKey(a.object), termKey(b.object))
  );
}

function termsEqual(a: RdfTerm, b: RdfTerm): boolean {
  return a === b || termKey(a) === termKey(b);
}

// ===========================================================================
// IRI reference resolution (RFC 3986, section 5.2)
// ===========================================================================

const SCHEME_RE = /^[A-Za-z][A-Za-z0-9+.-]*:/;
const IRI_PARTS_RE = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s;

interface IriParts {
  scheme: string | undefined;
  authority: string | undefined;
  path: string;
  query: string | undefined;
  fragment: string | undefined;
}

function hasScheme(iri: string): boolean {
  return SCHEME_RE.test(iri);
}

function splitIri(iri: string): IriParts {
  const m = IRI_PARTS_RE.exec(iri);
  // unreachable: the pattern matches every string
  if (!m) return { scheme: undefined, authority: undefined, path: iri, query: undefined, fragment: undefined };
  return { scheme: m[1], authority: m[2], path: m[3] ?? '', query: m[4], fragment: m[5] };
}

function removeDotSegments(path: string): string {
  const out: string[] = [];
  let input = path;
  while (input.length > 0) {
    if (input.startsWith('../')) input = input.slice(3);
    else if (input.startsWith('./')) input = input.slice(2);
    else if (input.startsWith('/./')) input = input.slice(2);
    else if (input === '/.') input = '/';
    else if (input.startsWith('/../')) {
      input = input.slice(3);
      out.pop();
    } else if (input === '/..') {
      input = '/';
      out.pop();
    } else if (input === '.' || input === '..') input = '';
    else {
      const next = input.indexOf('/', input.startsWith('/') ? 1 : 0);
      const segment = next === -1 ? input : input.slice(0, next);
      out.push(segment);
      input = next === -1 ? '' : input.slice(next);
    }
  }
  return out.join('');
}

function mergePaths(base: IriParts, refPath: string): string {
  if (base.authority !== undefined && base.path === '') return '/' + refPath;
  const slash = base.path.lastIndexOf('/');
  return slash === -1 ? refPath : base.path.slice(0, slash + 1) + refPath;
}

function recompose(p: IriParts): string {
  let out = '';
  if (p.scheme !== undefined) out += p.scheme + ':';
  if (p.authority !== undefined) out += '//' + p.authority;
  out += p.path;
  if (p.query !== undefined) out += '?' + p.query;
  if (p.fragment !== undefined) out += '#' + p.fragment;
  return out;
}

/**
 * Resolve `ref` against `base`. An IRI with a scheme is returned untouched; a
 * relative one without a base throws ResolutionError.
 */
function resolveIriRef(ref: string, base: string | null, position: SourcePosition | null = null): string {
  if (hasScheme(ref)) return ref;
  if (!base) throw new ResolutionError(`Cannot resolve relative IRI <${ref}> without a base IRI`, position);
  if (!hasScheme(base)) throw new ResolutionError(`Base IRI <${base}> is not absolute`, position);

  const r = splitIri(ref);
  const b = splitIri(base);
  const t: IriParts = { scheme: b.scheme, authority: undefined, path: '', query: undefined, fragment: r.fragment };

  if (r.authority !== undefined) {
    t.authority = r.authority;
    t.path = removeDotSegments(r.path);
    t.query = r.query;
  } else {
    t.authority = b.authority;
    if (r.path === '') {
      t.path = b.path;
      t.query = r.query !== undefined ? r.query : b.query;
    } else {
      t.path = r.path.startsWith('/') ? removeDotSegments(r.path) : removeDotSegments(mergePaths(b, r.path));
      t.query = r.query;
    }
  }
  return recompose(t);
}

export {
  version,
  RDF_NS, RDFS_NS, OWL_NS, XSD_NS, LOG_NS,
  RDF_TYPE, RDF_FIRST, RDF_REST, RDF_NIL, RDF_LANG_STRING,
  XSD_STRING, XSD_BOOLEAN, XSD_INTEGER, XSD_DECIMAL, XSD_DOUBLE,
  OWL_SAME_AS, LOG_IMPLIES, LOG_IMPLIED_BY,
  LexError, N3SyntaxError, ResolutionError, UnsupportedConstruct, isParseFailure,
  setTraceWriter, traceWriteLine,
  Iri, Blank, Literal, DefaultGraph, DEFAULT_GRAPH, Var, Formula, Triple, Quad,
  internIri, literal, quad,
  termKey, quadKey, compareStrings, compareQuads, termsEqual,
  hasScheme, removeDotSegments, resolveIriRef,
};
export type {
  SourcePosition, ParseFailure, TraceWriter,
  Subject, Predicate, ObjectTerm, GraphName, RdfTerm, N3Term,
};
