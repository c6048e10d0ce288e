import { DEFAULT_GRAPH, N3SyntaxError, ResolutionError, Quad, hasScheme, internIri, literal } from './core';
import type { GraphName, Iri, ObjectTerm, Subject } from './core';
import { Lexer, ParseContext, PrefixEnv } from './n3_input';
import type { ParseResult, Token } from './n3_input';
import { QuadStore } from './store';

interface NQuadsOptions {
  /** 'ntriples' rejects a fourth (graph) term. */
  format?: 'nquads' | 'ntriples';
  /** Graph for statements without a graph label. */
  graph?: GraphName;
  onQuad?: (q: Quad) => void;
}

/**
 * Line-based reader for N-Triples and N-Quads: absolute IRIs only, no
 * prefixes, no shorthand, one statement per line.
 */
function parseNQuads(input: string | Uint8Array, options: NQuadsOptions = {}): ParseResult {
  const { format = 'nquads', graph: defaultGraph = DEFAULT_GRAPH, onQuad } = options;
  const lexer = new Lexer(input);
  const context = new ParseContext(new PrefixEnv());
  const store = new QuadStore();

  let lookahead: Token | null = null;
  const peek = (): Token => (lookahead ??= lexer.next());
  const next = (): Token => {
    const tok = peek();
    lookahead = null;
    return tok;
  };

  function fail(expected: string, tok: Token): never {
    throw new N3SyntaxError(expected, tok.describe(), tok.position);
  }

  function iri(tok: Token): Iri {
    if (!hasScheme(tok.value)) {
      throw new ResolutionError(`Relative IRI <${tok.value}> is not allowed in ${format === 'nquads' ? 'N-Quads' : 'N-Triples'}`, tok.position);
    }
    return internIri(tok.value);
  }

  function subjectOrGraph(tok: Token, expected: string): Subject {
    if (tok.kind === 'IRIREF') return iri(tok);
    if (tok.kind === 'BLANK_NODE_LABEL') return context.labeledBlank(tok.value);
    return fail(expected, tok);
  }

  function object(tok: Token): ObjectTerm {
    if (tok.kind !== 'STRING_LITERAL') return subjectOrGraph(tok, 'object');
    const after = peek();
    if (after.kind === 'LANGTAG') {
      next();
      return literal(tok.value, after.value);
    }
    if (after.kind === 'HATHAT') {
      next();
      const dt = next();
      if (dt.kind !== 'IRIREF') fail('datatype IRI', dt);
      return literal(tok.value, iri(dt));
    }
    return literal(tok.value);
  }

  let lastLine = 0;
  while (peek().kind !== 'EOF') {
    const first = next();
    if (first.position.line === lastLine) fail('end of line', first);

    const s = subjectOrGraph(first, 'subject');
    const pTok = next();
    if (pTok.kind !== 'IRIREF') fail('predicate IRI', pTok);
    const p = iri(pTok);
    const o = object(next());

    let g = defaultGraph;
    if (format === 'nquads' && peek().kind !== 'DOT') g = subjectOrGraph(next(), "graph label or '.'");
    const dot = next();
    if (dot.kind !== 'DOT') fail("'.'", dot);
    lastLine = dot.position.line;

    const q = new Quad(s, p, o, g);
    context.statementCount += 1;
    if (store.add(q) && onQuad) onQuad(q);
  }

  return { store, context };
}

export { parseNQuads };
export type { NQuadsOptions };
