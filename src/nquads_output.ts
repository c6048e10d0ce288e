import { DEFAULT_GRAPH, UnsupportedConstruct, XSD_STRING } from './core';
import type { Blank, GraphName, N3Term, Quad, RdfTerm } from './core';
import type { QuadStore } from './store';

// ===========================================================================
// Escaping
// ===========================================================================

const IRI_FORBIDDEN = '<>"{}|^`\\';

function hex(cp: number, width: number): string {
  return cp.toString(16).toUpperCase().padStart(width, '0');
}

function uchar(cp: number): string {
  return cp <= 0xffff ? '\\u' + hex(cp, 4) : '\\U' + hex(cp, 8);
}

/** Literal body for a double-quoted N-Quads string; output is pure ASCII. */
function escapeLiteralValue(value: string): string {
  let out = '';
  for (const ch of value) {
    const cp = ch.codePointAt(0) ?? 0;
    switch (ch) {
      case '"':
        out += '\\"';
        break;
      case '\\':
        out += '\\\\';
        break;
      case '\n':
        out += '\\n';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\t':
        out += '\\t';
        break;
      default:
        out += cp < 0x20 || cp >= 0x7f ? uchar(cp) : ch;
    }
  }
  return out;
}

const HEX_RE = /^[0-9A-Fa-f]$/;

/** IRIREF body; a '%' that does not start a %XX sequence is written as \u0025. */
function escapeIri(iri: string): string {
  const chars = Array.from(iri);
  let out = '';
  chars.forEach((ch, i) => {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp <= 0x20 || IRI_FORBIDDEN.includes(ch)) {
      throw new UnsupportedConstruct('iri', `IRI <${iri}> contains ${JSON.stringify(ch)}, which an IRIREF cannot carry`);
    }
    if (ch === '%' && !(HEX_RE.test(chars[i + 1] ?? '') && HEX_RE.test(chars[i + 2] ?? ''))) {
      out += uchar(cp);
    } else {
      out += cp >= 0x7f ? uchar(cp) : ch;
    }
  });
  return out;
}

// ===========================================================================
// Blank node relabelling
// ===========================================================================

/** Hands out _:b0, _:b1, ... in order of first use. */
class BlankLabeler {
  private readonly labels = new Map<string, string>();

  label(b: Blank): string {
    let l = this.labels.get(b.label);
    if (l === undefined) {
      l = `b${this.labels.size}`;
      this.labels.set(b.label, l);
    }
    return l;
  }
}

// ===========================================================================
// Terms and quads
// ===========================================================================

function termToNQuads(t: RdfTerm | N3Term, labels: BlankLabeler): string {
  switch (t.termType) {
    case 'Iri':
      return `<${escapeIri(t.value)}>`;
    case 'Blank':
      return `_:${labels.label(t)}`;
    case 'Literal': {
      const body = `"${escapeLiteralValue(t.value)}"`;
      if (t.language !== null) return `${body}@${t.language}`;
      if (t.datatype.value === XSD_STRING) return body;
      return `${body}^^<${escapeIri(t.datatype.value)}>`;
    }
    case 'DefaultGraph':
      return '';
    case 'Var':
      throw new UnsupportedConstruct('variable', `Variable ?${t.name} cannot be written as N-Quads`);
    case 'Formula':
      throw new UnsupportedConstruct('formula', 'Quoted formulas cannot be written as N-Quads');
  }
}

function quadToNQuads(q: Quad, labels: BlankLabeler = new BlankLabeler(), withGraph = true): string {
  const s = termToNQuads(q.subject, labels);
  const p = termToNQuads(q.predicate, labels);
  const o = termToNQuads(q.object, labels);
  const g = withGraph ? termToNQuads(q.graph, labels) : '';
  return g ? `${s} ${p} ${o} ${g} .` : `${s} ${p} ${o} .`;
}

/** One line per quad, canonical order, blank nodes relabelled in order of appearance. */
function serializeNQuads(store: QuadStore): string[] {
  const labels = new BlankLabeler();
  return store.quads().map((q) => quadToNQuads(q, labels));
}

/** The quads of one graph (default graph unless given) as N-Triples lines. */
function serializeNTriples(store: QuadStore, graph: GraphName = DEFAULT_GRAPH): string[] {
  const labels = new BlankLabeler();
  return store.quads(graph).map((q) => quadToNQuads(q, labels, false));
}

function joinLines(lines: string[]): string {
  return lines.length ? lines.join('\n') + '\n' : '';
}

function writeNQuads(store: QuadStore): string {
  return joinLines(serializeNQuads(store));
}

function writeNTriples(store: QuadStore, graph: GraphName = DEFAULT_GRAPH): string {
  return joinLines(serializeNTriples(store, graph));
}

export {
  escapeLiteralValue, escapeIri, BlankLabeler,
  termToNQuads, quadToNQuads, serializeNQuads, serializeNTriples, writeNQuads, writeNTriples,
};
