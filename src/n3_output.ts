import { RDF_TYPE, XSD_BOOLEAN, XSD_DECIMAL, XSD_DOUBLE, XSD_INTEGER, XSD_STRING, termKey } from './core';
import type { GraphName, ParseFailure, Quad, RdfTerm } from './core';
import { PrefixEnv, isPnChars, isPnCharsBase, isPnCharsU } from './n3_input';
import { BlankLabeler, escapeIri } from './nquads_output';
import type { QuadStore } from './store';

// ===========================================================================
// Pretty printing as Turtle / TriG
// ===========================================================================

interface TurtleOptions {
  /** Prefixes offered to the writer; only the ones used are emitted. */
  prefixes?: Record<string, string> | PrefixEnv;
}

const SHORTHAND: Record<string, RegExp> = {
  [XSD_INTEGER]: /^[+-]?[0-9]+$/,
  [XSD_DECIMAL]: /^[+-]?[0-9]*\.[0-9]+$/,
  [XSD_DOUBLE]: /^[+-]?(?:[0-9]+\.[0-9]*|\.?[0-9]+)[eE][+-]?[0-9]+$/,
  [XSD_BOOLEAN]: /^(?:true|false)$/,
};

function isPrefixName(p: string): boolean {
  const chars = Array.from(p);
  if (chars.length === 0) return true;
  if (!isPnCharsBase(chars[0]) || chars[chars.length - 1] === '.') return false;
  return chars.every((c) => isPnChars(c) || c === '.');
}

// Conservative PN_LOCAL: no escapes, no percent sequences.
function isPlainLocalName(local: string): boolean {
  const chars = Array.from(local);
  if (chars.length === 0) return true;
  const first = chars[0];
  if (!(isPnCharsU(first) || first === ':' || (first >= '0' && first <= '9'))) return false;
  if (chars[chars.length - 1] === '.') return false;
  return chars.every((c) => isPnChars(c) || c === '.' || c === ':');
}

function toPrefixEnv(prefixes: TurtleOptions['prefixes']): PrefixEnv {
  if (prefixes instanceof PrefixEnv) return prefixes;
  return new PrefixEnv(prefixes ?? {});
}

function escapeTurtleString(value: string): string {
  const long = /[\n\r]/.test(value);
  let out = '';
  for (const ch of value) {
    if (ch === '\\') out += '\\\\';
    else if (ch === '"') out += '\\"';
    else if (ch === '\r') out += '\\r';
    else if (ch === '\n') out += long ? '\n' : '\\n';
    else if (ch === '\t') out += '\\t';
    else if ((ch.codePointAt(0) ?? 0) < 0x20) out += '\\u' + (ch.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0');
    else out += ch;
  }
  return long ? `"""${out}"""` : `"${out}"`;
}

class TurtleWriter {
  private readonly pref: PrefixEnv;
  private readonly labels = new BlankLabeler();
  private readonly used = new Set<string>();

  constructor(prefixes: TurtleOptions['prefixes']) {
    const env = toPrefixEnv(prefixes);
    this.pref = new PrefixEnv();
    for (const [p, ns] of env.map) if (ns && isPrefixName(p)) this.pref.set(p, ns);
  }

  iri(value: string): string {
    const q = this.pref.shrinkIri(value);
    if (q !== null && isPlainLocalName(q.local)) {
      this.used.add(q.prefix);
      return `${q.prefix}:${q.local}`;
    }
    return `<${escapeIri(value)}>`;
  }

  term(t: RdfTerm): string {
    switch (t.termType) {
      case 'Iri':
        return this.iri(t.value);
      case 'Blank':
        return `_:${this.labels.label(t)}`;
      case 'Literal': {
        const shorthand = SHORTHAND[t.datatype.value];
        if (shorthand && shorthand.test(t.value)) return t.value;
        const body = escapeTurtleString(t.value);
        if (t.language !== null) return `${body}@${t.language}`;
        if (t.datatype.value === XSD_STRING) return body;
        return `${body}^^${this.iri(t.datatype.value)}`;
      }
      case 'DefaultGraph':
        return '';
    }
  }

  /** Subjects grouped with ';', objects with ','. Quads must be in canonical order. */
  block(quads: Quad[], indent: string): string[] {
    const out: string[] = [];
    let i = 0;
    while (i < quads.length) {
      const subject = quads[i].subject;
      const sk = termKey(subject);
      const preds: string[] = [];
      while (i < quads.length && termKey(quads[i].subject) === sk) {
        const predicate = quads[i].predicate;
        const pk = termKey(predicate);
        const objects: string[] = [];
        while (i < quads.length && termKey(quads[i].subject) === sk && termKey(quads[i].predicate) === pk) {
          objects.push(this.term(quads[i].object));
          i++;
        }
        const verb = predicate.value === RDF_TYPE ? 'a' : this.term(predicate);
        preds.push(`${verb} ${objects.join(', ')}`);
      }
      const head = `${indent}${this.term(subject)} `;
      const cont = indent + '    ';
      out.push(head + preds.join(` ;\n${cont}`) + ' .');
    }
    return out;
  }

  prefixLines(): string[] {
    return [...this.used]
      .sort()
      .map((p) => `@prefix ${p}: <${escapeIri(this.pref.map.get(p) ?? '')}> .`);
  }
}

function assemble(writer: TurtleWriter, body: string[]): string {
  const header = writer.prefixLines();
  const parts = [...(header.length ? [header.join('\n'), ''] : []), ...body];
  return parts.length ? parts.join('\n') + '\n' : '';
}

/** Turtle for one graph of the store (the default graph unless given). */
function writeTurtle(store: QuadStore, options: TurtleOptions & { graph?: GraphName } = {}): string {
  const writer = new TurtleWriter(options.prefixes);
  const quads = options.graph === undefined ? store.quads().filter((q) => q.graph.termType === 'DefaultGraph') : store.quads(options.graph);
  return assemble(writer, writer.block(quads, ''));
}

/** TriG: default graph triples at top level, one `label { ... }` block per named graph. */
function writeTriG(store: QuadStore, options: TurtleOptions = {}): string {
  const writer = new TurtleWriter(options.prefixes);
  const body: string[] = [];
  for (const graph of store.graphs()) {
    const quads = store.quads(graph);
    if (graph.termType === 'DefaultGraph') {
      body.push(...writer.block(quads, ''));
    } else {
      body.push(`${writer.term(graph)} {`, ...writer.block(quads, '    '), '}');
    }
  }
  return assemble(writer, body);
}

// ===========================================================================
// Diagnostics
// ===========================================================================

function formatParseError(err: ParseFailure, text: string, path?: string): string {
  const label = path ? String(path) : '<input>';
  if (!err.position) return `${err.name} in ${label}: ${err.detail}`;
  const { line, column } = err.position;
  const lines = text.split(/\r\n|\n|\r/);
  const lineText = lines[line - 1] ?? '';
  const caret = ' '.repeat(Math.max(0, column - 1)) + '^';
  return `${err.name} in ${label}:${line}:${column}: ${err.detail}\n${lineText}\n${caret}`;
}

export { writeTurtle, writeTriG, escapeTurtleString, formatParseError };
export type { TurtleOptions };
