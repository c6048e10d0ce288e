import { describe, expect, it } from 'vitest';

import {
  DEFAULT_GRAPH, N3SyntaxError, ResolutionError, UnsupportedConstruct,
  LOG_IMPLIES, OWL_SAME_AS, RDF_FIRST, RDF_NIL, RDF_REST, RDF_TYPE,
  XSD_BOOLEAN, XSD_DECIMAL, XSD_DOUBLE, XSD_INTEGER,
  internIri, setTraceWriter, termKey,
} from '../src/core';
import type { Quad } from '../src/core';
import { parse, writeNQuads } from '../src/n3quads';

const X = 'http://x/';
const RDF = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';

function nquads(text: string, base = X): string {
  return writeNQuads(parse(text, { baseIri: base }).store);
}

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected an error');
}

describe('Parser directives', () => {
  it('applies a prefix redefinition only to later statements', () => {
    const text = [
      '@prefix ex: <http://example.org/a#> .',
      'ex:s ex:p ex:o .',
      '@prefix ex: <http://example.org/b#> .',
      'ex:s ex:p ex:o .',
    ].join('\n');

    expect(writeNQuads(parse(text).store)).toEqual(
      '<http://example.org/a#s> <http://example.org/a#p> <http://example.org/a#o> .\n' +
        '<http://example.org/b#s> <http://example.org/b#p> <http://example.org/b#o> .\n',
    );
  });

  it('resolves relative IRIs against the base in force', () => {
    const text = [
      '@base <http://example.org/> .',
      '<foo> <p> <o> .',
      '@base <http://example.org/sub/> .',
      '<bar> <p> <o> .',
    ].join('\n');
    const { store } = parse(text);

    expect(store.quads().map((q) => q.subject.value)).toEqual(['http://example.org/foo', 'http://example.org/sub/bar']);
    expect(store.quads().map((q) => q.predicate.value)).toEqual(['http://example.org/p', 'http://example.org/sub/p']);
  });

  it('resolves a relative @base against the previous one', () => {
    const { store } = parse('@base <http://example.org/a/> .\n@base <b/> .\n<c> <p> <o> .');

    expect(store.quads()[0].subject.value).toEqual('http://example.org/a/b/c');
  });

  it('accepts SPARQL-style PREFIX and BASE in any case', () => {
    const text = 'PREFIX ex: <http://example.org/>\nbase <http://base.org/>\nex:s ex:p <o> .';

    expect(writeNQuads(parse(text).store)).toEqual('<http://example.org/s> <http://example.org/p> <http://base.org/o> .\n');
  });

  it('takes initial prefixes and base from options', () => {
    const { store, context } = parse('ex:s ex:p <o> .', { prefixes: { ex: 'http://example.org/' }, baseIri: X });

    expect(termKey(store.quads()[0].object)).toEqual('<http://x/o>');
    expect(context.prefixes.map.get('ex')).toEqual('http://example.org/');
    expect(context.statementCount).toEqual(1);
  });

  it('fails on an undeclared prefix', () => {
    expect(() => parse('ex:foo <http://x/p> <http://x/o> .')).toThrow(ResolutionError);
    expect(() => parse('ex:foo <http://x/p> <http://x/o> .')).toThrow("Undeclared prefix 'ex:' at line 1, column 1");
  });

  it('fails on a relative IRI without a base', () => {
    expect(() => parse('<foo> <http://x/p> <http://x/o> .')).toThrow(
      'Cannot resolve relative IRI <foo> without a base IRI at line 1, column 1',
    );
  });
});

describe('Parser terms', () => {
  it('expands a to rdf:type', () => {
    expect(nquads('<s> a <C> .')).toEqual(`<http://x/s> <${RDF_TYPE}> <http://x/C> .\n`);
  });

  it('shares labelled blank nodes within a document', () => {
    const quads = parse('_:b0 <p> <o1> .\n_:b0 <p> <o2> .', { baseIri: X }).store.quads();

    expect(quads).toHaveLength(2);
    expect(termKey(quads[0].subject)).toEqual(termKey(quads[1].subject));
  });

  it('gives every [] a fresh blank node', () => {
    const quads = parse('[] <p> <o1> .\n[] <p> <o2> .', { baseIri: X }).store.quads();

    expect(quads).toHaveLength(2);
    expect(termKey(quads[0].subject)).not.toEqual(termKey(quads[1].subject));
  });

  it('never reuses blank nodes across documents', () => {
    const a = parse('_:x <p> <o> .', { baseIri: X }).store.quads()[0];
    const b = parse('_:x <p> <o> .', { baseIri: X }).store.quads()[0];

    expect(termKey(a.subject)).not.toEqual(termKey(b.subject));
  });

  it('decodes escapes in language-tagged literals', () => {
    const { store } = parse(String.raw`<http://x/s> <http://x/p> "caf\u00e9"@en .`);
    const object = store.quads()[0].object;

    expect(object.termType).toEqual('Literal');
    expect(object).toMatchObject({ value: 'caf\u00e9', language: 'en' });
    expect(writeNQuads(store)).toEqual('<http://x/s> <http://x/p> "caf\\u00E9"@en .\n');
  });

  it('types numeric and boolean shorthand', () => {
    const { store } = parse('<s> <p> 1, 2.5, 1e3, true .', { baseIri: X });
    const typed = store.quads().map((q) => (q.object.termType === 'Literal' ? [q.object.value, q.object.datatype.value] : []));

    expect(typed).toEqual([
      ['1', XSD_INTEGER],
      ['1e3', XSD_DOUBLE],
      ['2.5', XSD_DECIMAL],
      ['true', XSD_BOOLEAN],
    ]);
  });

  it('desugars a collection into two cells ending in rdf:nil', () => {
    const { store, context } = parse('<s> <p> ( <a> <b> ) .', { baseIri: X });

    expect(context.blankCounter).toEqual(2);
    expect(writeNQuads(store)).toEqual(
      [
        '<http://x/s> <http://x/p> _:b0 .',
        `_:b0 <${RDF_FIRST}> <http://x/a> .`,
        `_:b0 <${RDF_REST}> _:b1 .`,
        `_:b1 <${RDF_FIRST}> <http://x/b> .`,
        `_:b1 <${RDF_REST}> <${RDF_NIL}> .`,
        '',
      ].join('\n'),
    );
  });

  it('reads an empty collection as rdf:nil', () => {
    expect(nquads('<s> <p> () .')).toEqual(`<http://x/s> <http://x/p> <${RDF}nil> .\n`);
  });

  it('nests blank node property lists', () => {
    const { store } = parse('[ <p> [ <q> "x" ] ] .', { baseIri: X });
    const [outer, inner] = store.match(null, internIri('http://x/p')).concat(store.match(null, internIri('http://x/q')));

    expect(store.size).toEqual(2);
    expect(termKey(outer.object)).toEqual(termKey(inner.subject));
  });

  it('allows repeated and trailing semicolons', () => {
    expect(parse('<s> <p> <o> ; ; <q> <o2> ; .', { baseIri: X }).store.size).toEqual(2);
  });

  it('collapses duplicate statements', () => {
    expect(parse('<s> <p> <o>, <o> .\n<s> <p> <o> .', { baseIri: X }).store.size).toEqual(1);
  });
});

describe('Parser errors', () => {
  it('reports the expected production and the token found', () => {
    const error = caught(() => parse('<http://x/s> <http://x/p> .'));

    expect(error).toBeInstanceOf(N3SyntaxError);
    expect(error).toMatchObject({
      expected: 'object',
      found: "'.'",
      detail: "Expected object, got '.'",
      position: { line: 1, column: 27 },
    });
  });

  it('requires the final dot', () => {
    expect(() => parse('<http://x/s> <http://x/p> <http://x/o>')).toThrow("Expected '.', got end of input");
  });

  it('rejects a literal with both a language tag and a datatype', () => {
    const error = caught(() =>
      parse('<http://x/s> <http://x/p> "a"@en^^<http://www.w3.org/2001/XMLSchema#string> .'),
    );

    expect(error).toBeInstanceOf(N3SyntaxError);
    expect(error).toHaveProperty('detail', 'A literal cannot have both a language tag (@...) and a datatype (^^...)');
  });

  it('rejects N3 syntax in Turtle', () => {
    expect(() => parse('?x <http://x/p> <http://x/o> .')).toThrow(N3SyntaxError);
    expect(() => parse('{ <http://x/s> <http://x/p> <http://x/o> } .')).toThrow("'{' is only allowed in N3");
  });

  it('rejects a literal predicate', () => {
    expect(() => parse('<http://x/s> "p" <http://x/o> .')).toThrow('Expected predicate, got "p"');
  });

  it('limits nesting depth', () => {
    const subjectVerb = '<http://x/s> <http://x/p> ';
    const collections = (depth: number) => subjectVerb + '('.repeat(depth) + ')'.repeat(depth) + ' .';
    const propertyLists = subjectVerb + '[ <http://x/p> '.repeat(300) + '<http://x/o>' + ' ]'.repeat(300) + ' .';

    expect(parse(collections(256)).store.size).toEqual(511);
    expect(() => parse(collections(300))).toThrow('Nesting deeper than 256 levels at line 1, column 283');
    expect(caught(() => parse(propertyLists))).toHaveProperty('detail', 'Nesting deeper than 256 levels');
  });

  it('inserts nothing from the statement that failed', () => {
    const seen: Quad[] = [];
    const text = '<http://x/a> <http://x/p> <http://x/o> .\n<http://x/b> <http://x/p> <http://x/o1>, <http://x/o2> <oops>';

    expect(() => parse(text, { onQuad: (q) => seen.push(q) })).toThrow(N3SyntaxError);
    expect(seen.map((q) => q.subject.value)).toEqual(['http://x/a']);
  });
});

describe('TriG', () => {
  const text = [
    '@prefix ex: <http://example.org/> .',
    'ex:g1 { ex:s ex:p ex:o }',
    'GRAPH ex:g2 { ex:s ex:p ex:o . ex:s ex:p ex:o2 . }',
    '{ ex:s ex:p ex:d }',
    'ex:s ex:p ex:top .',
  ].join('\n');

  it('puts graph blocks into named graphs', () => {
    const { store } = parse(text, { format: 'trig' });

    expect(store.size).toEqual(5);
    expect(store.graphs().map(termKey)).toEqual(['', '<http://example.org/g1>', '<http://example.org/g2>']);
    expect(store.quads(internIri('http://example.org/g2'))).toHaveLength(2);
    expect(store.quads(DEFAULT_GRAPH)).toHaveLength(2);
  });

  it('sends statements outside blocks to the graph option', () => {
    const g = internIri('http://example.org/target');
    const { store } = parse(text, { format: 'trig', graph: g });

    expect(store.graphs().map(termKey)).toEqual([
      '<http://example.org/g1>',
      '<http://example.org/g2>',
      '<http://example.org/target>',
    ]);
  });

  it('accepts blank graph labels', () => {
    const { store } = parse('_:g { <http://x/s> <http://x/p> <http://x/o> }\n[] { <http://x/s> <http://x/p> <http://x/o> }', {
      format: 'trig',
    });

    expect(store.graphs().map((g) => g.termType)).toEqual(['Blank', 'Blank']);
  });
});

describe('N3', () => {
  const prefix = '@prefix : <http://x/> .\n';

  it('maps N3 verbs onto RDF predicates', () => {
    const { store } = parse(prefix + ':a = :b .\n:c is :p of :d .\n:e has :q :f .', { format: 'n3' });

    expect(writeNQuads(store)).toEqual(
      `<http://x/a> <${OWL_SAME_AS}> <http://x/b> .\n` +
        '<http://x/d> <http://x/p> <http://x/c> .\n' +
        '<http://x/e> <http://x/q> <http://x/f> .\n',
    );
  });

  it('follows paths through fresh blank nodes', () => {
    const { store } = parse(prefix + ':a!:p :q :c .', { format: 'n3' });

    expect(writeNQuads(store)).toEqual('<http://x/a> <http://x/p> _:b0 .\n_:b0 <http://x/q> <http://x/c> .\n');
  });

  it('rejects formulas when projecting to quads', () => {
    const error = caught(() => parse(prefix + '{ :a :b :c } => { :a :d :c } .', { format: 'n3' }));

    expect(error).toBeInstanceOf(UnsupportedConstruct);
    expect(error).toMatchObject({ construct: 'formula', position: { line: 2, column: 1 } });
  });

  it('rejects literal subjects', () => {
    expect(() => parse(prefix + '"x" :p :o .', { format: 'n3' })).toThrow(
      'Literal "x" cannot be a subject at line 2, column 1',
    );
  });

  it('skips unsupported statements with a warning when asked to', () => {
    const lines: string[] = [];
    const previous = setTraceWriter((line) => lines.push(line));
    const text = prefix + ':a :b :c .\n{ :a :b :c } => { :a :d :c } .\n:e :f ?x .\n:g :h :i .';
    let size = 0;
    try {
      size = parse(text, { format: 'n3', onUnsupported: 'warn' }).store.size;
    } finally {
      setTraceWriter(previous);
    }

    expect(size).toEqual(2);
    expect(lines).toEqual([
      'Skipping statement at line 3, column 1: Quoted formulas { ... } cannot be represented as quads',
      'Skipping statement at line 4, column 1: Variable ?x cannot be represented as an RDF term',
    ]);
  });

  it('reads => as log:implies between plain terms', () => {
    const { store } = parse(prefix + ':a => :b .', { format: 'n3' });

    expect(store.quads()[0].predicate.value).toEqual(LOG_IMPLIES);
  });
});
