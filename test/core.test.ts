import { describe, expect, it } from 'vitest';

import {
  DEFAULT_GRAPH, RDF_LANG_STRING, XSD_INTEGER, XSD_STRING,
  Blank, Literal, Quad, ResolutionError,
  compareQuads, internIri, literal, quad, resolveIriRef, setTraceWriter, termKey, traceWriteLine,
} from '../src/core';

describe('resolveIriRef', () => {
  const base = 'http://a/b/c/d;p?q';

  it.each([
    ['g', 'http://a/b/c/g'],
    ['./g', 'http://a/b/c/g'],
    ['g/', 'http://a/b/c/g/'],
    ['/g', 'http://a/g'],
    ['//g', 'http://g'],
    ['?y', 'http://a/b/c/d;p?y'],
    ['g?y', 'http://a/b/c/g?y'],
    ['#s', 'http://a/b/c/d;p?q#s'],
    ['', 'http://a/b/c/d;p?q'],
    ['.', 'http://a/b/c/'],
    ['..', 'http://a/b/'],
    ['../g', 'http://a/b/g'],
    ['../../../g', 'http://a/g'],
    ['g;x=1/../y', 'http://a/b/c/y'],
  ])('resolves %j', (ref, expected) => {
    expect(resolveIriRef(ref, base)).toEqual(expected);
  });

  it('never re-resolves an IRI with a scheme', () => {
    expect(resolveIriRef('urn:x:y/../z', base)).toEqual('urn:x:y/../z');
    expect(resolveIriRef('http:g', base)).toEqual('http:g');
  });

  it('resolves against a base ending in a slash', () => {
    expect(resolveIriRef('foo', 'http://example.org/')).toEqual('http://example.org/foo');
    expect(resolveIriRef('bar', 'http://example.org/sub/')).toEqual('http://example.org/sub/bar');
  });

  it('fails without a usable base', () => {
    expect(() => resolveIriRef('foo', null)).toThrow(ResolutionError);
    expect(() => resolveIriRef('foo', 'relative/')).toThrow('Base IRI <relative/> is not absolute');
  });
});

describe('literals', () => {
  it('defaults to xsd:string', () => {
    const l = literal('hello');

    expect(l.language).toBeNull();
    expect(l.datatype.value).toEqual(XSD_STRING);
    expect(termKey(l)).toEqual('"hello"');
  });

  it('lowercases language tags and types them rdf:langString', () => {
    const l = literal('chat', 'FR-be');

    expect(l.language).toEqual('fr-be');
    expect(l.datatype.value).toEqual(RDF_LANG_STRING);
    expect(termKey(l)).toEqual('"chat"@fr-be');
  });

  it('rejects a language tag together with another datatype', () => {
    expect(() => new Literal('x', 'en', internIri(XSD_STRING))).toThrow(TypeError);
    expect(() => new Literal('x', null, internIri(RDF_LANG_STRING))).toThrow(TypeError);
  });

  it('quotes the lexical form in its key', () => {
    expect(termKey(literal('a"b', internIri(XSD_INTEGER)))).toEqual(
      '"a\\"b"^^<http://www.w3.org/2001/XMLSchema#integer>',
    );
  });
});

describe('terms', () => {
  it('interns IRIs by value', () => {
    expect(internIri('http://example.org/x')).toBe(internIri('http://example.org/x'));
  });

  it('orders quads by graph first, default graph before named ones', () => {
    const s = internIri('http://example.org/s');
    const p = internIri('http://example.org/p');
    const named = quad(s, p, literal('1'), internIri('http://example.org/g'));
    const unnamed = new Quad(new Blank('z'), p, literal('2'));

    expect(unnamed.graph).toBe(DEFAULT_GRAPH);
    expect([named, unnamed].sort(compareQuads)).toEqual([unnamed, named]);
  });
});

describe('trace writer', () => {
  it('routes lines to the installed writer and hands back the previous one', () => {
    const lines: string[] = [];
    const previous = setTraceWriter((line) => lines.push(line));
    try {
      traceWriteLine('first');
      traceWriteLine('second');
    } finally {
      setTraceWriter(previous);
    }

    expect(lines).toEqual(['first', 'second']);
  });
});
