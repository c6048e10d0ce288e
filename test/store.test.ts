import { describe, expect, it } from 'vitest';

import { Blank, DEFAULT_GRAPH, internIri, literal, quad, quadKey } from '../src/core';
import { QuadStore, isomorphic } from '../src/store';

const s = internIri('http://example.org/s');
const p = internIri('http://example.org/p');
const q = internIri('http://example.org/q');
const g = internIri('http://example.org/g');

describe('QuadStore', () => {
  it('adds a quad once', () => {
    const store = new QuadStore();
    const first = store.add(quad(s, p, literal('x')));
    const canonical = store.quads().map(quadKey);
    const second = store.add(quad(s, p, literal('x')));

    expect([first, second]).toEqual([true, false]);
    expect(store.quads().map(quadKey)).toEqual(canonical);
    expect(store.size).toEqual(1);
  });

  it('orders quads canonically whatever the insertion order', () => {
    const quads = [
      quad(s, q, literal('b')),
      quad(s, p, literal('a'), g),
      quad(new Blank('n'), p, s),
      quad(s, p, literal('a')),
    ];
    const forward = new QuadStore(quads);
    const backward = new QuadStore([...quads].reverse());

    expect(forward.quads().map(quadKey)).toEqual([
      '\t<http://example.org/s>\t<http://example.org/p>\t"a"',
      '\t<http://example.org/s>\t<http://example.org/q>\t"b"',
      '\t_:n\t<http://example.org/p>\t<http://example.org/s>',
      '<http://example.org/g>\t<http://example.org/s>\t<http://example.org/p>\t"a"',
    ]);
    expect(backward.quads().map(quadKey)).toEqual(forward.quads().map(quadKey));
  });

  it('iterates in insertion order', () => {
    const a = quad(s, q, literal('b'));
    const b = quad(s, p, literal('a'));

    expect([...new QuadStore([a, b])]).toEqual([a, b]);
  });

  it('lists graphs with the default graph first', () => {
    const store = new QuadStore([quad(s, p, s, g), quad(s, p, s)]);

    expect(store.graphs()).toEqual([DEFAULT_GRAPH, g]);
    expect(store.quads(g)).toEqual([quad(s, p, s, g)]);
  });

  it('removes quads and drops empty graphs', () => {
    const store = new QuadStore([quad(s, p, s, g), quad(s, p, s)]);

    expect(store.remove(quad(s, p, s, g))).toBe(true);
    expect(store.remove(quad(s, p, s, g))).toBe(false);
    expect(store.contains(quad(s, p, s))).toBe(true);
    expect(store.graphs()).toEqual([DEFAULT_GRAPH]);
  });

  it('matches with wildcards', () => {
    const store = new QuadStore([quad(s, p, literal('1')), quad(s, q, literal('2')), quad(s, p, literal('3'), g)]);

    expect(store.match(null, p)).toHaveLength(2);
    expect(store.match(undefined, p, null, DEFAULT_GRAPH)).toEqual([quad(s, p, literal('1'))]);
    expect(store.match(s, null, literal('2'))).toEqual([quad(s, q, literal('2'))]);
  });

  it('counts new quads in addAll', () => {
    const store = new QuadStore([quad(s, p, s)]);

    expect(store.addAll([quad(s, p, s), quad(s, q, s)])).toEqual(1);
  });
});

describe('isomorphic', () => {
  it('ignores blank node labels', () => {
    const a = new QuadStore([quad(new Blank('x'), p, new Blank('y')), quad(new Blank('y'), q, literal('v'))]);
    const b = new QuadStore([quad(new Blank('m'), p, new Blank('n')), quad(new Blank('n'), q, literal('v'))]);

    expect(isomorphic(a, b)).toBe(true);
  });

  it('keeps the renaming a bijection', () => {
    const a = new QuadStore([quad(new Blank('a'), p, new Blank('b'))]);
    const b = new QuadStore([quad(new Blank('c'), p, new Blank('c'))]);

    expect(isomorphic(a, b)).toBe(false);
  });

  it('requires ground quads to match exactly', () => {
    const a = new QuadStore([quad(s, p, literal('1'))]);
    const b = new QuadStore([quad(s, p, literal('1', 'en'))]);

    expect(isomorphic(a, b)).toBe(false);
  });

  it('follows long blank node chains without deep recursion', () => {
    const chain = (prefix: string, length: number, end: string) =>
      new QuadStore([
        ...Array.from({ length }, (_, i) => quad(new Blank(`${prefix}${i}`), p, new Blank(`${prefix}${i + 1}`))),
        quad(new Blank(`${prefix}${length}`), q, literal(end)),
      ]);

    expect(isomorphic(chain('a', 20000, 'end'), chain('z', 20000, 'end'))).toBe(true);
    expect(isomorphic(chain('a', 20000, 'end'), chain('z', 20000, 'other'))).toBe(false);
  });

  it('backtracks over ambiguous candidates', () => {
    // two chains of the same shape; only one pairing of the heads works
    const a = new QuadStore([
      quad(new Blank('a1'), p, new Blank('a2')),
      quad(new Blank('a2'), q, literal('end1')),
      quad(new Blank('b1'), p, new Blank('b2')),
      quad(new Blank('b2'), q, literal('end2')),
    ]);
    const b = new QuadStore([
      quad(new Blank('y1'), p, new Blank('y2')),
      quad(new Blank('y2'), q, literal('end2')),
      quad(new Blank('x1'), p, new Blank('x2')),
      quad(new Blank('x2'), q, literal('end1')),
    ]);

    expect(isomorphic(a, b)).toBe(true);
  });
});
