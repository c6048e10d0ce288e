import { compareQuads, compareStrings, quadKey, termKey } from './core';
import type { GraphName, ObjectTerm, Predicate, Quad, RdfTerm, Subject } from './core';

// ===========================================================================
// Quad store
// ===========================================================================
//
//   - byKey:   Map<quadKey, Quad>      set semantics, insertion order
//   - byGraph: Map<graphKey, Set<quadKey>>   per-graph view, kept in step with byKey
//   - sorted:  canonical order cache, dropped on every mutation

class QuadStore implements Iterable<Quad> {
  private readonly byKey = new Map<string, Quad>();
  private readonly byGraph = new Map<string, { graph: GraphName; keys: Set<string> }>();
  private sorted: Quad[] | null = null;

  constructor(quads: Iterable<Quad> = []) {
    this.addAll(quads);
  }

  get size(): number {
    return this.byKey.size;
  }

  /** True when the quad was not present before. */
  add(q: Quad): boolean {
    const key = quadKey(q);
    if (this.byKey.has(key)) return false;
    this.byKey.set(key, q);

    const gk = termKey(q.graph);
    let entry = this.byGraph.get(gk);
    if (!entry) {
      entry = { graph: q.graph, keys: new Set() };
      this.byGraph.set(gk, entry);
    }
    entry.keys.add(key);
    this.sorted = null;
    return true;
  }

  addAll(quads: Iterable<Quad>): number {
    let added = 0;
    for (const q of quads) if (this.add(q)) added++;
    return added;
  }

  contains(q: Quad): boolean {
    return this.byKey.has(quadKey(q));
  }

  remove(q: Quad): boolean {
    const key = quadKey(q);
    if (!this.byKey.delete(key)) return false;
    const gk = termKey(q.graph);
    const entry = this.byGraph.get(gk);
    if (entry) {
      entry.keys.delete(key);
      if (entry.keys.size === 0) this.byGraph.delete(gk);
    }
    this.sorted = null;
    return true;
  }

  /** Distinct graph names in canonical order; the default graph is DEFAULT_GRAPH. */
  graphs(): GraphName[] {
    return [...this.byGraph.entries()].sort((a, b) => compareStrings(a[0], b[0])).map(([, e]) => e.graph);
  }

  /** Quads in canonical order, optionally restricted to one graph. */
  quads(graph?: GraphName): Quad[] {
    if (!this.sorted) this.sorted = [...this.byKey.values()].sort(compareQuads);
    if (graph === undefined) return this.sorted.slice();
    const gk = termKey(graph);
    return this.sorted.filter((q) => termKey(q.graph) === gk);
  }

  match(
    subject?: Subject | null,
    predicate?: Predicate | null,
    object?: ObjectTerm | null,
    graph?: GraphName | null,
  ): Quad[] {
    const want = (t: RdfTerm | null | undefined): string | null => (t === null || t === undefined ? null : termKey(t));
    const [s, p, o, g] = [want(subject), want(predicate), want(object), want(graph)];
    return this.quads().filter(
      (q) =>
        (s === null || termKey(q.subject) === s) &&
        (p === null || termKey(q.predicate) === p) &&
        (o === null || termKey(q.object) === o) &&
        (g === null || termKey(q.graph) === g),
    );
  }

  /** Insertion order. */
  [Symbol.iterator](): Iterator<Quad> {
    return this.byKey.values();
  }
}

// ===========================================================================
// Isomorphism (equality up to blank node renaming)
// ===========================================================================

function isBlankTerm(t: RdfTerm): boolean {
  return t.termType === 'Blank';
}

function hasBlank(q: Quad): boolean {
  return isBlankTerm(q.subject) || isBlankTerm(q.object) || isBlankTerm(q.graph);
}

// Binds blank labels of `a` to labels of `b`, both directions, so the mapping stays a bijection.
// `trail` lists the `a` labels in binding order; backtracking unwinds it to a mark.
interface BlankMapping {
  forward: Map<string, string>;
  backward: Map<string, string>;
  trail: string[];
}

function matchTerm(a: RdfTerm, b: RdfTerm, m: BlankMapping): boolean {
  if (a.termType === 'Blank' && b.termType === 'Blank') {
    const bound = m.forward.get(a.label);
    if (bound !== undefined) return bound === b.label;
    if (m.backward.has(b.label)) return false;
    m.forward.set(a.label, b.label);
    m.backward.set(b.label, a.label);
    m.trail.push(a.label);
    return true;
  }
  if (a.termType === 'Blank' || b.termType === 'Blank') return false;
  return termKey(a) === termKey(b);
}

function undoTo(m: BlankMapping, mark: number): void {
  while (m.trail.length > mark) {
    const a = m.trail.pop();
    if (a === undefined) return;
    const b = m.forward.get(a);
    m.forward.delete(a);
    if (b !== undefined) m.backward.delete(b);
  }
}

/** Blank-free part of a quad; only quads of equal shape can be paired. */
function groundShape(q: Quad): string {
  const part = (t: RdfTerm) => (isBlankTerm(t) ? '_' : termKey(t));
  return part(q.graph) + '\t' + part(q.subject) + '\t' + termKey(q.predicate) + '\t' + part(q.object);
}

type BlankPosition = 'graph' | 'subject' | 'object';
const BLANK_POSITIONS: readonly BlankPosition[] = ['subject', 'object', 'graph'];

function blankLabels(q: Quad): string[] {
  const labels: string[] = [];
  for (const pos of BLANK_POSITIONS) {
    const t = q[pos];
    if (t.termType === 'Blank') labels.push(t.label);
  }
  return labels;
}

function pushTo<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const bucket = index.get(key);
  if (bucket) bucket.push(value);
  else index.set(key, [value]);
}

// Quads reachable through shared blank nodes come right after each other, so
// that most quads are tried with a blank node already bound.
function connectedOrder(xs: Quad[], bucketSize: (q: Quad) => number): Quad[] {
  const byLabel = new Map<string, Quad[]>();
  for (const x of xs) for (const label of blankLabels(x)) pushTo(byLabel, label, x);

  const seeds = [...xs].sort((p, q) => bucketSize(p) - bucketSize(q));
  const placed = new Set<Quad>();
  const seen = new Set<string>();
  const order: Quad[] = [];
  for (const seed of seeds) {
    if (placed.has(seed)) continue;
    const queue = [seed];
    for (let head = 0; head < queue.length; head++) {
      const x = queue[head];
      if (placed.has(x)) continue;
      placed.add(x);
      order.push(x);
      for (const label of blankLabels(x)) {
        if (seen.has(label)) continue;
        seen.add(label);
        for (const next of byLabel.get(label) ?? []) if (!placed.has(next)) queue.push(next);
      }
    }
  }
  return order;
}

interface Frame {
  x: Quad;
  options: Quad[];
  next: number;
  mark: number;
  chosen: boolean;
}

/**
 * True when `a` and `b` hold the same quads up to a bijective renaming of
 * blank nodes. Quads without blank nodes must match exactly; the rest are
 * matched by backtracking over an explicit stack, with the candidates for a
 * quad narrowed through any of its blank nodes that is already bound.
 */
function isomorphic(a: QuadStore, b: QuadStore): boolean {
  if (a.size !== b.size) return false;

  const xs: Quad[] = [];
  for (const q of a) {
    if (!hasBlank(q)) {
      if (!b.contains(q)) return false;
    } else {
      xs.push(q);
    }
  }

  const byShape = new Map<string, Quad[]>();
  // position, bound label and shape -> quads of `b`
  const byBlank = new Map<string, Quad[]>();
  let blankQuads = 0;
  for (const y of b) {
    if (!hasBlank(y)) continue;
    blankQuads++;
    const shape = groundShape(y);
    pushTo(byShape, shape, y);
    for (const pos of BLANK_POSITIONS) {
      const t = y[pos];
      if (t.termType === 'Blank') pushTo(byBlank, `${pos}\t${t.label}\t${shape}`, y);
    }
  }
  if (xs.length !== blankQuads) return false;

  const bucketSize = (x: Quad) => byShape.get(groundShape(x))?.length ?? 0;
  if (xs.some((x) => bucketSize(x) === 0)) return false;
  if (xs.length === 0) return true;

  const m: BlankMapping = { forward: new Map(), backward: new Map(), trail: [] };
  const order = connectedOrder(xs, bucketSize);

  function candidatesFor(x: Quad): Quad[] {
    const shape = groundShape(x);
    for (const pos of BLANK_POSITIONS) {
      const t = x[pos];
      if (t.termType !== 'Blank') continue;
      const bound = m.forward.get(t.label);
      if (bound !== undefined) return byBlank.get(`${pos}\t${bound}\t${shape}`) ?? [];
    }
    return byShape.get(shape) ?? [];
  }

  function open(x: Quad): Frame {
    return { x, options: candidatesFor(x), next: 0, mark: m.trail.length, chosen: false };
  }

  // A bijection maps distinct quads to distinct quads, so no `b` quad is paired twice.
  const stack: Frame[] = [open(order[0])];
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.chosen) {
      undoTo(m, frame.mark);
      frame.chosen = false;
    }
    while (frame.next < frame.options.length) {
      const y = frame.options[frame.next++];
      const { x } = frame;
      if (matchTerm(x.graph, y.graph, m) && matchTerm(x.subject, y.subject, m) && matchTerm(x.object, y.object, m)) {
        frame.chosen = true;
        break;
      }
      undoTo(m, frame.mark);
    }
    if (!frame.chosen) {
      stack.pop();
      continue;
    }
    if (stack.length === order.length) return true;
    stack.push(open(order[stack.length]));
  }
  return false;
}

export { QuadStore, isomorphic };
