import * as fs from 'node:fs';
import { pathToFileURL } from 'node:url';
import { TextDecoder } from 'node:util';

import {
  version,
  LexError, N3SyntaxError, ResolutionError, UnsupportedConstruct, isParseFailure,
  setTraceWriter,
  Iri, Blank, Literal, DefaultGraph, DEFAULT_GRAPH, Quad,
  internIri, literal, quad, termKey, termsEqual, hasScheme, resolveIriRef,
} from './core';
import type { GraphName, ObjectTerm, ParseFailure, Predicate, RdfTerm, SourcePosition, Subject } from './core';
import { Lexer, Parser, PrefixEnv, lex } from './n3_input';
import type { InputFormat, ParseOptions, ParseResult } from './n3_input';
import { parseNQuads } from './nquads_input';
import { serializeNQuads, serializeNTriples, writeNQuads, writeNTriples } from './nquads_output';
import { formatParseError, writeTriG, writeTurtle } from './n3_output';
import type { TurtleOptions } from './n3_output';
import { QuadStore, isomorphic } from './store';

// ===========================================================================
// Library API
// ===========================================================================

type SourceFormat = InputFormat | 'nquads' | 'ntriples';

interface ConvertOptions extends Omit<ParseOptions, 'format'> {
  format?: SourceFormat;
}

/** Parse one Turtle / TriG / N3 document into a fresh store. */
function parse(input: string | Uint8Array, options: ParseOptions = {}): ParseResult {
  return new Parser(new Lexer(input), options).parseDocument();
}

/** Any supported input syntax, line-based ones included. */
function parseAny(input: string | Uint8Array, options: ConvertOptions = {}): ParseResult {
  const { format = 'turtle', ...rest } = options;
  if (format === 'nquads' || format === 'ntriples') {
    return parseNQuads(input, { format, graph: rest.graph, onQuad: rest.onQuad });
  }
  return parse(input, { ...rest, format });
}

function toNQuads(store: QuadStore): string {
  return writeNQuads(store);
}

/** Parse and write canonical N-Quads in one step. */
function convert(input: string | Uint8Array, options: ConvertOptions = {}): string {
  return writeNQuads(parseAny(input, options).store);
}

// ===========================================================================
// Command line: named-graph-to-nquads
// ===========================================================================

interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Uint8Array;
  readStdin: () => Uint8Array;
  writeFile: (path: string, text: string) => void;
}

const nodeIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readFile: (path) => fs.readFileSync(path),
  readStdin: () => fs.readFileSync(0),
  writeFile: (path, text) => fs.writeFileSync(path, text, { encoding: 'utf8' }),
};

const SOURCE_FORMATS: readonly SourceFormat[] = ['turtle', 'trig', 'n3', 'nquads', 'ntriples'];

const EXTENSION_FORMATS: Record<string, SourceFormat> = {
  '.ttl': 'turtle',
  '.turtle': 'turtle',
  '.trig': 'trig',
  '.n3': 'n3',
  '.nq': 'nquads',
  '.nt': 'ntriples',
};

type ValueFlag = 'graph' | 'base' | 'format' | 'output';

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '-g': 'graph',
  '--graph': 'graph',
  '-b': 'base',
  '--base': 'base',
  '-f': 'format',
  '--format': 'format',
  '-o': 'output',
  '--output': 'output',
};

function isSourceFormat(s: string): s is SourceFormat {
  return SOURCE_FORMATS.some((f) => f === s);
}

function formatForPath(path: string): SourceFormat {
  const dot = path.lastIndexOf('.');
  if (dot === -1) return 'turtle';
  return EXTENSION_FORMATS[path.slice(dot).toLowerCase()] ?? 'turtle';
}

// '-wg' -> '-w', '-g'; '--graph=x' -> '--graph', 'x'
function expandArgs(argv: readonly string[]): string[] {
  const out: string[] = [];
  for (const a of argv) {
    if (a.startsWith('--') && a.includes('=')) {
      const eq = a.indexOf('=');
      out.push(a.slice(0, eq), a.slice(eq + 1));
    } else if (a === '-' || !a.startsWith('-') || a.startsWith('--') || a.length === 2) {
      out.push(a);
    } else {
      for (const ch of a.slice(1)) out.push('-' + ch);
    }
  }
  return out;
}

function helpText(prog: string): string {
  return (
    `Usage: ${prog} [options] <file | ->\n\n` +
    `Convert Turtle, TriG or N3 to canonical N-Quads.\n\n` +
    `Options:\n` +
    `  -g, --graph <iri>         Put statements outside graph blocks into this named graph.\n` +
    `  -b, --base <iri>          Base IRI (default: the file: URL of the input; none for stdin).\n` +
    `  -f, --format <fmt>        turtle | trig | n3 | nquads | ntriples (default: by extension, else turtle).\n` +
    `  -o, --output <file>       Write to a file instead of stdout.\n` +
    `  -w, --warn-unsupported    Skip N3-only statements with a warning instead of failing.\n` +
    `  -h, --help                Show this help and exit.\n` +
    `  -v, --version             Print version and exit.\n`
  );
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Runs the converter and returns the process exit status (0 ok, 1 failure, 2 usage). */
function run(argv: readonly string[], io: CliIo = nodeIo, prog = 'named-graph-to-nquads'): number {
  const usageError = (message: string): number => {
    io.stderr(`Error: ${message}\n`);
    io.stderr(helpText(prog));
    return 2;
  };

  const args = expandArgs(argv);
  const values: Partial<Record<ValueFlag, string>> = {};
  const positional: string[] = [];
  let help = false;
  let showVersion = false;
  let warnUnsupported = false;

  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === '-' || !a.startsWith('-')) {
      positional.push(a);
      continue;
    }
    if (a === '--') {
      positional.push(...args.slice(i + 1));
      break;
    }
    if (a === '-h' || a === '--help') help = true;
    else if (a === '-v' || a === '--version') showVersion = true;
    else if (a === '-w' || a === '--warn-unsupported') warnUnsupported = true;
    else {
      const key = VALUE_FLAGS[a];
      if (key === undefined) return usageError(`unknown option ${a}`);
      const value = args[i + 1];
      if (value === undefined) return usageError(`option ${a} needs a value`);
      values[key] = value;
      i++;
    }
  }

  if (help) {
    io.stdout(helpText(prog));
    return 0;
  }
  if (showVersion) {
    io.stdout(`${prog} v${version}\n`);
    return 0;
  }
  if (positional.length !== 1) return usageError('expected exactly one input <file | ->');

  const path = positional[0];
  const fromStdin = path === '-';

  let format: SourceFormat = fromStdin ? 'turtle' : formatForPath(path);
  if (values.format !== undefined) {
    const f = values.format.toLowerCase();
    if (!isSourceFormat(f)) return usageError(`unknown format ${JSON.stringify(values.format)}`);
    format = f;
  }

  let graph: GraphName = DEFAULT_GRAPH;
  if (values.graph !== undefined) {
    if (!hasScheme(values.graph)) return usageError(`graph name must be an absolute IRI, got ${JSON.stringify(values.graph)}`);
    graph = internIri(values.graph);
  }

  const baseIri = values.base ?? (fromStdin ? null : pathToFileURL(path).href);
  if (baseIri !== null && !hasScheme(baseIri)) return usageError(`base must be an absolute IRI, got ${JSON.stringify(baseIri)}`);

  let bytes: Uint8Array;
  try {
    bytes = fromStdin ? io.readStdin() : io.readFile(path);
  } catch (e) {
    io.stderr(`Error reading file ${JSON.stringify(path)}: ${errorMessage(e)}\n`);
    return 1;
  }

  const label = fromStdin ? '<stdin>' : path;
  const previousTrace = warnUnsupported ? setTraceWriter((line) => io.stderr(`Warning: ${line}\n`)) : null;
  let output: string;
  try {
    output = convert(bytes, { format, graph, baseIri, onUnsupported: warnUnsupported ? 'warn' : 'error' });
  } catch (e) {
    if (!isParseFailure(e)) throw e;
    // lenient decode, only to show the offending line
    const text = new TextDecoder('utf-8').decode(bytes).replace(/^\uFEFF/, '');
    io.stderr(formatParseError(e, text, label) + '\n');
    return 1;
  } finally {
    if (previousTrace) setTraceWriter(previousTrace);
  }

  if (values.output !== undefined) {
    try {
      io.writeFile(values.output, output);
    } catch (e) {
      io.stderr(`Error writing file ${JSON.stringify(values.output)}: ${errorMessage(e)}\n`);
      return 1;
    }
  } else {
    io.stdout(output);
  }
  return 0;
}

function main(): void {
  process.exitCode = run(process.argv.slice(2));
}

export {
  version,
  parse, parseAny, parseNQuads, toNQuads, convert, run, main,
  lex, Lexer, Parser, PrefixEnv,
  QuadStore, isomorphic,
  serializeNQuads, serializeNTriples, writeNQuads, writeNTriples, writeTurtle, writeTriG, formatParseError,
  LexError, N3SyntaxError, ResolutionError, UnsupportedConstruct, isParseFailure, setTraceWriter,
  Iri, Blank, Literal, DefaultGraph, DEFAULT_GRAPH, Quad,
  internIri, literal, quad, termKey, termsEqual, resolveIriRef,
};
export type {
  SourceFormat, ConvertOptions, CliIo, InputFormat, ParseOptions, ParseResult, TurtleOptions,
  GraphName, ObjectTerm, ParseFailure, Predicate, RdfTerm, SourcePosition, Subject,
};
