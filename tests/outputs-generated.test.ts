import { describe, expect, it } from 'vitest';
import { OutputProtocolError } from '../src/errors.js';
import { applyOutputCommand, type OutputDocument } from '../src/outputs/apply.js';
import { parseOutputLine, type ChunkBuffers } from '../src/outputs/parse.js';
import { formatPath, type PathComponent } from '../src/outputs/path.js';
import type { JsonObject, JsonValue } from '../src/types.js';
import { SeededRandom } from './helpers/random.js';

const SEEDS = Array.from({ length: 30 }, (_, i) => i + 1);

const KEYS = ['a', 'b', '_c', '$d', 'key 1', 'with"quote', 'k.dot', '0', 'tab\there'];
const STRINGS = ['', 'x', 'hello world', 'quote"d', 'back\\slash', 'line\nbreak'];

function isContainer(v: JsonValue): v is JsonObject | JsonValue[] {
  return typeof v === 'object' && v !== null;
}

function genScalar(rng: SeededRandom): JsonValue {
  switch (rng.int(5)) {
    case 0:
      return rng.int(2000) - 1000;
    case 1:
      return rng.int(100) / 4;
    case 2:
      return rng.bool();
    case 3:
      return null;
    default:
      return rng.pick(STRINGS);
  }
}

function genObject(rng: SeededRandom, depth: number): JsonObject {
  const obj: JsonObject = {};
  for (const key of rng.sample(KEYS, rng.int(5))) obj[key] = genValue(rng, depth - 1);
  return obj;
}

function genValue(rng: SeededRandom, depth: number): JsonValue {
  if (depth <= 0 || rng.bool(0.35)) return genScalar(rng);
  if (rng.bool()) return genObject(rng, depth);
  return Array.from({ length: rng.int(4) }, () => genValue(rng, depth - 1));
}

function line(command: 'set' | 'append', path: PathComponent[], value: JsonValue): string {
  const p = formatPath(path);
  const json = JSON.stringify(value);
  return p === '' ? `airplane_output_${command} ${json}` : `airplane_output_${command}:${p} ${json}`;
}

/** Commands that rebuild `value` at `path`, sometimes whole, sometimes piece by piece. */
function buildLines(rng: SeededRandom, value: JsonValue, path: PathComponent[], out: string[]): void {
  if (!isContainer(value) || rng.bool(0.3)) {
    out.push(line('set', path, value));
    return;
  }
  if (Array.isArray(value)) {
    if (value.length === 0 || rng.bool()) out.push(line('set', path, []));
    appendElements(rng, value, path, out);
    return;
  }
  const entries = Object.entries(value);
  if (entries.length === 0 || rng.bool()) out.push(line('set', path, {}));
  for (const [key, child] of entries) buildLines(rng, child, [...path, key], out);
}

function appendElements(rng: SeededRandom, items: JsonValue[], path: PathComponent[], out: string[]): void {
  items.forEach((item, i) => {
    if (!isContainer(item) || rng.bool(0.3)) {
      out.push(line('append', path, item));
      return;
    }
    if (Array.isArray(item)) {
      out.push(line('append', path, []));
      appendElements(rng, item, [...path, i], out);
      return;
    }
    out.push(line('append', path, {}));
    for (const [key, child] of Object.entries(item)) buildLines(rng, child, [...path, i, key], out);
  });
}

function applyLines(lines: string[], initial: JsonValue = null): JsonValue {
  const doc: OutputDocument = { value: initial };
  const chunks: ChunkBuffers = new Map();
  for (const l of lines) {
    const parsed = parseOutputLine(chunks, l);
    if (parsed) applyOutputCommand(parsed, doc);
  }
  return doc.value;
}

interface Node {
  path: PathComponent[];
  value: JsonValue;
}

function nodes(value: JsonValue, path: PathComponent[] = []): Node[] {
  const out: Node[] = [{ path, value }];
  if (Array.isArray(value)) {
    value.forEach((item, i) => out.push(...nodes(item, [...path, i])));
  } else if (isContainer(value)) {
    for (const [key, child] of Object.entries(value)) out.push(...nodes(child, [...path, key]));
  }
  return out;
}

/** Commands that must fail against `node`, each with the exact error message. */
function failingCommands(rng: SeededRandom, node: Node): Array<[string, string]> {
  const { path, value } = node;
  const cases: Array<[string, string]> = [];
  const both = (target: PathComponent[], message: string): void => {
    cases.push([line('set', target, 1), message], [line('append', target, 1), message]);
  };

  if (Array.isArray(value)) {
    const index = value.length + rng.int(3);
    both([...path, index], `index ${index} out of range at ${formatPath([...path, index])}`);
    both([...path, 'key'], `cannot index non-object with "key" at ${formatPath([...path, 'key'])}`);
    return cases;
  }
  if (value === null) return cases;

  both([...path, 0], `cannot index non-array with [0] at ${formatPath([...path, 0])}`);
  if (!isContainer(value)) {
    both([...path, 'key'], `cannot index non-object with "key" at ${formatPath([...path, 'key'])}`);
  }
  if (path.length > 0) {
    cases.push([line('append', path, 1), `cannot append to non-array at ${formatPath(path)}`]);
  }
  return cases;
}

function applyExpectingError(initial: JsonValue, l: string): { error: unknown; after: JsonValue } {
  const doc: OutputDocument = { value: structuredClone(initial) };
  const parsed = parseOutputLine(new Map(), l);
  if (!parsed) throw new Error(`not an output command: ${l}`);
  try {
    applyOutputCommand(parsed, doc);
  } catch (error) {
    return { error, after: doc.value };
  }
  return { error: undefined, after: doc.value };
}

const GARBAGE_PREFIXES = [
  'airplane_output',
  'airplane_output ',
  'airplane_output:',
  'airplane_output_set',
  'airplane_output_set ',
  'airplane_output_set:',
  'airplane_output_append ',
  'airplane_output_append:',
  'airplane_chunk:k ',
  'airplane_chunk_end:k',
  'airplane_chunk',
];
const GARBAGE_CHARS = [...'[]{}"\'.:,\\ ab_$019-u', '\t', 'true', 'null', '"x"', '[0]', '.a', '\\u00'];

describe('output commands over generated documents', () => {
  it.each(SEEDS)('rebuilds the document from set and append commands (seed %i)', (seed) => {
    const rng = new SeededRandom(seed);
    const expected = genValue(rng, 4);
    const lines: string[] = [];
    buildLines(rng, expected, [], lines);

    expect(applyLines(lines)).toEqual(expected);
  });

  it.each(SEEDS)('rejects type mismatches and out-of-range indices without changing the document (seed %i)', (seed) => {
    const rng = new SeededRandom(seed);
    const doc = genObject(rng, 4);

    for (const node of nodes(doc)) {
      for (const [l, message] of failingCommands(rng, node)) {
        const { error, after } = applyExpectingError(doc, l);
        expect(error, l).toBeInstanceOf(OutputProtocolError);
        expect(error instanceof Error ? error.message : error, l).toBe(message);
        expect(after, l).toEqual(doc);
      }
    }
  });

  it.each(SEEDS)('throws nothing but OutputProtocolError on arbitrary lines (seed %i)', (seed) => {
    const rng = new SeededRandom(seed);
    const doc: OutputDocument = { value: genValue(rng, 3) };
    const chunks: ChunkBuffers = new Map();
    const unexpected: Array<[string, unknown]> = [];

    for (let n = 0; n < 200; n++) {
      let l = rng.pick(GARBAGE_PREFIXES);
      const length = rng.int(12);
      for (let c = 0; c < length; c++) l += rng.pick(GARBAGE_CHARS);
      try {
        const parsed = parseOutputLine(chunks, l, { outputLineMaxBytes: 40 });
        if (parsed) applyOutputCommand(parsed, doc);
      } catch (err) {
        if (!(err instanceof OutputProtocolError)) unexpected.push([l, err]);
      }
    }

    expect(unexpected).toEqual([]);
  });
});
