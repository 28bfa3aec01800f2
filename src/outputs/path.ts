/**
 * JavaScript-style accessor paths for output commands, e.g. `a.b[0]["c d"]`.
 * A path is a list of components: strings address object keys, numbers address array indices.
 */
import { OutputProtocolError } from '../errors.js';

export type PathComponent = string | number;

const IDENT_START = /[A-Za-z_$]/;
const IDENT_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  v: '\v',
  '0': '\0',
};

interface PartialParse {
  components: PathComponent[];
  /** Index of the first character that is not part of the path. */
  end: number;
}

/**
 * Parses the longest path prefix of `input`. Parsing stops at the first character
 * that cannot continue a path (usually the space before an output value).
 * Malformed accessors (an unterminated bracket, a bad index) are errors.
 */
export function parsePathPartial(input: string): PartialParse {
  const components: PathComponent[] = [];
  let i = 0;

  if (i < input.length && IDENT_START.test(input[i])) {
    const [ident, next] = readIdentifier(input, i);
    components.push(ident);
    i = next;
  } else if (input[i] !== '[') {
    return { components, end: i };
  }

  while (i < input.length) {
    const ch = input[i];
    if (ch === '.') {
      if (i + 1 >= input.length || !IDENT_START.test(input[i + 1])) {
        throw new OutputProtocolError(`invalid path "${input}": expected identifier after "." at ${i}`);
      }
      const [ident, next] = readIdentifier(input, i + 1);
      components.push(ident);
      i = next;
    } else if (ch === '[') {
      const [component, next] = readBracket(input, i);
      components.push(component);
      i = next;
    } else {
      break;
    }
  }

  return { components, end: i };
}

/** Parses a whole path; trailing characters are an error. The empty string is the root path. */
export function parsePath(input: string): PathComponent[] {
  const { components, end } = parsePathPartial(input);
  if (end !== input.length) {
    throw new OutputProtocolError(`invalid path "${input}": unexpected character at ${end}`);
  }
  return components;
}

export function formatPath(components: readonly PathComponent[]): string {
  return components
    .map((c, i) => {
      if (typeof c === 'number') return `[${c}]`;
      if (/^[A-Za-z_$][A-Za-z0-9_$]*$/.test(c)) return i === 0 ? c : `.${c}`;
      return `[${JSON.stringify(c)}]`;
    })
    .join('');
}

function readIdentifier(input: string, start: number): [string, number] {
  let i = start;
  while (i < input.length && IDENT_PART.test(input[i])) i++;
  return [input.slice(start, i), i];
}

function readBracket(input: string, open: number): [PathComponent, number] {
  let i = open + 1;
  const ch = input[i];
  let component: PathComponent;

  if (ch === '"' || ch === "'") {
    const [key, next] = readQuoted(input, i);
    component = key;
    i = next;
  } else if (ch !== undefined && DIGIT.test(ch)) {
    const start = i;
    while (i < input.length && DIGIT.test(input[i])) i++;
    component = Number.parseInt(input.slice(start, i), 10);
    if (!Number.isSafeInteger(component)) {
      throw new OutputProtocolError(`invalid path "${input}": index out of range at ${start}`);
    }
  } else {
    throw new OutputProtocolError(`invalid path "${input}": expected index or quoted key at ${i}`);
  }

  if (input[i] !== ']') {
    throw new OutputProtocolError(`invalid path "${input}": expected "]" at ${i}`);
  }
  return [component, i + 1];
}

function readQuoted(input: string, open: number): [string, number] {
  const quote = input[open];
  let out = '';
  let i = open + 1;
  while (i < input.length) {
    const ch = input[i];
    if (ch === quote) return [out, i + 1];
    if (ch !== '\\') {
      out += ch;
      i++;
      continue;
    }
    const esc = input[i + 1];
    if (esc === undefined) break;
    if (esc === 'u') {
      const hex = input.slice(i + 2, i + 6);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
        throw new OutputProtocolError(`invalid path "${input}": bad unicode escape at ${i}`);
      }
      out += String.fromCharCode(Number.parseInt(hex, 16));
      i += 6;
      continue;
    }
    out += SIMPLE_ESCAPES[esc] ?? esc;
    i += 2;
  }
  throw new OutputProtocolError(`invalid path "${input}": unterminated string starting at ${open}`);
}
