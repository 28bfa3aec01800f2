/**
 * Output protocol: tasks emit structured outputs by printing specially-prefixed lines.
 *
 *   airplane_output[:name] <value>              legacy, appends to a top-level array
 *   airplane_output_set[:path] <json>           sets the value at a path
 *   airplane_output_append[:path] <json>        appends to the array at a path
 *   airplane_chunk:<key> <text> / airplane_chunk_end:<key>
 *                                               splits one long line over several
 */
import { OutputProtocolError } from '../errors.js';
import type { JsonValue } from '../types.js';
import { parsePathPartial } from './path.js';

export const OUTPUT_PREFIX = 'airplane_output';
export const DEFAULT_OUTPUT_NAME = 'output';
const CHUNK_PREFIX = 'airplane_chunk';

const LEGACY_REGEXP = /^airplane_output(?::(?:("[^"]*")|('[^']*')|([^ ]+))?)? (.*)$/;
const STRUCTURED_REGEXP = /^airplane_output(_set|_append)(:| )(.*)$/;
const CHUNK_REGEXP = /^airplane_chunk(|_end):([^ ]*)(?: (.+)|)$/;

export type OutputCommand = '' | 'set' | 'append';

export interface ParsedLine {
  /** Empty for the legacy command. */
  command: OutputCommand;
  /** Target top-level key of a legacy command. */
  name: string;
  /** Accessor path of a structured command; empty means the document root. */
  jsonPath: string;
  value: JsonValue;
  /** Byte length of the effective output text. */
  size: number;
}

export interface ParseOptions {
  /** Effective output lines longer than this are rejected. Disabled when <= 0. */
  outputLineMaxBytes?: number;
}

/** Partial chunked lines, keyed by chunk key. Owned by a single run. */
export type ChunkBuffers = Map<string, string>;

/**
 * Resolves the chunking protocol. Returns the effective text of a line:
 * the line itself, '' while a chunk is accumulating, or the joined chunk on `_end`.
 */
export function reassembleChunks(chunks: ChunkBuffers, text: string): string {
  if (!text.startsWith(CHUNK_PREFIX)) return text;

  const m = CHUNK_REGEXP.exec(text);
  if (!m) {
    throw new OutputProtocolError(`line started with ${CHUNK_PREFIX} but was not a valid chunk: ${text}`);
  }
  const [, suffix, key, body] = m;
  const sofar = chunks.get(key) ?? '';
  if (suffix === '_end') {
    chunks.delete(key);
    return sofar;
  }
  chunks.set(key, sofar + (body ?? ''));
  return '';
}

/**
 * Parses one line of process output. Returns null for lines that are not output
 * commands (including chunk fragments). Throws OutputProtocolError for malformed commands.
 */
export function parseOutputLine(chunks: ChunkBuffers, logText: string, opts: ParseOptions = {}): ParsedLine | null {
  const text = reassembleChunks(chunks, logText);
  if (!text.startsWith(OUTPUT_PREFIX)) return null;

  const size = Buffer.byteLength(text, 'utf8');
  const max = opts.outputLineMaxBytes ?? 0;
  if (max > 0 && size > max) {
    throw new OutputProtocolError('output line too long');
  }

  const legacy = parseLegacy(text);
  if (legacy) return { ...legacy, size };

  const structured = parseStructured(text);
  if (structured) return { ...structured, size };

  // Prefix matched but no known command word: treated as an empty legacy output.
  return { command: '', name: DEFAULT_OUTPUT_NAME, jsonPath: '', value: '', size };
}

function parseLegacy(text: string): Omit<ParsedLine, 'size'> | null {
  const m = LEGACY_REGEXP.exec(text);
  if (!m) return null;
  const [, doubleQuoted, singleQuoted, bare, rawValue] = m;

  let name = '';
  if (doubleQuoted) name = doubleQuoted.slice(1, -1);
  else if (singleQuoted) name = singleQuoted.slice(1, -1);
  else if (bare) name = bare;
  name = name.trim();

  return {
    command: '',
    name: name || DEFAULT_OUTPUT_NAME,
    jsonPath: '',
    value: parseLenient(rawValue.trim()),
  };
}

function parseStructured(text: string): Omit<ParsedLine, 'size'> | null {
  const m = STRUCTURED_REGEXP.exec(text);
  if (!m) return null;
  const [, commandSuffix, separator, rest] = m;
  const command: OutputCommand = commandSuffix === '_set' ? 'set' : 'append';

  let jsonPath = '';
  let valueText = rest;
  if (separator === ':') {
    const { end } = parsePathPartial(rest);
    if (rest[end] !== ' ') {
      throw new OutputProtocolError(`invalid output line: ${text}`);
    }
    jsonPath = rest.slice(0, end);
    valueText = rest.slice(end + 1).trim();
  }

  let value: JsonValue;
  try {
    value = parseJson(valueText);
  } catch (err) {
    throw new OutputProtocolError(`invalid ${OUTPUT_PREFIX}_${command} value: ${valueText}`, { cause: err });
  }
  return { command, name: '', jsonPath, value };
}

function parseJson(text: string): JsonValue {
  const parsed: JsonValue = JSON.parse(text);
  return parsed;
}

/** JSON when it parses, the raw string otherwise. */
function parseLenient(text: string): JsonValue {
  try {
    return parseJson(text);
  } catch {
    return text;
  }
}
