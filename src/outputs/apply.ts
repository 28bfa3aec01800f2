import { OutputProtocolError } from '../errors.js';
import type { JsonObject, JsonValue } from '../types.js';
import type { ParsedLine } from './parse.js';
import { formatPath, parsePath } from './path.js';

/** Mutable holder for a run's output document. The document starts as `null`. */
export interface OutputDocument {
  value: JsonValue;
}

export function newOutputDocument(): OutputDocument {
  return { value: null };
}

function isObject(v: JsonValue | undefined): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function hasOwn(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

function getOwn(obj: JsonObject, key: string): JsonValue | undefined {
  return hasOwn(obj, key) ? obj[key] : undefined;
}

// Plain assignment would hit the prototype setter for "__proto__".
function setOwn(obj: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(obj, key, { value, writable: true, enumerable: true, configurable: true });
}

/** Applies one parsed output command to the document in place. */
export function applyOutputCommand(cmd: ParsedLine, doc: OutputDocument): void {
  switch (cmd.command) {
    case '':
      applyLegacy(cmd.name, cmd.value, doc);
      return;
    case 'set':
    case 'append':
      applyAtPath(cmd.command, cmd.jsonPath, cmd.value, doc);
      return;
  }
}

function applyLegacy(name: string, value: JsonValue, doc: OutputDocument): void {
  if (doc.value === null) doc.value = {};
  if (!isObject(doc.value)) {
    throw new OutputProtocolError('legacy output requires an object document');
  }
  const existing = getOwn(doc.value, name);
  if (existing === undefined) {
    setOwn(doc.value, name, [value]);
    return;
  }
  if (!Array.isArray(existing)) {
    throw new OutputProtocolError(`output "${name}" is not an array`);
  }
  existing.push(value);
}

function applyAtPath(command: 'set' | 'append', jsonPath: string, value: JsonValue, doc: OutputDocument): void {
  const components = parsePath(jsonPath);

  if (components.length === 0) {
    if (command === 'set') {
      doc.value = value;
      return;
    }
    if (doc.value === null) doc.value = [];
    if (!Array.isArray(doc.value)) {
      throw new OutputProtocolError('cannot append to non-array root output');
    }
    doc.value.push(value);
    return;
  }

  let getCur = (): JsonValue | undefined => doc.value;
  let setCur = (v: JsonValue): void => {
    doc.value = v;
  };

  for (let i = 0; i < components.length; i++) {
    const component = components[i];
    const last = i === components.length - 1;
    const where = formatPath(components.slice(0, i + 1));
    let cur = getCur();

    if (typeof component === 'string') {
      if (cur === undefined || cur === null) {
        cur = {};
        setCur(cur);
      }
      if (!isObject(cur)) {
        throw new OutputProtocolError(`cannot index non-object with "${component}" at ${where}`);
      }
      const container = cur;
      if (last) {
        finish(command, getOwn(container, component), (v) => setOwn(container, component, v), value, where);
        return;
      }
      getCur = () => getOwn(container, component);
      setCur = (v) => setOwn(container, component, v);
    } else {
      if (!Array.isArray(cur)) {
        throw new OutputProtocolError(`cannot index non-array with [${component}] at ${where}`);
      }
      if (component >= cur.length) {
        throw new OutputProtocolError(`index ${component} out of range at ${where}`);
      }
      const container = cur;
      if (last) {
        finish(command, container[component], (v) => {
          container[component] = v;
        }, value, where);
        return;
      }
      getCur = () => container[component];
      setCur = (v) => {
        container[component] = v;
      };
    }
  }
}

function finish(
  command: 'set' | 'append',
  existing: JsonValue | undefined,
  set: (v: JsonValue) => void,
  value: JsonValue,
  where: string
): void {
  if (command === 'set') {
    set(value);
    return;
  }
  if (existing === undefined || existing === null) {
    set([value]);
    return;
  }
  if (!Array.isArray(existing)) {
    throw new OutputProtocolError(`cannot append to non-array at ${where}`);
  }
  existing.push(value);
}
