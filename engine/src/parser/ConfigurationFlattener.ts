/**
 * Configuration Flattener
 *
 * Turns the parsed `<Configuration>` element of a tool into a flat
 * key/value record. Keys are paths below `<Configuration>`:
 *
 * - child elements join with dots: `Mode`, `Fields.Field`
 * - attributes append `@name`: `Fields.Field@name`
 * - repeated elements get an index: `Fields.Field[0]@name`
 * - text of an element that also has child elements goes to `path#text`
 *
 * @module parser
 */

import type { ToolConfigValue, ToolConfiguration } from '../types/graph-types.js';

const ATTRIBUTE_PREFIX = '@_';
const TEXT_KEY = '#text';

/**
 * `True`/`False` become booleans, numbers that print back unchanged
 * become numbers, everything else stays a string.
 */
export function coerceScalar(raw: string): ToolConfigValue {
  if (raw === 'True') return true;
  if (raw === 'False') return false;
  const number = Number(raw);
  if (raw.trim() !== '' && Number.isFinite(number) && String(number) === raw) {
    return number;
  }
  return raw;
}

export function flattenConfiguration(configuration: unknown): ToolConfiguration {
  // <Configuration/>
  if (configuration === '') {
    return Object.freeze({});
  }
  const entries: Record<string, ToolConfigValue> = {};
  flattenInto(configuration, '', entries);
  return Object.freeze(entries);
}

function flattenInto(value: unknown, path: string, out: Record<string, ToolConfigValue>): void {
  if (value === undefined || value === null) {
    return;
  }

  if (Array.isArray(value)) {
    value.forEach((item, index) => flattenInto(item, `${path}[${index}]`, out));
    return;
  }

  if (typeof value === 'object') {
    const keys = Object.keys(value);
    const hasChildElements = keys.some((key) => !key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_KEY);

    for (const [key, child] of Object.entries(value)) {
      if (key.startsWith(ATTRIBUTE_PREFIX)) {
        setScalar(out, `${path}@${key.slice(ATTRIBUTE_PREFIX.length)}`, child);
      } else if (key === TEXT_KEY) {
        setScalar(out, hasChildElements || path === '' ? `${path}${TEXT_KEY}` : path, child);
      } else {
        flattenInto(child, path === '' ? key : `${path}.${key}`, out);
      }
    }
    return;
  }

  setScalar(out, path === '' ? TEXT_KEY : path, value);
}

function setScalar(out: Record<string, ToolConfigValue>, key: string, value: unknown): void {
  if (typeof value === 'string') {
    out[key] = coerceScalar(value);
  } else if (typeof value === 'number' || typeof value === 'boolean') {
    out[key] = value;
  }
}
