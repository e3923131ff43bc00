/**
 * JSON payloads for the `json` rule.
 *
 * Binary protocol fields travel as `{"type":"octets","value":"<latin1 text>"}`.
 * Their value is re-encoded to Base64 so the raw bytes survive every later
 * string conversion.
 */

import { isRecord } from '../dsl/helpers/validators.js';

/**
 * Vrátí kopii hodnoty, ve které je každý `octets` objekt převeden na Base64.
 */
export function encodeOctets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(encodeOctets);
  }

  if (!isRecord(value)) {
    return value;
  }

  if (value['type'] === 'octets' && 'value' in value) {
    const raw = value['value'];
    if (typeof raw === 'string') {
      return { ...value, value: Buffer.from(raw, 'latin1').toString('base64') };
    }
    return { ...value };
  }

  // defineProperty keeps a `__proto__` key as an own field
  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    Object.defineProperty(result, key, { value: encodeOctets(nested), enumerable: true, writable: true, configurable: true });
  }
  return result;
}

/**
 * Parsuje JSON text a zakóduje `octets` pole.
 * Při chybě parsování vrací `undefined`.
 */
export function parseJsonPayload(raw: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  return encodeOctets(parsed);
}

/**
 * String form a JSON field is checked in by non-`json` sub-conditions.
 */
export function stringifyField(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === null || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value) ?? '';
}
