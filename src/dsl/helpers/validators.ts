/**
 * Validation helpers shared by the condition parser and the YAML schema.
 *
 * Each guard reports through an error factory so callers keep their own
 * error class (`RuleParseError`, `YamlValidationError`) and path format.
 *
 * @module
 */

import { DURATION_RE, parseDuration } from '../../utils/duration-parser.js';

export type ErrorFactory = (message: string, path: string) => Error;

/** Type guard for plain (non-array) objects. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function requireRecord(value: unknown, path: string, fail: ErrorFactory): Record<string, unknown> {
  if (!isRecord(value)) {
    throw fail(`must be an object, got ${describe(value)}`, path);
  }
  return value;
}

export function requireArray(value: unknown, path: string, fail: ErrorFactory): unknown[] {
  if (!Array.isArray(value)) {
    throw fail(`must be an array, got ${describe(value)}`, path);
  }
  return value;
}

export function requireString(value: unknown, path: string, fail: ErrorFactory): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw fail(`must be a non-empty string, got ${value === '' ? 'empty string' : describe(value)}`, path);
  }
  return value;
}

export function requireNumber(value: unknown, path: string, fail: ErrorFactory): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw fail(`must be a finite number, got ${describe(value)}`, path);
  }
  return value;
}

/** Nejdelší zpoždění, které `setTimeout` přijme bez zkrácení na 1 ms */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

/**
 * Reads a timeout given either as seconds (number) or as a duration string
 * (`"500ms"`, `"30s"`, `"2m"`). Returns milliseconds, at most {@link MAX_TIMEOUT_MS}.
 */
export function requireTimeoutMs(value: unknown, path: string, fail: ErrorFactory): number {
  let ms: number | undefined;
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) {
      throw fail(`must be a positive number of seconds, got ${value}`, path);
    }
    ms = value * 1000;
  } else if (typeof value === 'string' && DURATION_RE.test(value)) {
    const parsed = parseDuration(value);
    if (parsed > 0) ms = parsed;
  }

  if (ms === undefined) {
    throw fail(
      `must be a positive number of seconds or a duration string (e.g. "500ms", "30s", "2m"), got ${JSON.stringify(value)}`,
      path,
    );
  }
  if (ms > MAX_TIMEOUT_MS) {
    throw fail(`must not exceed ${MAX_TIMEOUT_MS}ms, got ${ms}ms`, path);
  }
  return ms;
}

/**
 * Splits a single-key mapping (`{ name: params }`) used throughout the test
 * format for triggers, actions and combinator children.
 */
export function requireSingleKey(value: unknown, path: string, fail: ErrorFactory): [string, unknown] {
  const obj = requireRecord(value, path, fail);
  const keys = Object.keys(obj);
  const [key] = keys;
  if (key === undefined || keys.length !== 1) {
    throw fail(`must be a mapping with exactly one key, got ${keys.length}`, path);
  }
  return [key, obj[key]];
}
