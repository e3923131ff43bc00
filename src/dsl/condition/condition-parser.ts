/**
 * Parsování podmínek pravidel z konfigurace.
 *
 * Jediné místo, kde se názvy podmínek (`pattern`, `regex`, `within_range`,
 * `all_pass`, ...) převádějí na uzavřený {@link RuleSpec}. Evaluátor už
 * pracuje jen s `kind`.
 *
 * @example
 * ```yaml
 * verify:
 *   triggers:
 *     - status:
 *         pattern: "^OK"
 *         may_range: { min: 1, max: 3 }
 * ```
 */

import type { JsonFieldSpec, RuleBuildOptions, RuleDefinition, RuleKind, RuleSpec } from '../../types/rule.js';
import { RuleParseError } from '../helpers/errors.js';
import { isRecord, requireNumber, requireRecord, requireSingleKey, type ErrorFactory } from '../helpers/validators.js';

type ConditionKind = Exclude<RuleKind, 'unknown'>;

/** Konfigurační názvy → druh pravidla */
const CONDITION_NAMES: ReadonlyMap<string, ConditionKind> = new Map<string, ConditionKind>([
  ['pass', 'pass'],
  ['fire', 'pass'],
  ['never_fire', 'never_fire'],
  ['fail', 'never_fire'],
  ['pattern', 'pattern'],
  ['regex', 'pattern'],
  ['range', 'range'],
  ['within_range', 'range'],
  ['code', 'code'],
  ['json', 'json'],
  ['all', 'all'],
  ['all_pass', 'all'],
  ['any', 'any'],
  ['any_pass', 'any'],
]);

export const CONDITION_NAME_LIST: readonly string[] = [...CONDITION_NAMES.keys()];

const ADVISORY_PREFIX = 'may_';

const fail: ErrorFactory = (message, path) => new RuleParseError(message, path);

/**
 * Vrátí druh pravidla pro daný název podmínky (bez `may_` prefixu),
 * nebo `undefined` pro neznámý název.
 */
export function resolveConditionKind(name: string): ConditionKind | undefined {
  const normalized = name.toLowerCase();
  return CONDITION_NAMES.get(
    normalized.startsWith(ADVISORY_PREFIX) ? normalized.slice(ADVISORY_PREFIX.length) : normalized,
  );
}

/**
 * Parsuje jednu podmínku (`{ pattern: "^OK" }`) na {@link RuleDefinition}.
 *
 * @throws {RuleParseError} Při neznámém názvu (pokud není `lenient`), neplatných
 *   parametrech nebo `code` pravidle bez `allowCode`
 */
export function parseCondition(
  name: string,
  params: unknown,
  options: RuleBuildOptions = {},
  path: string = name,
): RuleDefinition {
  const written = name.toLowerCase();
  const advisory = written.startsWith(ADVISORY_PREFIX);
  const normalized = advisory ? written.slice(ADVISORY_PREFIX.length) : written;
  const kind = CONDITION_NAMES.get(normalized);

  if (kind === undefined) {
    if (options.lenient) {
      return { name: written, advisory, spec: { kind: 'unknown', name: normalized } };
    }
    throw new RuleParseError(
      `unknown condition "${name}". Expected one of: ${CONDITION_NAME_LIST.join(', ')} (optionally prefixed with "may_")`,
      path,
    );
  }

  return { name: written, advisory, spec: parseSpec(kind, params, options, path) };
}

function parseSpec(kind: ConditionKind, params: unknown, options: RuleBuildOptions, path: string): RuleSpec {
  switch (kind) {
    case 'pass':
      return { kind: 'pass' };

    case 'never_fire':
      return parseNeverFire(params);

    case 'pattern':
      return { kind: 'pattern', pattern: parsePattern(params, path) };

    case 'range':
      return parseRange(params, path);

    case 'code':
      return parseCode(params, options, path);

    case 'json':
      return { kind: 'json', fields: parseJsonFields(params, options, path) };

    case 'all':
    case 'any':
      return { kind, rules: parseChildren(params, options, path) };
  }
}

function parseNeverFire(params: unknown): RuleSpec {
  if (typeof params === 'string' && params.length > 0) {
    return { kind: 'never_fire', message: params };
  }
  if (isRecord(params) && typeof params['msg'] === 'string') {
    return { kind: 'never_fire', message: params['msg'] };
  }
  return { kind: 'never_fire' };
}

function parsePattern(params: unknown, path: string): string {
  let source: unknown = params;
  if (isRecord(params)) {
    source = params['pattern'] ?? params['reg_pattern'] ?? params['regex'];
  }
  if (typeof source === 'number') {
    source = String(source);
  }
  if (typeof source !== 'string' || source.length === 0) {
    throw new RuleParseError('pattern must be a non-empty string (or { pattern: "..." })', path);
  }

  try {
    new RegExp(source);
  } catch (err) {
    throw new RuleParseError(
      `invalid regular expression ${JSON.stringify(source)}: ${err instanceof Error ? err.message : String(err)}`,
      path,
    );
  }
  return source;
}

function parseRange(params: unknown, path: string): RuleSpec {
  let min: number;
  let max: number;

  if (Array.isArray(params)) {
    if (params.length !== 2) {
      throw new RuleParseError(`range must have exactly two bounds [min, max], got ${params.length}`, path);
    }
    min = requireNumber(params[0], `${path}[0]`, fail);
    max = requireNumber(params[1], `${path}[1]`, fail);
  } else if (isRecord(params)) {
    const rawMin = params['min'] ?? params['minimum'];
    const rawMax = params['max'] ?? params['maximum'];
    min = requireNumber(rawMin, `${path}.min`, fail);
    max = requireNumber(rawMax, `${path}.max`, fail);
  } else {
    throw new RuleParseError('range must be [min, max] or { min, max }', path);
  }

  if (min > max) {
    throw new RuleParseError(`range min (${min}) must not exceed max (${max})`, path);
  }
  return { kind: 'range', min, max };
}

function parseCode(params: unknown, options: RuleBuildOptions, path: string): RuleSpec {
  if (!options.allowCode) {
    throw new RuleParseError(
      'code rules are disabled; set "rules.allowCode": true in the configuration to run them',
      path,
    );
  }

  const source = isRecord(params) ? params['block'] : params;
  if (typeof source !== 'string' || source.trim().length === 0) {
    throw new RuleParseError('code must be a non-empty script (or { block: "..." })', path);
  }
  return { kind: 'code', source };
}

function parseJsonFields(params: unknown, options: RuleBuildOptions, path: string): JsonFieldSpec[] {
  const fieldsObj = requireRecord(params, path, fail);
  const fields: JsonFieldSpec[] = [];

  for (const [key, conditionsRaw] of Object.entries(fieldsObj)) {
    const conditionsObj = requireRecord(conditionsRaw, `${path}.${key}`, fail);
    const conditions = Object.entries(conditionsObj).map(([condition, condParams]) =>
      parseCondition(condition, condParams, options, `${path}.${key}.${condition}`),
    );
    if (conditions.length === 0) {
      throw new RuleParseError('must list at least one condition', `${path}.${key}`);
    }
    fields.push({ key, conditions });
  }

  if (fields.length === 0) {
    throw new RuleParseError('json rule must check at least one key', path);
  }
  return fields;
}

/**
 * Combinator children are either a mapping (`{ pattern: ..., range: ... }`)
 * or a list of single-key mappings, which allows repeating a condition.
 */
function parseChildren(params: unknown, options: RuleBuildOptions, path: string): RuleDefinition[] {
  let entries: Array<[string, unknown, string]>;

  if (Array.isArray(params)) {
    entries = params.map((item, i) => {
      const [name, childParams] = requireSingleKey(item, `${path}[${i}]`, fail);
      return [name, childParams, `${path}[${i}].${name}`];
    });
  } else {
    const obj = requireRecord(params, path, fail);
    entries = Object.entries(obj).map(([name, childParams]) => [name, childParams, `${path}.${name}`]);
  }

  if (entries.length === 0) {
    throw new RuleParseError('combinator needs at least one condition', path);
  }

  return entries.map(([name, childParams, childPath]) => parseCondition(name, childParams, options, childPath));
}
