import type {
  CompiledRule,
  JsonFieldSpec,
  RuleBuildOptions,
  RuleDefinition,
  RuleMap,
  RuleRequirement,
  RuleResult,
} from '../types/rule.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { parseCondition } from '../dsl/condition/condition-parser.js';
import { RuleParseError } from '../dsl/helpers/errors.js';
import { isRecord, requireArray, requireRecord, requireSingleKey } from '../dsl/helpers/validators.js';
import { compilePattern, matchesPattern, withinRange } from './leaf-rules.js';
import { parseJsonPayload, stringifyField } from './json-payload.js';
import { CodeSandbox } from './code-sandbox.js';

export interface CompileOptions extends RuleBuildOptions {
  logger?: Logger | undefined;
  /** Cesta v konfiguraci pro chybové hlášky */
  path?: string | undefined;
}

const MATCHED: RuleResult = { matched: true };
const NOT_MATCHED: RuleResult = { matched: false };

/** Check applied to one JSON field; nested `json` receives the raw value. */
type FieldCheck = (value: unknown) => RuleResult;

/**
 * Sestaví čitelný popisek pravidla pro reporty.
 *
 * Popisek začíná názvem podmínky tak, jak byl zapsán, takže `never_fire`,
 * `fail` a `may_*` pravidla jsou rozpoznatelná i z výpisu.
 */
export function describeRule(definition: RuleDefinition): string {
  const { name, spec } = definition;

  switch (spec.kind) {
    case 'pass':
    case 'unknown':
      return name;
    case 'never_fire':
      return spec.message !== undefined ? `${name}: ${spec.message}` : name;
    case 'pattern':
      return `${name}: ${spec.pattern}`;
    case 'range':
      return `${name}: min=${spec.min}, max=${spec.max}`;
    case 'code':
      return `${name}: code block`;
    case 'json':
      return `${name}: ${spec.fields
        .map((field) => `${field.key}(${field.conditions.map(describeRule).join(', ')})`)
        .join(', ')}`;
    case 'all':
    case 'any':
      return `${name}: ${spec.rules.map(describeRule).join(', ')}`;
  }
}

/** Jak se pravidlo účastní sledování pass/fail */
export function requirementOf(definition: RuleDefinition): RuleRequirement {
  if (definition.advisory) return 'advisory';
  if (definition.spec.kind === 'never_fire') return 'forbidden';
  return 'required';
}

/**
 * Zkompiluje naparsovanou podmínku na predikát.
 *
 * Kombinátory nejdřív zkompilují své potomky, `all` při prvním neúspěchu
 * vrací `failingLabel` neúspěšného potomka.
 */
export function compileRule(definition: RuleDefinition, options: CompileOptions = {}): CompiledRule {
  const logger = options.logger ?? silentLogger;
  const label = describeRule(definition);
  const requirement = requirementOf(definition);
  const { spec } = definition;

  const rule = (evaluate: (value: string) => RuleResult): CompiledRule => ({
    label,
    kind: spec.kind,
    requirement,
    evaluate,
  });

  switch (spec.kind) {
    case 'pass':
      return rule(() => MATCHED);

    case 'never_fire':
      return rule(() => NOT_MATCHED);

    case 'unknown':
      logger.warn(`Unknown condition "${spec.name}" compiled to a rule that never matches`);
      return rule(() => NOT_MATCHED);

    case 'pattern': {
      const regex = compilePattern(spec.pattern);
      return rule((value) => {
        const matched = matchesPattern(regex, value);
        logger.debug(`Pattern ${matched ? 'matched' : 'did not match'}: ${spec.pattern}`);
        return matched ? MATCHED : NOT_MATCHED;
      });
    }

    case 'range':
      return rule((value) => {
        const matched = withinRange(spec.min, spec.max, value);
        logger.debug(`Value ${JSON.stringify(value)} ${matched ? 'is' : 'is not'} within ${spec.min}..${spec.max}`);
        return matched ? MATCHED : NOT_MATCHED;
      });

    case 'code': {
      const sandbox = new CodeSandbox(spec.source, {
        timeoutMs: options.codeTimeoutMs,
        logger,
        path: options.path,
      });
      return rule((value) => (sandbox.run(value) ? MATCHED : NOT_MATCHED));
    }

    case 'json': {
      const check = compileJsonFields(spec.fields, options);
      return rule((value) => {
        const data = parseJsonPayload(value);
        if (!isRecord(data) || Object.keys(data).length === 0) {
          logger.debug('No valid JSON object could be parsed');
          return NOT_MATCHED;
        }
        return check(data);
      });
    }

    case 'all': {
      const children = spec.rules.map((child) => compileRule(child, options));
      return rule((value) => evaluateAll(children, value, logger));
    }

    case 'any': {
      const children = spec.rules.map((child) => compileRule(child, options));
      return rule((value) => evaluateAny(children, value, logger));
    }
  }
}

// ---------------------------------------------------------------------------
// Combinators
// ---------------------------------------------------------------------------

/** Vyhodnocuje potomky v pořadí a končí na prvním, který neprojde. */
export function evaluateAll(children: readonly CompiledRule[], value: string, logger: Logger = silentLogger): RuleResult {
  for (const child of children) {
    if (!child.evaluate(value).matched) {
      logger.debug(`'all' rule failed on: ${child.label}`);
      return { matched: false, failingLabel: child.label };
    }
  }
  return MATCHED;
}

/** Vyhodnocuje potomky v pořadí a končí na prvním, který projde. */
export function evaluateAny(children: readonly CompiledRule[], value: string, logger: Logger = silentLogger): RuleResult {
  for (const child of children) {
    if (child.evaluate(value).matched) {
      logger.debug(`'any' rule passed on: ${child.label}`);
      return MATCHED;
    }
  }
  return NOT_MATCHED;
}

function compileJsonFields(fields: JsonFieldSpec[], options: CompileOptions): (data: Record<string, unknown>) => RuleResult {
  const compiled = fields.map((field) => ({
    key: field.key,
    checks: field.conditions.map((condition) => compileFieldCheck(condition, options)),
  }));

  return (data) => {
    for (const { key, checks } of compiled) {
      if (!Object.prototype.hasOwnProperty.call(data, key)) {
        options.logger?.debug(`Key "${key}" not found in JSON object`);
        return NOT_MATCHED;
      }
      const fieldValue = data[key];
      for (const check of checks) {
        if (!check(fieldValue).matched) {
          return NOT_MATCHED;
        }
      }
    }
    return MATCHED;
  };
}

function compileFieldCheck(definition: RuleDefinition, options: CompileOptions): FieldCheck {
  const { spec } = definition;

  if (spec.kind === 'json') {
    const check = compileJsonFields(spec.fields, options);
    return (value) => {
      const data = typeof value === 'string' ? parseJsonPayload(value) : value;
      return isRecord(data) ? check(data) : NOT_MATCHED;
    };
  }

  const compiled = compileRule(definition, options);
  return (value) => compiled.evaluate(stringifyField(value));
}

/**
 * Public `compile(condition, parameters)` contract: parse then compile.
 *
 * @throws {RuleParseError} Pro neplatnou podmínku
 */
export function compileCondition(name: string, params: unknown, options: CompileOptions = {}): CompiledRule {
  const definition = parseCondition(name, params, options, options.path ?? name);
  return compileRule(definition, options);
}

/**
 * Sestaví rule mapu z `verify.triggers`.
 *
 * Každá položka je `{ atribut: { podmínka: parametry, ... } }`; opakovaný
 * atribut pravidla přidává na konec.
 *
 * @throws {RuleParseError} Pro neplatnou strukturu nebo podmínku
 */
export function buildRuleMap(triggers: unknown, options: CompileOptions = {}): RuleMap {
  const basePath = options.path ?? 'triggers';
  const fail = (message: string, path: string) => new RuleParseError(message, path);
  const map = new Map<string, CompiledRule[]>();

  if (triggers === undefined || triggers === null) {
    return map;
  }

  requireArray(triggers, basePath, fail).forEach((item, i) => {
    const [attribute, conditionsRaw] = requireSingleKey(item, `${basePath}[${i}]`, fail);
    const conditionsPath = `${basePath}[${i}].${attribute}`;
    const conditions = requireRecord(conditionsRaw ?? {}, conditionsPath, fail);

    const rules = map.get(attribute) ?? [];
    for (const [condition, params] of Object.entries(conditions)) {
      const path = `${conditionsPath}.${condition}`;
      rules.push(compileCondition(condition, params, { ...options, path }));
      options.logger?.debug(`Added rule for trigger ${attribute}: ${condition}`);
    }
    map.set(attribute, rules);
  });

  return map;
}
