/** Druh pravidla po normalizaci názvu podmínky */
export type RuleKind =
  | 'pass'
  | 'never_fire'
  | 'pattern'
  | 'range'
  | 'code'
  | 'json'
  | 'all'
  | 'any'
  | 'unknown';

/** Podmínka aplikovaná na jedno pole JSON objektu */
export interface JsonFieldSpec {
  key: string;
  conditions: RuleDefinition[];
}

/** Specifikace pravidla - uzavřený tagged union */
export type RuleSpec =
  | { kind: 'pass' }
  | { kind: 'never_fire'; message?: string }
  | { kind: 'pattern'; pattern: string }
  | { kind: 'range'; min: number; max: number }
  | { kind: 'code'; source: string }
  | { kind: 'json'; fields: JsonFieldSpec[] }
  | { kind: 'all'; rules: RuleDefinition[] }
  | { kind: 'any'; rules: RuleDefinition[] }
  | { kind: 'unknown'; name: string };

/** Naparsovaná podmínka z konfigurace */
export interface RuleDefinition {
  /** Název podmínky tak, jak byl zapsán (lowercase, včetně `may_`) */
  name: string;
  /** `may_` prefix - pravidlo se vyhodnocuje, ale nesleduje */
  advisory: boolean;
  spec: RuleSpec;
}

/**
 * How a rule takes part in pass/fail tracking.
 *
 * - `required`: starts failed, must be matched for the state to complete
 * - `forbidden`: `never_fire`/`fail`, starts passed
 * - `advisory`: `may_*`, evaluated and logged only
 */
export type RuleRequirement = 'required' | 'forbidden' | 'advisory';

/** Výsledek vyhodnocení pravidla */
export type RuleResult =
  | { matched: true }
  | { matched: false; failingLabel?: string };

/** Zkompilované pravidlo připravené k vyhodnocení */
export interface CompiledRule {
  readonly label: string;
  readonly kind: RuleKind;
  readonly requirement: RuleRequirement;
  evaluate(value: string): RuleResult;
}

/** Atribut → seřazená pravidla */
export type RuleMap = ReadonlyMap<string, readonly CompiledRule[]>;

/** Options ovlivňující parsování a kompilaci pravidel */
export interface RuleBuildOptions {
  /** Povolí `code` pravidla (spouštěná v izolovaném vm kontextu) */
  allowCode?: boolean | undefined;
  /** Timeout jednoho vyhodnocení `code` pravidla v ms */
  codeTimeoutMs?: number | undefined;
  /** Neznámé podmínky se zkompilují na vždy-false místo chyby */
  lenient?: boolean | undefined;
}
