import type { CompiledRule, RuleMap } from '../types/rule.js';
import type { TriggerEvent } from '../types/event.js';
import type { AttributeResult, ValidationSummary } from '../types/validation.js';
import { ProtocheckError } from '../dsl/helpers/errors.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { type AsyncQueue, QueueAbortedError } from '../utils/async-queue.js';
import { colorize, type ColorName } from '../utils/colors.js';

export class MissingRuleError extends ProtocheckError {
  readonly attribute: string;

  constructor(attribute: string) {
    super(`No rules defined for attribute: ${attribute}`);
    this.name = 'MissingRuleError';
    this.attribute = attribute;
  }
}

export interface ValidatorOptions {
  logger?: Logger | undefined;
}

export type ValidatedCallback = (event: TriggerEvent, matched: boolean) => void;

const HEADER = 'Validation Results';
const RULE_LINE = '-'.repeat(HEADER.length);

/**
 * Porovnává přijaté události s rule mapou a udržuje stav passed/failed.
 *
 * Tracking je oddělený od rule mapy: required pravidla začínají ve `failed`,
 * `never_fire`/`fail` v `passed`, `may_*` se nesledují vůbec. Label je pro
 * daný atribut vždy nejvýše v jedné z množin.
 */
export class Validator {
  private readonly ruleMap: RuleMap;
  private readonly logger: Logger;
  private readonly passed = new Map<string, Set<string>>();
  private readonly failed = new Map<string, Set<string>>();
  private readonly failureReasons = new Map<string, Map<string, string>>();
  private readonly eventCounts = new Map<string, number>();
  private unknownEvents = 0;
  private required = 0;

  constructor(ruleMap: RuleMap, options: ValidatorOptions = {}) {
    this.ruleMap = ruleMap;
    this.logger = options.logger ?? silentLogger;

    for (const [attribute, rules] of ruleMap) {
      for (const rule of rules) {
        if (rule.requirement === 'forbidden') {
          setFor(this.passed, attribute).add(rule.label);
        } else if (rule.requirement === 'required') {
          if (!setFor(this.failed, attribute).has(rule.label)) {
            this.required++;
          }
          setFor(this.failed, attribute).add(rule.label);
        }
      }
    }
  }

  /** Původní rule mapa (jen pro čtení) */
  get unmatchedRules(): RuleMap {
    return this.ruleMap;
  }

  /** Počet sledovaných required pravidel */
  get requiredCount(): number {
    return this.required;
  }

  /** True when no attribute has a failed rule left. */
  isSatisfied(): boolean {
    for (const labels of this.failed.values()) {
      if (labels.size > 0) return false;
    }
    return true;
  }

  /**
   * Vyhodnotí hodnotu atributu proti jeho pravidlům v pořadí konfigurace.
   *
   * První shoda přesune label do `passed` a vrací `true`. Bez shody se každé
   * neúspěšné required pravidlo přesune do `failed`.
   *
   * @throws {MissingRuleError} Atribut nemá žádná pravidla
   */
  validate(attribute: string, value: string): boolean {
    const rules = this.ruleMap.get(attribute);
    if (rules === undefined || rules.length === 0) {
      throw new MissingRuleError(attribute);
    }

    this.eventCounts.set(attribute, (this.eventCounts.get(attribute) ?? 0) + 1);
    this.logger.debug(`Validating ${attribute}`, { value });

    for (const rule of rules) {
      const result = rule.evaluate(value);

      if (result.matched) {
        this.markPassed(attribute, rule);
        return true;
      }

      if (rule.requirement === 'required') {
        this.markFailed(attribute, rule, result.failingLabel);
      } else if (rule.requirement === 'forbidden') {
        this.logger.warn(`Forbidden trigger observed: ${attribute} (${rule.label})`, { value });
      }
    }

    return false;
  }

  /**
   * Smyčka konzumující frontu událostí.
   *
   * Skončí po zrušení `signal`; události, které ve frontě zůstaly, se už
   * nevyhodnotí.
   */
  async startValidating(
    queue: AsyncQueue<TriggerEvent>,
    signal: AbortSignal,
    onValidated?: ValidatedCallback,
  ): Promise<void> {
    while (!signal.aborted) {
      let event: TriggerEvent;
      try {
        event = await queue.take(signal);
      } catch (error) {
        if (error instanceof QueueAbortedError) break;
        throw error;
      }

      let matched: boolean;
      try {
        matched = this.validate(event.attribute, event.value);
      } catch (error) {
        if (error instanceof MissingRuleError) {
          this.unknownEvents++;
          this.logger.debug(`Validation skipped: ${error.message}`);
          continue;
        }
        throw error;
      }

      this.logger.debug(`Validation result for ${event.attribute}: ${matched ? 'PASSED' : 'FAILED'}`);
      onValidated?.(event, matched);
    }

    this.logger.debug('Validator finished processing events');
  }

  getResults(): ValidationSummary {
    const attributes: AttributeResult[] = [];
    let matched = 0;
    let failures = 0;

    for (const attribute of this.ruleMap.keys()) {
      const passed = [...(this.passed.get(attribute) ?? [])];
      const failed = [...(this.failed.get(attribute) ?? [])];
      const reasons = this.failureReasons.get(attribute) ?? new Map<string, string>();

      matched += passed.length;
      failures += failed.length;
      attributes.push({
        attribute,
        passed,
        failed,
        failureReasons: Object.fromEntries(reasons),
        events: this.eventCounts.get(attribute) ?? 0,
      });
    }

    let events = this.unknownEvents;
    for (const count of this.eventCounts.values()) {
      events += count;
    }

    return {
      attributes,
      matched,
      total: matched + failures,
      failures,
      events,
      unknownEvents: this.unknownEvents,
      satisfied: failures === 0,
    };
  }

  /**
   * Textový report. Bez `detailed` jeden řádek `attr: N/M matched` na
   * atribut, s ním výpis jednotlivých pravidel.
   */
  getResultsStr(detailed = false): string {
    const summary = this.getResults();
    const lines = [RULE_LINE, HEADER, RULE_LINE];

    for (const result of summary.attributes) {
      const total = result.passed.length + result.failed.length;
      if (total === 0) continue;

      const color: ColorName =
        result.failed.length === 0 ? 'green' : result.passed.length > 0 ? 'yellow' : 'red';

      if (!detailed) {
        lines.push(`${colorize(result.attribute, color)}: ${colorize(`${result.passed.length}/${total}`, color)} matched`);
        continue;
      }

      lines.push(`${colorize(result.attribute, color)}:`);
      for (const label of result.passed) {
        lines.push(`    ${colorize(`+ ${label}`, 'green')}`);
      }
      for (const label of result.failed) {
        const reason = result.failureReasons[label];
        const suffix = reason !== undefined ? ` (failed on: ${reason})` : '';
        lines.push(`    ${colorize(`- ${label}${suffix}`, 'red')}`);
      }
    }

    const matched = summary.matched > 0 ? colorize(String(summary.matched), 'green') : String(summary.matched);
    const failures = summary.failures > 0 ? colorize(String(summary.failures), 'red') : String(summary.failures);
    lines.push(RULE_LINE, `Matched: ${matched}/${summary.total} (failures: ${failures})`, RULE_LINE);

    return lines.join('\n');
  }

  private markPassed(attribute: string, rule: CompiledRule): void {
    if (rule.requirement === 'advisory') {
      this.logger.debug(`Advisory rule matched: ${attribute} (${rule.label})`);
      return;
    }
    this.failed.get(attribute)?.delete(rule.label);
    this.failureReasons.get(attribute)?.delete(rule.label);
    setFor(this.passed, attribute).add(rule.label);
  }

  private markFailed(attribute: string, rule: CompiledRule, failingLabel: string | undefined): void {
    this.passed.get(attribute)?.delete(rule.label);
    setFor(this.failed, attribute).add(rule.label);

    const reasons = this.failureReasons.get(attribute) ?? new Map<string, string>();
    if (failingLabel !== undefined) {
      reasons.set(rule.label, failingLabel);
    } else {
      reasons.delete(rule.label);
    }
    this.failureReasons.set(attribute, reasons);
  }
}

function setFor(map: Map<string, Set<string>>, key: string): Set<string> {
  let set = map.get(key);
  if (set === undefined) {
    set = new Set<string>();
    map.set(key, set);
  }
  return set;
}
