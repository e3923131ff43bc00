/**
 * Registry of actions hosts can perform during a state.
 *
 * Akce se hledají podle názvu nebo aliasu (case-insensitive). Při sestavení
 * testu {@link bindActions} doplní vypočtené parametry (`source`, `target`,
 * `testName`, `logger`) podle toho, co si akce deklaruje v `inject`.
 *
 * @module
 */

import type {
  ActionDefinition,
  ActionInjections,
  ActionParams,
  BoundAction,
  HostConfig,
} from '../types/action.js';
import { ConfigurationError } from '../dsl/helpers/errors.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';

export const DEFAULT_HOST_TEMPLATE = '{test}-{host}-1';

export class ActionRegistry {
  private readonly actions = new Map<string, ActionDefinition>();

  /**
   * @throws {ConfigurationError} Název nebo alias už je obsazený
   */
  register(definition: ActionDefinition): this {
    const names = [definition.name, ...(definition.aliases ?? [])].map((name) => name.toLowerCase());
    for (const name of names) {
      if (this.actions.has(name)) {
        throw new ConfigurationError(`Action "${name}" is already registered`);
      }
    }
    for (const name of names) {
      this.actions.set(name, definition);
    }
    return this;
  }

  get(name: string): ActionDefinition | undefined {
    return this.actions.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.actions.has(name.toLowerCase());
  }

  /** Všechny registrované názvy včetně aliasů, seřazené */
  names(): string[] {
    return [...this.actions.keys()].sort();
  }
}

/** Dosadí `{test}` a `{host}` do šablony identifikátoru hosta */
export function hostTemplate(template: string, testName: string, host: string): string {
  return template.replaceAll('{test}', testName).replaceAll('{host}', host);
}

export interface BindOptions {
  hostTemplate?: string | undefined;
  logger?: Logger | undefined;
  /** Prefix cesty pro chybové hlášky */
  path?: string | undefined;
}

/**
 * Převede konfiguraci hostů na spustitelné akce.
 *
 * Neznámé akce se zalogují a přeskočí.
 *
 * @throws {ConfigurationError} Akce deklaruje `target`, ale parametr chybí,
 *   nebo neprojde její `validate`
 */
export function bindActions(
  hosts: readonly HostConfig[],
  registry: ActionRegistry,
  testName: string,
  options: BindOptions = {},
): BoundAction[] {
  const template = options.hostTemplate ?? DEFAULT_HOST_TEMPLATE;
  const logger = options.logger ?? silentLogger;
  const basePath = options.path ?? 'host';
  const bound: BoundAction[] = [];

  for (const host of hosts) {
    host.actions.forEach((action, i) => {
      const path = `${basePath}.${host.name}.actions[${i}].${action.name}`;
      const definition = registry.get(action.name);

      if (definition === undefined) {
        logger.warn(`Unknown action "${action.name}" for host ${host.name}, skipping`);
        return;
      }

      definition.validate?.(action.params, path);
      const injected = computeInjections(definition, action.params, testName, host.name, template, logger, path);

      bound.push({
        name: definition.name,
        host: host.name,
        execute: (runtime) => definition.run(action.params, injected, runtime),
      });
    });
  }

  return bound;
}

function computeInjections(
  definition: ActionDefinition,
  params: ActionParams,
  testName: string,
  host: string,
  template: string,
  logger: Logger,
  path: string,
): ActionInjections {
  const injected: ActionInjections = {};

  for (const param of definition.inject ?? []) {
    switch (param) {
      case 'source':
        injected.source = hostTemplate(template, testName, host);
        break;
      case 'target': {
        const target = params['target'];
        if (typeof target !== 'string' || target.length === 0) {
          throw new ConfigurationError(`Action ${definition.name} requires a target parameter`, path);
        }
        injected.target = hostTemplate(template, testName, target);
        break;
      }
      case 'testName':
        injected.testName = testName;
        break;
      case 'logger':
        injected.logger = logger.child(host);
        break;
    }
  }

  return injected;
}
