/**
 * Validation of the test configuration format.
 *
 * ```yaml
 * timeout: 40              # whole test, seconds or "2m"
 * state_order: random      # sequence | random | unordered | shuffle
 * seed: 1234               # optional, for random order
 * states:
 *   login:
 *     description: Client authenticates
 *     host:
 *       client:
 *         actions:
 *           - emit: { attribute: Status, value: OK }
 *     verify:
 *       timeout: 15
 *       triggers:
 *         - Status:
 *             pattern: ^OK
 * ```
 *
 * Triggers are kept raw here; the rule compiler validates them when the test
 * is built.
 *
 * @module
 */

import type { ActionConfig, HostConfig } from '../../types/action.js';
import type { StateOrder } from '../../types/test.js';
import { ConfigurationError } from '../helpers/errors.js';
import {
  isRecord,
  requireArray,
  requireNumber,
  requireRecord,
  requireSingleKey,
  requireTimeoutMs,
} from '../helpers/validators.js';

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlValidationError extends ConfigurationError {
  constructor(message: string, path: string) {
    super(message, path);
    this.name = 'YamlValidationError';
  }
}

const fail = (message: string, path: string): YamlValidationError => new YamlValidationError(message, path);

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const DEFAULT_TEST_TIMEOUT_MS = 40_000;
export const DEFAULT_STATE_TIMEOUT_MS = 15_000;

export interface StateConfig {
  name: string;
  description: string;
  hosts: HostConfig[];
  timeoutMs: number;
  triggers: unknown;
}

export interface TestConfig {
  timeoutMs: number;
  order: StateOrder;
  seed?: number;
  states: StateConfig[];
}

const STATE_ORDERS: ReadonlyMap<string, StateOrder> = new Map([
  ['sequence', 'sequence'],
  ['random', 'random'],
  ['unordered', 'random'],
  ['shuffle', 'random'],
]);

// ---------------------------------------------------------------------------
// Validators
// ---------------------------------------------------------------------------

function optional(obj: Record<string, unknown>, key: string): unknown {
  const value = obj[key];
  return value === null ? undefined : value;
}

function validateStateOrder(value: unknown, path: string): StateOrder {
  if (value === undefined) return 'sequence';
  const order = typeof value === 'string' ? STATE_ORDERS.get(value.toLowerCase()) : undefined;
  if (order === undefined) {
    throw fail(`must be one of ${[...STATE_ORDERS.keys()].join(', ')}, got ${JSON.stringify(value)}`, path);
  }
  return order;
}

function validateSeed(value: unknown, path: string): number | undefined {
  if (value === undefined) return undefined;
  const seed = requireNumber(value, path, fail);
  if (!Number.isInteger(seed) || seed < 0 || seed >= 2 ** 32) {
    throw fail(`must be an integer between 0 and ${2 ** 32 - 1}`, path);
  }
  return seed;
}

function validateAction(value: unknown, path: string): ActionConfig {
  const [name, params] = requireSingleKey(value, path, fail);
  if (params === undefined || params === null) {
    return { name, params: {} };
  }
  return { name, params: requireRecord(params, `${path}.${name}`, fail) };
}

function validateHosts(value: unknown, path: string): HostConfig[] {
  if (value === undefined) return [];

  return Object.entries(requireRecord(value, path, fail)).map(([name, hostRaw]) => {
    const hostPath = `${path}.${name}`;
    if (hostRaw === null || hostRaw === undefined) {
      return { name, actions: [] };
    }
    const host = requireRecord(hostRaw, hostPath, fail);
    const actionsRaw = optional(host, 'actions');
    const actions =
      actionsRaw === undefined
        ? []
        : requireArray(actionsRaw, `${hostPath}.actions`, fail).map((action, i) =>
            validateAction(action, `${hostPath}.actions[${i}]`),
          );
    return { name, actions };
  });
}

export function validateState(name: string, value: unknown, path: string): StateConfig {
  const state: Record<string, unknown> = value === null || value === undefined ? {} : requireRecord(value, path, fail);

  const descriptionRaw = optional(state, 'description');
  const description = descriptionRaw === undefined ? '' : String(descriptionRaw);

  const verifyRaw = optional(state, 'verify');
  const verify: Record<string, unknown> = verifyRaw === undefined ? {} : requireRecord(verifyRaw, `${path}.verify`, fail);
  const timeoutRaw = optional(verify, 'timeout');

  return {
    name,
    description,
    hosts: validateHosts(optional(state, 'host'), `${path}.host`),
    timeoutMs:
      timeoutRaw === undefined ? DEFAULT_STATE_TIMEOUT_MS : requireTimeoutMs(timeoutRaw, `${path}.verify.timeout`, fail),
    triggers: optional(verify, 'triggers'),
  };
}

/**
 * Zvaliduje celý test a doplní výchozí hodnoty.
 *
 * @throws {YamlValidationError} Při chybě struktury
 */
export function validateTest(value: unknown, path: string = 'test'): TestConfig {
  if (!isRecord(value)) {
    throw fail('must be an object with a "states" mapping', path);
  }

  const timeoutRaw = optional(value, 'timeout');
  const statesRaw = requireRecord(value['states'], `${path}.states`, fail);
  const states = Object.entries(statesRaw).map(([name, state]) =>
    validateState(name, state, `${path}.states.${name}`),
  );
  if (states.length === 0) {
    throw fail('must define at least one state', `${path}.states`);
  }

  const seed = validateSeed(optional(value, 'seed'), `${path}.seed`);

  return {
    timeoutMs: timeoutRaw === undefined ? DEFAULT_TEST_TIMEOUT_MS : requireTimeoutMs(timeoutRaw, `${path}.timeout`, fail),
    order: validateStateOrder(optional(value, 'state_order'), `${path}.state_order`),
    ...(seed !== undefined && { seed }),
    states,
  };
}
