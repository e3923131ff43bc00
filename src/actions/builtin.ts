import { appendFile } from 'node:fs/promises';
import { createConnection } from 'node:net';
import { setTimeout as delay } from 'node:timers/promises';
import type { ActionDefinition, ActionParams, ActionRuntime } from '../types/action.js';
import { ConfigurationError } from '../dsl/helpers/errors.js';
import { requireTimeoutMs } from '../dsl/helpers/validators.js';
import { LOG_LEVELS, type LogLevel } from '../logging/logger.js';
import { ActionRegistry } from './registry.js';

const fail = (message: string, path: string): ConfigurationError => new ConfigurationError(message, path);

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function durationParam(params: ActionParams, key: string, path: string): number {
  return requireTimeoutMs(params[key], `${path}.${key}`, fail);
}

function stringParam(params: ActionParams, key: string, path: string): string {
  const value = params[key];
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (typeof value !== 'string') {
    throw fail('must be a string', `${path}.${key}`);
  }
  return value;
}

/** `wait: { seconds: 2 }` - čeká, dokud stav neskončí */
export const waitAction: ActionDefinition = {
  name: 'wait',
  aliases: ['sleep'],
  inject: ['logger'],
  validate(params, path) {
    durationParam(params, 'seconds', path);
  },
  async run(params, { logger }, { signal }) {
    const ms = durationParam(params, 'seconds', 'wait');
    logger?.debug(`Waiting ${ms}ms`);
    await delay(ms, undefined, { signal });
  },
};

/** `log: { message: "...", level: info }` */
export const logAction: ActionDefinition = {
  name: 'log',
  inject: ['logger', 'source'],
  validate(params, path) {
    stringParam(params, 'message', path);
    const level = params['level'];
    if (level !== undefined && !isLogLevel(level)) {
      throw fail(`must be one of ${LOG_LEVELS.join(', ')}`, `${path}.level`);
    }
  },
  async run(params, { logger, source }) {
    const message = stringParam(params, 'message', 'log');
    const level = isLogLevel(params['level']) ? params['level'] : 'info';
    logger?.[level](message, source !== undefined ? { source } : undefined);
  },
};

/**
 * `emit: { attribute: Status, value: OK, delay: 0.5 }`
 *
 * Zapíše jeden trigger řádek do listeneru běžícího stavu, jako by ho poslal
 * host. Hodí se pro lokální běhy a ladění konfigurace.
 */
export const emitAction: ActionDefinition = {
  name: 'emit',
  aliases: ['emit_trigger'],
  inject: ['logger'],
  validate(params, path) {
    const attribute = stringParam(params, 'attribute', path);
    if (attribute.length === 0 || /\s/.test(attribute)) {
      throw fail('must be a non-empty string without whitespace', `${path}.attribute`);
    }
    stringParam(params, 'value', path);
    if (params['delay'] !== undefined) {
      durationParam(params, 'delay', path);
    }
  },
  async run(params, { logger }, runtime) {
    if (params['delay'] !== undefined) {
      await delay(durationParam(params, 'delay', 'emit'), undefined, { signal: runtime.signal });
    }
    const line = `${stringParam(params, 'attribute', 'emit')} ${stringParam(params, 'value', 'emit')}\n`;
    logger?.debug(`Emitting trigger: ${line.trimEnd()}`);
    await writeTrigger(runtime, line);
  },
};

/** Zapíše řádek do socketu nebo souboru listeneru */
export async function writeTrigger({ trigger, signal }: ActionRuntime, line: string): Promise<void> {
  signal.throwIfAborted();
  if (trigger.kind === 'file') {
    await appendFile(trigger.destination, line);
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const socket = createConnection(trigger.destination);
    const onAbort = (): void => {
      socket.destroy();
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    socket.once('error', (error) => {
      signal.removeEventListener('abort', onAbort);
      reject(error);
    });
    socket.once('connect', () => {
      socket.end(line, () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      });
    });
  });
}

export const BUILTIN_ACTIONS: readonly ActionDefinition[] = [waitAction, logAction, emitAction];

/** Registry s vestavěnými akcemi */
export function createDefaultRegistry(): ActionRegistry {
  const registry = new ActionRegistry();
  for (const action of BUILTIN_ACTIONS) {
    registry.register(action);
  }
  return registry;
}
