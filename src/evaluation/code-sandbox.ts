/**
 * Izolované spouštění `code` pravidel.
 *
 * Fragment se vyhodnotí jako tělo funkce v čerstvém `node:vm` kontextu,
 * který obsahuje jen `value` (alias `string`) a zmrazený `logger`. Není
 * dostupný `require`, `process` ani globály hostitele, generování kódu ze
 * stringů a WebAssembly jsou vypnuté a každé vyhodnocení má timeout.
 *
 * `node:vm` není bezpečnostní hranice proti cílenému útoku, proto jsou
 * `code` pravidla vypnutá, dokud je konfigurace výslovně nepovolí.
 */

import { Script, createContext, type Context } from 'node:vm';
import type { Logger } from '../logging/logger.js';
import { LOG_LEVELS, type LogLevel } from '../logging/logger.js';
import { RuleParseError } from '../dsl/helpers/errors.js';

export const DEFAULT_CODE_TIMEOUT_MS = 50;

export interface CodeSandboxOptions {
  timeoutMs?: number | undefined;
  logger: Logger;
  /** Cesta v konfiguraci pro chybové hlášky */
  path?: string | undefined;
}

type HostEmit = (level: unknown, message: unknown) => void;

/**
 * Facade `logger` vzniká uvnitř kontextu. Její funkce patří realmu kontextu
 * (kde je generování kódu vypnuté) a host callback drží jen v closure.
 */
const LOGGER_BOOTSTRAP = new Script(
  `(function (emit) {
  'use strict';
  const method = (level) => Object.freeze(function (message) { emit(level, \`\${message}\`); });
  const logger = Object.freeze({ debug: method('debug'), info: method('info'), warn: method('warn'), error: method('error') });
  Object.defineProperty(globalThis, 'logger', { value: logger, enumerable: true });
})`,
  { filename: 'rule-logger.js' },
);

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

export class CodeSandbox {
  private readonly script: Script;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  /**
   * @throws {RuleParseError} Pokud fragment nejde zkompilovat
   */
  constructor(source: string, options: CodeSandboxOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CODE_TIMEOUT_MS;
    this.logger = options.logger;

    try {
      this.script = new Script(`(function () {\n${source}\n})()`, { filename: 'rule-code.js' });
    } catch (err) {
      throw new RuleParseError(
        `code block does not compile: ${err instanceof Error ? err.message : String(err)}`,
        options.path,
      );
    }
  }

  /**
   * Globální objekt bez prototypu, takže `this.constructor` vede na
   * `Function` kontextu, ne hostitele. Zprávy loggeru se jen ukládají,
   * do skutečného loggeru jdou až po doběhnutí fragmentu.
   */
  private createSandboxContext(value: string, pending: Array<[LogLevel, string]>): Context {
    const globals: Record<string, unknown> = Object.create(null);
    globals['value'] = value;
    globals['string'] = value;
    const context = createContext(globals, { codeGeneration: { strings: false, wasm: false } });

    const install: unknown = LOGGER_BOOTSTRAP.runInContext(context);
    if (typeof install !== 'function') {
      throw new Error('Rule logger bootstrap did not produce a function');
    }
    const emit: HostEmit = (level, message) => {
      if (isLogLevel(level) && typeof message === 'string') {
        pending.push([level, message]);
      }
    };
    install(emit);
    return context;
  }

  /**
   * Spustí fragment nad hodnotou. Chyba, timeout nebo ne-primitivní
   * výsledek znamenají `false`.
   */
  run(value: string): boolean {
    const pending: Array<[LogLevel, string]> = [];
    const context = this.createSandboxContext(value, pending);

    let result: unknown;
    try {
      result = this.script.runInContext(context, { timeout: this.timeoutMs });
    } catch (err) {
      this.flush(pending);
      this.logger.error(`Error executing code block: ${describeError(err)}`);
      return false;
    }
    this.flush(pending);

    if (typeof result === 'object' || typeof result === 'function') {
      this.logger.debug('Code block returned a non-primitive result, treating it as false');
      return false;
    }

    this.logger.debug(`Code block executed with result: ${String(result)}`);
    return Boolean(result);
  }

  private flush(pending: Array<[LogLevel, string]>): void {
    for (const [level, message] of pending) {
      this.logger[level](message);
    }
  }
}

/** Chyby z kontextu nejsou `instanceof Error` hostitele */
function describeError(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
