/**
 * Hierarchie chybových tříd.
 *
 * Konfigurační chyby dědí z {@link ConfigurationError}, takže je lze odchytit
 * najednou a přeskočit jen dotčený test:
 *
 * ```typescript
 * try {
 *   await loadTestFromFile('./tests/auth.yml');
 * } catch (err) {
 *   if (err instanceof ConfigurationError) {
 *     // YAML syntaxe, struktura testu nebo neplatné pravidlo
 *   }
 * }
 * ```
 */

/** Společný předek všech chyb knihovny */
export class ProtocheckError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProtocheckError';
  }
}

/**
 * Chyba konfigurace testu, stavu nebo akce.
 *
 * `path` ukazuje na místo v konfiguraci (např. `states.auth.verify.triggers[0]`).
 */
export class ConfigurationError extends ProtocheckError {
  readonly path: string | undefined;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigurationError';
    this.path = path;
  }
}

/** Neplatná podmínka pravidla (neznámý název, chybné parametry, zakázaný `code`) */
export class RuleParseError extends ConfigurationError {
  constructor(message: string, path?: string) {
    super(message, path);
    this.name = 'RuleParseError';
  }
}
