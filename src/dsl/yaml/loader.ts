/**
 * YAML loader pro konfiguraci testů.
 *
 * @example
 * ```typescript
 * import { loadTestFromYAML, loadTestFromFile } from 'protocheck';
 *
 * const config = loadTestFromYAML(`
 *   states:
 *     ready:
 *       verify:
 *         triggers:
 *           - Status:
 *               pattern: ^OK
 * `);
 *
 * const fromFile = await loadTestFromFile('./tests/auth.yml');
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parseDocument } from 'yaml';
import { validateTest, YamlValidationError, type TestConfig } from './schema.js';
import { ConfigurationError } from '../helpers/errors.js';

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlLoadError extends ConfigurationError {
  constructor(message: string, readonly filePath?: string | undefined) {
    super(message, filePath);
    this.name = 'YamlLoadError';
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parsuje YAML řetězec a vrací validovanou konfiguraci testu.
 *
 * Soubor musí obsahovat jediný dokument a názvy stavů musí být unikátní.
 *
 * @throws {YamlLoadError} Při YAML syntaktické chybě, duplicitním klíči nebo prázdném vstupu
 * @throws {YamlValidationError} Při validační chybě struktury testu
 */
export function loadTestFromYAML(yamlContent: string): TestConfig {
  const document = parseDocument(yamlContent, { uniqueKeys: true });
  const [syntaxError] = document.errors;
  if (syntaxError !== undefined) {
    throw new YamlLoadError(`YAML syntax error: ${syntaxError.message}`);
  }

  const parsed: unknown = document.toJS();
  if (parsed === null || parsed === undefined) {
    throw new YamlLoadError('YAML content is empty');
  }

  return validateTest(parsed);
}

/**
 * Načte konfiguraci testu z YAML souboru.
 *
 * @throws {YamlLoadError} Při chybě čtení souboru, YAML syntaxi nebo prázdném souboru
 * @throws {YamlValidationError} Při validační chybě struktury (cesta s názvem souboru)
 */
export async function loadTestFromFile(filePath: string): Promise<TestConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new YamlLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  try {
    return loadTestFromYAML(content);
  } catch (err) {
    if (err instanceof YamlLoadError) {
      throw new YamlLoadError(err.message, filePath);
    }
    if (err instanceof YamlValidationError) {
      throw new YamlValidationError(err.message, filePath);
    }
    throw err;
  }
}
