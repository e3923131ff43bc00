/**
 * CLI chybové třídy.
 */

import { ExitCode } from '../types.js';
import { ConfigurationError } from '../../dsl/helpers/errors.js';
import { YamlLoadError } from '../../dsl/yaml/loader.js';
import type { SkippedTest } from '../../types/test.js';

/** Základní CLI chyba */
export class CliError extends Error {
  public readonly exitCode: ExitCode;
  public override readonly cause: Error | undefined;

  constructor(message: string, exitCode: ExitCode = ExitCode.GeneralError, cause?: Error) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
    this.cause = cause;
  }
}

/** Chyba validace argumentů */
export class InvalidArgumentsError extends CliError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.InvalidArguments, cause);
    this.name = 'InvalidArgumentsError';
  }
}

/** Soubor nenalezen */
export class FileNotFoundError extends CliError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    super(`File not found: ${filePath}`, ExitCode.FileNotFound, cause);
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
  }
}

/** Neplatná konfigurace testů nebo `.protocheck.json` */
export class ValidationError extends CliError {
  public readonly skipped: SkippedTest[];

  constructor(message: string, skipped: SkippedTest[] = [], cause?: Error) {
    super(message, ExitCode.ValidationError, cause);
    this.name = 'ValidationError';
    this.skipped = skipped;
  }
}

/** Některý test neprošel */
export class TestFailedError extends CliError {
  public readonly failed: string[];

  constructor(message: string, failed: string[] = []) {
    super(message, ExitCode.TestFailed);
    this.name = 'TestFailedError';
    this.failed = failed;
  }
}

/** Běh přerušen signálem */
export class InterruptedError extends CliError {
  constructor() {
    super('Test run interrupted', ExitCode.Interrupted);
    this.name = 'InterruptedError';
  }
}

/** Získá exit kód z chyby */
export function getExitCode(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof YamlLoadError) {
    return ExitCode.FileNotFound;
  }
  if (error instanceof ConfigurationError) {
    return ExitCode.ValidationError;
  }
  return ExitCode.GeneralError;
}

/** Formátuje chybu pro výstup */
export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    let message = error.message;
    if (error instanceof ValidationError && error.skipped.length > 0) {
      message += '\n' + error.skipped.map((s) => `  ✗ ${s.name}: ${s.error}`).join('\n');
    }
    if (error instanceof TestFailedError && error.failed.length > 0) {
      message += '\n' + error.failed.map((name) => `  ✗ ${name}`).join('\n');
    }
    return message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
