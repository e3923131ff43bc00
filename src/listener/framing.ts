import { StringDecoder } from 'node:string_decoder';
import type { TriggerEvent } from '../types/event.js';
import type { Logger } from '../logging/logger.js';

/**
 * Rozparsuje jeden řádek `"<attribute> <value>"`.
 *
 * Řádek se ořízne, rozdělí na první mezeře a hodnota se znovu ořízne.
 * Prázdné řádky a řádky bez mezery vrací `null`.
 */
export function parseTriggerLine(line: string, logger?: Logger): TriggerEvent | null {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const separator = trimmed.indexOf(' ');
  if (separator === -1) {
    logger?.warn(`Dropping malformed trigger line: ${JSON.stringify(trimmed)}`);
    return null;
  }

  return {
    attribute: trimmed.slice(0, separator),
    value: trimmed.slice(separator + 1).trim(),
  };
}

/**
 * Splits a byte stream into newline-terminated lines.
 *
 * UTF-8 decoding keeps multi-byte characters intact across chunk boundaries
 * and replaces invalid sequences with U+FFFD. The unterminated tail stays
 * buffered until the next chunk; `end()` discards it.
 */
export class LineSplitter {
  private readonly decoder = new StringDecoder('utf8');
  private tail = '';

  push(chunk: Buffer | string): string[] {
    this.tail += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

    const lines = this.tail.split('\n');
    this.tail = lines.pop() ?? '';
    return lines;
  }

  /** Ukončí stream, vrací zahozený nedokončený zbytek */
  end(): string {
    const dropped = this.tail + this.decoder.end();
    this.tail = '';
    return dropped;
  }

  get pending(): string {
    return this.tail;
  }
}
