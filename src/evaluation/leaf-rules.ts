/** Cache pro RegExp objekty `pattern` pravidel */
const patternCache = new Map<string, RegExp>();

/**
 * Zkompiluje (a nacachuje) sticky regex - match musí začínat na pozici 0,
 * ale nemusí pokrýt celý řetězec.
 */
export function compilePattern(pattern: string): RegExp {
  let regex = patternCache.get(pattern);
  if (!regex) {
    regex = new RegExp(pattern, 'y');
    patternCache.set(pattern, regex);
  }
  return regex;
}

/**
 * Anchored match: `^abc` i `abc` odpovídají `"abcdef"`, ale ne `"xabc"`.
 */
export function matchesPattern(regex: RegExp, value: string): boolean {
  regex.lastIndex = 0;
  return regex.test(value);
}

/**
 * Vytáhne číslo z `"10"` nebo `"label:10"` (text za posledním `:`).
 * Vrací `null` pro prázdný nebo nečíselný vstup.
 */
export function parseRangeValue(value: string): number | null {
  const colon = value.lastIndexOf(':');
  const text = (colon === -1 ? value : value.slice(colon + 1)).trim();
  if (text.length === 0) {
    return null;
  }

  const num = Number(text);
  return Number.isNaN(num) ? null : num;
}

/**
 * `min <= x <= max`; nečíselný vstup je false, nikdy nevyhazuje.
 */
export function withinRange(min: number, max: number, value: string): boolean {
  const num = parseRangeValue(value);
  return num !== null && min <= num && num <= max;
}
