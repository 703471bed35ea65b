import { readFileSync } from 'node:fs';

/**
 * US state (and DC) postal codes, used to recover a state from a
 * single-line address when the filing does not carry one separately.
 */

let stateCodes: Set<string> | null = null;

function loadStateCodes(): Set<string> {
  if (stateCodes) return stateCodes;
  // Resolves to <root>/data from both src/processing and dist/processing
  const raw = readFileSync(new URL('../../data/us-states.json', import.meta.url), 'utf8');
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every((code): code is string => typeof code === 'string')) {
    throw new Error('data/us-states.json must be an array of state codes');
  }
  stateCodes = new Set(parsed);
  return stateCodes;
}

export function isUsStateCode(code: string): boolean {
  return loadStateCodes().has(code);
}

/** Last standalone state code in the address ("Boston, MA 02110" -> "MA"), or null */
export function extractState(address: string): string | null {
  if (!address) return null;

  const tokens = address.split(/[\s,]+/).filter(Boolean);
  for (let i = tokens.length - 1; i >= 0; i--) {
    if (isUsStateCode(tokens[i])) return tokens[i];
  }
  return null;
}
