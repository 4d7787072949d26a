/**
 * Numeric environment variables. An empty or unset variable yields the
 * fallback; a non-numeric value throws.
 */

function readNumber(name: string, parse: (raw: string) => number): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = parse(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

export function parseIntEnv(name: string, fallback: number): number {
  return readNumber(name, (raw) => parseInt(raw, 10)) ?? fallback;
}

export function parseFloatEnv(name: string, fallback: number): number {
  return readNumber(name, parseFloat) ?? fallback;
}

export function optionalFloatEnv(name: string): number | undefined {
  return readNumber(name, parseFloat);
}
