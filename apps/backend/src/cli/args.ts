/**
 * Reads a positional argument as a positive whole number, falling back when
 * it is absent.
 */
export function positiveIntArg(
  raw: string | undefined,
  name: string,
  fallback: number,
): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive whole number, got "${raw}"`);
  }
  return value;
}
