/** Throws if value is not a positive finite number. */
export function assertPositive(value: number, label: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${label}: expected positive number, got ${value}`);
  }
  return value;
}

/** Throws if value is not a whole number >= 1 (worker counts, list sizes). */
export function assertPositiveInt(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${label}: expected positive integer, got ${value}`);
  }
  return value;
}
