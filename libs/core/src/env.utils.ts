const stripWrapping = (value: string): string =>
  value.trim().replace(/^['"(\s]+/, '').replace(/['")\s]+$/, '');

/**
 * Loosely parses a boolean-like env value. Values that do not look like a
 * boolean are returned unchanged so that the schema reports them.
 */
export const booleanFromEnv = (value: unknown): unknown => {
  if (typeof value !== 'string') return value;
  const normalized = stripWrapping(value).toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
};

export const numberFromEnv = (value: unknown): unknown => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') return value;
  const normalized = stripWrapping(value);
  if (!normalized) return undefined;
  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : value;
};
