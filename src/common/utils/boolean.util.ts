const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

/**
 * Maps query-string and multipart booleans to real booleans. Anything else is
 * returned untouched so `@IsBoolean()` can reject it.
 */
export function parseBooleanParam(value: unknown): unknown {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return value;

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  return value;
}
