import { RowValidationError } from '../errors/import.errors';
import { BooleanTokens } from '../interface/import-report.interface';

const INTEGER_PATTERN = /^\d+$/;
const DECIMAL_PATTERN = /^\d+(?:\.(\d+))?$/;

export function requireText(value: string, column: string, maxLength?: number): string {
  const text = value.trim();
  if (!text) {
    throw new RowValidationError(`Missing ${column}`);
  }
  return limitLength(text, column, maxLength);
}

export function optionalText(value: string, column: string, maxLength?: number): string | null {
  const text = value.trim();
  return text ? limitLength(text, column, maxLength) : null;
}

function limitLength(text: string, column: string, maxLength?: number): string {
  if (maxLength !== undefined && text.length > maxLength) {
    throw new RowValidationError(`${column} is longer than ${maxLength} characters`);
  }
  return text;
}

interface IntegerRules {
  min: number;
  fallback: number;
}

/** Non-negative whole number; empty cells take the fallback. */
export function parseInteger(value: string, column: string, rules: IntegerRules): number {
  const text = value.trim();
  if (!text) return rules.fallback;

  if (!INTEGER_PATTERN.test(text)) {
    throw new RowValidationError(`Invalid ${column} "${text}": expected a whole number`);
  }
  const parsed = Number(text);
  if (!Number.isSafeInteger(parsed) || parsed < rules.min) {
    throw new RowValidationError(`Invalid ${column} "${text}": must be at least ${rules.min}`);
  }
  return parsed;
}

interface DecimalRules {
  max: number;
  decimalPlaces: number;
  fallback?: number;
}

/** Non-negative decimal with a bounded scale. Trailing zeros do not count toward the scale. */
export function parseDecimal(value: string, column: string, rules: DecimalRules): number {
  const text = value.trim();
  if (!text) {
    if (rules.fallback === undefined) {
      throw new RowValidationError(`Missing ${column}`);
    }
    return rules.fallback;
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new RowValidationError(`Invalid ${column} "${text}": expected a non-negative number`);
  }

  const fraction = (match[1] ?? '').replace(/0+$/, '');
  if (fraction.length > rules.decimalPlaces) {
    throw new RowValidationError(
      `Invalid ${column} "${text}": at most ${rules.decimalPlaces} decimal place(s) allowed`,
    );
  }

  const parsed = Number(text);
  if (parsed > rules.max) {
    throw new RowValidationError(`Invalid ${column} "${text}": must not exceed ${rules.max}`);
  }
  return parsed;
}

export function parseBooleanToken(
  value: string,
  column: string,
  tokens: BooleanTokens,
  fallback: boolean,
): boolean {
  const token = value.trim().toLowerCase();
  if (!token) return fallback;
  if (tokens.truthy.includes(token)) return true;
  if (tokens.falsy.includes(token)) return false;
  throw new RowValidationError(`Invalid ${column} "${value.trim()}": expected one of ${[...tokens.truthy, ...tokens.falsy].join(', ')}`);
}
