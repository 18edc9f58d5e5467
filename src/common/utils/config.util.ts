import { ConfigService } from '@nestjs/config';

export function readPositiveInt(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function readBoolean(config: ConfigService, key: string, fallback: boolean): boolean {
  const raw = config.get<string | boolean>(key);
  if (raw === undefined || raw === '') return fallback;
  if (typeof raw === 'boolean') return raw;
  return ['true', '1', 'yes'].includes(raw.trim().toLowerCase());
}

// Comma-separated env value, lower-cased
export function readTokenList(config: ConfigService, key: string, fallback: readonly string[]): string[] {
  const raw = config.get<string>(key);
  if (!raw) return [...fallback];
  return raw
    .split(',')
    .map((token) => token.trim().toLowerCase())
    .filter(Boolean);
}
