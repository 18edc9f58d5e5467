import { ValueTransformer } from 'typeorm';

/** Decimal columns come back as strings on some drivers; keep them numbers in the domain. */
export const numericTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null): number | null => (value === null ? null : Number(value)),
};
