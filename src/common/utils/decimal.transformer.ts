import { ValueTransformer } from 'typeorm';

/**
 * Drivers hand DECIMAL columns back as strings or numbers depending on the
 * engine; entities always see a number.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null || value === undefined ? null : Number(value),
};
