export type IntRange = { readonly min: number; readonly max: number };

export const assertIntegerInRange = (name: string, value: number, range: IntRange): number => {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
  return value;
};
