export const CM_PER_INCH = 2.54;
export const MM_PER_INCH = 25.4;

// Exact conversions. Rounding happens only where values are rendered.
export const cmToInches = (cm: number): number => cm / CM_PER_INCH;
export const mmToInches = (mm: number): number => mm / MM_PER_INCH;
export const celsiusToF = (valueC: number): number => (valueC * 9) / 5 + 32;

const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

export const formatInches = (inches: number | null | undefined, digits: number = 1): string =>
  isFiniteNumber(inches) ? `${inches.toFixed(digits)}"` : 'N/A';

export const sumFinite = (values: (number | null | undefined)[]): number =>
  values.reduce<number>((total, value) => (isFiniteNumber(value) ? total + value : total), 0);
