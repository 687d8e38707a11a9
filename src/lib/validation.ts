export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function validatePositiveInt(field: string, value: unknown, max = 1_000_000): number {
  const n = typeof value === 'number' ? value : parseInt(String(value ?? ''), 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError(field, `${field} must be a positive integer`);
  }
  if (n > max) {
    throw new ValidationError(field, `${field} must be at most ${max}`);
  }
  return n;
}

export function validateSeed(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError('seed', 'Seed must be an integer');
  }
  return value >>> 0;
}

export function validatePositiveNumber(field: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ValidationError(field, `${field} must be a positive number`);
  }
  return value;
}

export function validateProbability(field: string, value: unknown): number {
  if (typeof value !== 'number' || Number.isNaN(value) || value < 0 || value > 1) {
    throw new ValidationError(field, `${field} must be a number between 0 and 1`);
  }
  return value;
}

export function validateRange(field: string, range: { min: number; max: number }): { min: number; max: number } {
  const min = validatePositiveInt(`${field}.min`, range.min);
  const max = validatePositiveInt(`${field}.max`, range.max);
  if (min > max) {
    throw new ValidationError(field, `${field}.min must not exceed ${field}.max`);
  }
  return { min, max };
}
