/**
 * A producer supplied a score value that cannot be read as a number.
 */
export class InvalidScoreError extends Error {
  readonly key: string;
  readonly value: unknown;

  constructor(key: string, value: unknown) {
    super(`Score "${key}" must be numeric, got ${describeValue(value)}`);
    this.name = 'InvalidScoreError';
    this.key = key;
    this.value = value;
  }
}

/**
 * A fusion weight table is incomplete, negative or does not sum to 1.
 */
export class InvalidWeightsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidWeightsError';
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `"${value}"`;
  if (typeof value === 'object') return Array.isArray(value) ? 'array' : 'object';
  return `${typeof value} ${String(value)}`;
}
