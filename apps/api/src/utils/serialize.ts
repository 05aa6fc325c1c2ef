/**
 * Converts a camelCase string to snake_case.
 */
const camelToSnake = (str: string): string =>
  str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);

const isPlainObject = (value: unknown): value is object =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

/**
 * Transforms object keys from camelCase to snake_case.
 * - Top-level keys are transformed.
 * - Array values with object elements are recursively transformed.
 * - Non-array nested objects (variant maps, metadata) are left untouched.
 */
export const toSnakeKeys = (obj: object): Record<string, unknown> => {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const snakeKey = camelToSnake(key);
    if (Array.isArray(value)) {
      result[snakeKey] = value.map((item: unknown) => (isPlainObject(item) ? toSnakeKeys(item) : item));
    } else {
      result[snakeKey] = value;
    }
  }
  return result;
};
