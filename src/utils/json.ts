import stringify from 'safe-stable-stringify';

/**
 * Pretty-printed JSON with stable key order. Bigints are written as plain JSON integers.
 */
export function safeStringifyPretty(value: unknown, indent = 2): string {
  const result = stringify(value, null, indent);
  return result !== undefined ? result : '{}';
}
