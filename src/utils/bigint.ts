export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Converts a value into something JSON.stringify can carry without loss:
 * bigint becomes a decimal string and Maps become plain objects.
 */
export const toJsonSafe = (data: unknown): JsonValue => {
  if (data === null || data === undefined) return null;

  if (typeof data === 'bigint') {
    return data.toString();
  }

  if (typeof data === 'string' || typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }

  if (Array.isArray(data)) {
    return data.map(toJsonSafe);
  }

  // fromEntries defines own keys, so a "__proto__" key survives as data
  if (data instanceof Map) {
    return Object.fromEntries(
      Array.from(data, ([key, value]): [string, JsonValue] => [String(key), toJsonSafe(value)]),
    );
  }

  if (typeof data === 'object') {
    return Object.fromEntries(
      Object.entries(data).map(([key, value]): [string, JsonValue] => [key, toJsonSafe(value)]),
    );
  }

  return null;
};
