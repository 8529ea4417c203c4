/**
 * Decoded session payload: the key/value bag application code works with.
 */
export type SessionValues = Record<string, unknown>;

/**
 * Codec between {@link SessionValues} and the opaque string a backend stores.
 */
export type SessionSerializer = {
  serialize: (values: SessionValues) => string;
  deserialize: (raw: string) => SessionValues;
};

export const jsonSessionSerializer: SessionSerializer = {
  serialize(values) {
    return JSON.stringify(values);
  },
  deserialize(raw) {
    if (raw === "") {
      return {};
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isPlainObject(parsed)) {
      throw new TypeError("Session payload must decode to an object.");
    }
    return parsed;
  },
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
