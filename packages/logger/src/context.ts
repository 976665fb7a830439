interface JsonConvertible {
  toJSON(): unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonConvertible(value: object): value is JsonConvertible {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function toPlain(value: unknown, ancestors: readonly object[]): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'function' || typeof value === 'symbol') return undefined;
  if (typeof value !== 'object' || value === null) return value;

  // only a reference back up the current path is a cycle; siblings may share objects
  if (ancestors.includes(value)) return '[Circular]';
  const path = [...ancestors, value];

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (isJsonConvertible(value)) {
    return toPlain(value.toJSON(), path);
  }
  if (value instanceof Error) {
    return { message: value.message, name: value.name, stack: value.stack };
  }
  if (Array.isArray(value)) {
    return value.map((item) => toPlain(item, path) ?? null);
  }
  if (value instanceof Map) {
    return toPlain(Object.fromEntries(value), path);
  }
  if (value instanceof Set) {
    return toPlain([...value], path);
  }

  const plain: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const converted = toPlain(entry, path);
    if (converted !== undefined) plain[key] = converted;
  }
  return plain;
}

/**
 * Reduce a log context to JSON-safe data before it reaches any sink.
 */
export function toPlainContext(context: Record<string, unknown>): Record<string, unknown> {
  const plain = toPlain(context, []);
  return isRecord(plain) ? plain : {};
}
