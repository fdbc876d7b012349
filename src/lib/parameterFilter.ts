// lib/parameterFilter.ts

export interface FilteredParameters {
  accepted: Record<string, unknown>;
  ignored: string[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Keeps the arguments a tool declares. Unknown keys are dropped and
 * reported; null counts as "not given" so the tool's default applies.
 * Returns null when `args` is not an argument object at all.
 */
export function filterParameters(
  args: unknown,
  allowedKeys: readonly string[],
): FilteredParameters | null {
  if (args === undefined || args === null) {
    return { accepted: {}, ignored: [] };
  }
  if (!isPlainObject(args)) {
    return null;
  }

  const allowed = new Set(allowedKeys);
  const accepted: Record<string, unknown> = {};
  const ignored: string[] = [];

  for (const [key, value] of Object.entries(args)) {
    if (!allowed.has(key)) {
      ignored.push(key);
    } else if (value !== null) {
      accepted[key] = value;
    }
  }

  return { accepted, ignored };
}
