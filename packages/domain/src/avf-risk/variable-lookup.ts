/**
 * Case-insensitive lookup of per-variable artifact entries.
 * Keys are trimmed and lowercased on both sides.
 */
export function normalizeVariableName(name: string): string {
  return name.trim().toLowerCase();
}

export function lookupVariable<T>(
  entries: Readonly<Record<string, T>>,
  variableName: string
): T | undefined {
  const target = normalizeVariableName(variableName);
  for (const [key, value] of Object.entries(entries)) {
    if (normalizeVariableName(key) === target) {
      return value;
    }
  }
  return undefined;
}
