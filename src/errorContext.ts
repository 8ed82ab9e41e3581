const RESERVED_KEYS: readonly string[] = ['schemaVersion', 'name', 'code', 'message', 'hint', 'context'];

/**
 * Copy an error context for serialization, dropping keys that would collide
 * with top-level fields of the serialized error.
 */
export function sanitizeErrorContext(
  context: Record<string, string> | undefined,
  topLevelKeys: readonly string[] = []
): Record<string, string> {
  if (!context) return {};
  const blocked = new Set<string>([...RESERVED_KEYS, ...topLevelKeys]);
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (blocked.has(key)) continue;
    sanitized[key] = value;
  }
  return sanitized;
}
