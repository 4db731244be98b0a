/**
 * Deterministic JSON formatting utilities
 */

/**
 * Stable, deterministic JSON stringification with alphabetical key ordering
 *
 * Values with a `toJSON` method (ordered vectors, 2D arrays, dates) are
 * converted first. Bigints are written as decimal strings.
 *
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @returns Formatted JSON string with trailing newline
 * @throws Error if circular references detected
 */
export function stableStringify(value: unknown, indent = 2): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  };

  const normalize = (input: unknown): unknown => {
    if (typeof input === "bigint") {
      return input.toString();
    }

    if (input === null || typeof input !== "object") {
      return input;
    }

    // Detect cycles
    if (seen.has(input)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(input);

    try {
      if (hasToJSON(input)) {
        return normalize(input.toJSON());
      }

      // Arrays: preserve order but normalize contents
      if (Array.isArray(input)) {
        return input.map(normalize);
      }

      // Objects: sort keys and normalize values
      const out: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(input).sort(([a], [b]) => sorter(a, b))) {
        out[key] = normalize(entry);
      }
      return out;
    } finally {
      seen.delete(input);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return "toJSON" in value && typeof value.toJSON === "function";
}

/**
 * Safe JSON parsing with structured error information
 * @param raw - Raw string to parse
 * @returns Parsed value or error details
 */
export function safeParseJson(
  raw: string
): { success: true; data: unknown } | { success: false; error: string } {
  try {
    const data: unknown = JSON.parse(raw);
    return { success: true, data };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}
