export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function tryParseJson(value: string): unknown {
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Parses model output that should be JSON but may arrive wrapped in prose or a
 * markdown fence: the whole text first, then the outermost `{...}` span.
 */
export function extractFirstJsonObject(text: string): unknown {
  const direct = tryParseJson(text.trim());
  if (direct !== undefined) {
    return direct;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) {
    return undefined;
  }

  return tryParseJson(text.slice(start, end + 1));
}
