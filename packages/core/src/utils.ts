const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Cuts a title down to maxLen characters (code points), ending it with "..."
 * when there is room for the marker. With maxLen <= 3 the title is cut
 * without a marker.
 */
export function truncateTitle(title: string, maxLen: number): string {
  const chars = [...title];
  if (chars.length <= maxLen) {
    return title;
  }
  if (maxLen <= 3) {
    return chars.slice(0, Math.max(0, maxLen)).join('');
  }
  return chars.slice(0, maxLen - 3).join('') + '...';
}

export function isUUID(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Type guard for plain objects (tool arguments, decoded JSON)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the trimmed string at key, or undefined when it is missing or blank.
 */
export function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Keeps the order of first appearance.
 */
export function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}
