/**
 * Regex helpers shared by the document extractors.
 *
 * Patterns passed to `allCaptures` must carry the `g` flag.
 */

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * First capture group of the first pattern that matches, whitespace-collapsed
 */
export function firstCapture(
  text: string,
  patterns: RegExp[],
  group = 1,
): string | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    const captured = match?.[group];
    if (captured !== undefined) {
      const cleaned = collapseWhitespace(captured);
      if (cleaned) {
        return cleaned;
      }
    }
  }
  return undefined;
}

export function firstInteger(
  text: string,
  pattern: RegExp,
): number | undefined {
  const captured = firstCapture(text, [pattern]);
  if (captured === undefined) {
    return undefined;
  }
  const value = parseInt(captured, 10);
  return Number.isNaN(value) ? undefined : value;
}

export function allMatches(text: string, pattern: RegExp): RegExpExecArray[] {
  return Array.from(text.matchAll(pattern));
}

/**
 * Every capture of `group` across all patterns, in pattern order,
 * whitespace-collapsed, empty and duplicate values dropped
 */
export function allCaptures(
  text: string,
  patterns: RegExp[],
  options: { group?: number; maxLength?: number } = {},
): string[] {
  const group = options.group ?? 1;
  const results: string[] = [];

  for (const pattern of patterns) {
    for (const match of allMatches(text, pattern)) {
      const captured = match[group];
      if (captured === undefined) {
        continue;
      }
      const cleaned = collapseWhitespace(captured);
      if (
        !cleaned ||
        results.includes(cleaned) ||
        (options.maxLength !== undefined && cleaned.length >= options.maxLength)
      ) {
        continue;
      }
      results.push(cleaned);
    }
  }

  return results;
}
