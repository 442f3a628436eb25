export const SEPARATOR = '_';

/**
 * Find where a digit body breaks its grouping.
 *
 * The body is split on underscores. The leading group may be shorter
 * than `width` but not empty; every later group must be exactly `width`
 * long. Returns the offset into `body` of the first offending character
 * (the body length when it ends too early), or null when the grouping
 * is valid.
 */
export function findInvalidSeparator(body: string, width: number): number | null {
  const segments = body.split(SEPARATOR);
  let start = 0;

  for (const [index, segment] of segments.entries()) {
    if (index === 0) {
      if (segment.length === 0) return 0;
      if (segment.length > width) return width;
    } else if (segment.length < width) {
      return start + segment.length;
    } else if (segment.length > width) {
      return start + width;
    }
    start += segment.length + SEPARATOR.length;
  }

  return null;
}

export function isValidlySeparated(body: string, width: number): boolean {
  return findInvalidSeparator(body, width) === null;
}
