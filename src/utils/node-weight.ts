/**
 * Structural size of a value, used to pick the richer of two versions of
 * the same issue. Objects score 10 per entry and arrays 5 per element on
 * top of their contents; strings score their length in code points; other
 * scalars 1.
 */
export function nodeWeight(value: unknown): number {
  if (typeof value === "string") {
    return [...value].length;
  }
  if (Array.isArray(value)) {
    const elements: unknown[] = value;
    return (
      elements.reduce<number>((sum, element) => sum + nodeWeight(element), 0) +
      elements.length * 5
    );
  }
  if (typeof value === "object" && value !== null) {
    const values = Object.values(value);
    return (
      values.reduce<number>((sum, entry) => sum + nodeWeight(entry), 0) +
      values.length * 10
    );
  }
  return 1;
}
