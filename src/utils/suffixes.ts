function lastParts(parts: readonly string[], count: number, separator: string): string {
  return parts.slice(-count).join(separator);
}

/**
 * Maps every name to its shortest trailing run of `separator`-delimited parts that no
 * other name shares. A name that is itself a suffix of another keeps all its parts.
 */
export function shortenToUnambiguousSuffixes(names: Iterable<string>, separator = '/'): Map<string, string> {
  const split = [...new Set(names)].map((name) => ({ name, parts: name.split(separator) }));
  const shortened = new Map<string, string>();
  for (const { name, parts } of split) {
    let count = 1;
    while (
      count < parts.length &&
      split.some(
        (other) =>
          other.name !== name && lastParts(other.parts, count, separator) === lastParts(parts, count, separator)
      )
    ) {
      count += 1;
    }
    shortened.set(name, lastParts(parts, count, separator));
  }
  return shortened;
}
