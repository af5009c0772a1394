// Name sets are plain string arrays kept sorted by UTF-16 code unit with no duplicates.

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function toSortedSet(names: Iterable<string>): string[] {
  return Array.from(new Set(names)).sort(compareNames);
}

/** Names in `left` that are not in `right`. */
export function sortedDifference(left: readonly string[], right: readonly string[]): string[] {
  const result: string[] = [];
  let j = 0;

  for (const name of left) {
    while (j < right.length && right[j] < name) j++;
    if (j >= right.length || right[j] !== name) {
      result.push(name);
    }
  }

  return result;
}

export function sortedIntersection(left: readonly string[], right: readonly string[]): string[] {
  const result: string[] = [];
  let i = 0;
  let j = 0;

  while (i < left.length && j < right.length) {
    const order = compareNames(left[i], right[j]);
    if (order === 0) {
      result.push(left[i]);
      i++;
      j++;
    } else if (order < 0) {
      i++;
    } else {
      j++;
    }
  }

  return result;
}
