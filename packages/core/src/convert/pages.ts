/**
 * Parse a page list such as `"1,3,5-8"` into sorted, unique 1-based page
 * numbers. Reversed ranges are swapped, parts that do not parse are skipped
 * and, when `total` is given, pages outside 1..total are dropped.
 */
export function parsePageList(list: string, total?: number): number[] {
  const pages = new Set<number>();
  for (const raw of list.split(',')) {
    const part = raw.trim();
    if (!part) continue;
    const range = /^(\d+)\s*-\s*(\d+)$/.exec(part);
    if (range) {
      let a = Number(range[1]);
      let b = Number(range[2]);
      if (a > b) [a, b] = [b, a];
      const hi = total === undefined ? b : Math.min(b, total);
      for (let p = a; p <= hi; p++) pages.add(p);
      continue;
    }
    if (/^\d+$/.test(part)) pages.add(Number(part));
  }
  return [...pages]
    .filter((p) => p >= 1 && (total === undefined || p <= total))
    .sort((a, b) => a - b);
}
