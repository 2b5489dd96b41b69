const DECIMAL_ID = /^\d+$/;

export function isPostId(value: string): boolean {
  return DECIMAL_ID.test(value);
}

// Post ids exceed Number.MAX_SAFE_INTEGER, so compare them as BigInt.
export function compareIds(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  if (x === y) return 0;
  return x < y ? -1 : 1;
}

export function isNewer(id: string, cursor: string): boolean {
  return compareIds(id, cursor) > 0;
}

export function maxId(ids: readonly string[]): string | null {
  let best: string | null = null;
  for (const id of ids) {
    if (best === null || compareIds(id, best) > 0) best = id;
  }
  return best;
}
