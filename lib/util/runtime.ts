export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

export function stringRecord(x: unknown): Record<string, string> | undefined {
  if (!isRecord(x)) { return undefined; }

  const ret: Record<string, string> = {};
  for (const [k, v] of Object.entries(x)) {
    if (typeof v === 'string') {
      ret[k] = v;
    }
  }
  return ret;
}

export function unique<A>(xs: Iterable<A>): A[] {
  return Array.from(new Set(xs));
}
