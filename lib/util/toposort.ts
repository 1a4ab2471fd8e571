import { SimpleError } from './flow';

export type KeyFunc<T, K> = (x: T) => K;
export type DepFunc<T, K> = (x: T) => K[];

/**
 * Return a topological sort of all elements of xs, according to the given dependency functions
 *
 * Dependencies outside the list are ignored. Elements that are free to go in the same
 * round keep their original order.
 */
export function topologicalSort<T, K>(xs: Iterable<T>, keyFn: KeyFunc<T, K>, depFn: DepFunc<T, K>): T[] {
  const remaining = new Map<K, TopoElement<T, K>>();
  for (const element of xs) {
    const key = keyFn(element);
    remaining.set(key, { key, element, dependencies: depFn(element) });
  }

  const ret = new Array<T>();
  while (remaining.size > 0) {
    // All elements with no more deps in the set can be ordered
    const selectable = Array.from(remaining.values()).filter(e => e.dependencies.every(d => !remaining.has(d)));

    if (selectable.length === 0) {
      throw new SimpleError(`Dependency cycle between: ${Array.from(remaining.keys()).join(', ')}`);
    }

    for (const selected of selectable) {
      remaining.delete(selected.key);
      ret.push(selected.element);
    }
  }

  return ret;
}

interface TopoElement<T, K> {
  key: K;
  dependencies: K[];
  element: T;
}
