import { topologicalSort } from './toposort';

/**
 * Directed acylic graph
 */
export class Graph<A> {
  private _nodes = new Set<A>();
  private _outgoing = new Map<A, A[]>();
  private _incoming = new Map<A, A[]>();

  public addNode(...nodes: A[]) {
    for (const node of nodes) {
      this._nodes.add(node);
    }
  }

  public addEdge(from: A, to: A) {
    if (!this._nodes.has(from)) {
      throw new Error(`FROM node is not in Graph`);
    }
    if (!this._nodes.has(to)) {
      throw new Error(`TO node is not in Graph`);
    }

    appendTo(this._outgoing, from, to);
    appendTo(this._incoming, to, from);
  }

  public* edges(): IterableIterator<[A, A]> {
    for (const [from, tos] of this._outgoing) {
      for (const to of tos) {
        yield [from, to];
      }
    }
  }

  /**
   * Select only the nodes in the list and any edges touching nodes in the list
   */
  public subgraph(nodes: A[]) {
    const ns = new Set(nodes);
    const ret = new Graph<A>();
    ret.addNode(...nodes);
    for (const [from, to] of this.edges()) {
      if (ns.has(from) && ns.has(to)) {
        ret.addEdge(from, to);
      }
    }
    return ret;
  }

  public feedsInto(...nodes: A[]) {
    return this.closure(nodes, this._incoming);
  }

  public sorted(): A[] {
    return topologicalSort(this._nodes, x => x, x => this._incoming.get(x) ?? []);
  }

  private closure(startingNodes: A[], links: Map<A, A[]>) {
    const ret = new Set<A>();
    const toInspect = [...startingNodes];
    while (toInspect.length > 0) {
      const node = toInspect.splice(0, 1)[0];
      if (!this._nodes.has(node)) {
        throw new Error(`Found a node not in the graph: ${node}`);
      }
      if (ret.has(node)) { continue; } // Already visited
      ret.add(node);
      const ls = links.get(node);
      if (ls) { toInspect.push(...ls); }
    }
    return Array.from(ret);
  }
}

function appendTo<A>(map: Map<A, A[]>, key: A, value: A) {
  const existing = map.get(key);
  if (existing) {
    existing.push(value);
  } else {
    map.set(key, [value]);
  }
}
