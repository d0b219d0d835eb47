import type { UsageGraph } from "./usage-graph.js";

/**
 * Breadth-first traversal from every entry node over all edges, static and
 * dynamic. Cycles are safe: each node is visited once.
 */
export function computeReachable(graph: UsageGraph): Set<string> {
  const visited = new Uint8Array(graph.size);
  const queue: number[] = [];
  for (const entry of graph.entries) {
    if (visited[entry]) continue;
    visited[entry] = 1;
    queue.push(entry);
  }

  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (node === undefined) break;
    for (const edge of graph.successors(node)) {
      if (visited[edge.to]) continue;
      visited[edge.to] = 1;
      queue.push(edge.to);
    }
  }

  return new Set(queue.map((n) => graph.idOf(n)));
}
