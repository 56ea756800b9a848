import * as fc from "fast-check";

import { GraphStore } from "../../src/graph/store.js";

/**
 * A(0,0), B(10,0), C(10,10) with A→B (10), B→C (10) and a direct A→C (30). D
 * sits far away with no edges at all.
 */
export function buildTriangleGraph(): { graph: GraphStore; a: number; b: number; c: number; d: number } {
  const graph = new GraphStore({ nodeCapacity: 8, edgesPerNode: 4 });
  const a = graph.addNode("A", 0, 0);
  const b = graph.addNode("B", 10, 0);
  const c = graph.addNode("C", 10, 10);
  const d = graph.addNode("D", 100, 100);
  graph.addEdge(a, b, 10);
  graph.addEdge(b, c, 10);
  graph.addEdge(a, c, 30);
  return { graph, a, b, c, d };
}

/** Reference shortest-path cost by plain O(n²) Dijkstra; `Infinity` when unreachable. */
export function dijkstraCost(graph: GraphStore, start: number, goal: number): number {
  const dist = new Array<number>(graph.nodeCount).fill(Number.POSITIVE_INFINITY);
  const done = new Array<boolean>(graph.nodeCount).fill(false);
  dist[start] = 0;
  for (;;) {
    let current = -1;
    for (let id = 0; id < graph.nodeCount; id++) {
      if (!done[id] && graph.isActive(id) && (current === -1 || dist[id] < dist[current])) {
        current = id;
      }
    }
    if (current === -1 || dist[current] === Number.POSITIVE_INFINITY) {
      return dist[goal];
    }
    if (current === goal) {
      return dist[goal];
    }
    done[current] = true;
    for (const edge of graph.outgoingEdges(current)) {
      dist[edge.to] = Math.min(dist[edge.to], dist[current] + edge.weight);
    }
  }
}

export interface GeneratedGraph {
  readonly points: ReadonlyArray<{ x: number; y: number }>;
  /** `[from, to, stretch]` where the weight is the straight-line distance times `1 + stretch`. */
  readonly links: ReadonlyArray<readonly [number, number, number]>;
}

/**
 * Random planar graphs whose edge weights never undercut the straight-line
 * distance, so every heuristic bounded by it stays admissible.
 */
export const generatedGraphArb: fc.Arbitrary<GeneratedGraph> = fc
  .integer({ min: 2, max: 12 })
  .chain((size) =>
    fc.record({
      points: fc.array(fc.record({ x: fc.integer({ min: 0, max: 100 }), y: fc.integer({ min: 0, max: 100 }) }), {
        minLength: size,
        maxLength: size,
      }),
      links: fc.array(
        fc.tuple(
          fc.integer({ min: 0, max: size - 1 }),
          fc.integer({ min: 0, max: size - 1 }),
          fc.double({ min: 0, max: 2, noNaN: true }),
        ),
        { maxLength: size * 3 },
      ),
    }),
  );

/** Materialises a {@link GeneratedGraph}; duplicate links are refused by the store. */
export function buildGeneratedGraph(shape: GeneratedGraph): GraphStore {
  const graph = new GraphStore({ nodeCapacity: shape.points.length, edgesPerNode: 40 });
  shape.points.forEach((point, index) => graph.addNode(`n${index}`, point.x, point.y));
  for (const [from, to, stretch] of shape.links) {
    const straight = graph.distance(from, to) ?? 0;
    graph.addEdge(from, to, straight * (1 + stretch));
  }
  return graph;
}
