import type { Point } from "../graph/types.js";

/** Distance estimates understood by the search engine. */
export const HEURISTIC_KINDS = ["euclidean", "manhattan", "chebyshev", "zero"] as const;

export type HeuristicKind = (typeof HEURISTIC_KINDS)[number];

/** Straight-line distance between two points. */
export function euclideanDistance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Estimated remaining cost between two positions.
 *
 * - `euclidean`: straight-line distance.
 * - `manhattan`: `|dx| + |dy|`.
 * - `chebyshev`: `max(|dx|, |dy|)`.
 * - `zero`: always 0, turning A* into Dijkstra's algorithm. Use it when edge
 *   weights do not correlate with planar distance.
 *
 * When weights are at least the straight-line distance, every kind except
 * `manhattan` is admissible; `manhattan` can overestimate diagonal moves.
 */
export function heuristic(a: Point, b: Point, kind: HeuristicKind): number {
  const dx = Math.abs(b.x - a.x);
  const dy = Math.abs(b.y - a.y);

  switch (kind) {
    case "euclidean":
      return Math.hypot(dx, dy);
    case "manhattan":
      return dx + dy;
    case "chebyshev":
      return Math.max(dx, dy);
    case "zero":
      return 0;
  }
}
