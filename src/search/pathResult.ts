/** Marker stored in a predecessor table for "no predecessor". */
export const NO_PREDECESSOR = -1;

/**
 * Route produced by a search. The caller owns the result and calls
 * {@link PathResult.release} once done with it; afterwards the node sequence is
 * gone and {@link PathResult.released} reports true.
 */
export class PathResult {
  private sequence: number[];
  private releasedFlag = false;

  private constructor(
    nodes: readonly number[],
    readonly totalCost: number,
    readonly found: boolean,
  ) {
    this.sequence = [...nodes];
  }

  /** Empty result: no sequence, cost 0, `found = false`. */
  static notFound(): PathResult {
    return new PathResult([], 0, false);
  }

  static of(nodes: readonly number[], totalCost: number): PathResult {
    if (nodes.length === 0) {
      return PathResult.notFound();
    }
    return new PathResult(nodes, totalCost, true);
  }

  /** Node ids from start to goal, inclusive. */
  get nodes(): readonly number[] {
    return this.sequence;
  }

  get length(): number {
    return this.sequence.length;
  }

  get released(): boolean {
    return this.releasedFlag;
  }

  /** Drops the backing sequence. Calling it twice is harmless. */
  release(): void {
    this.sequence = [];
    this.releasedFlag = true;
  }

  toJSON(): { found: boolean; totalCost: number; nodes: number[] } {
    return { found: this.found, totalCost: this.totalCost, nodes: [...this.sequence] };
  }
}

/**
 * Walks predecessor links back from {@link goalId}. A chain that breaks or
 * takes more than {@link nodeCount} steps yields a not-found result instead of
 * looping forever.
 */
export function reconstructPath(
  predecessors: ArrayLike<number>,
  gScores: ArrayLike<number>,
  startId: number,
  goalId: number,
  nodeCount: number,
): PathResult {
  if (startId === goalId) {
    return PathResult.of([startId], 0);
  }

  const reversed: number[] = [];
  let current = goalId;
  while (current !== startId) {
    if (current === NO_PREDECESSOR || reversed.length >= nodeCount) {
      return PathResult.notFound();
    }
    reversed.push(current);
    current = predecessors[current] ?? NO_PREDECESSOR;
  }
  reversed.push(startId);

  return PathResult.of(reversed.reverse(), gScores[goalId] ?? 0);
}
