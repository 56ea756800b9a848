import { performance } from "node:perf_hooks";

import { PATHFINDING_ERROR_TAXONOMY } from "../errors.js";
import type { GraphStore } from "../graph/store.js";
import type { GraphNode } from "../graph/types.js";
import type { PathfindingLogger } from "../logger.js";
import { resolveAStarConfig, type AStarConfigInput } from "./config.js";
import { heuristic, type HeuristicKind } from "./heuristic.js";
import { NO_PREDECESSOR, PathResult, reconstructPath } from "./pathResult.js";
import { PriorityQueue } from "./priorityQueue.js";

/** Observational counters collected during a search. */
export interface AStarStats {
  /** Entries popped from the open set. */
  readonly nodesExplored: number;
  /** Open-set size when the search stopped. */
  readonly nodesInOpenSet: number;
  /** Largest open-set size seen during the run. */
  readonly maxOpenSetSize: number;
  readonly searchTimeMs: number;
}

export interface PathSearch {
  readonly path: PathResult;
  readonly stats: AStarStats;
}

export interface SearchOptions {
  /** Receives an `astar_search_completed` debug entry. */
  readonly logger?: PathfindingLogger;
}

export interface ExplorationOptions {
  /** Defaults to `euclidean`, independent of any search configuration. */
  readonly heuristic?: HeuristicKind;
  /** Defaults to 1. */
  readonly heuristicWeight?: number;
}

function emptyStats(searchTimeMs = 0): AStarStats {
  return { nodesExplored: 0, nodesInOpenSet: 0, maxOpenSetSize: 0, searchTimeMs };
}

/** Per-call working storage; nothing survives the call that created it. */
interface WorkingSet {
  readonly gScore: Float64Array;
  readonly fScore: Float64Array;
  readonly cameFrom: Int32Array;
  readonly inOpenSet: Uint8Array;
  readonly inClosedSet: Uint8Array;
  readonly openSet: PriorityQueue;
}

function allocateWorkingSet(nodeCount: number): WorkingSet | null {
  try {
    const gScore = new Float64Array(nodeCount).fill(Number.POSITIVE_INFINITY);
    const fScore = new Float64Array(nodeCount).fill(Number.POSITIVE_INFINITY);
    const cameFrom = new Int32Array(nodeCount).fill(NO_PREDECESSOR);
    return {
      gScore,
      fScore,
      cameFrom,
      inOpenSet: new Uint8Array(nodeCount),
      inClosedSet: new Uint8Array(nodeCount),
      openSet: new PriorityQueue(nodeCount),
    };
  } catch (error) {
    if (error instanceof RangeError) {
      return null;
    }
    throw error;
  }
}

function resolveEndpoints(graph: GraphStore, startId: number, goalId: number): [GraphNode, GraphNode] | null {
  const start = graph.getNode(startId);
  const goal = graph.getNode(goalId);
  return start && goal ? [start, goal] : null;
}

/**
 * A* shortest path between two active nodes.
 *
 * Invalid or inactive endpoints and working-storage allocation failures return
 * an empty, not-found result rather than throwing. An invalid configuration
 * throws a `ValidationError`.
 *
 * The goal is accepted the first time it is popped from the open set, not when
 * it is first discovered, so an admissible heuristic with weight 1 yields an
 * optimal route.
 */
export function search(
  graph: GraphStore,
  startId: number,
  goalId: number,
  config: AStarConfigInput = {},
  options: SearchOptions = {},
): PathSearch {
  const cfg = resolveAStarConfig(config);
  const startedAt = performance.now();

  const finish = (path: PathResult, stats: AStarStats, reason: string): PathSearch => {
    options.logger?.debug("astar_search_completed", {
      start: startId,
      goal: goalId,
      heuristic: cfg.heuristic,
      heuristic_weight: cfg.heuristicWeight,
      found: path.found,
      total_cost: path.totalCost,
      reason,
      ...stats,
    });
    return { path, stats };
  };

  const endpoints = resolveEndpoints(graph, startId, goalId);
  if (!endpoints) {
    return finish(PathResult.notFound(), emptyStats(), PATHFINDING_ERROR_TAXONOMY.INVALID_REFERENCE.code);
  }
  const [startNode, goalNode] = endpoints;

  const nodeCount = graph.nodeCount;
  const working = allocateWorkingSet(nodeCount);
  if (!working) {
    return finish(
      PathResult.notFound(),
      emptyStats(performance.now() - startedAt),
      PATHFINDING_ERROR_TAXONOMY.ALLOCATION_FAILURE.code,
    );
  }
  const { gScore, fScore, cameFrom, inOpenSet, inClosedSet, openSet } = working;
  const estimate = (node: GraphNode): number => heuristic(node, goalNode, cfg.heuristic) * cfg.heuristicWeight;

  gScore[startId] = 0;
  fScore[startId] = estimate(startNode);
  openSet.push(startId, fScore[startId]);
  inOpenSet[startId] = 1;

  let nodesExplored = 0;
  let maxOpenSetSize = 1;
  let path = PathResult.notFound();

  while (!openSet.isEmpty()) {
    const current = openSet.pop();
    if (!current) {
      break;
    }
    const currentId = current.id;
    inOpenSet[currentId] = 0;
    nodesExplored += 1;

    // Lazy deletion: a stale entry for an already finalised node is skipped.
    if (inClosedSet[currentId] === 1) {
      continue;
    }
    inClosedSet[currentId] = 1;

    if (currentId === goalId) {
      path = reconstructPath(cameFrom, gScore, startId, goalId, nodeCount);
      break;
    }

    for (const edge of graph.outgoingEdges(currentId)) {
      const neighborId = edge.to;
      if (inClosedSet[neighborId] === 1) {
        continue;
      }
      const tentativeG = gScore[currentId] + edge.weight;
      if (!(tentativeG < gScore[neighborId])) {
        continue;
      }
      const neighbor = graph.getNode(neighborId);
      if (!neighbor) {
        continue;
      }

      cameFrom[neighborId] = currentId;
      gScore[neighborId] = tentativeG;
      fScore[neighborId] = tentativeG + estimate(neighbor);

      if (inOpenSet[neighborId] === 0) {
        // A full queue drops this branch of the frontier.
        if (openSet.push(neighborId, fScore[neighborId])) {
          inOpenSet[neighborId] = 1;
          maxOpenSetSize = Math.max(maxOpenSetSize, openSet.size);
        }
      } else {
        openSet.decreaseOrInsert(neighborId, fScore[neighborId]);
      }
    }
  }

  const stats: AStarStats = {
    nodesExplored,
    nodesInOpenSet: openSet.size,
    maxOpenSetSize,
    searchTimeMs: performance.now() - startedAt,
  };
  openSet.clear();
  return finish(path, stats, path.found ? "goal_reached" : PATHFINDING_ERROR_TAXONOMY.NOT_FOUND.code);
}

/**
 * Replays the search and records node ids in the order they are finalised,
 * stopping at the goal or after {@link cap} ids.
 *
 * The trace is advisory. It uses the Euclidean heuristic unless
 * {@link ExplorationOptions} says otherwise, so it can differ from the order
 * followed by a {@link search} configured with another heuristic or weight.
 * Invalid endpoints or a non-positive cap give an empty trace; an invalid
 * heuristic weight throws a `ValidationError`.
 */
export function explorationOrder(
  graph: GraphStore,
  startId: number,
  goalId: number,
  cap: number,
  options: ExplorationOptions = {},
): number[] {
  const limit = Number.isNaN(cap) ? 0 : Math.floor(cap);
  const endpoints = resolveEndpoints(graph, startId, goalId);
  if (!endpoints || limit <= 0) {
    return [];
  }
  const [startNode, goalNode] = endpoints;
  const cfg = resolveAStarConfig({
    heuristic: options.heuristic ?? "euclidean",
    heuristicWeight: options.heuristicWeight ?? 1,
  });
  const estimate = (node: GraphNode): number => heuristic(node, goalNode, cfg.heuristic) * cfg.heuristicWeight;

  const working = allocateWorkingSet(graph.nodeCount);
  if (!working) {
    return [];
  }
  const { gScore, inClosedSet, openSet } = working;
  const explored: number[] = [];

  gScore[startId] = 0;
  openSet.push(startId, estimate(startNode));

  while (explored.length < limit) {
    const current = openSet.pop();
    if (!current) {
      break;
    }
    const currentId = current.id;
    if (inClosedSet[currentId] === 1) {
      continue;
    }
    inClosedSet[currentId] = 1;
    explored.push(currentId);

    if (currentId === goalId) {
      break;
    }

    for (const edge of graph.outgoingEdges(currentId)) {
      const neighborId = edge.to;
      if (inClosedSet[neighborId] === 1) {
        continue;
      }
      const tentativeG = gScore[currentId] + edge.weight;
      const neighbor = graph.getNode(neighborId);
      if (!neighbor || !(tentativeG < gScore[neighborId])) {
        continue;
      }
      gScore[neighborId] = tentativeG;
      openSet.decreaseOrInsert(neighborId, tentativeG + estimate(neighbor));
    }
  }

  openSet.clear();
  return explored;
}
