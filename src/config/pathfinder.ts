import { DEFAULT_EDGES_PER_NODE, DEFAULT_NODE_CAPACITY } from "../graph/types.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { HEURISTIC_KINDS, type HeuristicKind } from "../search/heuristic.js";
import { readBool, readEnum, readInt, readNumber, readOptionalString, type EnvSource } from "./env.js";

/** Upper bound accepted for `ROUTECRAFT_EXPLORE_CAP`. */
export const MAX_EXPLORE_CAP = 100_000;

export const DEFAULT_EXPLORE_CAP = 50;

/** Process-level defaults shared by the CLI and embedding applications. */
export interface PathfinderConfig {
  readonly heuristic: HeuristicKind;
  readonly heuristicWeight: number;
  readonly allowDiagonal: boolean;
  readonly nodeCapacity: number;
  readonly edgesPerNode: number;
  readonly exploreCap: number;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
}

/**
 * Resolves the configuration from environment variables. Unset or malformed
 * values fall back to the defaults instead of failing.
 *
 * - `ROUTECRAFT_HEURISTIC`: `euclidean` | `manhattan` | `chebyshev` | `zero`
 * - `ROUTECRAFT_HEURISTIC_WEIGHT`: non-negative number
 * - `ROUTECRAFT_ALLOW_DIAGONAL`: boolean literal
 * - `ROUTECRAFT_NODE_CAPACITY`, `ROUTECRAFT_EDGES_PER_NODE`: positive integers
 * - `ROUTECRAFT_EXPLORE_CAP`: positive integer
 * - `ROUTECRAFT_LOG_LEVEL`, `ROUTECRAFT_LOG_FILE`
 */
export function loadPathfinderConfig(env?: EnvSource): PathfinderConfig {
  return {
    heuristic: readEnum("ROUTECRAFT_HEURISTIC", HEURISTIC_KINDS, "euclidean", env),
    heuristicWeight: readNumber("ROUTECRAFT_HEURISTIC_WEIGHT", 1, { min: 0 }, env),
    allowDiagonal: readBool("ROUTECRAFT_ALLOW_DIAGONAL", true, env),
    nodeCapacity: readInt("ROUTECRAFT_NODE_CAPACITY", DEFAULT_NODE_CAPACITY, { min: 1 }, env),
    edgesPerNode: readInt("ROUTECRAFT_EDGES_PER_NODE", DEFAULT_EDGES_PER_NODE, { min: 1 }, env),
    exploreCap: readInt("ROUTECRAFT_EXPLORE_CAP", DEFAULT_EXPLORE_CAP, { min: 1, max: MAX_EXPLORE_CAP }, env),
    logLevel: readEnum("ROUTECRAFT_LOG_LEVEL", LOG_LEVELS, "warn", env),
    logFile: readOptionalString("ROUTECRAFT_LOG_FILE", env) ?? null,
  };
}
