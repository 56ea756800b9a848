import { z } from "zod";

import { ValidationError } from "../errors.js";
import { HEURISTIC_KINDS, type HeuristicKind } from "./heuristic.js";

/**
 * Schema guarding the search configuration. Missing fields fall back to the
 * defaults of standard, admissible A*.
 */
export const AStarConfigSchema = z
  .object({
    heuristic: z.enum(HEURISTIC_KINDS).default("euclidean"),
    heuristicWeight: z.number().finite().nonnegative().default(1),
    /** Reserved for grid maps; graph search ignores it. */
    allowDiagonal: z.boolean().default(true),
  })
  .strict();

export type AStarConfigInput = z.input<typeof AStarConfigSchema>;

export interface AStarConfig {
  readonly heuristic: HeuristicKind;
  /** 1 keeps A* optimal; larger values search greedier without that guarantee. */
  readonly heuristicWeight: number;
  readonly allowDiagonal: boolean;
}

export function defaultAStarConfig(): AStarConfig {
  return { heuristic: "euclidean", heuristicWeight: 1, allowDiagonal: true };
}

/** Validates a partial configuration and fills in the defaults. */
export function resolveAStarConfig(input: AStarConfigInput = {}): AStarConfig {
  const parsed = AStarConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid A* configuration", { issues: parsed.error.issues });
  }
  return parsed.data;
}
