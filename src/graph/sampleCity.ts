import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { CapacityExceededError, ValidationError } from "../errors.js";
import { GraphStore, type GraphStoreInit } from "./store.js";
import { INVALID_NODE_ID } from "./types.js";

/** Bundled demo map, resolved next to the package whether run from sources or `dist`. */
export const SAMPLE_CITY_PATH = fileURLToPath(new URL("../../data/sample-city.json", import.meta.url));

const SampleCityNodeSchema = z
  .object({
    key: z.string().min(1),
    name: z.string(),
    x: z.number().finite(),
    y: z.number().finite(),
  })
  .strict();

export const SampleCitySchema = z
  .object({
    nodes: z.array(SampleCityNodeSchema),
    connections: z.array(z.tuple([z.string(), z.string()])),
  })
  .strict()
  .superRefine((city, ctx) => {
    const keys = new Set<string>();
    city.nodes.forEach((node, index) => {
      if (keys.has(node.key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["nodes", index, "key"], message: `duplicate key '${node.key}'` });
      }
      keys.add(node.key);
    });
    city.connections.forEach(([a, b], index) => {
      for (const key of [a, b]) {
        if (!keys.has(key)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["connections", index], message: `unknown node '${key}'` });
        }
      }
    });
  });

export type SampleCity = z.infer<typeof SampleCitySchema>;

/** Reads and validates a map definition. Throws a `ValidationError` when the JSON does not fit. */
export async function loadSampleCity(file: string = SAMPLE_CITY_PATH): Promise<SampleCity> {
  const raw: unknown = JSON.parse(await readFile(file, "utf8"));
  const parsed = SampleCitySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid map definition in ${file}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Adds the map to {@link graph}: one node per entry, then a pair of directed
 * edges per connection weighted by the Euclidean distance between its ends.
 * Returns the ids assigned to each key. Throws a `CapacityExceededError` when
 * a node or either direction of a road does not fit.
 */
export function populateSampleCity(graph: GraphStore, city: SampleCity): Map<string, number> {
  const ids = new Map<string, number>();
  for (const node of city.nodes) {
    const id = graph.addNode(node.name, node.x, node.y);
    if (id === INVALID_NODE_ID) {
      throw new CapacityExceededError(`Graph is full before node '${node.key}'`, {
        meta: { nodeCapacity: graph.nodeCapacity },
      });
    }
    ids.set(node.key, id);
  }

  for (const [a, b] of city.connections) {
    const from = ids.get(a);
    const to = ids.get(b);
    const weight = from === undefined || to === undefined ? undefined : graph.distance(from, to);
    if (from === undefined || to === undefined || weight === undefined) {
      continue;
    }
    graph.addBidirectionalEdge(from, to, weight);
    if (!graph.hasEdge(from, to) || !graph.hasEdge(to, from)) {
      throw new CapacityExceededError(`Graph has no edge slot left for road '${a}' <-> '${b}'`, {
        meta: { edgesPerNode: graph.edgesPerNode },
      });
    }
  }
  return ids;
}

export interface SampleCityOptions extends GraphStoreInit {
  /** Alternative map definition; defaults to the bundled one. */
  readonly file?: string;
}

/** Builds a fresh store holding the demo map. */
export async function buildSampleCity(options: SampleCityOptions = {}): Promise<GraphStore> {
  const { file, ...init } = options;
  const city = await loadSampleCity(file);
  const graph = new GraphStore(init);
  populateSampleCity(graph, city);
  return graph;
}
