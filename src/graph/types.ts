/** Shared type definitions describing the in-memory graph. */

/** Sentinel returned by lookups and insertions that could not produce a node. */
export const INVALID_NODE_ID = -1;

/** Default maximum number of node slots in a graph. */
export const DEFAULT_NODE_CAPACITY = 1000;

/** Default maximum number of edge slots per source node. */
export const DEFAULT_EDGES_PER_NODE = 20;

/** Width of the fixed name field, terminator included. */
export const NAME_FIELD_BYTES = 128;

/** Longest name kept by the store, in UTF-8 bytes. */
export const MAX_NAME_BYTES = NAME_FIELD_BYTES - 1;

/** Planar position. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Location stored in the graph. `id` equals the insertion index. */
export interface GraphNode extends Point {
  readonly id: number;
  readonly name: string;
  readonly active: boolean;
}

/** Directed, weighted connection between two nodes. */
export interface GraphEdge {
  readonly from: number;
  readonly to: number;
  readonly weight: number;
  readonly active: boolean;
}

export interface GraphStoreOptions {
  /** Maximum number of nodes ever created. Defaults to {@link DEFAULT_NODE_CAPACITY}. */
  readonly nodeCapacity?: number;
  /** Maximum number of edge slots per node. Defaults to {@link DEFAULT_EDGES_PER_NODE}. */
  readonly edgesPerNode?: number;
}
