import { PATHFINDING_ERROR_TAXONOMY, PathfindingError, ValidationError, type PathfindingErrorCategory } from "../errors.js";
import type { PathfindingLogger } from "../logger.js";
import {
  DEFAULT_EDGES_PER_NODE,
  DEFAULT_NODE_CAPACITY,
  INVALID_NODE_ID,
  MAX_NAME_BYTES,
  type GraphEdge,
  type GraphNode,
  type GraphStoreOptions,
} from "./types.js";

interface NodeSlot {
  id: number;
  name: string;
  x: number;
  y: number;
  active: boolean;
}

interface EdgeSlot {
  from: number;
  to: number;
  weight: number;
  active: boolean;
}

export interface GraphStoreInit extends GraphStoreOptions {
  /** Receives a `debug` entry for every rejected mutation. */
  readonly logger?: PathfindingLogger;
}

/** Raw slot contents accepted by {@link GraphStore.fromSlots}. */
export interface GraphSlots {
  readonly nodeCapacity: number;
  readonly edgesPerNode: number;
  readonly nodes: readonly GraphNode[];
  /** Edge slots per source node, indexed like {@link nodes}. */
  readonly edges: readonly (readonly GraphEdge[])[];
}

const nameEncoder = new TextEncoder();

/**
 * Cuts {@link name} to at most {@link MAX_NAME_BYTES} UTF-8 bytes without
 * splitting a character.
 */
export function truncateName(name: string): string {
  if (nameEncoder.encode(name).length <= MAX_NAME_BYTES) {
    return name;
  }
  let result = "";
  let bytes = 0;
  for (const char of name) {
    const size = nameEncoder.encode(char).length;
    if (bytes + size > MAX_NAME_BYTES) {
      break;
    }
    result += char;
    bytes += size;
  }
  return result;
}

function assertCapacity(label: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${label} must be a positive integer`, { meta: { [label]: value } });
  }
}

/**
 * Capacity-bounded graph with id-stable slots. Nodes and edges are never
 * removed physically: removal flips their `active` flag and every query skips
 * inactive entries. Node ids equal their insertion index and are never reused.
 *
 * The store is not safe to mutate while a search over it is running; callers
 * serialise searches and mutations themselves.
 */
export class GraphStore {
  private nodeCapacityValue: number;
  private edgesPerNodeValue: number;
  private nodeSlots: NodeSlot[] = [];
  private edgeSlots: EdgeSlot[][] = [];
  private readonly logger?: PathfindingLogger;

  constructor(options: GraphStoreInit = {}) {
    const nodeCapacity = options.nodeCapacity ?? DEFAULT_NODE_CAPACITY;
    const edgesPerNode = options.edgesPerNode ?? DEFAULT_EDGES_PER_NODE;
    assertCapacity("nodeCapacity", nodeCapacity);
    assertCapacity("edgesPerNode", edgesPerNode);
    this.nodeCapacityValue = nodeCapacity;
    this.edgesPerNodeValue = edgesPerNode;
    this.logger = options.logger;
  }

  /**
   * Rebuilds a store from raw slots, inactive entries included. Throws a
   * {@link PathfindingError} when the slots break the graph invariants (ids
   * not matching their index, endpoints out of range, lists over capacity,
   * two active edges for the same pair).
   */
  static fromSlots(slots: GraphSlots, options: Pick<GraphStoreInit, "logger"> = {}): GraphStore {
    const store = new GraphStore({
      nodeCapacity: slots.nodeCapacity,
      edgesPerNode: slots.edgesPerNode,
      ...(options.logger ? { logger: options.logger } : {}),
    });
    const nodeCount = slots.nodes.length;
    if (nodeCount > slots.nodeCapacity) {
      throw new PathfindingError("CAPACITY_EXCEEDED", `node count ${nodeCount} exceeds capacity ${slots.nodeCapacity}`);
    }
    if (slots.edges.length !== nodeCount) {
      throw new PathfindingError("INVALID_REFERENCE", "edge lists must match the node count");
    }

    slots.nodes.forEach((node, index) => {
      if (node.id !== index) {
        throw new PathfindingError("INVALID_REFERENCE", `node at slot ${index} carries id ${node.id}`);
      }
      if (!Number.isFinite(node.x) || !Number.isFinite(node.y)) {
        throw new PathfindingError("INVALID_REFERENCE", `node ${index} has non-finite coordinates`);
      }
      store.nodeSlots.push({ id: index, name: truncateName(node.name), x: node.x, y: node.y, active: node.active });
    });

    slots.edges.forEach((list, from) => {
      if (list.length > slots.edgesPerNode) {
        throw new PathfindingError("CAPACITY_EXCEEDED", `node ${from} holds ${list.length} edges`);
      }
      const copies: EdgeSlot[] = [];
      const activeTargets = new Set<number>();
      for (const edge of list) {
        if (edge.from !== from || !Number.isInteger(edge.to) || edge.to < 0 || edge.to >= nodeCount) {
          throw new PathfindingError("INVALID_REFERENCE", `edge ${edge.from}->${edge.to} stored under node ${from}`);
        }
        if (!Number.isFinite(edge.weight) || edge.weight < 0) {
          throw new PathfindingError("INVALID_REFERENCE", `edge ${edge.from}->${edge.to} has an invalid weight`);
        }
        if (edge.active) {
          if (activeTargets.has(edge.to)) {
            throw new PathfindingError("DUPLICATE_EDGE", `edge ${edge.from}->${edge.to} is active more than once`);
          }
          activeTargets.add(edge.to);
        }
        copies.push({ from: edge.from, to: edge.to, weight: edge.weight, active: edge.active });
      }
      store.edgeSlots.push(copies);
    });

    return store;
  }

  get nodeCapacity(): number {
    return this.nodeCapacityValue;
  }

  get edgesPerNode(): number {
    return this.edgesPerNodeValue;
  }

  /** Number of node slots ever created, inactive ones included. */
  get nodeCount(): number {
    return this.nodeSlots.length;
  }

  get activeNodeCount(): number {
    let count = 0;
    for (const node of this.nodeSlots) {
      if (node.active) {
        count += 1;
      }
    }
    return count;
  }

  /** Whether {@link id} references an existing, active node. */
  isActive(id: number): boolean {
    return this.slotAt(id)?.active === true;
  }

  addNode(name: string, x: number, y: number): number {
    if (this.nodeSlots.length >= this.nodeCapacityValue) {
      this.reject("addNode", "CAPACITY_EXCEEDED", { name, nodeCapacity: this.nodeCapacityValue });
      return INVALID_NODE_ID;
    }
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      this.reject("addNode", "VALIDATION_ERROR", { name, x, y });
      return INVALID_NODE_ID;
    }
    const id = this.nodeSlots.length;
    this.nodeSlots.push({ id, name: truncateName(name), x, y, active: true });
    this.edgeSlots.push([]);
    return id;
  }

  /**
   * Deactivates the node, clears its outgoing list and deactivates every
   * active edge pointing at it. Returns false when the node is unknown or
   * already inactive.
   */
  removeNode(id: number): boolean {
    const node = this.slotAt(id);
    if (!node?.active) {
      this.reject("removeNode", "INVALID_REFERENCE", { id });
      return false;
    }
    node.active = false;
    this.edgeSlots[id] = [];

    for (const list of this.edgeSlots) {
      for (const edge of list) {
        if (edge.active && edge.to === id) {
          edge.active = false;
        }
      }
    }
    return true;
  }

  /** Snapshot of an active node, or `undefined`. */
  getNode(id: number): GraphNode | undefined {
    const node = this.slotAt(id);
    return node?.active ? { ...node } : undefined;
  }

  /** Snapshot of a node slot whether active or not. */
  nodeSlot(id: number): GraphNode | undefined {
    const node = this.slotAt(id);
    return node ? { ...node } : undefined;
  }

  /** Snapshot of every edge slot of {@link id}, inactive ones included. */
  edgeSlotsOf(id: number): GraphEdge[] {
    if (!this.slotAt(id)) {
      return [];
    }
    return (this.edgeSlots[id] ?? []).map((edge) => ({ ...edge }));
  }

  /** Number of edge slots used by {@link id}. */
  edgeSlotCount(id: number): number {
    return this.slotAt(id) ? (this.edgeSlots[id]?.length ?? 0) : 0;
  }

  addEdge(from: number, to: number, weight: number): boolean {
    if (!this.isActive(from) || !this.isActive(to)) {
      this.reject("addEdge", "INVALID_REFERENCE", { from, to });
      return false;
    }
    if (!Number.isFinite(weight) || weight < 0) {
      this.reject("addEdge", "VALIDATION_ERROR", { from, to, weight });
      return false;
    }
    const list = this.edgeSlots[from] ?? [];
    if (list.length >= this.edgesPerNodeValue) {
      this.reject("addEdge", "CAPACITY_EXCEEDED", { from, to, edgesPerNode: this.edgesPerNodeValue });
      return false;
    }
    if (this.findActiveEdge(from, to)) {
      this.reject("addEdge", "DUPLICATE_EDGE", { from, to });
      return false;
    }
    list.push({ from, to, weight, active: true });
    this.edgeSlots[from] = list;
    return true;
  }

  /**
   * Adds `a -> b` and `b -> a` as two independent edges. Succeeds when at
   * least one direction was created.
   */
  addBidirectionalEdge(a: number, b: number, weight: number): boolean {
    const forward = this.addEdge(a, b, weight);
    const backward = this.addEdge(b, a, weight);
    return forward || backward;
  }

  removeEdge(from: number, to: number): boolean {
    const edge = this.findActiveEdge(from, to);
    if (!edge) {
      this.reject("removeEdge", "INVALID_REFERENCE", { from, to });
      return false;
    }
    edge.active = false;
    return true;
  }

  edgeWeight(from: number, to: number): number | undefined {
    if (!this.isActive(to)) {
      return undefined;
    }
    return this.findActiveEdge(from, to)?.weight;
  }

  hasEdge(from: number, to: number): boolean {
    return this.edgeWeight(from, to) !== undefined;
  }

  /** Ids reachable through one active edge, in slot order. */
  neighbors(id: number): number[] {
    return this.outgoingEdges(id).map((edge) => edge.to);
  }

  /** Active edges leaving {@link id} towards active nodes. */
  outgoingEdges(id: number): GraphEdge[] {
    if (!this.isActive(id)) {
      return [];
    }
    const edges: GraphEdge[] = [];
    for (const edge of this.edgeSlots[id] ?? []) {
      if (edge.active && this.isActive(edge.to)) {
        edges.push({ ...edge });
      }
    }
    return edges;
  }

  /** Straight-line distance between two active nodes. */
  distance(a: number, b: number): number | undefined {
    const from = this.getNode(a);
    const to = this.getNode(b);
    if (!from || !to) {
      return undefined;
    }
    return Math.hypot(to.x - from.x, to.y - from.y);
  }

  /**
   * Finds an active node by name: a case-insensitive exact match first, then
   * a case-insensitive substring match. Both passes scan in id order and the
   * first hit wins.
   */
  findNodeByName(query: string): number {
    const needle = query.toLowerCase();
    if (needle.length === 0) {
      return INVALID_NODE_ID;
    }
    for (const node of this.nodeSlots) {
      if (node.active && node.name.toLowerCase() === needle) {
        return node.id;
      }
    }
    for (const node of this.nodeSlots) {
      if (node.active && node.name.toLowerCase().includes(needle)) {
        return node.id;
      }
    }
    return INVALID_NODE_ID;
  }

  /**
   * Closest active node strictly within {@link radius} of `(x, y)`. Ties keep
   * the lowest id.
   */
  findNodeNear(x: number, y: number, radius: number): number {
    let closest = INVALID_NODE_ID;
    let closestDistSq = radius * radius;
    for (const node of this.nodeSlots) {
      if (!node.active) {
        continue;
      }
      const dx = node.x - x;
      const dy = node.y - y;
      const distSq = dx * dx + dy * dy;
      if (distSq < closestDistSq) {
        closestDistSq = distSq;
        closest = node.id;
      }
    }
    return closest;
  }

  /** Active nodes in id order. */
  *nodes(): IterableIterator<GraphNode> {
    for (const node of this.nodeSlots) {
      if (node.active) {
        yield { ...node };
      }
    }
  }

  /** Active edges between active nodes, grouped by source id. */
  *edges(): IterableIterator<GraphEdge> {
    for (const node of this.nodeSlots) {
      yield* this.outgoingEdges(node.id);
    }
  }

  /** Drops every node and edge while keeping the capacities. */
  clear(): void {
    this.nodeSlots = [];
    this.edgeSlots = [];
  }

  /** Adopts the capacities and a deep copy of the slots of {@link other}. */
  replaceWith(other: GraphStore): void {
    this.nodeCapacityValue = other.nodeCapacityValue;
    this.edgesPerNodeValue = other.edgesPerNodeValue;
    this.nodeSlots = other.nodeSlots.map((node) => ({ ...node }));
    this.edgeSlots = other.edgeSlots.map((list) => list.map((edge) => ({ ...edge })));
  }

  private slotAt(id: number): NodeSlot | undefined {
    if (!Number.isInteger(id) || id < 0 || id >= this.nodeSlots.length) {
      return undefined;
    }
    return this.nodeSlots[id];
  }

  private findActiveEdge(from: number, to: number): EdgeSlot | undefined {
    if (!this.slotAt(from)) {
      return undefined;
    }
    return this.edgeSlots[from]?.find((edge) => edge.active && edge.to === to);
  }

  private reject(operation: string, category: PathfindingErrorCategory, details: Record<string, unknown>): void {
    this.logger?.debug("graph_mutation_rejected", {
      operation,
      category,
      code: PATHFINDING_ERROR_TAXONOMY[category].code,
      ...details,
    });
  }
}
