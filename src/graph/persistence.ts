import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { CapacityExceededError, FormatMismatchError, PathfindingError, describeError } from "../errors.js";
import type { PathfindingLogger } from "../logger.js";
import { GraphStore, type GraphSlots } from "./store.js";
import { MAX_NAME_BYTES, NAME_FIELD_BYTES, type GraphEdge, type GraphNode } from "./types.js";

/**
 * Binary graph files. Two layouts exist, told apart by their 8-byte magic;
 * every multi-byte value is little-endian.
 *
 * `RCGRAPH1` mirrors the historical fixed-width layout: float32 coordinates,
 * a 128-byte NUL-padded name field and an edge-count table that always holds
 * 1000 entries. `RCGRAPH2` stores the capacities, float64 values, length-
 * prefixed names and one edge count per node.
 */
export const LEGACY_MAGIC = "RCGRAPH1";
export const PORTABLE_MAGIC = "RCGRAPH2";

/** Size of the edge-count table in `RCGRAPH1`, whatever the node count. */
export const LEGACY_TABLE_SIZE = 1000;

/** Per-node edge limit of readers of `RCGRAPH1`. */
export const LEGACY_EDGES_PER_NODE = 20;

export type GraphFileFormat = "legacy" | "portable";

export interface EncodeOptions {
  /** Defaults to `portable`. */
  readonly format?: GraphFileFormat;
}

export interface PersistenceOptions extends EncodeOptions {
  /** Receives a `warn` entry when a file cannot be written or read. */
  readonly logger?: PathfindingLogger;
}

const MAGIC_BYTES = 8;
const LEGACY_NODE_BYTES = 4 + NAME_FIELD_BYTES + 4 + 4 + 1;
const LEGACY_EDGE_BYTES = 4 + 4 + 4 + 1;
const PORTABLE_EDGE_BYTES = 4 + 8 + 1;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8");

class ByteWriter {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(size: number) {
    this.bytes = new Uint8Array(size);
    this.view = new DataView(this.bytes.buffer);
  }

  ascii(value: string): void {
    for (let i = 0; i < value.length; i++) {
      this.bytes[this.offset++] = value.charCodeAt(i);
    }
  }

  raw(value: Uint8Array, width = value.length): void {
    this.bytes.set(value.subarray(0, width), this.offset);
    this.offset += width;
  }

  u8(value: number): void {
    this.view.setUint8(this.offset, value);
    this.offset += 1;
  }

  i32(value: number): void {
    this.view.setInt32(this.offset, value, true);
    this.offset += 4;
  }

  u32(value: number): void {
    this.view.setUint32(this.offset, value, true);
    this.offset += 4;
  }

  f32(value: number): void {
    this.view.setFloat32(this.offset, value, true);
    this.offset += 4;
  }

  f64(value: number): void {
    this.view.setFloat64(this.offset, value, true);
    this.offset += 8;
  }

  finish(): Uint8Array {
    return this.bytes;
  }
}

class ByteReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  raw(width: number): Uint8Array {
    const start = this.claim(width);
    return this.bytes.subarray(start, start + width);
  }

  u8(): number {
    return this.view.getUint8(this.claim(1));
  }

  i32(): number {
    return this.view.getInt32(this.claim(4), true);
  }

  u32(): number {
    return this.view.getUint32(this.claim(4), true);
  }

  f32(): number {
    return this.view.getFloat32(this.claim(4), true);
  }

  f64(): number {
    return this.view.getFloat64(this.claim(8), true);
  }

  private claim(width: number): number {
    if (width > this.remaining) {
      throw new FormatMismatchError(`Unexpected end of graph data at byte ${this.offset}`);
    }
    const start = this.offset;
    this.offset += width;
    return start;
  }
}

function collectSlots(graph: GraphStore): { nodes: GraphNode[]; edges: GraphEdge[][] } {
  const nodes: GraphNode[] = [];
  const edges: GraphEdge[][] = [];
  for (let id = 0; id < graph.nodeCount; id++) {
    const node = graph.nodeSlot(id);
    if (node) {
      nodes.push(node);
      edges.push(graph.edgeSlotsOf(id));
    }
  }
  return { nodes, edges };
}

function encodeLegacy(graph: GraphStore): Uint8Array {
  const { nodes, edges } = collectSlots(graph);
  if (nodes.length > LEGACY_TABLE_SIZE) {
    throw new CapacityExceededError(`${LEGACY_MAGIC} holds at most ${LEGACY_TABLE_SIZE} nodes`, {
      meta: { nodeCount: nodes.length },
    });
  }
  if (graph.edgesPerNode > LEGACY_EDGES_PER_NODE) {
    throw new CapacityExceededError(`${LEGACY_MAGIC} holds at most ${LEGACY_EDGES_PER_NODE} edges per node`, {
      meta: { edgesPerNode: graph.edgesPerNode },
    });
  }

  const edgeTotal = edges.reduce((sum, list) => sum + list.length, 0);
  const writer = new ByteWriter(
    MAGIC_BYTES + 4 + nodes.length * LEGACY_NODE_BYTES + LEGACY_TABLE_SIZE * 4 + edgeTotal * LEGACY_EDGE_BYTES,
  );
  writer.ascii(LEGACY_MAGIC);
  writer.i32(nodes.length);
  for (const node of nodes) {
    writer.i32(node.id);
    const name = new Uint8Array(NAME_FIELD_BYTES);
    name.set(utf8Encoder.encode(node.name).subarray(0, MAX_NAME_BYTES));
    writer.raw(name);
    writer.f32(node.x);
    writer.f32(node.y);
    writer.u8(node.active ? 1 : 0);
  }
  for (let i = 0; i < LEGACY_TABLE_SIZE; i++) {
    writer.i32(edges[i]?.length ?? 0);
  }
  for (const list of edges) {
    for (const edge of list) {
      writer.i32(edge.from);
      writer.i32(edge.to);
      writer.f32(edge.weight);
      writer.u8(edge.active ? 1 : 0);
    }
  }
  return writer.finish();
}

function encodePortable(graph: GraphStore): Uint8Array {
  const { nodes, edges } = collectSlots(graph);
  const names = nodes.map((node) => utf8Encoder.encode(node.name).subarray(0, MAX_NAME_BYTES));
  const nameBytes = names.reduce((sum, name) => sum + name.length, 0);
  const edgeTotal = edges.reduce((sum, list) => sum + list.length, 0);

  const writer = new ByteWriter(
    MAGIC_BYTES + 12 + nodes.length * (4 + 1 + 8 + 8 + 1) + nameBytes + nodes.length * 4 + edgeTotal * PORTABLE_EDGE_BYTES,
  );
  writer.ascii(PORTABLE_MAGIC);
  writer.u32(graph.nodeCapacity);
  writer.u32(graph.edgesPerNode);
  writer.u32(nodes.length);
  nodes.forEach((node, index) => {
    const name = names[index] ?? new Uint8Array(0);
    writer.u32(node.id);
    writer.u8(name.length);
    writer.raw(name);
    writer.f64(node.x);
    writer.f64(node.y);
    writer.u8(node.active ? 1 : 0);
  });
  for (const list of edges) {
    writer.u32(list.length);
  }
  for (const list of edges) {
    for (const edge of list) {
      writer.u32(edge.to);
      writer.f64(edge.weight);
      writer.u8(edge.active ? 1 : 0);
    }
  }
  return writer.finish();
}

/**
 * Serialises every node and edge slot, inactive ones included, so ids survive
 * a round trip. Throws a `CapacityExceededError` when the graph does not fit
 * the legacy layout: more than 1000 nodes, or an `edgesPerNode` above 20.
 */
export function encodeGraph(graph: GraphStore, options: EncodeOptions = {}): Uint8Array {
  return (options.format ?? "portable") === "legacy" ? encodeLegacy(graph) : encodePortable(graph);
}

function decodeName(field: Uint8Array): string {
  const end = field.indexOf(0);
  return utf8Decoder.decode(end === -1 ? field : field.subarray(0, end));
}

function decodeLegacy(reader: ByteReader, logger: PathfindingLogger | undefined): GraphStore {
  const nodeCount = reader.i32();
  if (nodeCount < 0 || nodeCount > LEGACY_TABLE_SIZE) {
    throw new FormatMismatchError(`Node count ${nodeCount} is outside the ${LEGACY_MAGIC} limits`);
  }
  const nodes: GraphNode[] = [];
  for (let i = 0; i < nodeCount; i++) {
    const id = reader.i32();
    const name = decodeName(reader.raw(NAME_FIELD_BYTES));
    const x = reader.f32();
    const y = reader.f32();
    const active = reader.u8() !== 0;
    nodes.push({ id, name, x, y, active });
  }

  const counts: number[] = [];
  for (let i = 0; i < LEGACY_TABLE_SIZE; i++) {
    counts.push(reader.i32());
  }

  const edges: GraphEdge[][] = [];
  for (let i = 0; i < nodeCount; i++) {
    const count = counts[i] ?? 0;
    if (count < 0 || count > LEGACY_EDGES_PER_NODE) {
      throw new FormatMismatchError(`Edge count ${count} of node ${i} is outside the ${LEGACY_MAGIC} limits`);
    }
    const list: GraphEdge[] = [];
    for (let j = 0; j < count; j++) {
      const from = reader.i32();
      const to = reader.i32();
      const weight = reader.f32();
      const active = reader.u8() !== 0;
      list.push({ from, to, weight, active });
    }
    edges.push(list);
  }

  return buildStore(
    { nodeCapacity: LEGACY_TABLE_SIZE, edgesPerNode: LEGACY_EDGES_PER_NODE, nodes, edges },
    reader,
    logger,
  );
}

function decodePortable(reader: ByteReader, logger: PathfindingLogger | undefined): GraphStore {
  const nodeCapacity = reader.u32();
  const edgesPerNode = reader.u32();
  const nodeCount = reader.u32();
  if (nodeCount > nodeCapacity) {
    throw new FormatMismatchError(`Node count ${nodeCount} exceeds the stored capacity ${nodeCapacity}`);
  }

  const nodes: GraphNode[] = [];
  for (let i = 0; i < nodeCount; i++) {
    const id = reader.u32();
    const nameLength = reader.u8();
    if (nameLength > MAX_NAME_BYTES) {
      throw new FormatMismatchError(`Name of node ${i} is ${nameLength} bytes long`);
    }
    const name = utf8Decoder.decode(reader.raw(nameLength));
    const x = reader.f64();
    const y = reader.f64();
    const active = reader.u8() !== 0;
    nodes.push({ id, name, x, y, active });
  }

  const counts: number[] = [];
  for (let i = 0; i < nodeCount; i++) {
    counts.push(reader.u32());
  }

  const edges: GraphEdge[][] = [];
  for (let from = 0; from < nodeCount; from++) {
    const count = counts[from] ?? 0;
    if (count > edgesPerNode) {
      throw new FormatMismatchError(`Edge count ${count} of node ${from} exceeds the stored capacity ${edgesPerNode}`);
    }
    const list: GraphEdge[] = [];
    for (let j = 0; j < count; j++) {
      const to = reader.u32();
      const weight = reader.f64();
      const active = reader.u8() !== 0;
      list.push({ from, to, weight, active });
    }
    edges.push(list);
  }

  return buildStore({ nodeCapacity, edgesPerNode, nodes, edges }, reader, logger);
}

function buildStore(
  slots: GraphSlots,
  reader: ByteReader,
  logger: PathfindingLogger | undefined,
): GraphStore {
  if (reader.remaining > 0) {
    throw new FormatMismatchError(`${reader.remaining} unexpected trailing bytes`);
  }
  try {
    return GraphStore.fromSlots(slots, logger ? { logger } : {});
  } catch (error) {
    if (error instanceof PathfindingError) {
      throw new FormatMismatchError(`Inconsistent graph data: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Parses a graph file into a fresh store. Throws a `FormatMismatchError` on an
 * unknown magic, a short read, trailing bytes or content that breaks the graph
 * invariants.
 */
export function decodeGraph(bytes: Uint8Array, options: Pick<PersistenceOptions, "logger"> = {}): GraphStore {
  if (bytes.byteLength < MAGIC_BYTES) {
    throw new FormatMismatchError("Graph data is shorter than its magic header");
  }
  const reader = new ByteReader(bytes);
  const magic = String.fromCharCode(...reader.raw(MAGIC_BYTES));
  switch (magic) {
    case LEGACY_MAGIC:
      return decodeLegacy(reader, options.logger);
    case PORTABLE_MAGIC:
      return decodePortable(reader, options.logger);
    default:
      throw new FormatMismatchError(`Unknown graph file magic '${magic}'`, {
        hint: `expected ${LEGACY_MAGIC} or ${PORTABLE_MAGIC}`,
      });
  }
}

/** Writes {@link graph} to {@link file}. Resolves to false when encoding or I/O fails. */
export async function saveGraph(graph: GraphStore, file: string, options: PersistenceOptions = {}): Promise<boolean> {
  try {
    const bytes = encodeGraph(graph, options);
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, bytes);
    return true;
  } catch (error) {
    options.logger?.warn("graph_save_failed", { file, ...describeError(error) });
    return false;
  }
}

/**
 * Replaces the contents of {@link graph} with the graph stored in {@link file}.
 * On any failure the destination is left untouched and the promise resolves
 * to false.
 */
export async function loadGraph(
  graph: GraphStore,
  file: string,
  options: Pick<PersistenceOptions, "logger"> = {},
): Promise<boolean> {
  let decoded: GraphStore;
  try {
    decoded = decodeGraph(await readFile(file), options);
  } catch (error) {
    options.logger?.warn("graph_load_failed", { file, ...describeError(error) });
    return false;
  }
  graph.replaceWith(decoded);
  return true;
}
