import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { tmpdir } from "node:os";

import { CapacityExceededError, FormatMismatchError } from "../../src/errors.js";
import {
  LEGACY_MAGIC,
  PORTABLE_MAGIC,
  decodeGraph,
  encodeGraph,
  loadGraph,
  saveGraph,
} from "../../src/graph/persistence.js";
import { GraphStore } from "../../src/graph/store.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

/** Graph exercising inactive nodes, inactive edges and a multi-byte name. */
function buildFixture(): GraphStore {
  const graph = new GraphStore({ nodeCapacity: 10, edgesPerNode: 4 });
  const a = graph.addNode("Gare du Nord", 1.5, -2.25);
  const b = graph.addNode("Café", 10, 0.5);
  const c = graph.addNode("Ghost", 3, 3);
  const d = graph.addNode("Quay", -4, 8);
  graph.addEdge(a, b, 2.5);
  graph.addEdge(b, d, 0.75);
  graph.addEdge(a, d, 12);
  graph.addEdge(d, a, 12);
  graph.addEdge(a, c, 1);
  graph.removeEdge(a, d);
  graph.removeNode(c);
  return graph;
}

function expectSameSlots(actual: GraphStore, expected: GraphStore): void {
  expect(actual.nodeCount).to.equal(expected.nodeCount);
  for (let id = 0; id < expected.nodeCount; id++) {
    expect(actual.nodeSlot(id)).to.deep.equal(expected.nodeSlot(id));
    expect(actual.edgeSlotsOf(id)).to.deep.equal(expected.edgeSlotsOf(id));
  }
}

describe("graph persistence", () => {
  describe("portable format", () => {
    it("round-trips slots and capacities", () => {
      const graph = buildFixture();
      const bytes = encodeGraph(graph);

      expect(new TextDecoder().decode(bytes.subarray(0, 8))).to.equal(PORTABLE_MAGIC);
      const decoded = decodeGraph(bytes);
      expect(decoded.nodeCapacity).to.equal(10);
      expect(decoded.edgesPerNode).to.equal(4);
      expectSameSlots(decoded, graph);
    });

    it("keeps float64 precision", () => {
      const graph = new GraphStore();
      const a = graph.addNode("A", 0.1, 1 / 3);
      const b = graph.addNode("B", Math.PI, -Math.E);
      graph.addEdge(a, b, Math.SQRT2);

      const decoded = decodeGraph(encodeGraph(graph, { format: "portable" }));
      expect(decoded.getNode(a)).to.deep.equal({ id: a, name: "A", x: 0.1, y: 1 / 3, active: true });
      expect(decoded.edgeWeight(a, b)).to.equal(Math.SQRT2);
    });

    it("rejects a node count above the stored capacity", () => {
      const bytes = encodeGraph(buildFixture());
      new DataView(bytes.buffer).setUint32(8, 2, true);
      expect(() => decodeGraph(bytes)).to.throw(FormatMismatchError, /exceeds the stored capacity/);
    });

    it("wraps content that breaks the graph invariants", () => {
      const bytes = encodeGraph(buildFixture());
      // First node id sits right after the magic and the three header fields.
      new DataView(bytes.buffer).setUint32(20, 5, true);
      expect(() => decodeGraph(bytes)).to.throw(FormatMismatchError, /Inconsistent graph data/);
    });

    it("rejects two active edges for the same pair", () => {
      const graph = new GraphStore({ nodeCapacity: 2, edgesPerNode: 4 });
      const a = graph.addNode("A", 0, 0);
      const b = graph.addNode("B", 1, 0);
      graph.addEdge(a, b, 1);
      const bytes = encodeGraph(graph);
      // Header 20 bytes, two 23-byte node records, then the two edge counts.
      const countOffset = 20 + 2 * 23;
      const edgeOffset = countOffset + 2 * 4;
      expect(bytes.byteLength).to.equal(edgeOffset + 13);

      const patched = new Uint8Array(bytes.byteLength + 13);
      patched.set(bytes);
      patched.set(bytes.subarray(edgeOffset, edgeOffset + 13), bytes.byteLength);
      new DataView(patched.buffer).setUint32(countOffset, 2, true);

      expect(() => decodeGraph(patched)).to.throw(
        FormatMismatchError,
        "Inconsistent graph data: edge 0->1 is active more than once",
      );

      // A removed slot followed by an active one is the normal re-add layout.
      patched[edgeOffset + 12] = 0;
      const decoded = decodeGraph(patched);
      expect(decoded.edgeSlotCount(a)).to.equal(2);
      expect(decoded.removeEdge(a, b)).to.equal(true);
      expect(decoded.hasEdge(a, b)).to.equal(false);
    });
  });

  describe("legacy format", () => {
    it("uses fixed-width records and a 1000-entry count table", () => {
      const graph = buildFixture();
      const bytes = encodeGraph(graph, { format: "legacy" });

      const edgeSlots = [0, 1, 2, 3].reduce((sum, id) => sum + graph.edgeSlotCount(id), 0);
      expect(edgeSlots).to.equal(5);
      expect(bytes.byteLength).to.equal(8 + 4 + 4 * 141 + 1000 * 4 + 5 * 13);

      const view = new DataView(bytes.buffer);
      expect(new TextDecoder().decode(bytes.subarray(0, 8))).to.equal(LEGACY_MAGIC);
      expect(view.getInt32(8, true)).to.equal(4);
      expect(view.getInt32(12 + 4 * 141, true)).to.equal(3);
    });

    it("round-trips values representable as float32", () => {
      const graph = buildFixture();
      const decoded = decodeGraph(encodeGraph(graph, { format: "legacy" }));

      expect(decoded.nodeCapacity).to.equal(1000);
      expect(decoded.edgesPerNode).to.equal(20);
      expectSameSlots(decoded, graph);
    });

    it("reads a hand-assembled legacy file", () => {
      const bytes = new Uint8Array(8 + 4 + 2 * 141 + 4000 + 13);
      const view = new DataView(bytes.buffer);
      bytes.set(new TextEncoder().encode(LEGACY_MAGIC), 0);
      view.setInt32(8, 2, true);
      const writeNode = (offset: number, id: number, name: string, x: number, y: number): void => {
        view.setInt32(offset, id, true);
        bytes.set(new TextEncoder().encode(name), offset + 4);
        view.setFloat32(offset + 132, x, true);
        view.setFloat32(offset + 136, y, true);
        view.setUint8(offset + 140, 1);
      };
      writeNode(12, 0, "Hub", 100, 200);
      writeNode(153, 1, "Spoke", 250, 200);
      const counts = 12 + 2 * 141;
      view.setInt32(counts, 1, true);
      const edge = counts + 4000;
      view.setInt32(edge, 0, true);
      view.setInt32(edge + 4, 1, true);
      view.setFloat32(edge + 8, 150, true);
      view.setUint8(edge + 12, 1);

      const graph = decodeGraph(bytes);

      expect(graph.getNode(0)).to.deep.equal({ id: 0, name: "Hub", x: 100, y: 200, active: true });
      expect(graph.findNodeByName("spoke")).to.equal(1);
      expect(graph.edgeWeight(0, 1)).to.equal(150);
      expect(graph.hasEdge(1, 0)).to.equal(false);
    });

    it("refuses graphs exceeding the legacy limits", () => {
      const crowded = new GraphStore({ nodeCapacity: 30, edgesPerNode: 25 });
      const hub = crowded.addNode("hub", 0, 0);
      for (let i = 0; i < 21; i++) {
        crowded.addEdge(hub, crowded.addNode(`leaf ${i}`, i, 1), 1);
      }
      expect(() => encodeGraph(crowded, { format: "legacy" })).to.throw(CapacityExceededError);

      const roomy = new GraphStore({ edgesPerNode: 25 });
      roomy.addEdge(roomy.addNode("a", 0, 0), roomy.addNode("b", 1, 0), 1);
      expect(() => encodeGraph(roomy, { format: "legacy" })).to.throw(
        CapacityExceededError,
        "RCGRAPH1 holds at most 20 edges per node",
      );
      expect(decodeGraph(encodeGraph(roomy)).edgesPerNode).to.equal(25);

      const large = new GraphStore({ nodeCapacity: 1001 });
      for (let i = 0; i < 1001; i++) {
        large.addNode(`n${i}`, 0, 0);
      }
      expect(() => encodeGraph(large, { format: "legacy" })).to.throw(CapacityExceededError);
      expect(decodeGraph(encodeGraph(large)).nodeCount).to.equal(1001);
    });
  });

  describe("malformed input", () => {
    it("rejects an unknown magic", () => {
      const bytes = encodeGraph(buildFixture());
      bytes[7] = "X".charCodeAt(0);
      expect(() => decodeGraph(bytes)).to.throw(FormatMismatchError, /Unknown graph file magic 'RCGRAPHX'/);
    });

    it("rejects input shorter than the magic", () => {
      expect(() => decodeGraph(new Uint8Array(3))).to.throw(FormatMismatchError);
    });

    it("rejects truncated and padded payloads", () => {
      for (const format of ["legacy", "portable"] as const) {
        const bytes = encodeGraph(buildFixture(), { format });
        expect(() => decodeGraph(bytes.subarray(0, bytes.byteLength - 1))).to.throw(
          FormatMismatchError,
          /Unexpected end of graph data/,
        );
        const padded = new Uint8Array(bytes.byteLength + 2);
        padded.set(bytes);
        expect(() => decodeGraph(padded)).to.throw(FormatMismatchError, /2 unexpected trailing bytes/);
      }
    });
  });

  describe("files", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), "routecraft-persistence-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("saves and loads a graph", async () => {
      const graph = buildFixture();
      const file = path.join(dir, "nested", "city.rcg");

      expect(await saveGraph(graph, file)).to.equal(true);
      expect(new Uint8Array(await readFile(file))).to.deep.equal(encodeGraph(graph));

      const loaded = new GraphStore();
      expect(await loadGraph(loaded, file)).to.equal(true);
      expectSameSlots(loaded, graph);
      expect(loaded.nodeCapacity).to.equal(10);
    });

    it("saves in the legacy format on request", async () => {
      const file = path.join(dir, "legacy.rcg");
      expect(await saveGraph(buildFixture(), file, { format: "legacy" })).to.equal(true);
      const bytes = await readFile(file);
      expect(bytes.subarray(0, 8).toString("ascii")).to.equal(LEGACY_MAGIC);
    });

    it("leaves the destination untouched when loading fails", async () => {
      const logger = new RecordingLogger();
      const destination = buildFixture();
      const corrupt = path.join(dir, "corrupt.rcg");
      await writeFile(corrupt, "NOTAGRAPH");

      expect(await loadGraph(destination, path.join(dir, "missing.rcg"), { logger })).to.equal(false);
      expect(await loadGraph(destination, corrupt, { logger })).to.equal(false);

      expectSameSlots(destination, buildFixture());
      const failures = logger.find("graph_load_failed");
      expect(failures.map((entry) => entry.level)).to.deep.equal(["warn", "warn"]);
      expect(failures[1].payload).to.include({ file: corrupt, code: "E-FORMAT" });
    });

    it("reports write failures", async () => {
      const logger = new RecordingLogger();
      const blocker = path.join(dir, "blocker");
      await writeFile(blocker, "");

      expect(await saveGraph(buildFixture(), path.join(blocker, "graph.rcg"), { logger })).to.equal(false);
      expect(logger.find("graph_save_failed")).to.have.length(1);
    });
  });
});
