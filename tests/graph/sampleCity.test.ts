import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { tmpdir } from "node:os";

import { CapacityExceededError, ValidationError } from "../../src/errors.js";
import { buildSampleCity, loadSampleCity, populateSampleCity } from "../../src/graph/sampleCity.js";
import { GraphStore } from "../../src/graph/store.js";
import { search } from "../../src/search/astar.js";
import { dijkstraCost } from "../helpers/graphFixtures.js";

describe("graph sample city", () => {
  it("builds sixteen places joined by two-way roads", async () => {
    const graph = await buildSampleCity();

    expect(graph.activeNodeCount).to.equal(16);
    expect([...graph.edges()]).to.have.length(52);
    expect(graph.getNode(0)).to.deep.equal({ id: 0, name: "Downtown", x: 600, y: 360, active: true });
    expect(graph.findNodeByName("tech")).to.equal(10);
    expect(graph.findNodeByName("industrial zone")).to.equal(15);
  });

  it("weights each road by its straight-line length", async () => {
    const graph = await buildSampleCity();
    const downtown = graph.findNodeByName("Downtown");
    const centralPark = graph.findNodeByName("Central Park");

    expect(graph.edgeWeight(downtown, centralPark)).to.equal(Math.hypot(100, 60));
    expect(graph.edgeWeight(centralPark, downtown)).to.equal(Math.hypot(100, 60));
  });

  it("takes the direct road between neighbouring places", async () => {
    const graph = await buildSampleCity();
    const { path } = search(graph, graph.findNodeByName("Downtown"), graph.findNodeByName("City Hall"));

    expect(path.nodes).to.deep.equal([0, 3]);
    expect(path.totalCost).to.equal(Math.hypot(50, 20));
  });

  it("finds optimal routes across the map", async () => {
    const graph = await buildSampleCity();
    const hospital = graph.findNodeByName("Hospital");
    const beach = graph.findNodeByName("Beach");

    const { path } = search(graph, hospital, beach);

    expect(path.found).to.equal(true);
    expect(path.nodes[0]).to.equal(hospital);
    expect(path.nodes[path.length - 1]).to.equal(beach);
    expect(path.totalCost).to.be.closeTo(dijkstraCost(graph, hospital, beach), 1e-9);
  });

  it("reports a full graph while populating", async () => {
    const city = await loadSampleCity();
    const graph = new GraphStore({ nodeCapacity: 4 });
    expect(() => populateSampleCity(graph, city)).to.throw(CapacityExceededError, /before node 'northGate'/);
  });

  it("reports roads that do not fit the per-node edge limit", async () => {
    const city = await loadSampleCity();
    const graph = new GraphStore({ edgesPerNode: 1 });

    let failure: unknown;
    try {
      populateSampleCity(graph, city);
    } catch (error) {
      failure = error;
    }

    expect(failure).to.be.instanceOf(CapacityExceededError);
    if (failure instanceof CapacityExceededError) {
      expect(failure.message).to.equal("Graph has no edge slot left for road 'downtown' <-> 'mainStation'");
      expect(failure.meta).to.deep.equal({ edgesPerNode: 1 });
    }
    // Downtown's single slot already holds its road to Central Park.
    expect(graph.hasEdge(graph.findNodeByName("Main Station"), graph.findNodeByName("Downtown"))).to.equal(true);
    expect(graph.hasEdge(graph.findNodeByName("Downtown"), graph.findNodeByName("Main Station"))).to.equal(false);
  });

  it("validates alternative map definitions", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "routecraft-city-"));
    try {
      const file = path.join(dir, "city.json");
      await writeFile(
        file,
        JSON.stringify({
          nodes: [{ key: "a", name: "A", x: 0, y: 0 }],
          connections: [["a", "b"]],
        }),
      );
      let failure: unknown;
      try {
        await loadSampleCity(file);
      } catch (error) {
        failure = error;
      }
      expect(failure).to.be.instanceOf(ValidationError);

      await writeFile(
        file,
        JSON.stringify({
          nodes: [
            { key: "a", name: "A", x: 0, y: 0 },
            { key: "b", name: "B", x: 6, y: 8 },
          ],
          connections: [["a", "b"]],
        }),
      );
      const graph = await buildSampleCity({ file, nodeCapacity: 2 });
      expect(graph.edgeWeight(0, 1)).to.equal(10);
      expect(graph.edgeWeight(1, 0)).to.equal(10);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
