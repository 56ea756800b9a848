#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { loadPathfinderConfig, type PathfinderConfig } from "./config/pathfinder.js";
import type { EnvSource } from "./config/env.js";
import { ValidationError, describeError } from "./errors.js";
import { loadGraph, saveGraph } from "./graph/persistence.js";
import { buildSampleCity } from "./graph/sampleCity.js";
import { GraphStore } from "./graph/store.js";
import { INVALID_NODE_ID } from "./graph/types.js";
import { StructuredLogger } from "./logger.js";
import { explorationOrder, search } from "./search/astar.js";
import { HEURISTIC_KINDS, type HeuristicKind } from "./search/heuristic.js";

interface CliOptions {
  readonly file: string;
  readonly format: "text" | "json";
  readonly seed: boolean;
  readonly info: boolean;
  readonly route?: readonly [string, string];
  readonly explore?: { readonly from: string; readonly to: string; readonly cap?: number };
  readonly heuristic?: HeuristicKind;
  readonly weight?: number;
}

/** Output sinks; tests swap them for in-memory buffers. */
export interface CliIo {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
}

const processIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

interface GraphInfo {
  readonly nodes: number;
  readonly slots: number;
  readonly edges: number;
  readonly nodeCapacity: number;
  readonly edgesPerNode: number;
}

interface RouteReport {
  readonly from: string;
  readonly to: string;
  readonly found: boolean;
  readonly totalCost: number;
  readonly nodes: string[];
  readonly explored: number;
}

interface ExplorationReport {
  readonly from: string;
  readonly to: string;
  readonly nodes: string[];
}

interface CliReport {
  readonly file: string;
  readonly seeded: boolean;
  info?: GraphInfo;
  route?: RouteReport;
  exploration?: ExplorationReport;
}

/**
 * Runs the command line against {@link argv} (without the node and script
 * entries) and resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIo = processIo, env?: EnvSource): Promise<number> {
  if (argv.length === 0) {
    printUsage(io);
    return 1;
  }
  try {
    const options = parseArgs(argv);
    const config = loadPathfinderConfig(env);
    const logger = new StructuredLogger({ minLevel: config.logLevel, logFile: config.logFile });
    try {
      const report = await execute(options, config, logger);
      if (options.format === "json") {
        io.stdout(JSON.stringify(report, null, 2));
      } else {
        formatTextReport(report, io);
      }
    } finally {
      await logger.flush();
    }
    return 0;
  } catch (error) {
    io.stderr(describeError(error).message);
    return 1;
  }
}

async function execute(
  options: CliOptions,
  config: PathfinderConfig,
  logger: StructuredLogger,
): Promise<CliReport> {
  const capacities = { nodeCapacity: config.nodeCapacity, edgesPerNode: config.edgesPerNode };
  const graph = new GraphStore({ ...capacities, logger });
  let seeded = false;

  if (!(await loadGraph(graph, options.file, { logger }))) {
    if (!options.seed) {
      throw new Error(`Cannot load graph from '${options.file}'`);
    }
    graph.replaceWith(await buildSampleCity({ ...capacities, logger }));
    if (!(await saveGraph(graph, options.file, { logger }))) {
      throw new Error(`Cannot write graph to '${options.file}'`);
    }
    logger.info("sample_city_seeded", { file: options.file, nodes: graph.activeNodeCount });
    seeded = true;
  }

  const report: CliReport = { file: options.file, seeded };
  const heuristic = options.heuristic ?? config.heuristic;
  const heuristicWeight = options.weight ?? config.heuristicWeight;

  if (options.info || (!options.route && !options.explore)) {
    report.info = describeGraph(graph);
  }

  if (options.route) {
    const [fromToken, toToken] = options.route;
    const from = resolveNode(graph, fromToken);
    const to = resolveNode(graph, toToken);
    const { path, stats } = search(
      graph,
      from,
      to,
      { heuristic, heuristicWeight, allowDiagonal: config.allowDiagonal },
      { logger },
    );
    report.route = {
      from: nodeLabel(graph, from),
      to: nodeLabel(graph, to),
      found: path.found,
      totalCost: path.totalCost,
      nodes: path.nodes.map((id) => nodeLabel(graph, id)),
      explored: stats.nodesExplored,
    };
    path.release();
  }

  if (options.explore) {
    const from = resolveNode(graph, options.explore.from);
    const to = resolveNode(graph, options.explore.to);
    const order = explorationOrder(graph, from, to, options.explore.cap ?? config.exploreCap, {
      heuristic,
      heuristicWeight,
    });
    report.exploration = {
      from: nodeLabel(graph, from),
      to: nodeLabel(graph, to),
      nodes: order.map((id) => nodeLabel(graph, id)),
    };
  }

  return report;
}

function describeGraph(graph: GraphStore): GraphInfo {
  return {
    nodes: graph.activeNodeCount,
    slots: graph.nodeCount,
    edges: [...graph.edges()].length,
    nodeCapacity: graph.nodeCapacity,
    edgesPerNode: graph.edgesPerNode,
  };
}

/** Numeric tokens naming an active node are ids; anything else is looked up by name. */
function resolveNode(graph: GraphStore, token: string): number {
  if (/^\d+$/.test(token)) {
    const id = Number.parseInt(token, 10);
    if (graph.isActive(id)) {
      return id;
    }
  }
  const id = graph.findNodeByName(token);
  if (id === INVALID_NODE_ID) {
    throw new Error(`Unknown node '${token}'`);
  }
  return id;
}

function nodeLabel(graph: GraphStore, id: number): string {
  return graph.getNode(id)?.name ?? String(id);
}

function formatTextReport(report: CliReport, io: CliIo): void {
  if (report.seeded) {
    io.stdout(`Seeded sample city into ${report.file}`);
  }
  if (report.info) {
    const { nodes, edges, nodeCapacity, edgesPerNode } = report.info;
    io.stdout(`Graph: ${nodes} nodes, ${edges} edges (capacity ${nodeCapacity}, ${edgesPerNode} edges per node)`);
  }
  if (report.route) {
    const route = report.route;
    if (route.found) {
      io.stdout(`Route: ${route.nodes.join(" -> ")}`);
      io.stdout(`Cost: ${route.totalCost.toFixed(2)}`);
    } else {
      io.stdout(`Route: none from ${route.from} to ${route.to}`);
    }
    io.stdout(`Explored: ${route.explored}`);
  }
  if (report.exploration) {
    io.stdout(`Exploration: ${report.exploration.nodes.join(", ")}`);
  }
}

function parseArgs(argv: string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new ValidationError("First positional argument must be the path to a graph file");
  }
  let format: "text" | "json" = "text";
  let seed = false;
  let info = false;
  let route: readonly [string, string] | undefined;
  let explore: CliOptions["explore"];
  let heuristic: HeuristicKind | undefined;
  let weight: number | undefined;

  const operand = (index: number, flag: string): string => {
    const value = rest[index];
    if (value === undefined || value.startsWith("--")) {
      throw new ValidationError(`${flag} expects more arguments`);
    }
    return value;
  };

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--seed":
        seed = true;
        break;
      case "--info":
        info = true;
        break;
      case "--route":
        route = [operand(i + 1, token), operand(i + 2, token)];
        i += 2;
        break;
      case "--explore": {
        const from = operand(i + 1, token);
        const to = operand(i + 2, token);
        i += 2;
        const next = rest[i + 1];
        if (next !== undefined && /^-?\d+$/.test(next)) {
          explore = { from, to, cap: Number.parseInt(next, 10) };
          i += 1;
        } else {
          explore = { from, to };
        }
        break;
      }
      case "--heuristic": {
        const value = operand(i + 1, token).toLowerCase();
        const kind = HEURISTIC_KINDS.find((candidate) => candidate === value);
        if (!kind) {
          throw new ValidationError(`--heuristic must be one of ${HEURISTIC_KINDS.join(", ")}`);
        }
        heuristic = kind;
        i += 1;
        break;
      }
      case "--weight": {
        const value = Number(operand(i + 1, token));
        if (!Number.isFinite(value) || value < 0) {
          throw new ValidationError("--weight must be a non-negative number");
        }
        weight = value;
        i += 1;
        break;
      }
      case "--format": {
        const value = rest[i + 1];
        if (value !== "json" && value !== "text") {
          throw new ValidationError("--format must be 'json' or 'text'");
        }
        format = value;
        i += 1;
        break;
      }
      default:
        throw new ValidationError(`Unknown argument '${token}'`);
    }
  }

  return {
    file,
    format,
    seed,
    info,
    ...(route === undefined ? {} : { route }),
    ...(explore === undefined ? {} : { explore }),
    ...(heuristic === undefined ? {} : { heuristic }),
    ...(weight === undefined ? {} : { weight }),
  };
}

function printUsage(io: CliIo): void {
  io.stdout(
    "Usage: routecraft <graph-file> [--seed] [--route <from> <to>] [--explore <from> <to> [cap]]\n" +
      "                  [--heuristic euclidean|manhattan|chebyshev|zero] [--weight n] [--format json|text] [--info]",
  );
  io.stdout("Examples:");
  io.stdout("  routecraft city.rcg --seed");
  io.stdout('  routecraft city.rcg --route Downtown "Tech Park"');
  io.stdout("  routecraft city.rcg --explore 0 10 25 --format json");
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    // npm links `bin` entries, so compare resolved paths.
    return realpathSync(executedFromCli) === realpathSync(thisModulePath);
  } catch {
    return thisModulePath === executedFromCli;
  }
})();

if (isCliEntryPoint) {
  void runCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}

/**
 * Exposes internal helpers for the test suite without exporting them as part
 * of the runtime API surface.
 */
export const __testing = {
  parseArgs,
  resolveNode,
};
