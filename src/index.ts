export * from "./errors.js";
export * from "./logger.js";
export * from "./config/env.js";
export * from "./config/pathfinder.js";
export * from "./graph/types.js";
export * from "./graph/store.js";
export * from "./graph/persistence.js";
export * from "./graph/sampleCity.js";
export * from "./search/heuristic.js";
export * from "./search/priorityQueue.js";
export * from "./search/pathResult.js";
export * from "./search/config.js";
export * from "./search/astar.js";
