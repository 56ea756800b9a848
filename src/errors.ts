/**
 * Canonical taxonomy describing the failure categories recognised by the graph
 * store, the persistence layer and the search engine. Most categories are only
 * ever reported through return values (`false`, {@link INVALID_NODE_ID}, a
 * `found: false` result); the table still gives them a stable code so logs and
 * CLI reports stay comparable.
 */
export const PATHFINDING_ERROR_TAXONOMY = {
  INVALID_REFERENCE: { code: "E-INVALID-REFERENCE", message: "Node or edge reference is invalid" },
  CAPACITY_EXCEEDED: { code: "E-CAPACITY", message: "Graph capacity exceeded" },
  DUPLICATE_EDGE: { code: "E-DUPLICATE-EDGE", message: "An active edge already connects these nodes" },
  ALLOCATION_FAILURE: { code: "E-ALLOCATION", message: "Search working storage could not be allocated" },
  NOT_FOUND: { code: "E-NOT-FOUND", message: "No match found" },
  FORMAT_MISMATCH: { code: "E-FORMAT", message: "Graph file format mismatch" },
  VALIDATION_ERROR: { code: "E-VALIDATION", message: "Invalid parameters" },
} as const;

/** Union type describing the supported failure categories. */
export type PathfindingErrorCategory = keyof typeof PATHFINDING_ERROR_TAXONOMY;

/** Optional knobs attached to a thrown {@link PathfindingError}. */
export interface PathfindingErrorOptions {
  hint?: string;
  issues?: unknown;
  meta?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for the errors thrown by the package. Concrete subclasses fix the
 * category while keeping the options bag for hints and metadata.
 */
export class PathfindingError extends Error {
  readonly category: PathfindingErrorCategory;
  readonly code: string;
  readonly hint?: string;
  readonly issues?: unknown;
  readonly meta?: Record<string, unknown>;

  constructor(category: PathfindingErrorCategory, message?: string, options: PathfindingErrorOptions = {}) {
    const taxonomy = PATHFINDING_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.category = category;
    this.code = taxonomy.code;
    if (options.hint !== undefined) {
      this.hint = options.hint;
    }
    if (options.issues !== undefined) {
      this.issues = options.issues;
    }
    if (options.meta !== undefined) {
      this.meta = options.meta;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised by the decoder when a graph file has the wrong magic or is truncated. */
export class FormatMismatchError extends PathfindingError {
  constructor(message?: string, options: PathfindingErrorOptions = {}) {
    super("FORMAT_MISMATCH", message, options);
  }
}

/** Raised when a configuration payload fails schema validation. */
export class ValidationError extends PathfindingError {
  constructor(message?: string, options: PathfindingErrorOptions = {}) {
    super("VALIDATION_ERROR", message, options);
  }
}

/** Raised when a graph cannot be written in a layout whose limits it exceeds. */
export class CapacityExceededError extends PathfindingError {
  constructor(message?: string, options: PathfindingErrorOptions = {}) {
    super("CAPACITY_EXCEEDED", message, options);
  }
}

/** Returns a serialisable description of an unknown thrown value. */
export function describeError(error: unknown): { message: string; code?: string } {
  if (error instanceof PathfindingError) {
    return { message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { message: error.message };
  }
  return { message: String(error) };
}
