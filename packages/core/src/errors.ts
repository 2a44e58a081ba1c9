/**
 * Error taxonomy for network operations.
 *
 * StructuralError and NotFoundError abort an operation. DuplicateIdWarning and
 * Advisory are data: they ride along with a successful result.
 */

export type NetworkErrorCode = "STRUCTURAL" | "NOT_FOUND" | "INVALID";

export class NetworkError extends Error {
  readonly code: NetworkErrorCode;

  constructor(code: NetworkErrorCode, message: string) {
    super(message);
    this.name = "NetworkError";
    this.code = code;
  }
}

/**
 * The graph is malformed: a cycle, a traversal that stopped making progress,
 * or an id that cannot be resolved while rebuilding. Never recovered from.
 */
export class StructuralError extends NetworkError {
  constructor(message: string) {
    super("STRUCTURAL", message);
    this.name = "StructuralError";
  }
}

/** A referenced node id or anchor does not exist. */
export class NotFoundError extends NetworkError {
  readonly id: string;

  constructor(id: string, what = "Node") {
    super("NOT_FOUND", `${what} not found: ${id}`);
    this.name = "NotFoundError";
    this.id = id;
  }
}

export function invalidInput(message: string): NetworkError {
  return new NetworkError("INVALID", message);
}

/** An inserted id collided with an existing one and was renamed. */
export interface DuplicateIdWarning {
  kind: "duplicate-id";
  requestedId: string;
  assignedId: string;
}

/** Diagnostic produced while filling in coordinates. */
export interface Advisory {
  kind: "advisory";
  nodeId: string | null;
  message: string;
}

export function advisory(nodeId: string | null, message: string): Advisory {
  return { kind: "advisory", nodeId, message };
}
