import { ERROR_CODES, type ErrorCode } from "../types.js";

/**
 * Base class of every failure raised while preparing or running a
 * simulation. The runner converts these into structured failure results; any
 * other error escapes unchanged.
 */
export class SimulationError extends Error {
  public readonly code: ErrorCode;
  /** Optional operator hint describing how to recover from the error. */
  public readonly hint?: string;

  constructor(code: ErrorCode, message: string, hint?: string) {
    super(message);
    this.name = "SimulationError";
    this.code = code;
    this.hint = hint;
  }
}

/** Raised when an algorithm is asked to run over a graph without nodes. */
export class EmptyGraphError extends SimulationError {
  constructor(algorithm: string) {
    super(ERROR_CODES.SIM_EMPTY_GRAPH, `Cannot run ${algorithm} on an empty graph.`, "add at least one node");
    this.name = "EmptyGraphError";
  }
}

/**
 * Raised when the graph shape prevents a run: a connection towards a missing
 * peer, or a node lacking the outgoing connection an algorithm requires.
 */
export class TopologyError extends SimulationError {
  public readonly details: { node: string; peer?: string };

  constructor(message: string, details: { node: string; peer?: string }) {
    super(ERROR_CODES.SIM_TOPOLOGY, message, "fix the connections of the reported node");
    this.name = "TopologyError";
    this.details = details;
  }
}

/** The caller named an initiator that is not part of the graph. */
export class UnknownInitiatorError extends SimulationError {
  constructor(readonly initiator: string) {
    super(ERROR_CODES.SIM_INITIATOR, `Initiator ${initiator} is not a node of the graph.`, "pick one of the graph's node names");
    this.name = "UnknownInitiatorError";
  }
}

/** Engine invariant violations: these indicate a bug, never a data problem. */
export class InternalInvariantError extends SimulationError {
  constructor(message: string) {
    super(ERROR_CODES.SIM_INTERNAL, message);
    this.name = "InternalInvariantError";
  }
}

/** A message was addressed to a node that no wrapped state matches. */
export class UnknownNodeError extends InternalInvariantError {
  constructor(readonly nodeName: string) {
    super(`No simulated node named "${nodeName}".`);
    this.name = "UnknownNodeError";
  }
}

/** A Lamport clock went past the safe integer range. */
export class ClockOverflowError extends InternalInvariantError {
  constructor() {
    super(`Logical clock exceeded ${Number.MAX_SAFE_INTEGER}.`);
    this.name = "ClockOverflowError";
  }
}
