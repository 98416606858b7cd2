import { readFile } from "node:fs/promises";
import { z } from "zod";

import { ERROR_CODES } from "../types.js";
import type { NodeGrid } from "./model.js";

/** Raised when a persisted grid cannot be read or fails validation. */
export class GraphInputError extends Error {
  public readonly code = ERROR_CODES.GRAPH_INPUT;
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "GraphInputError";
    this.issues = issues;
  }
}

const ConnectionSchema = z
  .object({
    other: z.string().min(1),
    weight: z.number().finite(),
  })
  .strip();

/** Editor position; accepted for compatibility and dropped on load. */
const LocationSchema = z.object({
  horizontal: z.number().int().nonnegative(),
  vertical: z.number().int().nonnegative(),
});

const GraphNodeSchema = z
  .object({
    name: z.string().trim().min(1),
    id: z.number().int().nonnegative(),
    connections: z.array(ConnectionSchema).default([]),
    location: LocationSchema.optional(),
  })
  .transform(({ name, id, connections }) => ({ name, id, connections }));

/**
 * Shape of the `grid.json` files written by the graph editor. Names must be
 * unique since they act as node identities.
 */
export const NodeGridSchema = z
  .object({
    nodes: z.array(GraphNodeSchema),
  })
  .superRefine((grid, ctx) => {
    const seen = new Set<string>();
    grid.nodes.forEach((node, index) => {
      if (seen.has(node.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["nodes", index, "name"],
          message: `duplicate node name "${node.name}"`,
        });
      }
      seen.add(node.name);
    });
  });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
}

/** Validates an in-memory value against {@link NodeGridSchema}. */
export function parseNodeGrid(value: unknown): NodeGrid {
  const parsed = NodeGridSchema.safeParse(value);
  if (!parsed.success) {
    throw new GraphInputError("invalid node grid", formatIssues(parsed.error));
  }
  return parsed.data;
}

/** Reads and validates a grid file written by the editor. */
export async function loadNodeGrid(path: string): Promise<NodeGrid> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GraphInputError(`cannot read ${path}`, [reason]);
  }

  let value: unknown;
  try {
    value = JSON.parse(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GraphInputError(`${path} is not valid JSON`, [reason]);
  }

  return parseNodeGrid(value);
}
