/** Outgoing weighted edge towards the node named `other`. */
export interface Connection {
  readonly other: string;
  readonly weight: number;
}

/**
 * Node of the editable graph. `name` is the identity used by every message;
 * `id` is informational except for Chang-Roberts, which compares it.
 */
export interface GraphNode {
  readonly name: string;
  readonly id: number;
  readonly connections: readonly Connection[];
}

/** Graph handed to the simulator, as persisted by the editor. */
export interface NodeGrid {
  readonly nodes: readonly GraphNode[];
}

/** Connection referencing a peer absent from the graph. */
export interface DanglingConnection {
  readonly node: string;
  readonly peer: string;
}

/** Deep copy so simulations never share connection arrays with the caller. */
export function cloneNode(node: GraphNode): GraphNode {
  return {
    name: node.name,
    id: node.id,
    connections: node.connections.map((connection) => ({ ...connection })),
  };
}

/** Distinct outgoing peer names in connection order. */
export function outgoingNeighbours(node: GraphNode): string[] {
  return Array.from(new Set(node.connections.map((connection) => connection.other)));
}

/** Distinct names of the nodes holding a connection towards {@link name}. */
export function incomingNeighbours(nodes: readonly GraphNode[], name: string): string[] {
  return nodes
    .filter((candidate) => candidate.connections.some((connection) => connection.other === name))
    .map((candidate) => candidate.name);
}

export function findDanglingConnections(nodes: readonly GraphNode[]): DanglingConnection[] {
  const names = new Set(nodes.map((node) => node.name));
  const dangling: DanglingConnection[] = [];
  for (const node of nodes) {
    for (const connection of node.connections) {
      if (!names.has(connection.other)) {
        dangling.push({ node: node.name, peer: connection.other });
      }
    }
  }
  return dangling;
}
