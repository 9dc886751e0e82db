/**
 * Topology service for computing layer assignments in DAGs.
 *
 * Used by the dependency resolver to group a recompute plan into layers
 * whose members only depend on earlier layers.
 */

export interface GraphNode {
  id: string;
}

export interface GraphEdge {
  from: string;
  to: string;
}

export interface TopologyResult {
  /** Maps node ID to its layer index (0-indexed) */
  layerAssignments: Map<string, number>;
  /** Total number of layers in the graph (max layer + 1) */
  layerCount: number;
}

/**
 * Computes layer assignments for nodes in a DAG using Kahn's algorithm.
 *
 * Each node is assigned to the earliest layer where all its dependencies
 * have been satisfied. Nodes on a cycle are placed in layer 0; the resolver
 * rejects cycles before layering.
 */
export function computeTopologyLayers<N extends GraphNode>(nodes: N[], edges: GraphEdge[]): TopologyResult {
  if (nodes.length === 0) {
    return {
      layerAssignments: new Map(),
      layerCount: 0,
    };
  }

  const indegree = new Map<string, number>();
  const adjacency = new Map<string, Set<string>>();

  for (const node of nodes) {
    indegree.set(node.id, 0);
    adjacency.set(node.id, new Set());
  }

  for (const edge of edges) {
    const targets = adjacency.get(edge.from);
    if (!targets || !indegree.has(edge.to) || targets.has(edge.to)) {
      continue;
    }
    targets.add(edge.to);
    indegree.set(edge.to, (indegree.get(edge.to) ?? 0) + 1);
  }

  const queue: Array<{ nodeId: string; level: number }> = [];
  for (const [nodeId, degree] of indegree) {
    if (degree === 0) {
      queue.push({ nodeId, level: 0 });
    }
  }

  const levelMap = new Map<string, number>();
  const remaining = new Map(indegree);
  const pendingLevel = new Map<string, number>();

  for (let head = 0; head < queue.length; head += 1) {
    const { nodeId, level } = queue[head];
    levelMap.set(nodeId, level);

    for (const neighbor of adjacency.get(nodeId) ?? []) {
      pendingLevel.set(neighbor, Math.max(pendingLevel.get(neighbor) ?? 0, level + 1));
      const left = (remaining.get(neighbor) ?? 0) - 1;
      remaining.set(neighbor, left);
      if (left === 0) {
        queue.push({ nodeId: neighbor, level: pendingLevel.get(neighbor) ?? level + 1 });
      }
    }
  }

  for (const node of nodes) {
    if (!levelMap.has(node.id)) {
      levelMap.set(node.id, 0);
    }
  }

  const maxLevel = Math.max(...levelMap.values());

  return {
    layerAssignments: levelMap,
    layerCount: maxLevel + 1,
  };
}

/**
 * Groups node IDs by layer, keeping the input order within each layer.
 */
export function groupByLayer<N extends GraphNode>(nodes: N[], result: TopologyResult): string[][] {
  const layers: string[][] = Array.from({ length: result.layerCount }, () => []);
  for (const node of nodes) {
    layers[result.layerAssignments.get(node.id) ?? 0].push(node.id);
  }
  return layers;
}
