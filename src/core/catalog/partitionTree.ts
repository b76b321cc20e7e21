import type { Partition } from "./catalog.types";

export type PartitionNode = {
  partition: Partition;
  depth: number;
  children: PartitionNode[];
};

export type PartitionTreeOptions = {
  maxDepth: number;               // roots are depth 0; nodes at maxDepth are never expanded
  maxNodes?: number;
  onDepthLimit?: (partition: Partition) => void;
};

export type PartitionTree = {
  roots: PartitionNode[];
  leaves: Partition[];
  all: Partition[];
};

/**
 * Builds a category tree breadth-first from `roots`, asking `childrenOf` for each node's children.
 * Ids already visited are ignored, so a category listed under two parents (or a cycle in a broken
 * tree) is expanded once. Nodes at `maxDepth` are kept as leaves without being expanded.
 */
export const buildPartitionTree = async (
  roots: Partition[],
  childrenOf: (partition: Partition) => Promise<Partition[]>,
  options: PartitionTreeOptions
): Promise<PartitionTree> => {
  if (!Number.isInteger(options.maxDepth) || options.maxDepth < 0) {
    throw new Error("maxDepth must be an integer >= 0");
  }
  const maxNodes = options.maxNodes ?? 10000;

  const visited = new Set<string>();
  const rootNodes: PartitionNode[] = [];
  const all: PartitionNode[] = [];
  const queue: PartitionNode[] = [];

  for (const partition of roots) {
    if (visited.has(partition.id)) continue;
    visited.add(partition.id);
    const node: PartitionNode = { partition, depth: 0, children: [] };
    rootNodes.push(node);
    all.push(node);
    queue.push(node);
  }

  while (queue.length > 0) {
    const node = queue.shift();
    if (!node) break;

    if (node.depth >= options.maxDepth) {
      options.onDepthLimit?.(node.partition);
      continue;
    }

    const children = await childrenOf(node.partition);
    for (const child of children) {
      if (visited.has(child.id)) continue;
      if (all.length >= maxNodes) {
        throw new Error(`Partition tree exceeds ${maxNodes} nodes`);
      }
      visited.add(child.id);
      const childNode: PartitionNode = { partition: child, depth: node.depth + 1, children: [] };
      node.children.push(childNode);
      all.push(childNode);
      queue.push(childNode);
    }
  }

  return {
    roots: rootNodes,
    leaves: all.filter((node) => node.children.length === 0).map((node) => node.partition),
    all: all.map((node) => node.partition)
  };
};
