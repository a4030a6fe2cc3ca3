import { Graph } from './graph';

export interface GraphValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Nodes nothing points to.
 */
export function getEntryNodes(graph: Graph): string[] {
  return graph.nodeIds().filter((id) => graph.inDegree(id) === 0);
}

/**
 * Nodes pointing nowhere.
 */
export function getExitNodes(graph: Graph): string[] {
  return graph.nodeIds().filter((id) => graph.outDegree(id) === 0);
}

/**
 * Nodes reachable from `start`, the start included. Unknown starts reach nothing.
 */
export function getReachableNodes(graph: Graph, start: string): Set<string> {
  const visited = new Set<string>();
  if (!graph.hasNode(start)) {
    return visited;
  }

  const stack = [start];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    stack.push(...graph.successors(id));
  }

  return visited;
}

/**
 * Induced subgraph over the nodes to keep.
 */
export function pruneGraph(graph: Graph, keep: Iterable<string>): Graph {
  return graph.subgraph(keep);
}

/**
 * Seeds plus everything within `maxDepth` successor steps of them
 * (unbounded when omitted), as an induced subgraph.
 */
export function getSubgraphByScope(
  graph: Graph,
  seeds: readonly string[],
  maxDepth?: number
): Graph {
  const depths = new Map<string, number>();
  const queue: string[] = [];

  for (const seed of seeds) {
    if (graph.hasNode(seed) && !depths.has(seed)) {
      depths.set(seed, 0);
      queue.push(seed);
    }
  }

  for (let i = 0; i < queue.length; i++) {
    const id = queue[i];
    const depth = depths.get(id) ?? 0;
    if (maxDepth !== undefined && depth >= maxDepth) continue;

    for (const next of graph.successors(id)) {
      if (!depths.has(next)) {
        depths.set(next, depth + 1);
        queue.push(next);
      }
    }
  }

  return graph.subgraph(depths.keys());
}

/**
 * Strongly connected components that form a cycle: more than one node,
 * or a single node with a self-loop. Tarjan's algorithm, iterative.
 */
export function findCycles(graph: Graph): string[][] {
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];
  let counter = 0;

  for (const root of graph.nodeIds()) {
    if (index.has(root)) continue;

    const work: Array<{ id: string; successors: string[]; next: number }> = [];
    const open = (id: string): void => {
      index.set(id, counter);
      lowLink.set(id, counter);
      counter++;
      stack.push(id);
      onStack.add(id);
      work.push({ id, successors: graph.successors(id), next: 0 });
    };
    open(root);

    while (work.length > 0) {
      const frame = work[work.length - 1];
      if (frame.next < frame.successors.length) {
        const successor = frame.successors[frame.next++];
        if (!index.has(successor)) {
          open(successor);
        } else if (onStack.has(successor)) {
          lowLink.set(
            frame.id,
            Math.min(lowLink.get(frame.id) ?? 0, index.get(successor) ?? 0)
          );
        }
        continue;
      }

      work.pop();
      const parent = work[work.length - 1];
      if (parent) {
        lowLink.set(parent.id, Math.min(lowLink.get(parent.id) ?? 0, lowLink.get(frame.id) ?? 0));
      }

      if (lowLink.get(frame.id) === index.get(frame.id)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.id);

        const selfLoop = graph.findEdge(frame.id, frame.id) !== undefined;
        if (component.length > 1 || selfLoop) {
          cycles.push(component.reverse());
        }
      }
    }
  }

  return cycles;
}

/**
 * Orphans (no edges at all, in a graph with more than one node) are errors;
 * cycles are only warnings.
 */
export function validateGraph(graph: Graph): GraphValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (graph.nodeCount > 1) {
    for (const id of graph.nodeIds()) {
      if (graph.inDegree(id) === 0 && graph.outDegree(id) === 0) {
        errors.push(`Orphan node: ${id}`);
      }
    }
  }

  const cycles = findCycles(graph);
  if (cycles.length > 0) {
    warnings.push(`Graph contains ${cycles.length} cycle(s)`);
  }

  return { valid: errors.length === 0, errors, warnings };
}
