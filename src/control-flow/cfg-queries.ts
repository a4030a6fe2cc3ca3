/**
 * Read-only queries over a built Control Flow Graph.
 */

import type { ControlFlowGraph, CFGEdge, CFGNodeKind } from './cfg-types';

export function outgoingEdges(cfg: ControlFlowGraph, id: string): CFGEdge[] {
  return cfg.edges.filter((edge) => edge.source === id);
}

export function incomingEdges(cfg: ControlFlowGraph, id: string): CFGEdge[] {
  return cfg.edges.filter((edge) => edge.target === id);
}

export function countNodesOfKind(cfg: ControlFlowGraph, kind: CFGNodeKind): number {
  let count = 0;
  for (const node of cfg.nodes.values()) {
    if (node.kind === kind) count++;
  }
  return count;
}

/**
 * Cyclomatic-style complexity: one plus every decision point.
 */
export function cfgComplexity(cfg: ControlFlowGraph): number {
  return 1 + countNodesOfKind(cfg, 'branch') + countNodesOfKind(cfg, 'loop');
}

/**
 * Ids of all nodes reachable from the entry, the entry included.
 */
export function reachableFromEntry(cfg: ControlFlowGraph): Set<string> {
  const visited = new Set<string>();
  const stack = [cfg.entry];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    for (const edge of outgoingEdges(cfg, id)) {
      stack.push(edge.target);
    }
  }

  return visited;
}
