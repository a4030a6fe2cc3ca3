/**
 * CFG Visualizer - Plain-text rendering of Control Flow Graphs for terminals.
 *
 * Usage:
 *   console.log(cfgToText(cfg));
 *   console.log(cfgStats(cfg));
 */

import type { ControlFlowGraph, CFGNode, CFGEdgeKind } from './cfg-types';
import { countNodesOfKind, outgoingEdges, reachableFromEntry } from './cfg-queries';

/**
 * Options for text generation.
 */
export interface TextOptions {
  /** Show node IDs instead of labels on edge targets */
  showNodeIds?: boolean;

  /** Maximum label width (default 40) */
  labelWidth?: number;
}

const EDGE_MARKERS: Record<CFGEdgeKind, string> = {
  normal: '->',
  true: '-T->',
  false: '-F->',
  back_edge: '-back->',
  loop_exit: '-exit->',
  return: '-ret->',
};

/**
 * Render a CFG as one line per node followed by its outgoing edges.
 */
export function cfgToText(cfg: ControlFlowGraph, options: TextOptions = {}): string {
  const { showNodeIds = false, labelWidth = 40 } = options;
  const lines: string[] = [`CFG ${cfg.functionName} (${cfg.file})`];

  for (const node of cfg.nodes.values()) {
    lines.push(`  [${node.kind}] ${formatNodeLabel(node, labelWidth)}`);
    for (const edge of outgoingEdges(cfg, node.id)) {
      const target = cfg.nodes.get(edge.target);
      const targetLabel =
        showNodeIds || !target ? edge.target : formatNodeLabel(target, labelWidth);
      lines.push(`      ${EDGE_MARKERS[edge.kind]} ${targetLabel}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format the label for a node.
 */
function formatNodeLabel(node: CFGNode, width: number): string {
  let label = node.label;

  // Truncate long labels
  if (label.length > width) {
    label = label.substring(0, width - 3) + '...';
  }

  if (node.source_location) {
    label = `${label} (line ${node.source_location.line})`;
  }

  return label;
}

/**
 * Print CFG statistics.
 */
export function cfgStats(cfg: ControlFlowGraph): string {
  const totalNodes = cfg.nodes.size;
  const reachableNodes = reachableFromEntry(cfg).size;

  return [
    `CFG Statistics:`,
    `  Total nodes: ${totalNodes}`,
    `  Edges: ${cfg.edges.length}`,
    `  Reachable: ${reachableNodes}`,
    `  Unreachable: ${totalNodes - reachableNodes}`,
    `  Branch points: ${countNodesOfKind(cfg, 'branch')}`,
    `  Loops: ${countNodesOfKind(cfg, 'loop')}`,
    `  Returns: ${countNodesOfKind(cfg, 'return')}`,
  ].join('\n');
}
