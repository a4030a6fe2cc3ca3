/**
 * Control Flow Graph module.
 *
 * This module provides:
 * - CFG construction from the generic syntax tree
 * - Queries (edges, reachability, complexity)
 * - Plain-text rendering
 */

// Types
export type {
  ControlFlowGraph,
  CFGNode,
  CFGNodeKind,
  CFGEdge,
  CFGEdgeKind,
  CFGBuilderOptions,
  SourceLocation,
} from './cfg-types';

// Builder
export { buildCFG, buildFunctionCFG, findFunctionBody, CFGBuilder } from './cfg-builder';

// Queries
export {
  outgoingEdges,
  incomingEdges,
  countNodesOfKind,
  cfgComplexity,
  reachableFromEntry,
} from './cfg-queries';

// Visualizer
export { cfgToText, cfgStats, type TextOptions } from './cfg-visualizer';
