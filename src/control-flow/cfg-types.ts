/**
 * Control Flow Graph (CFG) types.
 *
 * A CFG represents the execution paths through one function. Nodes live in a
 * map keyed by id and edges reference nodes by id, so the graph can be
 * serialized and shared without object cycles.
 */

import type { Attributes } from '../types';

/**
 * Types of CFG nodes.
 */
export type CFGNodeKind =
  | 'entry' // Function entry point
  | 'exit' // Function exit point
  | 'statement' // Plain statement, also synthesized merge and loop-exit points
  | 'branch' // if condition
  | 'loop' // for / while / do loop header
  | 'return'; // return statement

/**
 * Types of CFG edges.
 */
export type CFGEdgeKind =
  | 'normal' // Sequential flow
  | 'true' // Branch condition holds
  | 'false' // Branch condition fails
  | 'back_edge' // Loop body end back to the loop header
  | 'loop_exit' // Loop header to the code after the loop
  | 'return'; // Return statement to the function exit

export interface SourceLocation {
  file: string;
  /** One-based line */
  line: number;
}

/**
 * A node in the Control Flow Graph.
 */
export interface CFGNode {
  /** Unique identifier, derived from the function's qualified name */
  id: string;

  kind: CFGNodeKind;

  /** Human-readable label for display */
  label: string;

  /** Where the originating syntax starts (absent on synthesized nodes) */
  source_location?: SourceLocation;

  /**
   * Additional facts recorded by the builder:
   * - `calls`: bare callee names found in the node's own syntax
   * - `syntax_kind`: grammar kind of the originating syntax
   * - `condition`: branch condition text
   * - `merge`: id of a branch's merge node, when one exists
   * - `loop_kind` / `loop_exit`: loop flavour and the id of its exit node
   * - `synthetic`: `merge` or `loop-exit` on nodes with no source construct
   */
  attributes: Attributes;
}

/**
 * A directed edge between two CFG nodes.
 */
export interface CFGEdge {
  source: string;
  target: string;
  kind: CFGEdgeKind;
  label?: string;
}

/**
 * A complete Control Flow Graph for one function.
 */
export interface ControlFlowGraph {
  /** Qualified name of the function the graph describes */
  functionName: string;

  file: string;

  /** Id of the single entry node */
  entry: string;

  /** Id of the single exit node */
  exit: string;

  /** All nodes, in creation order */
  nodes: Map<string, CFGNode>;

  /** All edges, in creation order */
  edges: CFGEdge[];
}

/**
 * Options for CFG construction.
 */
export interface CFGBuilderOptions {
  /** Maximum label length before truncation (default 50) */
  maxLabelLength?: number;

  /** Record source locations on nodes (default true) */
  trackSourceLocations?: boolean;

  /**
   * Prefix of every node id (default: the qualified name). Overloads share a
   * qualified name, so callers building several functions pass an id unique
   * to each one.
   */
  idPrefix?: string;
}
