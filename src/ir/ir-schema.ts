/**
 * Intermediate representation produced from the syntax tree and CFGs.
 *
 * Field names are part of the persisted JSON format and are kept in
 * snake_case so stored documents and in-memory values are the same shape.
 */

import type { Attributes } from '../types';

interface BlockBase {
  /** Id of the CFG node the block was recovered from */
  id: string;
  metadata: Attributes;
}

export interface SequenceBlock extends BlockBase {
  type: 'sequence';
  label: string;
}

export interface IfBlock extends BlockBase {
  type: 'if';
  condition: string;
  then_children: ControlBlock[];
  /** Omitted when the if statement has no else branch */
  else_children?: ControlBlock[];
}

export interface LoopBlock extends BlockBase {
  type: 'loop';
  label: string;
  body_children: ControlBlock[];
}

export type ControlBlock = SequenceBlock | IfBlock | LoopBlock;

export type ControlBlockType = ControlBlock['type'];

export interface ParameterIR {
  type: string;
  name: string;
}

export interface FunctionIR {
  id: string;
  name: string;
  signature: string;
  file: string;
  /** One-based line of the definition */
  line: number;
  namespace: string | null;
  class_name: string | null;
  inputs: ParameterIR[];
  outputs: string[];
  control_blocks: ControlBlock[];
  /** Distinct callee names, sorted */
  calls: string[];
  complexity: number;
  metadata: Attributes;
}

export interface ModuleIR {
  id: string;
  name: string;
  path: string;
  entry_points: string[];
  public_api: string[];
  private_api: string[];
  functions: string[];
  /** Module names, sorted */
  dependencies: string[];
  metadata: Attributes;
}

export interface MainFlow {
  module: string;
  entry_points: string[];
}

export interface ProjectIR {
  id: string;
  name: string;
  root_path: string;
  modules: string[];
  main_flows: MainFlow[];
  startup_sequence: string[];
  metadata: Attributes;
}

/**
 * Visit every block of a tree, parents before children.
 */
export function* walkBlocks(blocks: readonly ControlBlock[]): Generator<ControlBlock> {
  for (const block of blocks) {
    yield block;
    switch (block.type) {
      case 'if':
        yield* walkBlocks(block.then_children);
        if (block.else_children) {
          yield* walkBlocks(block.else_children);
        }
        break;
      case 'loop':
        yield* walkBlocks(block.body_children);
        break;
      case 'sequence':
        break;
    }
  }
}
