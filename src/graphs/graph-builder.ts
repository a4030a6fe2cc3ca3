/**
 * Builds normalized presentation graphs from the IR.
 */

import type { ControlBlock, FunctionIR, ModuleIR } from '../ir/ir-schema';
import { Attributes } from '../types';
import { Graph } from './graph';

function blockAttributes(fn: FunctionIR, block: ControlBlock): Attributes {
  return {
    type: block.type,
    label: block.type === 'if' ? block.condition : block.label,
    function_id: fn.id,
    condition: block.type === 'if' ? block.condition : null,
    metadata: block.metadata,
  };
}

function isReturnBlock(block: ControlBlock): boolean {
  return block.type === 'sequence' && block.metadata.node_kind === 'return';
}

export class GraphBuilder {
  /**
   * Per-function CFG with one node per control block.
   *
   * Sequences chain with normal edges, an if fans out to its arms with
   * true/false edges (the if itself falls through when there is no else), a
   * loop enters its body and the body's end returns to it with a back edge.
   * Return blocks go to the exit; everything left dangling is closed to it.
   */
  buildCfgGraph(fn: FunctionIR): Graph {
    const graph = new Graph();
    const entry = `${fn.id}_entry`;
    const exit = `${fn.id}_exit`;
    graph.addNode(entry, { type: 'entry', label: `Entry: ${fn.name}`, function_id: fn.id });
    graph.addNode(exit, { type: 'exit', label: `Exit: ${fn.name}`, function_id: fn.id });

    const nodeId = (block: ControlBlock): string => `${fn.id}_${block.id}`;

    const addBlocks = (
      blocks: readonly ControlBlock[],
      predecessors: string[],
      firstEdgeType: string
    ): string[] => {
      let frontier = predecessors;
      let edgeType = firstEdgeType;

      for (const block of blocks) {
        const id = nodeId(block);
        graph.addNode(id, blockAttributes(fn, block));
        for (const predecessor of frontier) {
          graph.addEdge(predecessor, id, { type: edgeType });
        }
        edgeType = 'normal';

        switch (block.type) {
          case 'sequence':
            if (isReturnBlock(block)) {
              graph.addEdge(id, exit, { type: 'return' });
              return [];
            }
            frontier = [id];
            break;

          case 'if': {
            const thenEnds = addBlocks(block.then_children, [id], 'true');
            const elseEnds = block.else_children
              ? addBlocks(block.else_children, [id], 'false')
              : [id];
            frontier = [...new Set([...thenEnds, ...elseEnds])];
            break;
          }

          case 'loop': {
            const bodyEnds = addBlocks(block.body_children, [id], 'normal');
            for (const end of bodyEnds) {
              graph.addEdge(end, id, { type: 'back_edge' });
            }
            frontier = [id];
            break;
          }
        }

        if (frontier.length === 0) {
          return [];
        }
      }

      return frontier;
    };

    // A trailing loop keeps its body edge, so its fall-through is explicit
    for (const end of addBlocks(fn.control_blocks, [entry], 'normal')) {
      graph.addEdge(end, exit, { type: 'normal' });
    }

    // Closure: dangling nodes flow to the exit
    for (const id of graph.nodeIds()) {
      if (id !== exit && graph.outDegree(id) === 0) {
        graph.addEdge(id, exit, { type: 'normal' });
      }
    }

    return graph;
  }

  /**
   * Call graph over FunctionIR ids. A callee name resolves to the first
   * function with that name; names matching no function are dropped.
   */
  buildCallGraph(functions: readonly FunctionIR[]): Graph {
    const graph = new Graph();
    const byName = new Map<string, string>();

    for (const fn of functions) {
      graph.addNode(fn.id, {
        name: fn.name,
        signature: fn.signature,
        file: fn.file,
        line: fn.line,
        metadata: fn.metadata,
      });
      if (!byName.has(fn.name)) {
        byName.set(fn.name, fn.id);
      }
    }

    for (const fn of functions) {
      for (const callee of fn.calls) {
        const target = byName.get(callee);
        if (target && !graph.findEdge(fn.id, target)) {
          graph.addEdge(fn.id, target, { type: 'call' });
        }
      }
    }

    return graph;
  }

  /**
   * Module dependency graph over ModuleIR ids.
   */
  buildModuleGraph(modules: readonly ModuleIR[]): Graph {
    const graph = new Graph();
    const byName = new Map<string, string>();

    for (const module of modules) {
      graph.addNode(module.id, { name: module.name, path: module.path, metadata: module.metadata });
      byName.set(module.name, module.id);
    }

    for (const module of modules) {
      for (const dependency of module.dependencies) {
        const target = byName.get(dependency);
        if (target && target !== module.id && !graph.findEdge(module.id, target)) {
          graph.addEdge(module.id, target, { type: 'depends_on' });
        }
      }
    }

    return graph;
  }
}
