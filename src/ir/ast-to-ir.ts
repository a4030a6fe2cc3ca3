/**
 * Turns syntax trees and CFGs into the nested IR.
 *
 * The transformer owns a registry of every FunctionIR, ModuleIR and the
 * ProjectIR it produced, keyed by stable ids.
 */

import * as path from 'path';
import { cfgComplexity, outgoingEdges } from '../control-flow/cfg-queries';
import type { ControlFlowGraph, CFGNode } from '../control-flow/cfg-types';
import type { FunctionSummary, ParameterInfo, SyntaxNode } from '../syntax-tree';
import { Attributes, isStringArray } from '../types';
import type {
  ControlBlock,
  FunctionIR,
  IfBlock,
  MainFlow,
  ModuleIR,
  ProjectIR,
} from './ir-schema';

/** Function names treated as entry points of their module */
export const ENTRY_POINT_NAMES: ReadonlySet<string> = new Set([
  'main',
  'Main',
  'init',
  'Init',
  'start',
  'Start',
]);

/**
 * What the transformer needs to know about a module.
 */
export interface ModuleData {
  path: string;
  files: readonly string[];
  publicHeaders: readonly string[];
  sourceFiles: readonly string[];
  dependencies?: readonly string[];
}

/**
 * Replace anything but letters, digits, `_` and `-` with `_`.
 */
export function sanitizeIdPart(part: string): string {
  return part.replace(/[^\p{L}\p{N}_-]/gu, '_');
}

/**
 * Join a prefix and sanitized parts with `_`. Empty parts are kept so that
 * ids of differently scoped entities do not collide.
 */
export function createUniqueId(prefix: string, ...parts: string[]): string {
  return [prefix, ...parts.map(sanitizeIdPart)].join('_');
}

export function formatSignature(
  returnType: string,
  name: string,
  parameters: readonly ParameterInfo[]
): string {
  const params = parameters.map((param) => `${param.type} ${param.name}`.trim()).join(', ');
  return `${returnType} ${name}(${params || 'void'})`;
}

function stringAttribute(node: CFGNode, key: string): string | undefined {
  const value = node.attributes[key];
  return typeof value === 'string' ? value : undefined;
}

function blockMetadata(node: CFGNode): Attributes {
  const metadata: Attributes = { node_kind: node.kind };
  if (node.source_location) {
    metadata.line = node.source_location.line;
  }
  const calls = node.attributes.calls;
  if (isStringArray(calls)) {
    metadata.calls = [...calls];
  }
  const loopKind = stringAttribute(node, 'loop_kind');
  if (loopKind) {
    metadata.loop_kind = loopKind;
  }
  return metadata;
}

/**
 * Recover nested control blocks from a CFG.
 *
 * Walks from the entry with one visited set, so each node yields at most one
 * block. Arms of an if stop at the branch's merge node and the walk resumes
 * from the merge after the if block; a loop body stops at the loop's exit
 * node, which the walk resumes from after the loop block. Synthesized merge
 * and loop-exit nodes produce no block of their own.
 */
export function recoverControlBlocks(cfg: ControlFlowGraph): ControlBlock[] {
  const visited = new Set<string>();
  const blocks: ControlBlock[] = [];

  const walk = (id: string, stops: ReadonlySet<string>, out: ControlBlock[]): void => {
    if (id === cfg.exit || stops.has(id) || visited.has(id)) {
      return;
    }
    const node = cfg.nodes.get(id);
    if (!node) {
      return;
    }
    visited.add(id);
    const successors = outgoingEdges(cfg, id);

    switch (node.kind) {
      case 'entry':
      case 'exit':
        break;

      case 'statement':
      case 'return':
        if (node.attributes.synthetic === undefined) {
          out.push({ type: 'sequence', id, label: node.label, metadata: blockMetadata(node) });
        }
        break;

      case 'branch': {
        const merge = stringAttribute(node, 'merge');
        const armStops = merge ? new Set([...stops, merge]) : stops;

        const block: IfBlock = {
          type: 'if',
          id,
          condition: stringAttribute(node, 'condition') ?? node.label,
          then_children: [],
          metadata: blockMetadata(node),
        };
        for (const edge of successors) {
          if (edge.kind === 'true') walk(edge.target, armStops, block.then_children);
        }

        const elseEdges = successors.filter(
          (edge) => edge.kind === 'false' && edge.target !== id && edge.target !== merge
        );
        if (elseEdges.length > 0) {
          const elseChildren: ControlBlock[] = [];
          for (const edge of elseEdges) walk(edge.target, armStops, elseChildren);
          block.else_children = elseChildren;
        }

        out.push(block);
        if (merge) walk(merge, stops, out);
        return;
      }

      case 'loop': {
        const loopExit = stringAttribute(node, 'loop_exit');
        const bodyStops = loopExit ? new Set([...stops, loopExit]) : stops;
        const body: ControlBlock[] = [];
        for (const edge of successors) {
          if (edge.kind !== 'loop_exit') walk(edge.target, bodyStops, body);
        }
        out.push({
          type: 'loop',
          id,
          label: node.label,
          body_children: body,
          metadata: blockMetadata(node),
        });
        for (const edge of successors) {
          if (edge.kind === 'loop_exit') walk(edge.target, stops, out);
        }
        return;
      }
    }

    for (const edge of successors) {
      walk(edge.target, stops, out);
    }
  };

  walk(cfg.entry, new Set(), blocks);
  return blocks;
}

/**
 * Distinct callee names tagged on any CFG node, sorted.
 */
export function extractCalls(cfg: ControlFlowGraph): string[] {
  const calls = new Set<string>();
  for (const node of cfg.nodes.values()) {
    const tagged = node.attributes.calls;
    if (isStringArray(tagged)) {
      for (const call of tagged) calls.add(call);
    }
  }
  return [...calls].sort();
}

/**
 * Move block ids of the form `<from>_n<k>` to `<to>_n<k>`.
 */
export function renameBlocks(
  blocks: readonly ControlBlock[],
  from: string,
  to: string
): ControlBlock[] {
  const rename = (id: string): string => {
    const match = /^(.*)_n(\d+)$/.exec(id);
    return match && match[1] === from ? `${to}_n${match[2]}` : id;
  };

  return blocks.map((block): ControlBlock => {
    switch (block.type) {
      case 'sequence':
        return { ...block, id: rename(block.id) };
      case 'if': {
        const renamed: IfBlock = {
          ...block,
          id: rename(block.id),
          then_children: renameBlocks(block.then_children, from, to),
        };
        if (block.else_children) {
          renamed.else_children = renameBlocks(block.else_children, from, to);
        }
        return renamed;
      }
      case 'loop':
        return {
          ...block,
          id: rename(block.id),
          body_children: renameBlocks(block.body_children, from, to),
        };
    }
  });
}

/**
 * AST-to-IR transformer.
 */
export class ASTToIRTransformer {
  private readonly projectRoot: string;
  private functions: Map<string, FunctionIR> = new Map();
  private modules: Map<string, ModuleIR> = new Map();
  private project: ProjectIR | null = null;

  constructor(projectRoot: string) {
    this.projectRoot = path.resolve(projectRoot);
  }

  /**
   * Build and register the FunctionIR of a function definition.
   */
  transformFunction(
    functionNode: SyntaxNode,
    cfg: ControlFlowGraph,
    file: string,
    namespace?: string | null,
    className?: string | null
  ): FunctionIR {
    const summary: FunctionSummary = functionNode.function ?? {
      name: cfg.functionName.split('::').pop() ?? cfg.functionName,
      returnType: null,
      parameters: [],
      isVirtual: false,
      isStatic: false,
      isConst: false,
      className: null,
      namespace: null,
    };
    const scopeNamespace = namespace ?? summary.namespace;
    const scopeClass = className ?? summary.className;
    const returnType = summary.returnType ?? 'void';

    const ir: FunctionIR = {
      id: createUniqueId(
        'func',
        scopeNamespace ?? '',
        scopeClass ?? '',
        summary.name,
        path.parse(file).name
      ),
      name: summary.name,
      signature: formatSignature(returnType, summary.name, summary.parameters),
      file,
      line: functionNode.span.start.row + 1,
      namespace: scopeNamespace,
      class_name: scopeClass,
      inputs: summary.parameters.map((param) => ({ type: param.type, name: param.name })),
      outputs: returnType === 'void' ? [] : [returnType],
      control_blocks: recoverControlBlocks(cfg),
      calls: extractCalls(cfg),
      complexity: cfgComplexity(cfg),
      metadata: {
        is_virtual: summary.isVirtual,
        is_static: summary.isStatic,
        is_const: summary.isConst,
      },
    };

    return this.registerFunction(ir);
  }

  /**
   * Id the next function with this scope, name, file and line will be
   * registered under. Use it as the CFG id prefix so node ids stay unique
   * across overloads.
   */
  functionId(
    name: string,
    namespace: string | null,
    className: string | null,
    file: string,
    line: number
  ): string {
    return this.availableId(
      createUniqueId('func', namespace ?? '', className ?? '', name, path.parse(file).name),
      line
    );
  }

  /**
   * Register a FunctionIR built elsewhere (a worker thread, the cache).
   * An id already taken gets a `_L<line>` suffix, then a counter; control
   * blocks prefixed with the old id move to the new one.
   */
  registerFunction(ir: FunctionIR): FunctionIR {
    const id = this.availableId(ir.id, ir.line);
    const registered =
      id === ir.id
        ? ir
        : { ...ir, id, control_blocks: renameBlocks(ir.control_blocks, ir.id, id) };
    this.functions.set(id, registered);
    return registered;
  }

  private availableId(id: string, line: number): string {
    if (!this.functions.has(id)) {
      return id;
    }
    let candidate = `${id}_L${line}`;
    for (let n = 2; this.functions.has(candidate); n++) {
      candidate = `${id}_L${line}_${n}`;
    }
    return candidate;
  }

  /**
   * Build and register the ModuleIR of a module.
   */
  transformModule(name: string, module: ModuleData, functionIds: readonly string[]): ModuleIR {
    const entryPoints: string[] = [];
    const publicApi: string[] = [];
    const privateApi: string[] = [];

    for (const functionId of functionIds) {
      const fn = this.functions.get(functionId);
      if (!fn) continue;

      const relative = path.relative(this.projectRoot, path.resolve(this.projectRoot, fn.file));
      const lowered = relative.toLowerCase();
      if (lowered.includes('public') || lowered.includes('include')) {
        publicApi.push(functionId);
      } else {
        privateApi.push(functionId);
      }

      if (ENTRY_POINT_NAMES.has(fn.name)) {
        entryPoints.push(functionId);
      }
    }

    const ir: ModuleIR = {
      id: createUniqueId('module', name),
      name,
      path: module.path,
      entry_points: entryPoints,
      public_api: publicApi,
      private_api: privateApi,
      functions: [...functionIds],
      dependencies: [...new Set(module.dependencies ?? [])].sort(),
      metadata: {
        file_count: module.files.length,
        public_headers: module.publicHeaders.length,
        source_files: module.sourceFiles.length,
      },
    };

    this.modules.set(ir.id, ir);
    return ir;
  }

  /**
   * Build the ProjectIR. Modules with entry points contribute a main flow;
   * the startup sequence lists their entry points in module order.
   */
  transformProject(name: string, moduleIds: readonly string[]): ProjectIR {
    const mainFlows: MainFlow[] = [];
    const startupSequence: string[] = [];

    for (const moduleId of moduleIds) {
      const module = this.modules.get(moduleId);
      if (module && module.entry_points.length > 0) {
        mainFlows.push({ module: moduleId, entry_points: [...module.entry_points] });
        startupSequence.push(...module.entry_points);
      }
    }

    this.project = {
      id: createUniqueId('project', name),
      name,
      root_path: this.projectRoot,
      modules: [...moduleIds],
      main_flows: mainFlows,
      startup_sequence: startupSequence,
      metadata: {},
    };
    return this.project;
  }

  getFunction(id: string): FunctionIR | undefined {
    return this.functions.get(id);
  }

  getModule(id: string): ModuleIR | undefined {
    return this.modules.get(id);
  }

  getProject(): ProjectIR | null {
    return this.project;
  }

  getAllFunctions(): FunctionIR[] {
    return [...this.functions.values()];
  }

  getAllModules(): ModuleIR[] {
    return [...this.modules.values()];
  }
}
