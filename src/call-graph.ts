/**
 * Whole-program call graph keyed by qualified function names.
 *
 * Functions are registered first; call sites found in their bodies are then
 * resolved against the registered names. A callee nobody registered still gets
 * a node (marked `external`) so the edge is not lost.
 */

import { CallKind, CallSite, collectCallSites } from './call-sites';
import { DiagnosticLog } from './diagnostics';
import { Graph } from './graphs/graph';
import { DEFAULT_RESOLVERS, Resolver, qualify, resolveCallee } from './resolution';
import { SyntaxNode, Lookup, findFunction } from './syntax-tree';
import { isStringArray } from './types';

export interface FunctionFlags {
  isVirtual?: boolean;
  isStatic?: boolean;
}

export interface CallerScope {
  name: string;
  file: string;
  className?: string | null;
  namespace?: string | null;
}

export interface CallGraphOptions {
  diagnostics?: DiagnosticLog;
  resolvers?: readonly Resolver[];
}

export class CallGraphBuilder {
  private graph = new Graph();
  private diagnostics: DiagnosticLog;
  private resolvers: readonly Resolver[];

  constructor(options: CallGraphOptions = {}) {
    this.diagnostics = options.diagnostics ?? new DiagnosticLog();
    this.resolvers = options.resolvers ?? DEFAULT_RESOLVERS;
  }

  /**
   * Register a function and return its qualified name.
   * Registering an already known name updates its attributes.
   */
  addFunction(
    name: string,
    file: string,
    className?: string | null,
    namespace?: string | null,
    flags: FunctionFlags = {}
  ): string {
    const qualifiedName = qualify(name, className, namespace);
    this.graph.addNode(qualifiedName, {
      function_name: name,
      class_name: className ?? null,
      namespace: namespace ?? null,
      file,
      is_virtual: flags.isVirtual ?? false,
      is_static: flags.isStatic ?? false,
      external: false,
    });
    return qualifiedName;
  }

  /**
   * Add (or merge into) the edge caller -> callee.
   * Repeated calls accumulate distinct call kinds on a single edge.
   */
  addCall(caller: string, callee: string, kind: CallKind): void {
    const existing = this.graph.findEdge(caller, callee);
    if (existing) {
      const kinds = existing.attributes.call_types;
      if (isStringArray(kinds) && !kinds.includes(kind)) {
        kinds.push(kind);
      }
      return;
    }
    this.graph.addEdge(caller, callee, { call_type: kind, call_types: [kind] });
  }

  /**
   * Locate `functionName` in the subtree and record every call it makes.
   * Returns the number of call sites recorded.
   */
  extractCalls(
    subtree: SyntaxNode,
    functionName: string,
    file: string,
    className?: string | null,
    namespace?: string | null
  ): Lookup<number> {
    const functionNode = findFunction(subtree, functionName);
    if (!functionNode) {
      return { found: false, reason: `Function ${functionName} not found in ${file}` };
    }

    // Nested definitions (local class methods) own their calls
    const sites = collectCallSites(functionNode, (node) => node.function !== undefined);
    const recorded = this.recordCalls({ name: functionName, file, className, namespace }, sites);
    return { found: true, value: recorded };
  }

  /**
   * Resolve and record call sites collected elsewhere for one caller.
   */
  recordCalls(caller: CallerScope, sites: readonly CallSite[]): number {
    const callerName = qualify(caller.name, caller.className, caller.namespace);

    for (const site of sites) {
      const resolution = resolveCallee(
        {
          name: site.name,
          writtenQualifiedName: site.qualifiedName,
          callerClass: caller.className ?? null,
          callerNamespace: caller.namespace ?? null,
          isKnown: (candidate) => this.graph.hasNode(candidate),
        },
        this.resolvers
      );

      if (!resolution.resolved) {
        this.graph.addNode(resolution.target, { function_name: site.name, external: true });
        this.diagnostics.record({
          kind: 'unresolved-reference',
          severity: 'low',
          message: `Call from ${callerName} to unknown function ${site.qualifiedName ?? site.name}`,
          file: caller.file,
          line: site.line,
        });
      }

      this.addCall(callerName, resolution.target, site.kind);
    }

    return sites.length;
  }

  /**
   * Functions called by `qualifiedName`.
   */
  callees(qualifiedName: string): string[] {
    return this.graph.successors(qualifiedName);
  }

  /**
   * Functions calling `qualifiedName`.
   */
  callers(qualifiedName: string): string[] {
    return this.graph.predecessors(qualifiedName);
  }

  hasFunction(qualifiedName: string): boolean {
    return this.graph.hasNode(qualifiedName);
  }

  getFunctionLocation(qualifiedName: string): string | undefined {
    const file = this.graph.getNode(qualifiedName)?.file;
    return typeof file === 'string' ? file : undefined;
  }

  /**
   * Callers before callees. With a cycle (recursion included) no such order
   * exists and every node is returned in registration order instead.
   */
  topologicalOrder(): string[] {
    const ids = this.graph.nodeIds();
    const inDegree = new Map<string, number>();
    for (const id of ids) {
      inDegree.set(id, 0);
    }
    for (const edge of this.graph.edges) {
      inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1);
    }

    const queue = ids.filter((id) => inDegree.get(id) === 0);
    const order: string[] = [];

    for (let i = 0; i < queue.length; i++) {
      const id = queue[i];
      order.push(id);
      for (const edge of this.graph.outEdges(id)) {
        const remaining = (inDegree.get(edge.target) ?? 0) - 1;
        inDegree.set(edge.target, remaining);
        if (remaining === 0) {
          queue.push(edge.target);
        }
      }
    }

    return order.length === ids.length ? order : ids;
  }

  get functionCount(): number {
    return this.graph.nodeCount;
  }

  get callCount(): number {
    return this.graph.edgeCount;
  }

  /**
   * Snapshot of the underlying graph.
   */
  toGraph(): Graph {
    return this.graph.subgraph(this.graph.nodeIds());
  }
}
