import type { Attributes, JsonValue } from '../types';

export interface GraphEdge {
  source: string;
  target: string;
  attributes: Attributes;
}

function cloneValue(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (value !== null && typeof value === 'object') {
    return cloneAttributes(value);
  }
  return value;
}

/**
 * Deep copy of an attribute map; arrays and nested maps are not shared.
 */
export function cloneAttributes(attributes: Attributes): Attributes {
  const copy: Attributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    copy[key] = cloneValue(value);
  }
  return copy;
}

function pairKey(source: string, target: string): string {
  return `${source}\u0000${target}`;
}

function distinct(ids: Iterable<string>): string[] {
  return [...new Set(ids)];
}

/**
 * Directed multigraph with attribute maps on nodes and edges.
 *
 * Node insertion order is preserved, which keeps every traversal and every
 * serialized document deterministic. Edges are indexed by source, by target
 * and by (source, target) pair, so neighbour and degree queries cost
 * O(degree) rather than a scan of every edge.
 */
export class Graph {
  private nodeMap: Map<string, Attributes> = new Map();
  private edgeList: GraphEdge[] = [];
  private outgoing: Map<string, GraphEdge[]> = new Map();
  private incoming: Map<string, GraphEdge[]> = new Map();
  private pairs: Map<string, GraphEdge[]> = new Map();

  /**
   * Add a node, or merge attributes into an existing one.
   */
  addNode(id: string, attributes: Attributes = {}): void {
    const existing = this.nodeMap.get(id);
    if (existing) {
      Object.assign(existing, cloneAttributes(attributes));
    } else {
      this.nodeMap.set(id, cloneAttributes(attributes));
      this.outgoing.set(id, []);
      this.incoming.set(id, []);
    }
  }

  /**
   * Add an edge, creating missing endpoints with empty attributes.
   */
  addEdge(source: string, target: string, attributes: Attributes = {}): GraphEdge {
    this.addNode(source);
    this.addNode(target);
    const edge: GraphEdge = { source, target, attributes: cloneAttributes(attributes) };
    this.edgeList.push(edge);
    this.outgoing.get(source)?.push(edge);
    this.incoming.get(target)?.push(edge);

    const key = pairKey(source, target);
    const sameEnds = this.pairs.get(key);
    if (sameEnds) {
      sameEnds.push(edge);
    } else {
      this.pairs.set(key, [edge]);
    }
    return edge;
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  getNode(id: string): Attributes | undefined {
    return this.nodeMap.get(id);
  }

  /**
   * First edge from `source` to `target`, optionally narrowed by a predicate.
   */
  findEdge(
    source: string,
    target: string,
    predicate?: (edge: GraphEdge) => boolean
  ): GraphEdge | undefined {
    return this.pairs.get(pairKey(source, target))?.find((edge) => !predicate || predicate(edge));
  }

  get nodes(): ReadonlyMap<string, Attributes> {
    return this.nodeMap;
  }

  get edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  /**
   * Edges leaving `id`, in insertion order.
   */
  outEdges(id: string): readonly GraphEdge[] {
    return this.outgoing.get(id) ?? [];
  }

  /**
   * Edges entering `id`, in insertion order.
   */
  inEdges(id: string): readonly GraphEdge[] {
    return this.incoming.get(id) ?? [];
  }

  nodeIds(): string[] {
    return [...this.nodeMap.keys()];
  }

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  /**
   * Distinct successor ids, in edge order.
   */
  successors(id: string): string[] {
    return distinct(this.outEdges(id).map((edge) => edge.target));
  }

  /**
   * Distinct predecessor ids, in edge order.
   */
  predecessors(id: string): string[] {
    return distinct(this.inEdges(id).map((edge) => edge.source));
  }

  inDegree(id: string): number {
    return this.inEdges(id).length;
  }

  outDegree(id: string): number {
    return this.outEdges(id).length;
  }

  /**
   * Induced subgraph over the given node ids. Attributes are copied, so the
   * result does not change when this graph does.
   */
  subgraph(ids: Iterable<string>): Graph {
    const keep = new Set(ids);
    const result = new Graph();
    for (const [id, attributes] of this.nodeMap) {
      if (keep.has(id)) result.addNode(id, attributes);
    }
    for (const edge of this.edgeList) {
      if (keep.has(edge.source) && keep.has(edge.target)) {
        result.addEdge(edge.source, edge.target, edge.attributes);
      }
    }
    return result;
  }
}
