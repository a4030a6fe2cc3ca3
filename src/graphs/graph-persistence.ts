/**
 * Graph files: `{nodes: [{id, ...attributes}], edges: [{source, target, ...attributes}]}`.
 * Attributes are flattened into the node and edge objects.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DiagnosticLog, errorMessage } from '../diagnostics';
import { IRFormatError } from '../ir/ir-serializer';
import { Attributes, JsonValue, isJsonValue, isRecord } from '../types';
import { Graph } from './graph';

export interface GraphDocument {
  nodes: Array<{ [key: string]: JsonValue }>;
  edges: Array<{ [key: string]: JsonValue }>;
}

export function graphToDocument(graph: Graph): GraphDocument {
  return {
    nodes: [...graph.nodes].map(([id, attributes]) => ({ ...attributes, id })),
    edges: graph.edges.map((edge) => ({
      ...edge.attributes,
      source: edge.source,
      target: edge.target,
    })),
  };
}

function splitAttributes(
  entry: unknown,
  keys: readonly string[],
  at: string
): { keys: string[]; attributes: Attributes } {
  if (!isRecord(entry)) {
    throw new IRFormatError(at, 'expected an object');
  }

  const values: string[] = [];
  for (const key of keys) {
    const value = entry[key];
    if (typeof value !== 'string') {
      throw new IRFormatError(`${at}.${key}`, 'expected a string');
    }
    values.push(value);
  }

  const attributes: Attributes = {};
  for (const [key, value] of Object.entries(entry)) {
    if (keys.includes(key)) continue;
    if (!isJsonValue(value)) {
      throw new IRFormatError(`${at}.${key}`, 'expected a JSON value');
    }
    attributes[key] = value;
  }

  return { keys: values, attributes };
}

export function graphFromDocument(value: unknown, at = 'graph'): Graph {
  if (!isRecord(value) || !Array.isArray(value.nodes) || !Array.isArray(value.edges)) {
    throw new IRFormatError(at, 'expected {nodes: [], edges: []}');
  }

  const graph = new Graph();
  value.nodes.forEach((entry, index) => {
    const { keys, attributes } = splitAttributes(entry, ['id'], `${at}.nodes[${index}]`);
    graph.addNode(keys[0], attributes);
  });
  value.edges.forEach((entry, index) => {
    const { keys, attributes } = splitAttributes(
      entry,
      ['source', 'target'],
      `${at}.edges[${index}]`
    );
    graph.addEdge(keys[0], keys[1], attributes);
  });
  return graph;
}

export function saveGraph(graph: Graph, filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(graphToDocument(graph), null, 2), 'utf-8');
}

/**
 * Load a graph file. Returns null when the file does not exist.
 */
export function loadGraph(filePath: string): Graph | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new IRFormatError(filePath, errorMessage(error));
  }
  return graphFromDocument(data, filePath);
}

/**
 * Write each graph to `<directory>/<name>.json`.
 */
export function saveGraphs(graphs: ReadonlyMap<string, Graph>, directory: string): void {
  for (const [name, graph] of graphs) {
    saveGraph(graph, path.join(directory, `${name}.json`));
  }
}

/**
 * Load every `*.json` graph in a directory, keyed by file stem.
 * Unreadable files are recorded as diagnostics and skipped.
 */
export function loadGraphs(directory: string, diagnostics?: DiagnosticLog): Map<string, Graph> {
  const graphs = new Map<string, Graph>();
  if (!fs.existsSync(directory)) {
    return graphs;
  }

  const files = fs
    .readdirSync(directory)
    .filter((file) => file.endsWith('.json'))
    .sort();

  for (const file of files) {
    const filePath = path.join(directory, file);
    try {
      const graph = loadGraph(filePath);
      if (graph) {
        graphs.set(path.parse(file).name, graph);
      }
    } catch (error) {
      diagnostics?.record({
        kind: 'malformed-input',
        severity: 'medium',
        message: `Skipped graph ${file}: ${errorMessage(error)}`,
        file: filePath,
      });
    }
  }

  return graphs;
}
