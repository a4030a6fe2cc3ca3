import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildCFG } from '../src/control-flow';
import { DiagnosticLog } from '../src/diagnostics';
import { Graph } from '../src/graphs/graph';
import { GraphBuilder } from '../src/graphs/graph-builder';
import {
  graphFromDocument,
  graphToDocument,
  loadGraph,
  loadGraphs,
  saveGraphs,
} from '../src/graphs/graph-persistence';
import {
  findCycles,
  getEntryNodes,
  getExitNodes,
  getReachableNodes,
  getSubgraphByScope,
  pruneGraph,
  validateGraph,
} from '../src/graphs/graph-utils';
import { ASTToIRTransformer } from '../src/ir/ast-to-ir';
import type { FunctionIR, ModuleIR } from '../src/ir/ir-schema';
import { Draft, block, fn, ifStmt, layout, ret, stmt, whileStmt } from './helpers/syntax';

function functionIR(draft: Draft, file = 'a.cc'): FunctionIR {
  const node = layout(draft);
  const name = node.function?.name ?? 'f';
  return new ASTToIRTransformer('/proj').transformFunction(node, buildCFG(node, name, file), file);
}

function stubFunction(id: string, name: string, calls: string[]): FunctionIR {
  return {
    id,
    name,
    signature: `void ${name}(void)`,
    file: 'x.cc',
    line: 1,
    namespace: null,
    class_name: null,
    inputs: [],
    outputs: [],
    control_blocks: [],
    calls,
    complexity: 1,
    metadata: {},
  };
}

function stubModule(name: string, dependencies: string[]): ModuleIR {
  return {
    id: `module_${name}`,
    name,
    path: `/proj/${name}`,
    entry_points: [],
    public_api: [],
    private_api: [],
    functions: [],
    dependencies,
    metadata: {},
  };
}

function edgeList(graph: Graph): string[] {
  return graph.edges.map((edge) => `${edge.source} -${String(edge.attributes.type)}-> ${edge.target}`);
}

/**
 * a -> b <-> c, d alone, e -> e
 */
function sampleGraph(): Graph {
  const graph = new Graph();
  graph.addEdge('a', 'b');
  graph.addEdge('b', 'c');
  graph.addEdge('c', 'b');
  graph.addNode('d');
  graph.addEdge('e', 'e');
  return graph;
}

describe('Graphs', () => {
  describe('GraphBuilder.buildCfgGraph', () => {
    const builder = new GraphBuilder();

    it('should lay out an if with early return', () => {
      const ir = functionIR(fn('f', block(ifStmt('x>0', block(ret('return 1;'))), ret('return 0;'))));
      const graph = builder.buildCfgGraph(ir);

      expect(ir.id).toBe('func___f_a');
      expect(edgeList(graph)).toEqual([
        'func___f_a_entry -normal-> func___f_a_f_n0',
        'func___f_a_f_n0 -true-> func___f_a_f_n1',
        'func___f_a_f_n1 -return-> func___f_a_exit',
        'func___f_a_f_n0 -normal-> func___f_a_f_n3',
        'func___f_a_f_n3 -return-> func___f_a_exit',
      ]);
      expect(graph.getNode('func___f_a_f_n0')).toEqual({
        type: 'if',
        label: 'x>0',
        function_id: 'func___f_a',
        condition: 'x>0',
        metadata: { node_kind: 'branch', line: 1 },
      });
    });

    it('should close a trailing loop to the exit', () => {
      const graph = builder.buildCfgGraph(functionIR(fn('spin', block(whileStmt('go', block(stmt('step;')))))));

      expect(edgeList(graph)).toEqual([
        'func___spin_a_entry -normal-> func___spin_a_spin_n0',
        'func___spin_a_spin_n0 -normal-> func___spin_a_spin_n1',
        'func___spin_a_spin_n1 -back_edge-> func___spin_a_spin_n0',
        'func___spin_a_spin_n0 -normal-> func___spin_a_exit',
      ]);
      expect(validateGraph(graph)).toEqual({
        valid: true,
        errors: [],
        warnings: ['Graph contains 1 cycle(s)'],
      });
    });

    it('should join entry and exit for an empty function', () => {
      const graph = builder.buildCfgGraph(functionIR(fn('g', block())));

      expect(edgeList(graph)).toEqual(['func___g_a_entry -normal-> func___g_a_exit']);
      expect(graph.getNode('func___g_a_entry')?.label).toBe('Entry: g');
    });

    it('should route both arms of an if/else to the next block', () => {
      const ir = functionIR(fn('pick', block(ifStmt('a', block(stmt('x = 1;')), block(stmt('x = 2;'))), stmt('use();'))));
      const graph = builder.buildCfgGraph(ir);

      expect(edgeList(graph)).toEqual([
        'func___pick_a_entry -normal-> func___pick_a_pick_n0',
        'func___pick_a_pick_n0 -true-> func___pick_a_pick_n1',
        'func___pick_a_pick_n0 -false-> func___pick_a_pick_n2',
        'func___pick_a_pick_n1 -normal-> func___pick_a_pick_n4',
        'func___pick_a_pick_n2 -normal-> func___pick_a_pick_n4',
        'func___pick_a_pick_n4 -normal-> func___pick_a_exit',
      ]);
    });
  });

  describe('GraphBuilder.buildCallGraph', () => {
    it('should link callers to the first function of each callee name', () => {
      const graph = new GraphBuilder().buildCallGraph([
        stubFunction('func_main', 'main', ['init', 'printf']),
        stubFunction('func_init_a', 'init', []),
        stubFunction('func_init_b', 'init', ['main']),
      ]);

      expect(graph.nodeIds()).toEqual(['func_main', 'func_init_a', 'func_init_b']);
      expect(edgeList(graph)).toEqual([
        'func_main -call-> func_init_a',
        'func_init_b -call-> func_main',
      ]);
      expect(graph.getNode('func_main')).toEqual({
        name: 'main',
        signature: 'void main(void)',
        file: 'x.cc',
        line: 1,
        metadata: {},
      });
    });
  });

  describe('GraphBuilder.buildModuleGraph', () => {
    it('should keep dependencies on known modules only', () => {
      const graph = new GraphBuilder().buildModuleGraph([
        stubModule('app', ['util', 'missing', 'app']),
        stubModule('util', []),
      ]);

      expect(edgeList(graph)).toEqual(['module_app -depends_on-> module_util']);
      expect(graph.getNode('module_util')).toEqual({ name: 'util', path: '/proj/util', metadata: {} });
    });
  });

  describe('Graph', () => {
    it('should index parallel edges by endpoint', () => {
      const graph = new Graph();
      graph.addEdge('a', 'b', { type: 'call' });
      graph.addEdge('a', 'b', { type: 'include' });
      graph.addEdge('c', 'b', { type: 'call' });

      expect(graph.outEdges('a').map((edge) => edge.attributes.type)).toEqual(['call', 'include']);
      expect(graph.inEdges('b').map((edge) => edge.source)).toEqual(['a', 'a', 'c']);
      expect(graph.successors('a')).toEqual(['b']);
      expect(graph.predecessors('b')).toEqual(['a', 'c']);
      expect([graph.outDegree('a'), graph.inDegree('b'), graph.inDegree('a')]).toEqual([2, 3, 0]);
      expect(graph.findEdge('a', 'b', (edge) => edge.attributes.type === 'include')?.attributes).toEqual({
        type: 'include',
      });
      expect(graph.findEdge('b', 'a')).toBeUndefined();
      expect(graph.outEdges('missing')).toEqual([]);
    });

    it('should copy attributes it is given', () => {
      const calls = ['x'];
      const graph = new Graph();
      graph.addNode('a', { calls });
      graph.addEdge('a', 'b', { kinds: calls });

      calls.push('y');

      expect(graph.getNode('a')).toEqual({ calls: ['x'] });
      expect(graph.findEdge('a', 'b')?.attributes).toEqual({ kinds: ['x'] });
    });

    it('should validate a large ring', () => {
      const size = 20000;
      const graph = new Graph();
      for (let i = 0; i < size; i++) {
        graph.addEdge(`n${i}`, `n${(i + 1) % size}`, { type: 'next' });
      }

      const cycles = findCycles(graph);

      expect(cycles).toHaveLength(1);
      expect(cycles[0]).toHaveLength(size);
      expect(cycles[0][0]).toBe('n0');
      expect(validateGraph(graph)).toEqual({
        valid: true,
        errors: [],
        warnings: ['Graph contains 1 cycle(s)'],
      });
      expect(getEntryNodes(graph)).toEqual([]);
    });
  });

  describe('graph utilities', () => {
    it('should find entry and exit nodes', () => {
      const graph = sampleGraph();

      expect(getEntryNodes(graph)).toEqual(['a', 'd']);
      expect(getExitNodes(graph)).toEqual(['d']);
    });

    it('should find reachable nodes', () => {
      const graph = sampleGraph();

      expect([...getReachableNodes(graph, 'a')].sort()).toEqual(['a', 'b', 'c']);
      expect(getReachableNodes(graph, 'zzz').size).toBe(0);
    });

    it('should find cycles including self loops', () => {
      expect(findCycles(sampleGraph())).toEqual([['b', 'c'], ['e']]);
    });

    it('should report orphans as errors and cycles as warnings', () => {
      expect(validateGraph(sampleGraph())).toEqual({
        valid: false,
        errors: ['Orphan node: d'],
        warnings: ['Graph contains 2 cycle(s)'],
      });
    });

    it('should accept a graph with a single node', () => {
      const graph = new Graph();
      graph.addNode('only');

      expect(validateGraph(graph)).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('should scope a subgraph by depth', () => {
      const graph = sampleGraph();

      expect(getSubgraphByScope(graph, ['a'], 1).nodeIds()).toEqual(['a', 'b']);
      expect(getSubgraphByScope(graph, ['a', 'unknown']).nodeIds()).toEqual(['a', 'b', 'c']);
      expect(getSubgraphByScope(graph, ['a'], 0).edgeCount).toBe(0);
    });

    it('should prune to the kept nodes', () => {
      const pruned = pruneGraph(sampleGraph(), ['b', 'c']);

      expect(pruned.nodeIds()).toEqual(['b', 'c']);
      expect(pruned.edges.map((edge) => `${edge.source}->${edge.target}`)).toEqual(['b->c', 'c->b']);
    });
  });

  describe('persistence', () => {
    let directory: string;

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'flowgraph-graphs-'));
    });

    afterEach(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    it('should flatten attributes into the document', () => {
      const graph = new Graph();
      graph.addNode('a', { label: 'A' });
      graph.addEdge('a', 'b', { type: 'call' });

      expect(graphToDocument(graph)).toEqual({
        nodes: [{ id: 'a', label: 'A' }, { id: 'b' }],
        edges: [{ source: 'a', target: 'b', type: 'call' }],
      });
    });

    it('should rebuild a graph from its document', () => {
      const graph = new Graph();
      graph.addNode('a', { label: 'A', calls: ['x', 'y'] });
      graph.addEdge('a', 'b', { type: 'call' });

      const restored = graphFromDocument(JSON.parse(JSON.stringify(graphToDocument(graph))));

      expect(restored.getNode('a')).toEqual({ label: 'A', calls: ['x', 'y'] });
      expect(restored.getNode('b')).toEqual({});
      expect(restored.edges).toEqual([{ source: 'a', target: 'b', attributes: { type: 'call' } }]);
    });

    it('should reject documents of the wrong shape', () => {
      expect(() => graphFromDocument({ nodes: [{ id: 3 }], edges: [] })).toThrow(
        'graph.nodes[0].id: expected a string'
      );
      expect(() => graphFromDocument([])).toThrow('graph: expected {nodes: [], edges: []}');
    });

    it('should save and load a directory of graphs', () => {
      const calls = new Graph();
      calls.addEdge('main', 'init', { type: 'call' });
      const modules = new Graph();
      modules.addNode('module_app', { name: 'app' });

      saveGraphs(
        new Map([
          ['call_graph', calls],
          ['module_graph', modules],
        ]),
        directory
      );
      fs.writeFileSync(path.join(directory, 'broken.json'), '{');

      const diagnostics = new DiagnosticLog();
      const loaded = loadGraphs(directory, diagnostics);

      expect([...loaded.keys()]).toEqual(['call_graph', 'module_graph']);
      expect(loaded.get('call_graph')?.edgeCount).toBe(1);
      expect(loaded.get('module_graph')?.getNode('module_app')).toEqual({ name: 'app' });
      expect(diagnostics.list()).toHaveLength(1);
      expect(diagnostics.list()[0]).toMatchObject({
        kind: 'malformed-input',
        severity: 'medium',
        file: path.join(directory, 'broken.json'),
      });
    });

    it('should return null for a missing graph file', () => {
      expect(loadGraph(path.join(directory, 'none.json'))).toBeNull();
    });
  });
});
