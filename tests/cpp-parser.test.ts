import { buildCFG } from '../src/control-flow';
import { CppSourceParser } from '../src/cpp-parser';
import { analyzeSource } from '../src/file-analysis';
import { ASTToIRTransformer } from '../src/ir/ast-to-ir';
import { walkBlocks } from '../src/ir/ir-schema';
import {
  ClassSummary,
  FunctionSummary,
  SyntaxNode,
  collectFunctions,
  descendants,
} from '../src/syntax-tree';

const parser = new CppSourceParser();

function functionsOf(source: string): FunctionSummary[] {
  const summaries: FunctionSummary[] = [];
  for (const node of collectFunctions(parser.parse(source))) {
    if (node.function) summaries.push(node.function);
  }
  return summaries;
}

function classesOf(source: string): ClassSummary[] {
  const summaries: ClassSummary[] = [];
  for (const node of descendants(parser.parse(source))) {
    if (node.class) summaries.push(node.class);
  }
  return summaries;
}

function onlyFunction(source: string): SyntaxNode {
  const [node] = collectFunctions(parser.parse(source));
  if (!node) {
    throw new Error('no function definition in source');
  }
  return node;
}

describe('CppSourceParser', () => {
  describe('function summaries', () => {
    it('should split parameters into type and name', () => {
      const [fill] = functionsOf('void fill(const char* name, std::vector<int>& items) {}');

      expect(fill.name).toBe('fill');
      expect(fill.returnType).toBe('void');
      expect(fill.parameters).toEqual([
        { type: 'const char*', name: 'name' },
        { type: 'std::vector<int>&', name: 'items' },
      ]);
    });

    it('should drop default values from parameter types', () => {
      const [add] = functionsOf('int add(int a, int b = 2) { return a + b; }');

      expect(add.parameters).toEqual([
        { type: 'int', name: 'a' },
        { type: 'int', name: 'b' },
      ]);
    });

    it('should read f(void) as no parameters and keep unnamed ones', () => {
      const [tick, cmp] = functionsOf('int tick(void) { return 0; }\nint cmp(int, int) { return 0; }');

      expect(tick.parameters).toEqual([]);
      expect(cmp.parameters).toEqual([
        { type: 'int', name: '' },
        { type: 'int', name: '' },
      ]);
    });

    it('should keep pointer declarators in the return type', () => {
      const [find] = functionsOf('int* find(int key) { return nullptr; }');

      expect(find.name).toBe('find');
      expect(find.returnType).toBe('int*');
    });

    it('should decode virtual, static and const members', () => {
      const [area, count] = functionsOf(`
namespace geo {
class Shape {
 public:
  virtual double area() const { return 0; }
  static int count() { return 1; }
  int sides;
};
}
`);

      expect(area).toEqual({
        name: 'area',
        returnType: 'double',
        parameters: [],
        isVirtual: true,
        isStatic: false,
        isConst: true,
        className: 'Shape',
        namespace: 'geo',
      });
      expect(count.isStatic).toBe(true);
      expect(count.isVirtual).toBe(false);
      expect(count.isConst).toBe(false);
    });

    it('should take class and namespace from out-of-class definitions', () => {
      const [close, read] = functionsOf(`
namespace net {
void Socket::close() {}
}
void io::File::read(char* buffer, int size = 64) {}
`);

      expect([close.namespace, close.className, close.name]).toEqual(['net', 'Socket', 'close']);
      expect([read.namespace, read.className, read.name]).toEqual(['io', 'File', 'read']);
      expect(read.parameters).toEqual([
        { type: 'char*', name: 'buffer' },
        { type: 'int', name: 'size' },
      ]);
    });

    it('should scope methods of nested classes under every enclosing class', () => {
      const [go] = functionsOf(`
class Outer {
  class Inner {
    void go() {}
  };
};
`);

      expect(go.className).toBe('Outer::Inner');
      expect(go.namespace).toBeNull();
    });

    it('should split nested namespace names', () => {
      const root = parser.parse('namespace a::b { int f() { return 1; } }');
      const namespaces = [...descendants(root)].flatMap((node) => (node.namespace ? [node.namespace] : []));

      expect(namespaces).toEqual([{ name: 'a::b', qualifiedName: 'a::b' }]);
      expect(collectFunctions(root)[0]?.function?.namespace).toBe('a::b');
    });
  });

  describe('class summaries', () => {
    it('should list bases, methods and fields', () => {
      const [shape, square] = classesOf(`
namespace geo {
class Shape {
 public:
  virtual double area() const { return 0; }
  int sides;
};
struct Square : public Shape {
  double edge;
};
}
`);

      expect(shape).toEqual({
        name: 'Shape',
        kind: 'class',
        baseClasses: [],
        methods: ['area'],
        fields: ['sides'],
        namespace: 'geo',
      });
      expect(square).toEqual({
        name: 'Square',
        kind: 'struct',
        baseClasses: ['Shape'],
        methods: [],
        fields: ['edge'],
        namespace: 'geo',
      });
    });
  });

  describe('declarations', () => {
    it('should name every declared variable', () => {
      const root = parser.parse('int x = 1, *y;');
      const declarations = [...descendants(root)].flatMap((node) =>
        node.declaration ? [node.declaration] : []
      );

      expect(declarations).toEqual([{ names: ['x', 'y'], type: 'int' }]);
    });
  });

  it('should parse sources past the default input buffer', () => {
    const source = Array.from({ length: 3000 }, (_, i) => `void f${i}() {}`).join('\n');

    expect(source.length).toBeGreaterThan(32 * 1024);
    expect(collectFunctions(parser.parse(source))).toHaveLength(3000);
  });

  describe('end to end', () => {
    const SOURCE = ['int f(int x) {', '  if (x > 0) {', '    return 1;', '  }', '  return 0;', '}', ''].join('\n');

    it('should build the early-return CFG from real source', () => {
      const cfg = buildCFG(onlyFunction(SOURCE), 'f', 'a.cc');

      expect(cfg.edges.map((edge) => `${edge.source} -${edge.kind}-> ${edge.target}`)).toEqual([
        'f_entry -normal-> f_n0',
        'f_n0 -true-> f_n1',
        'f_n1 -return-> f_exit',
        'f_n0 -false-> f_n2',
        'f_n2 -normal-> f_n3',
        'f_n3 -return-> f_exit',
      ]);
      expect(cfg.nodes.get('f_n0')?.attributes.condition).toBe('x > 0');
    });

    it('should produce the function IR from real source', () => {
      const node = onlyFunction(SOURCE);
      const ir = new ASTToIRTransformer('/proj').transformFunction(node, buildCFG(node, 'f', 'a.cc'), 'a.cc');

      expect(ir.id).toBe('func___f_a');
      expect(ir.signature).toBe('int f(int x)');
      expect(ir.line).toBe(1);
      expect(ir.inputs).toEqual([{ type: 'int', name: 'x' }]);
      expect(ir.outputs).toEqual(['int']);
      expect(ir.complexity).toBe(2);
      expect(ir.control_blocks).toEqual([
        {
          type: 'if',
          id: 'f_n0',
          condition: 'x > 0',
          then_children: [
            { type: 'sequence', id: 'f_n1', label: 'return 1;', metadata: { node_kind: 'return', line: 3 } },
          ],
          metadata: { node_kind: 'branch', line: 2 },
        },
        { type: 'sequence', id: 'f_n3', label: 'return 0;', metadata: { node_kind: 'return', line: 5 } },
      ]);
    });

    it('should keep node ids of overloads apart', () => {
      const analysis = analyzeSource(
        'void f(int x) { a(); }\nvoid f(double y) { b(); }\n',
        '/proj/a.cc',
        parser,
        '/proj'
      );
      const [first, second] = analysis.functions.map((fn) => fn.ir);
      const blockIds = (blocks: typeof first.control_blocks) => [...walkBlocks(blocks)].map((block) => block.id);

      expect([first.id, second.id]).toEqual(['func___f_a', 'func___f_a_L2']);
      expect(blockIds(first.control_blocks)).toEqual(['func___f_a_n0']);
      expect(blockIds(second.control_blocks)).toEqual(['func___f_a_L2_n0']);
      expect(first.calls).toEqual(['a']);
      expect(second.calls).toEqual(['b']);
    });
  });
});
