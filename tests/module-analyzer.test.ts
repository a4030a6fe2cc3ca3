import * as path from 'path';
import { DiagnosticLog } from '../src/diagnostics';
import {
  ModuleAnalyzer,
  ROOT_MODULE,
  UNKNOWN_MODULE,
  extractIncludes,
  isHeaderFile,
} from '../src/module-analyzer';

const ROOT = path.resolve('/proj');

/**
 * Analyzer over an in-memory file set keyed by project-relative path.
 */
function analyzerFor(sources: Record<string, string>, diagnostics = new DiagnosticLog()) {
  const analyzer = new ModuleAnalyzer(ROOT, {
    diagnostics,
    readSource: (file) => {
      const content = sources[path.relative(ROOT, file)];
      if (content === undefined) {
        throw new Error(`ENOENT: ${file}`);
      }
      return content;
    },
  });
  return { analyzer, files: Object.keys(sources), diagnostics };
}

describe('Module analyzer', () => {
  describe('extractIncludes', () => {
    it('should find quoted and angle includes with their lines', () => {
      expect(extractIncludes('#include <vector>\n  # include "net/socket.h"\nint x;')).toEqual([
        { target: 'vector', system: true, line: 1 },
        { target: 'net/socket.h', system: false, line: 2 },
      ]);
    });

    it('should ignore includes that are not at the start of a line', () => {
      expect(extractIncludes('// see #include "old.h"\nint y;')).toEqual([]);
    });
  });

  describe('isHeaderFile', () => {
    it('should recognize header extensions', () => {
      expect(isHeaderFile('a/b.h')).toBe(true);
      expect(isHeaderFile('a/b.HPP')).toBe(true);
      expect(isHeaderFile('a/b.hh')).toBe(true);
      expect(isHeaderFile('a/b.cc')).toBe(false);
    });
  });

  describe('analyze', () => {
    it('should derive one dependency from a cross-module include', () => {
      const { analyzer, files } = analyzerFor({
        'core/a.cc': '#include "b.h"\nint main() { return 0; }\n',
        'util/b.h': 'int helper();\n',
      });

      const { modules, moduleGraph } = analyzer.analyze(files);

      expect([...modules.keys()]).toEqual(['core', 'util']);
      expect(moduleGraph.edges).toEqual([
        { source: 'core', target: 'util', attributes: { type: 'depends_on' } },
      ]);
      expect(analyzer.getDependencies('core')).toEqual(['util']);
      expect(analyzer.getDependents('util')).toEqual(['core']);
      expect(analyzer.getDependencies('util')).toEqual([]);
    });

    it('should place files by their first directory', () => {
      const { analyzer } = analyzerFor({});

      expect(analyzer.moduleNameFor('main.cc')).toBe(ROOT_MODULE);
      expect(analyzer.moduleNameFor('engine/render/gl.cc')).toBe('engine');
      expect(analyzer.moduleNameFor('/elsewhere/x.cc')).toBe(UNKNOWN_MODULE);
    });

    it('should split headers into public and private', () => {
      const { analyzer, files } = analyzerFor({
        'net/include/net/socket.h': '',
        'net/detail.h': '',
        'net/socket.cc': '',
        'gfx/Public/api.hpp': '',
      });

      analyzer.analyze(files);

      const net = analyzer.getModule('net');
      expect(net?.path).toBe(path.join(ROOT, 'net'));
      expect(net?.publicHeaders).toEqual([path.join(ROOT, 'net/include/net/socket.h')]);
      expect(net?.privateHeaders).toEqual([path.join(ROOT, 'net/detail.h')]);
      expect(net?.sourceFiles).toEqual([path.join(ROOT, 'net/socket.cc')]);
      expect(analyzer.getModule('gfx')?.publicHeaders).toEqual([path.join(ROOT, 'gfx/Public/api.hpp')]);
    });

    it('should give root files the project root as path', () => {
      const { analyzer, files } = analyzerFor({ 'main.cc': '' });

      analyzer.analyze(files);

      expect(analyzer.getModule(ROOT_MODULE)?.path).toBe(ROOT);
      expect(analyzer.getModuleForFile('main.cc')).toBe(ROOT_MODULE);
    });

    it('should prefer an exact file name over a matching stem', () => {
      const { analyzer, files } = analyzerFor({
        'a/util.h': '',
        'b/util.hpp': '',
        'c/main.cc': '#include "util.hpp"\n',
      });

      analyzer.analyze(files);

      expect(analyzer.getDependencies('c')).toEqual(['b']);
    });

    it('should fall back to the stem of the include', () => {
      const { analyzer, files } = analyzerFor({
        'cfg/config.h': '',
        'app/main.cc': '#include "config.hpp"\n',
      });

      analyzer.analyze(files);

      expect(analyzer.getDependencies('app')).toEqual(['cfg']);
    });

    it('should skip includes within a module and absolute includes', () => {
      const { analyzer, files, diagnostics } = analyzerFor({
        'core/a.h': '',
        'core/a.cc': '#include "a.h"\n#include "/usr/include/zlib.h"\n',
      });

      const { moduleGraph } = analyzer.analyze(files);

      expect(moduleGraph.edgeCount).toBe(0);
      expect(diagnostics.size).toBe(0);
    });

    it('should record includes that match no project file', () => {
      const { analyzer, files, diagnostics } = analyzerFor({
        'core/a.cc': '\n#include <vector>\n',
      });

      analyzer.analyze(files);

      expect(diagnostics.list()).toEqual([
        {
          kind: 'unresolved-reference',
          severity: 'low',
          message: 'Include vector does not match a project file',
          file: path.join(ROOT, 'core/a.cc'),
          line: 2,
        },
      ]);
    });

    it('should record files it cannot read', () => {
      const diagnostics = new DiagnosticLog();
      const analyzer = new ModuleAnalyzer(ROOT, {
        diagnostics,
        readSource: () => {
          throw new Error('permission denied');
        },
      });

      analyzer.analyze(['core/a.cc']);

      expect(diagnostics.ofKind('unit-failure')).toEqual([
        {
          kind: 'unit-failure',
          severity: 'medium',
          message: `Could not read ${path.join(ROOT, 'core/a.cc')}: permission denied`,
          file: path.join(ROOT, 'core/a.cc'),
        },
      ]);
      expect(analyzer.getModule('core')?.files).toHaveLength(1);
    });

    it('should start over on every run', () => {
      const { analyzer, files } = analyzerFor({
        'core/a.cc': '#include "b.h"\n',
        'util/b.h': '',
      });

      analyzer.analyze(files);
      analyzer.addFunctionToModule('core', 'func___main_a');
      const second = analyzer.analyze(files);

      expect(second.moduleGraph.edgeCount).toBe(1);
      expect(analyzer.getModule('core')?.files).toHaveLength(1);
      expect(analyzer.getModule('core')?.functions).toEqual([]);
    });
  });

  describe('addFunctionToModule', () => {
    it('should attach a function once and reject unknown modules', () => {
      const { analyzer, files } = analyzerFor({ 'core/a.cc': '' });
      analyzer.analyze(files);

      expect(analyzer.addFunctionToModule('core', 'func_a')).toBe(true);
      expect(analyzer.addFunctionToModule('core', 'func_a')).toBe(true);
      expect(analyzer.addFunctionToModule('missing', 'func_a')).toBe(false);
      expect(analyzer.getModule('core')?.functions).toEqual(['func_a']);
    });
  });
});
