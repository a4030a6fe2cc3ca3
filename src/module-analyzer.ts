import * as fs from 'fs';
import * as path from 'path';
import { DiagnosticLog, errorMessage } from './diagnostics';
import { Graph } from './graphs/graph';

/**
 * A top-level directory of the project and the files it holds.
 */
export interface ModuleInfo {
  name: string;
  /** Absolute directory of the module (the project root for `root`) */
  path: string;
  files: string[];
  publicHeaders: string[];
  privateHeaders: string[];
  sourceFiles: string[];
  /** Function ids attached after IR construction */
  functions: string[];
}

export interface IncludeReference {
  target: string;
  /** `<...>` rather than `"..."` */
  system: boolean;
  line: number;
}

export interface ModuleAnalysis {
  modules: Map<string, ModuleInfo>;
  moduleGraph: Graph;
}

export interface ModuleAnalyzerOptions {
  /** Source reader, fs by default */
  readSource?: (file: string) => string;
  diagnostics?: DiagnosticLog;
}

/** Module holding files that sit directly in the project root */
export const ROOT_MODULE = 'root';
/** Module holding files outside the project root */
export const UNKNOWN_MODULE = 'unknown';

const HEADER_EXTENSIONS = new Set(['.h', '.hh', '.hpp', '.hxx']);

const INCLUDE_PATTERN = /^[ \t]*#[ \t]*include[ \t]*([<"])([^>"\n]+)[>"]/gm;

/**
 * Extract `#include` references from source text.
 */
export function extractIncludes(content: string): IncludeReference[] {
  const references: IncludeReference[] = [];
  for (const match of content.matchAll(INCLUDE_PATTERN)) {
    const offset = match.index ?? 0;
    references.push({
      target: match[2].trim(),
      system: match[1] === '<',
      line: content.substring(0, offset).split('\n').length,
    });
  }
  return references;
}

export function isHeaderFile(file: string): boolean {
  return HEADER_EXTENSIONS.has(path.extname(file).toLowerCase());
}

/**
 * Groups files into modules (first directory under the project root) and
 * derives module dependencies from include references.
 */
export class ModuleAnalyzer {
  private readonly projectRoot: string;
  private readonly readSource: (file: string) => string;
  private readonly diagnostics: DiagnosticLog;
  private modules: Map<string, ModuleInfo> = new Map();
  private fileModules: Map<string, string> = new Map();
  private graph = new Graph();

  constructor(projectRoot: string, options: ModuleAnalyzerOptions = {}) {
    this.projectRoot = path.resolve(projectRoot);
    this.readSource = options.readSource ?? ((file) => fs.readFileSync(file, 'utf-8'));
    this.diagnostics = options.diagnostics ?? new DiagnosticLog();
  }

  /**
   * Partition files into modules and build the module dependency graph.
   * Every call starts from a clean state, so repeated runs agree.
   */
  analyze(files: readonly string[]): ModuleAnalysis {
    this.modules = new Map();
    this.fileModules = new Map();
    this.graph = new Graph();

    const absoluteFiles = files.map((file) => path.resolve(this.projectRoot, file));

    for (const file of absoluteFiles) {
      this.assignFile(file);
    }

    for (const file of absoluteFiles) {
      this.collectDependencies(file, absoluteFiles);
    }

    return { modules: this.modules, moduleGraph: this.graph };
  }

  /**
   * Module name for a path, without registering anything.
   */
  moduleNameFor(file: string): string {
    const relative = path.relative(this.projectRoot, path.resolve(this.projectRoot, file));
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      return UNKNOWN_MODULE;
    }
    const segments = relative.split(path.sep).filter((segment) => segment.length > 0);
    return segments.length > 1 ? segments[0] : ROOT_MODULE;
  }

  getModule(name: string): ModuleInfo | undefined {
    return this.modules.get(name);
  }

  getModuleForFile(file: string): string | undefined {
    return this.fileModules.get(path.resolve(this.projectRoot, file));
  }

  getAllModules(): ModuleInfo[] {
    return [...this.modules.values()];
  }

  /**
   * Modules that `name` depends on.
   */
  getDependencies(name: string): string[] {
    return this.graph.hasNode(name) ? this.graph.successors(name) : [];
  }

  /**
   * Modules that depend on `name`.
   */
  getDependents(name: string): string[] {
    return this.graph.hasNode(name) ? this.graph.predecessors(name) : [];
  }

  addFunctionToModule(moduleName: string, functionId: string): boolean {
    const module = this.modules.get(moduleName);
    if (!module) {
      return false;
    }
    if (!module.functions.includes(functionId)) {
      module.functions.push(functionId);
    }
    return true;
  }

  get moduleGraph(): Graph {
    return this.graph;
  }

  private assignFile(file: string): void {
    const name = this.moduleNameFor(file);
    let module = this.modules.get(name);
    if (!module) {
      module = {
        name,
        path: name === ROOT_MODULE || name === UNKNOWN_MODULE ? this.projectRoot : path.join(this.projectRoot, name),
        files: [],
        publicHeaders: [],
        privateHeaders: [],
        sourceFiles: [],
        functions: [],
      };
      this.modules.set(name, module);
      this.graph.addNode(name, { path: module.path });
    }

    if (this.fileModules.has(file)) {
      return;
    }
    this.fileModules.set(file, name);
    module.files.push(file);

    if (isHeaderFile(file)) {
      const relative = path.relative(this.projectRoot, file).toLowerCase();
      if (relative.includes('include') || relative.includes('public')) {
        module.publicHeaders.push(file);
      } else {
        module.privateHeaders.push(file);
      }
    } else {
      module.sourceFiles.push(file);
    }
  }

  private collectDependencies(file: string, files: readonly string[]): void {
    const moduleName = this.fileModules.get(file);
    if (moduleName === undefined) {
      return;
    }

    let content: string;
    try {
      content = this.readSource(file);
    } catch (error) {
      this.diagnostics.record({
        kind: 'unit-failure',
        severity: 'medium',
        message: `Could not read ${file}: ${errorMessage(error)}`,
        file,
      });
      return;
    }

    for (const reference of extractIncludes(content)) {
      // Absolute includes point outside the project
      if (path.isAbsolute(reference.target)) {
        continue;
      }

      const targetFile = this.resolveInclude(reference.target, files);
      if (!targetFile) {
        this.diagnostics.record({
          kind: 'unresolved-reference',
          severity: 'low',
          message: `Include ${reference.target} does not match a project file`,
          file,
          line: reference.line,
        });
        continue;
      }

      const targetModule = this.fileModules.get(targetFile);
      if (targetModule === undefined || targetModule === moduleName) {
        continue;
      }
      if (!this.graph.findEdge(moduleName, targetModule)) {
        this.graph.addEdge(moduleName, targetModule, { type: 'depends_on' });
      }
    }
  }

  /**
   * First file whose name equals the reference's name, else the first whose
   * stem equals the reference's stem.
   */
  private resolveInclude(target: string, files: readonly string[]): string | undefined {
    const targetName = path.basename(target);
    const targetStem = path.parse(target).name;
    return (
      files.find((file) => path.basename(file) === targetName) ??
      files.find((file) => path.parse(file).name === targetStem)
    );
  }
}
