import { glob, Path } from 'glob';
import * as path from 'path';
import * as fs from 'fs';
import { cpus } from 'os';
import micromatch from 'micromatch';
import Piscina from 'piscina';
import { AnalysisCache } from './cache';
import { CallGraphBuilder } from './call-graph';
import { FlowgraphConfig, loadConfigWithInfo, mergeConfig, sourcePattern } from './config';
import { Diagnostic, DiagnosticLog, errorMessage, severityLevel } from './diagnostics';
import { FileAnalysis, analyzeFile, createCppParser } from './file-analysis';
import { Graph } from './graphs/graph';
import { GraphBuilder } from './graphs/graph-builder';
import { saveGraphs } from './graphs/graph-persistence';
import { getSubgraphByScope, pruneGraph } from './graphs/graph-utils';
import { ASTToIRTransformer } from './ir/ast-to-ir';
import type { FunctionIR, ModuleIR, ProjectIR } from './ir/ir-schema';
import { saveIR } from './ir/ir-store';
import { ModuleAnalyzer, ModuleInfo } from './module-analyzer';
import { qualify } from './resolution';
import type { SourceParser } from './syntax-tree';
import type { AnalysisResult, AnalysisTask } from './analysis-worker';

export interface AnalysisResults {
  projectRoot: string;
  config: Required<FlowgraphConfig>;
  files: string[];
  functions: FunctionIR[];
  modules: ModuleIR[];
  project: ProjectIR;
  moduleInfos: ModuleInfo[];
  callGraph: CallGraphBuilder;
  moduleGraph: Graph;
  diagnostics: Diagnostic[];
  summary: {
    filesAnalyzed: number;
    functions: number;
    modules: number;
    calls: number;
    moduleDependencies: number;
    diagnostics: number;
  };
}

export interface AnalyzerOptions {
  /** Glob pattern relative to the target (default: every configured extension) */
  pattern?: string;
  /** Extra ignore patterns, added to the configured ones */
  ignore?: string[];
  /** Configuration override (merged over the config file) */
  config?: FlowgraphConfig;
  /** Analyze exactly these files instead of discovering them */
  files?: string[];
  /** Reuse per-file results from the analysis cache */
  cache?: boolean;
  /** Drop the analysis cache before running */
  forceRebuild?: boolean;
  /** Analyze files in worker threads (improves performance for large codebases) */
  parallel?: boolean;
  /** Number of worker threads (default: number of CPU cores minus one) */
  workers?: number;
  /** Source frontend; the tree-sitter C++ parser when omitted */
  parser?: SourceParser;
  /** Suppress console output (machine-readable output mode) */
  json?: boolean;
}

// Minimum file count to benefit from parallel processing
const PARALLEL_THRESHOLD = 20;

const WORKER_FILE = path.join(__dirname, 'analysis-worker.js');

function shouldLog(options: AnalyzerOptions): boolean {
  return process.env.NODE_ENV !== 'test' && !options.json;
}

export async function analyzeProject(
  targetPath: string,
  options: AnalyzerOptions = {}
): Promise<AnalysisResults> {
  const projectRoot = path.resolve(targetPath);

  // Merge order: defaults < config file < options.config
  const configResult = loadConfigWithInfo(projectRoot);
  const config = options.config
    ? mergeConfig(configResult.config, options.config)
    : configResult.config;

  const files = options.files
    ? options.files.map((file) => path.resolve(projectRoot, file))
    : await findFiles(projectRoot, options.pattern ?? sourcePattern(config.extensions), [
        ...config.ignore,
        ...(options.ignore ?? []),
      ]);

  const log = new DiagnosticLog();
  const fileAnalyses = await analyzeFiles(files, projectRoot, config, options, log);

  // Merge per-file results in file order
  const transformer = new ASTToIRTransformer(projectRoot);
  const callGraph = new CallGraphBuilder({ diagnostics: log });
  const registered: Array<{ ir: FunctionIR; analysis: FileAnalysis['functions'][number] }> = [];

  for (const fileAnalysis of fileAnalyses) {
    log.merge(fileAnalysis.diagnostics);
    for (const fn of fileAnalysis.functions) {
      const ir = transformer.registerFunction(fn.ir);
      callGraph.addFunction(ir.name, ir.file, ir.class_name, ir.namespace, {
        isVirtual: fn.isVirtual,
        isStatic: fn.isStatic,
      });
      registered.push({ ir, analysis: fn });
    }
  }

  // Calls resolve only once every function is known
  for (const { ir, analysis } of registered) {
    callGraph.recordCalls(
      { name: ir.name, file: ir.file, className: ir.class_name, namespace: ir.namespace },
      analysis.callSites
    );
  }

  const moduleAnalyzer = new ModuleAnalyzer(projectRoot, { diagnostics: log });
  const { moduleGraph } = moduleAnalyzer.analyze(files);

  for (const { ir } of registered) {
    const moduleName = moduleAnalyzer.getModuleForFile(ir.file);
    if (moduleName !== undefined) {
      moduleAnalyzer.addFunctionToModule(moduleName, ir.id);
    }
  }

  const modules = moduleAnalyzer.getAllModules().map((info) =>
    transformer.transformModule(
      info.name,
      { ...info, dependencies: moduleAnalyzer.getDependencies(info.name) },
      info.functions
    )
  );

  const project = transformer.transformProject(
    config.projectName || path.basename(projectRoot),
    modules.map((module) => module.id)
  );

  const diagnostics = log.list();
  return {
    projectRoot,
    config,
    files,
    functions: transformer.getAllFunctions(),
    modules,
    project,
    moduleInfos: moduleAnalyzer.getAllModules(),
    callGraph,
    moduleGraph,
    diagnostics,
    summary: {
      filesAnalyzed: files.length,
      functions: registered.length,
      modules: modules.length,
      calls: callGraph.callCount,
      moduleDependencies: moduleGraph.edgeCount,
      diagnostics: diagnostics.length,
    },
  };
}

/**
 * Diagnostics at or above the configured severity.
 */
export function reportableDiagnostics(results: AnalysisResults): Diagnostic[] {
  const minimum = severityLevel(results.config.minSeverity);
  return results.diagnostics.filter((diagnostic) => severityLevel(diagnostic.severity) >= minimum);
}

async function analyzeFiles(
  files: string[],
  projectRoot: string,
  config: Required<FlowgraphConfig>,
  options: AnalyzerOptions,
  log: DiagnosticLog
): Promise<FileAnalysis[]> {
  const parallelRequested = options.parallel ?? config.parallel;
  const useCache = options.cache === true;

  // Use parallel if explicitly enabled OR if we have many files and it wasn't explicitly disabled
  let useParallel =
    parallelRequested === true ||
    (options.parallel !== false && files.length >= PARALLEL_THRESHOLD && !useCache);

  // Workers always run the tree-sitter frontend from the compiled output
  if (useParallel && (options.parser || !fs.existsSync(WORKER_FILE))) {
    if (parallelRequested && !options.parser && shouldLog(options)) {
      console.warn('Warning: worker script not found, analyzing files sequentially');
    }
    useParallel = false;
  }

  if (useParallel) {
    return analyzeFilesParallel(files, projectRoot, options.workers ?? config.workers, options, log);
  }

  const cache = useCache
    ? new AnalysisCache(path.resolve(projectRoot, config.cacheDir))
    : undefined;
  if (cache && options.forceRebuild) {
    cache.clear();
  }
  const parser = options.parser ?? (await createCppParser());
  return analyzeFilesSequential(files, projectRoot, parser, log, cache);
}

/**
 * Analyze files sequentially (used when caching is enabled or for small file counts)
 */
function analyzeFilesSequential(
  files: string[],
  projectRoot: string,
  parser: SourceParser,
  log: DiagnosticLog,
  cache?: AnalysisCache
): FileAnalysis[] {
  const results: FileAnalysis[] = [];

  for (const file of files) {
    const cached = cache?.get(file);
    if (cached) {
      results.push(cached);
      continue;
    }

    const analysis = analyzeFile(file, parser, projectRoot);
    cache?.set(file, analysis);
    results.push(analysis);
  }

  // Save cache at the end if caching is enabled
  try {
    cache?.save();
  } catch (error) {
    log.record({
      kind: 'unit-failure',
      severity: 'low',
      message: `Could not save the analysis cache: ${errorMessage(error)}`,
    });
  }

  return results;
}

/**
 * Analyze files in parallel using worker threads (faster for large codebases)
 */
async function analyzeFilesParallel(
  files: string[],
  projectRoot: string,
  numWorkers: number,
  options: AnalyzerOptions,
  log: DiagnosticLog
): Promise<FileAnalysis[]> {
  const workerCount = numWorkers > 0 ? numWorkers : Math.max(1, cpus().length - 1);

  // Create worker pool
  const piscina = new Piscina({
    filename: WORKER_FILE,
    maxThreads: workerCount,
    idleTimeout: 5000,
  });

  if (shouldLog(options)) {
    console.log(`Analyzing ${files.length} files using ${workerCount} worker threads...`);
  }

  try {
    // Submit all analysis tasks
    const tasks: Promise<AnalysisResult>[] = files.map((filePath) => {
      const task: AnalysisTask = { filePath, projectRoot };
      return piscina.run(task);
    });

    // Wait for all tasks to complete
    const results = await Promise.all(tasks);

    // Collect successful results
    const analyses: FileAnalysis[] = [];
    results.forEach((result, i) => {
      if (result.success && result.data) {
        analyses.push(result.data);
      } else {
        log.record({
          kind: 'unit-failure',
          severity: 'high',
          message: `Could not analyze ${files[i]}: ${result.error ?? 'unknown error'}`,
          file: files[i],
        });
      }
    });
    return analyses;
  } finally {
    // Destroy the worker pool
    await piscina.destroy();
  }
}

async function findFiles(targetPath: string, pattern: string, ignorePatterns: string[]): Promise<string[]> {
  const files = await glob(path.join(targetPath, pattern).split(path.sep).join('/'), {
    ignore: {
      ignored: (p: Path) => {
        // Use micromatch for robust glob pattern matching
        return micromatch.isMatch(p.fullpath(), ignorePatterns, { dot: true });
      },
    },
    absolute: true,
    nodir: true,
  });

  return files.sort();
}

/**
 * Call graph around `seeds`, capped at the configured maximum node count.
 */
export function scopedCallGraph(
  results: AnalysisResults,
  seeds: readonly string[],
  maxDepth?: number
): { graph: Graph; truncated: boolean } {
  const scoped = getSubgraphByScope(results.callGraph.toGraph(), seeds, maxDepth);
  const limit = results.config.maxGraphNodes;
  if (scoped.nodeCount <= limit) {
    return { graph: scoped, truncated: false };
  }
  return { graph: pruneGraph(scoped, scoped.nodeIds().slice(0, limit)), truncated: true };
}

/**
 * Normalized graphs of a run, keyed by the name they are saved under.
 */
export function buildGraphs(results: AnalysisResults): Map<string, Graph> {
  const builder = new GraphBuilder();
  const graphs = new Map<string, Graph>();
  graphs.set('call_graph', builder.buildCallGraph(results.functions));
  graphs.set('module_graph', builder.buildModuleGraph(results.modules));
  for (const fn of results.functions) {
    graphs.set(`cfg_${fn.id}`, builder.buildCfgGraph(fn));
  }
  return graphs;
}

/**
 * Persist the IR and every normalized graph of a run.
 */
export function exportResults(results: AnalysisResults, directory: string): void {
  saveIR(directory, results.functions, results.modules, results.project);
  saveGraphs(buildGraphs(results), path.join(directory, 'graphs'));
}

/**
 * Functions matching a bare name, a qualified name or an IR id.
 */
export function findFunctions(results: AnalysisResults, query: string): FunctionIR[] {
  return results.functions.filter(
    (fn) =>
      fn.id === query ||
      fn.name === query ||
      qualify(fn.name, fn.class_name, fn.namespace) === query
  );
}
