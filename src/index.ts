/**
 * cpp-flowgraph
 *
 * Control flow graphs, call graphs, module graphs and a structured IR for C/C++ projects.
 *
 * @example
 * ```typescript
 * import { analyzeProject, exportResults } from 'cpp-flowgraph';
 *
 * const results = await analyzeProject('./engine', { ignore: ['**\/third_party/**'] });
 *
 * console.log(results.callGraph.callees('core::Engine::run'));
 * exportResults(results, './flowgraph-out');
 * ```
 */

// Pipeline
export {
  analyzeProject,
  AnalysisResults,
  AnalyzerOptions,
  buildGraphs,
  exportResults,
  findFunctions,
  reportableDiagnostics,
  scopedCallGraph,
} from './analyzer';

// Syntax trees and the C++ frontend
export {
  SyntaxNode,
  SourceParser,
  Span,
  Point,
  FunctionSummary,
  ClassSummary,
  NamespaceSummary,
  DeclarationSummary,
  ParameterInfo,
  Lookup,
  collectFunctions,
  findFunction,
  truncateLabel,
} from './syntax-tree';
export { createCppParser, analyzeFile, analyzeSource, analyzeTree, FileAnalysis } from './file-analysis';
export { CallSite, CallKind, collectCallSites, calleeNames } from './call-sites';

// Control flow
export * from './control-flow';

// Call graph
export { CallGraphBuilder, CallGraphOptions, CallerScope, FunctionFlags } from './call-graph';
export {
  Resolver,
  Resolution,
  ResolutionContext,
  DEFAULT_RESOLVERS,
  qualify,
  resolveCallee,
} from './resolution';

// Modules
export {
  ModuleAnalyzer,
  ModuleInfo,
  ModuleAnalysis,
  IncludeReference,
  extractIncludes,
  isHeaderFile,
} from './module-analyzer';

// IR
export * from './ir/ir-schema';
export {
  ASTToIRTransformer,
  ModuleData,
  createUniqueId,
  recoverControlBlocks,
} from './ir/ast-to-ir';
export {
  IRFormatError,
  serializeFunction,
  deserializeFunction,
  serializeModule,
  deserializeModule,
  serializeProject,
  deserializeProject,
} from './ir/ir-serializer';
export { saveIR, loadIR, StoredIR } from './ir/ir-store';

// Graphs
export { Graph, GraphEdge } from './graphs/graph';
export { GraphBuilder } from './graphs/graph-builder';
export {
  getEntryNodes,
  getExitNodes,
  getReachableNodes,
  pruneGraph,
  getSubgraphByScope,
  findCycles,
  validateGraph,
  GraphValidation,
} from './graphs/graph-utils';
export {
  GraphDocument,
  graphToDocument,
  graphFromDocument,
  saveGraph,
  loadGraph,
  saveGraphs,
  loadGraphs,
} from './graphs/graph-persistence';

// Diagnostics
export { Diagnostic, DiagnosticKind, DiagnosticLog, severityLevel } from './diagnostics';

// Configuration
export {
  loadConfig,
  loadConfigWithInfo,
  LoadConfigResult,
  mergeConfig,
  FlowgraphConfig,
  DEFAULT_CONFIG,
} from './config';

// Cache
export { AnalysisCache } from './cache';
