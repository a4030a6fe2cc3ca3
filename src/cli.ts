#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import * as path from 'path';
import * as fs from 'fs';
import chalk from 'chalk';
import chokidar from 'chokidar';
import {
  AnalysisResults,
  AnalyzerOptions,
  analyzeProject,
  buildGraphs,
  exportResults,
  findFunctions,
  reportableDiagnostics,
  scopedCallGraph,
} from './analyzer';
import { buildFunctionCFG } from './control-flow/cfg-builder';
import { cfgStats, cfgToText } from './control-flow/cfg-visualizer';
import { Diagnostic, errorMessage } from './diagnostics';
import { createCppParser } from './file-analysis';
import { GraphBuilder } from './graphs/graph-builder';
import { graphToDocument } from './graphs/graph-persistence';
import { validateGraph } from './graphs/graph-utils';
import { qualify } from './resolution';
import type { Severity } from './types';

interface CliOptions {
  pattern?: string;
  ignore?: string[];
  json?: boolean;
  color?: boolean;
  out?: string;
  parallel?: boolean;
  workers?: number;
  cache?: boolean;
  forceRebuild?: boolean;
  minSeverity?: Severity;
}

function parseSeverity(value: string): Severity {
  if (value === 'high' || value === 'medium' || value === 'low') {
    return value;
  }
  throw new InvalidArgumentError('Expected one of: high, medium, low');
}

function parseCount(value: string): number {
  const count = Number.parseInt(value, 10);
  if (Number.isNaN(count) || count < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer');
  }
  return count;
}

function withAnalysisOptions(command: Command): Command {
  return command
    .option('-p, --pattern <pattern>', 'Glob pattern for files to analyze (default: configured extensions)')
    .option('-i, --ignore <patterns...>', 'Additional patterns to ignore')
    .option('--json', 'Output results as JSON')
    .option('--no-color', 'Disable colored output')
    .option('--parallel', 'Use worker threads (faster for large projects)')
    .option('--workers <count>', 'Number of worker threads (default: CPU cores - 1)', parseCount)
    .option('--cache', 'Enable caching for faster repeated runs')
    .option('--force-rebuild', 'Discard cached analysis before running')
    .option('--min-severity <level>', 'Minimum diagnostic severity to report (high, medium, low)', parseSeverity);
}

function resolveTarget(targetPath: string): string {
  const absolutePath = path.resolve(targetPath);
  if (!fs.existsSync(absolutePath)) {
    console.error(chalk.red(`Error: Path "${absolutePath}" does not exist`));
    process.exit(1);
  }
  return absolutePath;
}

function toAnalyzerOptions(options: CliOptions): AnalyzerOptions {
  // Disable colors if --no-color flag is used
  if (options.color === false) {
    chalk.level = 0;
  }
  return {
    pattern: options.pattern,
    ignore: options.ignore,
    json: options.json,
    parallel: options.parallel,
    workers: options.workers,
    cache: options.cache,
    forceRebuild: options.forceRebuild,
    config: options.minSeverity ? { minSeverity: options.minSeverity } : undefined,
  };
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function severityColor(severity: Severity): (text: string) => string {
  return severity === 'high' ? chalk.red : severity === 'medium' ? chalk.yellow : chalk.cyan;
}

function formatDiagnostic(diagnostic: Diagnostic, root: string): string {
  const location = diagnostic.file
    ? `${path.relative(root, diagnostic.file)}${diagnostic.line ? `:${diagnostic.line}` : ''} - `
    : '';
  return severityColor(diagnostic.severity)(
    `${location}${diagnostic.severity} ${diagnostic.kind}: ${diagnostic.message}`
  );
}

function formatResults(results: AnalysisResults): void {
  const { summary } = results;
  console.log(chalk.bold(`\nProject ${results.project.name}`));
  console.log(chalk.gray(`Files analyzed: ${summary.filesAnalyzed}`));
  console.log(`Functions: ${summary.functions}`);
  console.log(`Calls: ${summary.calls}`);
  console.log(`Modules: ${summary.modules}`);
  console.log(`Module dependencies: ${summary.moduleDependencies}`);

  for (const flow of results.project.main_flows) {
    console.log(chalk.green(`Entry points in ${flow.module}: ${flow.entry_points.join(', ')}`));
  }

  const diagnostics = reportableDiagnostics(results);
  if (diagnostics.length > 0) {
    console.log(chalk.bold(`\nDiagnostics (${diagnostics.length}):`));
    for (const diagnostic of diagnostics) {
      console.log(`  ${formatDiagnostic(diagnostic, results.projectRoot)}`);
    }
  }
}

const program = new Command();

program
  .name('cpp-flowgraph')
  .description('Build control flow graphs, call graphs, module graphs and IR for C/C++ projects')
  .version('0.1.0');

withAnalysisOptions(
  program.command('analyze <path>').description('Analyze a project and print a summary')
)
  .option('-o, --out <dir>', 'Write IR and graphs to this directory')
  .action(async (targetPath: string, options: CliOptions) => {
    try {
      const absolutePath = resolveTarget(targetPath);
      if (!options.json) {
        console.log(chalk.blue(`Analyzing C/C++ sources in: ${absolutePath}`));
      }

      const results = await analyzeProject(absolutePath, toAnalyzerOptions(options));

      if (options.out) {
        const outDir = path.resolve(options.out);
        exportResults(results, outDir);
        if (!options.json) {
          console.log(chalk.gray(`IR written to ${outDir}`));
        }
      }

      if (options.json) {
        printJson({
          summary: results.summary,
          project: results.project,
          modules: results.modules,
          functions: results.functions,
          diagnostics: reportableDiagnostics(results),
        });
      } else {
        formatResults(results);
      }
    } catch (error) {
      console.error(chalk.red('Error:'), errorMessage(error));
      process.exit(1);
    }
  });

withAnalysisOptions(
  program.command('cfg <path> <function>').description('Print the control flow graph of a function')
)
  .option('--text', 'Render the CFG as text instead of JSON')
  .action(async (targetPath: string, functionName: string, options: CliOptions & { text?: boolean }) => {
    try {
      const absolutePath = resolveTarget(targetPath);
      const results = await analyzeProject(absolutePath, toAnalyzerOptions(options));
      const matches = findFunctions(results, functionName);

      if (matches.length === 0) {
        console.error(chalk.red(`Error: Function "${functionName}" not found`));
        process.exit(1);
      }

      if (options.text) {
        const parser = await createCppParser();
        for (const fn of matches) {
          const root = parser.parse(fs.readFileSync(fn.file, 'utf-8'), fn.file);
          const lookup = buildFunctionCFG(
            root,
            fn.name,
            qualify(fn.name, fn.class_name, fn.namespace),
            fn.file
          );
          if (!lookup.found) {
            console.error(chalk.yellow(lookup.reason));
            continue;
          }
          console.log(cfgToText(lookup.value));
          console.log(chalk.gray(cfgStats(lookup.value)));
        }
        return;
      }

      const builder = new GraphBuilder();
      printJson(
        matches.map((fn) => ({ function: fn.id, cfg: graphToDocument(builder.buildCfgGraph(fn)) }))
      );
    } catch (error) {
      console.error(chalk.red('Error:'), errorMessage(error));
      process.exit(1);
    }
  });

withAnalysisOptions(
  program
    .command('calls <path> [function]')
    .description('Show callees and callers of a function, or every function in call order')
)
  .option('-d, --depth <depth>', 'Limit the scoped call graph to this many calls away', parseCount)
  .action(
    async (
      targetPath: string,
      functionName: string | undefined,
      options: CliOptions & { depth?: number }
    ) => {
      try {
        const absolutePath = resolveTarget(targetPath);
        const results = await analyzeProject(absolutePath, toAnalyzerOptions(options));
        const { callGraph } = results;

        if (!functionName) {
          const order = callGraph.topologicalOrder();
          if (options.json) {
            printJson({ order });
          } else {
            console.log(chalk.bold('Functions in call order:'));
            order.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));
          }
          return;
        }

        const names = findFunctions(results, functionName).map((fn) =>
          qualify(fn.name, fn.class_name, fn.namespace)
        );
        if (names.length === 0) {
          console.error(chalk.red(`Error: Function "${functionName}" not found`));
          process.exit(1);
        }

        const { graph, truncated } = scopedCallGraph(results, names, options.depth);
        if (options.json) {
          printJson({
            functions: names.map((name) => ({
              name,
              callees: callGraph.callees(name),
              callers: callGraph.callers(name),
            })),
            scope: graphToDocument(graph),
            truncated,
          });
          return;
        }

        for (const name of names) {
          console.log(chalk.bold(`\n${name}`));
          console.log(chalk.gray(`  defined in ${callGraph.getFunctionLocation(name) ?? 'unknown'}`));
          console.log(`  calls: ${callGraph.callees(name).join(', ') || '(none)'}`);
          console.log(`  called by: ${callGraph.callers(name).join(', ') || '(none)'}`);
        }
        console.log(chalk.gray(`\nScope: ${graph.nodeCount} functions, ${graph.edgeCount} calls`));
        if (truncated) {
          console.log(
            chalk.yellow(`Scope cut down to ${results.config.maxGraphNodes} functions (maxGraphNodes)`)
          );
        }
      } catch (error) {
        console.error(chalk.red('Error:'), errorMessage(error));
        process.exit(1);
      }
    }
  );

withAnalysisOptions(
  program.command('modules <path>').description('Show modules and their include dependencies')
).action(async (targetPath: string, options: CliOptions) => {
  try {
    const absolutePath = resolveTarget(targetPath);
    const results = await analyzeProject(absolutePath, toAnalyzerOptions(options));

    if (options.json) {
      printJson({ modules: results.modules, graph: graphToDocument(results.moduleGraph) });
      return;
    }

    for (const module of results.moduleInfos) {
      const dependencies = results.moduleGraph.successors(module.name);
      console.log(chalk.bold(`\n${module.name}`) + chalk.gray(` (${module.files.length} files)`));
      console.log(`  public headers: ${module.publicHeaders.length}`);
      console.log(`  functions: ${module.functions.length}`);
      console.log(`  depends on: ${dependencies.join(', ') || '(none)'}`);
    }
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
  }
});

withAnalysisOptions(
  program.command('validate <path>').description('Check every generated graph for structural problems')
).action(async (targetPath: string, options: CliOptions) => {
  try {
    const absolutePath = resolveTarget(targetPath);
    const results = await analyzeProject(absolutePath, toAnalyzerOptions(options));

    const report = [...buildGraphs(results)].map(([name, graph]) => ({
      name,
      ...validateGraph(graph),
    }));
    const invalid = report.filter((entry) => !entry.valid);

    if (options.json) {
      printJson({ graphs: report.length, invalid: invalid.length, report });
    } else {
      for (const entry of report) {
        for (const error of entry.errors) {
          console.log(chalk.red(`${entry.name}: ${error}`));
        }
        for (const warning of entry.warnings) {
          console.log(chalk.yellow(`${entry.name}: ${warning}`));
        }
      }
      const color = invalid.length === 0 ? chalk.green : chalk.red;
      console.log(color(`\n${report.length - invalid.length}/${report.length} graphs valid`));
    }

    if (invalid.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
  }
});

// Watch command for continuous monitoring
withAnalysisOptions(
  program.command('watch <path>').description('Watch for file changes and re-analyze automatically')
).action(async (targetPath: string, watchOptions: CliOptions) => {
  const absolutePath = resolveTarget(targetPath);
  const analyzerOptions = toAnalyzerOptions(watchOptions);

  console.log(chalk.blue(`\nWatching for changes in: ${absolutePath}`));
  console.log(chalk.gray('Press Ctrl+C to stop\n'));

  let isAnalyzing = false;
  let pendingAnalysis = false;

  const runAnalysis = async (): Promise<void> => {
    if (isAnalyzing) {
      pendingAnalysis = true;
      return;
    }

    isAnalyzing = true;
    console.log(chalk.gray(`\n[${new Date().toLocaleTimeString()}] Analyzing...`));

    try {
      const results = await analyzeProject(absolutePath, analyzerOptions);

      // Clear terminal for fresh output
      console.clear();
      console.log(chalk.blue(`Watching: ${absolutePath}`));
      console.log(chalk.gray(`[${new Date().toLocaleTimeString()}] Last analysis`));

      formatResults(results);
    } catch (error) {
      console.error(chalk.red('Error during analysis:'), errorMessage(error));
    }

    isAnalyzing = false;

    if (pendingAnalysis) {
      pendingAnalysis = false;
      await runAnalysis();
    }
  };

  // Run initial analysis
  await runAnalysis();

  const watcher = chokidar.watch(absolutePath, {
    ignored: ['**/node_modules/**', '**/.git/**', ...(watchOptions.ignore ?? [])],
    persistent: true,
    ignoreInitial: true,
  });

  // Debounce file changes
  let debounceTimer: NodeJS.Timeout | null = null;

  const schedule = (label: string, changedPath: string): void => {
    console.log(chalk.yellow(`\n${label}: ${path.relative(absolutePath, changedPath)}`));

    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }

    debounceTimer = setTimeout(() => {
      void runAnalysis();
    }, 300);
  };

  watcher.on('change', (changedPath) => schedule('Changed', changedPath));
  watcher.on('add', (addedPath) => schedule('Added', addedPath));
  watcher.on('unlink', (removedPath) => schedule('Removed', removedPath));

  // Handle graceful shutdown
  process.on('SIGINT', () => {
    console.log(chalk.blue('\n\nStopping watch mode...'));
    watcher.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(chalk.red('Error:'), errorMessage(error));
        process.exit(1);
      }
    );
  });
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exit(1);
});
