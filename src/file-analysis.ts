/**
 * Per-file analysis: parse, build a CFG and FunctionIR for every function,
 * and collect the call sites each function makes.
 *
 * The result is plain data so it can cross a worker-thread boundary and be
 * stored in the analysis cache.
 */

import * as fs from 'fs';
import { CallSite, collectCallSites } from './call-sites';
import { buildCFG } from './control-flow/cfg-builder';
import { Diagnostic, errorMessage } from './diagnostics';
import { ASTToIRTransformer } from './ir/ast-to-ir';
import type { FunctionIR } from './ir/ir-schema';
import { qualify } from './resolution';
import { SourceParser, SyntaxNode, collectFunctions, descendants } from './syntax-tree';

export interface FunctionAnalysis {
  ir: FunctionIR;
  qualifiedName: string;
  isVirtual: boolean;
  isStatic: boolean;
  callSites: CallSite[];
}

export interface FileAnalysis {
  file: string;
  functions: FunctionAnalysis[];
  diagnostics: Diagnostic[];
}

/**
 * Load the tree-sitter C++ frontend on first use.
 */
export async function createCppParser(): Promise<SourceParser> {
  const { CppSourceParser } = await import('./cpp-parser');
  return new CppSourceParser();
}

function countErrorNodes(root: SyntaxNode): number {
  let count = 0;
  for (const node of descendants(root)) {
    if (node.kind === 'ERROR') count++;
  }
  return count;
}

/**
 * Analyze already parsed source.
 */
export function analyzeTree(root: SyntaxNode, file: string, projectRoot: string): FileAnalysis {
  const diagnostics: Diagnostic[] = [];
  const functions: FunctionAnalysis[] = [];
  const transformer = new ASTToIRTransformer(projectRoot);

  const errors = countErrorNodes(root);
  if (errors > 0) {
    diagnostics.push({
      kind: 'malformed-input',
      severity: 'low',
      message: `${errors} region(s) could not be parsed; they are kept as opaque statements`,
      file,
    });
  }

  for (const node of collectFunctions(root)) {
    const summary = node.function;
    if (!summary) continue;

    const qualifiedName = qualify(summary.name, summary.className, summary.namespace);
    try {
      const idPrefix = transformer.functionId(
        summary.name,
        summary.namespace,
        summary.className,
        file,
        node.span.start.row + 1
      );
      const cfg = buildCFG(node, qualifiedName, file, { idPrefix });
      const ir = transformer.transformFunction(node, cfg, file, summary.namespace, summary.className);
      functions.push({
        ir,
        qualifiedName,
        isVirtual: summary.isVirtual,
        isStatic: summary.isStatic,
        // Nested definitions (local class methods) own their calls
        callSites: collectCallSites(node, (candidate) => candidate.function !== undefined),
      });
    } catch (error) {
      diagnostics.push({
        kind: 'unit-failure',
        severity: 'medium',
        message: `Skipped function ${qualifiedName}: ${errorMessage(error)}`,
        file,
        line: node.span.start.row + 1,
      });
    }
  }

  return { file, functions, diagnostics };
}

/**
 * Parse and analyze source text.
 */
export function analyzeSource(
  content: string,
  file: string,
  parser: SourceParser,
  projectRoot: string
): FileAnalysis {
  try {
    return analyzeTree(parser.parse(content, file), file, projectRoot);
  } catch (error) {
    return {
      file,
      functions: [],
      diagnostics: [
        {
          kind: 'unit-failure',
          severity: 'high',
          message: `Could not parse ${file}: ${errorMessage(error)}`,
          file,
        },
      ],
    };
  }
}

/**
 * Read, parse and analyze a file.
 */
export function analyzeFile(file: string, parser: SourceParser, projectRoot: string): FileAnalysis {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    return {
      file,
      functions: [],
      diagnostics: [
        {
          kind: 'unit-failure',
          severity: 'high',
          message: `Could not read ${file}: ${errorMessage(error)}`,
          file,
        },
      ],
    };
  }
  return analyzeSource(content, file, parser, projectRoot);
}
