/**
 * CFG Builder - Constructs a Control Flow Graph from a function's syntax tree.
 *
 * This builder creates a CFG that represents the execution paths through a
 * C/C++ function. It handles:
 * - Sequential statements (nested blocks are flattened into their parent)
 * - Conditional branches (if / else / else if)
 * - Loops (for, range-for, while, do-while)
 * - Early returns
 *
 * switch, try, break and continue are not modeled; they become opaque
 * statement nodes like any other unrecognized construct.
 */

import { calleeNames } from '../call-sites';
import {
  SyntaxNode,
  Lookup,
  childOfKind,
  findFirst,
  findFunction,
  isTrivia,
  normalizeText,
  truncateLabel,
} from '../syntax-tree';
import type {
  ControlFlowGraph,
  CFGNode,
  CFGNodeKind,
  CFGEdge,
  CFGEdgeKind,
  CFGBuilderOptions,
} from './cfg-types';

const LOOP_KINDS = new Map<string, string>([
  ['for_statement', 'for'],
  ['for_range_loop', 'range-for'],
  ['while_statement', 'while'],
  ['do_statement', 'do'],
]);

const KEYWORDS = new Set(['if', 'else', 'constexpr', 'for', 'while', 'do']);

/**
 * Build a Control Flow Graph for a function definition node.
 * A node without a body yields an entry joined directly to the exit.
 */
export function buildCFG(
  functionNode: SyntaxNode,
  qualifiedName: string,
  file: string,
  options: CFGBuilderOptions = {}
): ControlFlowGraph {
  const builder = new CFGBuilder(qualifiedName, file, options);
  return builder.build(functionNode);
}

/**
 * Locate a function by its bare name inside a larger tree, then build its CFG.
 */
export function buildFunctionCFG(
  root: SyntaxNode,
  functionName: string,
  qualifiedName: string,
  file: string,
  options: CFGBuilderOptions = {}
): Lookup<ControlFlowGraph> {
  const functionNode = findFunction(root, functionName);
  if (!functionNode) {
    return { found: false, reason: `Function ${functionName} not found in ${file}` };
  }
  return { found: true, value: buildCFG(functionNode, qualifiedName, file, options) };
}

/**
 * Find the block holding a function's statements.
 */
export function findFunctionBody(functionNode: SyntaxNode): SyntaxNode | undefined {
  return (
    childOfKind(functionNode, 'compound_statement') ??
    findFirst(functionNode, (node) => node.kind === 'compound_statement')
  );
}

/**
 * CFG Builder class that maintains state during graph construction.
 */
export class CFGBuilder {
  private nodeIdCounter = 0;
  private nodes: Map<string, CFGNode> = new Map();
  private edges: CFGEdge[] = [];
  private edgeKeys: Set<string> = new Set();
  private sources: Set<string> = new Set();
  private options: Required<CFGBuilderOptions>;
  private exitId: string;

  constructor(
    private readonly qualifiedName: string,
    private readonly file: string,
    options: CFGBuilderOptions = {}
  ) {
    this.options = {
      maxLabelLength: 50,
      trackSourceLocations: true,
      idPrefix: qualifiedName,
      ...options,
    };
    this.exitId = `${this.options.idPrefix}_exit`;
  }

  /**
   * Build the CFG for the given function node.
   */
  build(functionNode: SyntaxNode): ControlFlowGraph {
    const entry = this.createNode(
      'entry',
      `${this.options.idPrefix}_entry`,
      `Entry: ${this.qualifiedName}`,
      functionNode
    );
    const exit = this.createNode('exit', this.exitId, `Exit: ${this.qualifiedName}`, null);

    const body = findFunctionBody(functionNode);
    if (body) {
      this.processStatements(this.statementsOf(body), entry.id, 'normal');
    }

    // Closure: anything left dangling flows to the exit
    for (const node of this.nodes.values()) {
      if (node.id !== exit.id && !this.hasOutgoing(node.id)) {
        this.connect(node.id, exit.id, 'normal');
      }
    }

    return {
      functionName: this.qualifiedName,
      file: this.file,
      entry: entry.id,
      exit: exit.id,
      nodes: this.nodes,
      edges: this.edges,
    };
  }

  /**
   * Create a new CFG node. Pass an explicit id for entry/exit only.
   */
  private createNode(
    kind: CFGNodeKind,
    id: string | null,
    label: string,
    syntax: SyntaxNode | null
  ): CFGNode {
    const nodeId = id ?? `${this.options.idPrefix}_n${this.nodeIdCounter++}`;
    const node: CFGNode = {
      id: nodeId,
      kind,
      label,
      attributes: {},
    };

    if (syntax) {
      node.attributes.syntax_kind = syntax.kind;
      if (this.options.trackSourceLocations) {
        node.source_location = { file: this.file, line: syntax.span.start.row + 1 };
      }
    }

    this.nodes.set(nodeId, node);
    return node;
  }

  /**
   * Connect two nodes with a directed edge. Identical edges are not duplicated.
   */
  private connect(source: string, target: string, kind: CFGEdgeKind): void {
    const key = `${source}\u0000${target}\u0000${kind}`;
    if (this.edgeKeys.has(key)) {
      return;
    }
    this.edgeKeys.add(key);
    this.sources.add(source);
    this.edges.push({ source, target, kind });
  }

  private hasOutgoing(id: string): boolean {
    return this.sources.has(id);
  }

  /**
   * Statements of a block, with nested bare blocks flattened in place.
   * A single non-block statement is treated as a one-statement block.
   */
  private statementsOf(node: SyntaxNode): SyntaxNode[] {
    if (node.kind !== 'compound_statement') {
      return isTrivia(node) ? [] : [node];
    }

    const statements: SyntaxNode[] = [];
    for (const child of node.children) {
      if (isTrivia(child)) continue;
      if (child.kind === 'compound_statement') {
        statements.push(...this.statementsOf(child));
      } else {
        statements.push(child);
      }
    }
    return statements;
  }

  /**
   * Process a list of statements starting from `from`.
   * The first construct is attached with `entryKind`, later ones with normal edges.
   * Returns the last node, or null once a return has terminated the block.
   */
  private processStatements(
    statements: SyntaxNode[],
    from: string,
    entryKind: CFGEdgeKind
  ): string | null {
    let current = from;
    let kind = entryKind;

    for (const stmt of statements) {
      const end = this.processStatement(stmt, current, kind);
      // Remaining statements of the block are unreachable
      if (end === null) {
        return null;
      }
      current = end;
      kind = 'normal';
    }

    return current;
  }

  /**
   * Process a single statement.
   */
  private processStatement(stmt: SyntaxNode, from: string, kind: CFGEdgeKind): string | null {
    if (stmt.kind === 'return_statement') {
      return this.processReturnStatement(stmt, from, kind);
    }

    if (stmt.kind === 'if_statement') {
      return this.processIfStatement(stmt, from, kind);
    }

    const loopKind = LOOP_KINDS.get(stmt.kind);
    if (loopKind) {
      return this.processLoopStatement(stmt, loopKind, from, kind);
    }

    // Default: treat as an opaque statement
    const node = this.createNode(
      'statement',
      null,
      truncateLabel(stmt.text, this.options.maxLabelLength) || 'Statement',
      stmt
    );
    this.tagCalls(node, stmt);
    this.connect(from, node.id, kind);
    return node.id;
  }

  /**
   * Process a return statement. It terminates the enclosing block.
   */
  private processReturnStatement(stmt: SyntaxNode, from: string, kind: CFGEdgeKind): null {
    const node = this.createNode(
      'return',
      null,
      truncateLabel(stmt.text, this.options.maxLabelLength) || 'Return',
      stmt
    );
    this.tagCalls(node, stmt);
    this.connect(from, node.id, kind);
    this.connect(node.id, this.exitId, 'return');
    return null;
  }

  /**
   * Process an if statement.
   */
  private processIfStatement(stmt: SyntaxNode, from: string, kind: CFGEdgeKind): string | null {
    const { condition, consequence, alternative } = this.ifParts(stmt);
    const conditionText = condition ? this.conditionText(condition) : '';

    const branch = this.createNode('branch', null, conditionText || 'if', stmt);
    branch.attributes.condition = conditionText;
    if (condition) {
      this.tagCalls(branch, condition);
    }
    this.connect(from, branch.id, kind);

    // Process true branch (consequence)
    const thenStatements = consequence ? this.statementsOf(consequence) : [];
    const thenEnd =
      thenStatements.length > 0
        ? this.processStatements(thenStatements, branch.id, 'true')
        : branch.id;

    // Process false branch (alternative) if present
    let elseEnd: string | null = branch.id;
    if (alternative) {
      const elseStatements = this.statementsOf(alternative);
      elseEnd =
        elseStatements.length > 0
          ? this.processStatements(elseStatements, branch.id, 'false')
          : branch.id;
    }

    // Every path returned: nothing follows the if statement
    if (thenEnd === null && elseEnd === null) {
      return null;
    }

    const merge = this.createNode('statement', null, 'Merge', null);
    merge.attributes.synthetic = 'merge';
    branch.attributes.merge = merge.id;

    if (thenEnd !== null) {
      this.connect(thenEnd, merge.id, 'true');
    }
    if (elseEnd !== null) {
      this.connect(elseEnd, merge.id, 'false');
    }

    return merge.id;
  }

  /**
   * Process a for / range-for / while / do loop.
   */
  private processLoopStatement(
    stmt: SyntaxNode,
    loopKind: string,
    from: string,
    kind: CFGEdgeKind
  ): string {
    const body = this.loopBody(stmt);
    const loop = this.createNode('loop', null, this.loopHeader(stmt, body), stmt);
    loop.attributes.loop_kind = loopKind;
    this.tagCalls(loop, stmt, body);
    this.connect(from, loop.id, kind);

    const bodyStatements = body ? this.statementsOf(body) : [];
    const bodyEnd =
      bodyStatements.length > 0
        ? this.processStatements(bodyStatements, loop.id, 'normal')
        : loop.id;

    if (bodyEnd !== null) {
      this.connect(bodyEnd, loop.id, 'back_edge');
    }

    const loopExit = this.createNode('statement', null, 'Loop Exit', null);
    loopExit.attributes.synthetic = 'loop-exit';
    loop.attributes.loop_exit = loopExit.id;
    this.connect(loop.id, loopExit.id, 'loop_exit');

    return loopExit.id;
  }

  /**
   * Split an if statement into condition, consequence and alternative.
   * Accepts both the `else_clause` grammar and a bare `else` token.
   */
  private ifParts(stmt: SyntaxNode): {
    condition?: SyntaxNode;
    consequence?: SyntaxNode;
    alternative?: SyntaxNode;
  } {
    let condition: SyntaxNode | undefined;
    let consequence: SyntaxNode | undefined;
    let alternative: SyntaxNode | undefined;
    let seenElse = false;

    for (const child of stmt.children) {
      if (!condition && (child.kind === 'condition_clause' || child.kind === 'parenthesized_expression')) {
        condition = child;
      } else if (child.kind === 'else_clause') {
        alternative = child.children.find((part) => !isTrivia(part) && !KEYWORDS.has(part.kind));
      } else if (child.kind === 'else') {
        seenElse = true;
      } else if (condition && !isTrivia(child) && !KEYWORDS.has(child.kind)) {
        if (seenElse) {
          alternative ??= child;
        } else {
          consequence ??= child;
        }
      }
    }

    return { condition, consequence, alternative };
  }

  private loopBody(stmt: SyntaxNode): SyntaxNode | undefined {
    const candidates = stmt.children.filter((child) => !isTrivia(child) && !KEYWORDS.has(child.kind));
    if (stmt.kind === 'do_statement') {
      return candidates[0];
    }
    return candidates[candidates.length - 1];
  }

  /**
   * The loop's source text with its body cut out.
   */
  private loopHeader(stmt: SyntaxNode, body: SyntaxNode | undefined): string {
    let header = stmt.text;
    if (body) {
      const start = body.span.startIndex - stmt.span.startIndex;
      const end = body.span.endIndex - stmt.span.startIndex;
      if (start >= 0 && end <= stmt.text.length) {
        header = `${stmt.text.substring(0, start)} ${stmt.text.substring(end)}`;
      }
    }
    return truncateLabel(header, this.options.maxLabelLength) || 'Loop';
  }

  private conditionText(condition: SyntaxNode): string {
    let text = normalizeText(condition.text);
    if (text.startsWith('(') && text.endsWith(')')) {
      text = text.substring(1, text.length - 1).trim();
    }
    return truncateLabel(text, this.options.maxLabelLength);
  }

  /**
   * Record the callees of `syntax` on the node, skipping a nested body.
   */
  private tagCalls(node: CFGNode, syntax: SyntaxNode, skip?: SyntaxNode): void {
    const calls = calleeNames(syntax, skip ? (candidate) => candidate === skip : undefined);
    if (calls.length > 0) {
      node.attributes.calls = calls;
    }
  }
}
