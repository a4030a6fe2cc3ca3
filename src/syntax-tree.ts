/**
 * Generic, read-only syntax tree consumed by every analysis stage.
 *
 * Nodes carry the grammar kind, source span and text of a construct. The
 * source frontend may attach decoded summaries (function, class, namespace,
 * declaration) to the nodes it understands; the analysis stages never look at
 * anything beyond this shape, so any parser able to produce it can feed them.
 */

export interface Point {
  /** Zero-based line */
  row: number;
  /** Zero-based column */
  column: number;
}

export interface Span {
  startIndex: number;
  endIndex: number;
  start: Point;
  end: Point;
}

export interface ParameterInfo {
  type: string;
  name: string;
}

/**
 * Decoded information about a function definition.
 */
export interface FunctionSummary {
  name: string;
  /** Declared return type, null for constructors and destructors */
  returnType: string | null;
  parameters: ParameterInfo[];
  isVirtual: boolean;
  isStatic: boolean;
  isConst: boolean;
  /** Enclosing or qualifying class, if any */
  className: string | null;
  /** Enclosing namespaces joined with `::`, if any */
  namespace: string | null;
}

export interface ClassSummary {
  name: string;
  kind: 'class' | 'struct';
  baseClasses: string[];
  methods: string[];
  fields: string[];
  namespace: string | null;
}

export interface NamespaceSummary {
  name: string;
  /** Name including enclosing namespaces */
  qualifiedName: string;
}

export interface DeclarationSummary {
  /** Declared identifiers, in source order */
  names: string[];
  type: string | null;
}

export interface SyntaxNode {
  kind: string;
  span: Span;
  text: string;
  children: readonly SyntaxNode[];
  function?: FunctionSummary;
  class?: ClassSummary;
  namespace?: NamespaceSummary;
  declaration?: DeclarationSummary;
}

/**
 * Anything able to turn source text into a SyntaxNode tree.
 */
export interface SourceParser {
  parse(content: string, file: string): SyntaxNode;
}

/**
 * Result of a lookup that may legitimately find nothing.
 */
export type Lookup<T> = { found: true; value: T } | { found: false; reason: string };

/**
 * Pre-order traversal of a subtree, the root included.
 */
export function* descendants(node: SyntaxNode): Generator<SyntaxNode> {
  const stack: SyntaxNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    yield current;
    for (let i = current.children.length - 1; i >= 0; i--) {
      stack.push(current.children[i]);
    }
  }
}

/**
 * First node (pre-order) matching the predicate.
 */
export function findFirst(
  node: SyntaxNode,
  predicate: (candidate: SyntaxNode) => boolean
): SyntaxNode | undefined {
  for (const candidate of descendants(node)) {
    if (predicate(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

export function childOfKind(node: SyntaxNode, ...kinds: string[]): SyntaxNode | undefined {
  return node.children.find((child) => kinds.includes(child.kind));
}

export function childrenOfKind(node: SyntaxNode, ...kinds: string[]): SyntaxNode[] {
  return node.children.filter((child) => kinds.includes(child.kind));
}

/**
 * Every node carrying a decoded function summary, in source order.
 */
export function collectFunctions(root: SyntaxNode): SyntaxNode[] {
  const functions: SyntaxNode[] = [];
  for (const node of descendants(root)) {
    if (node.function) {
      functions.push(node);
    }
  }
  return functions;
}

/**
 * Locate a function definition by its decoded (bare) name.
 */
export function findFunction(root: SyntaxNode, name: string): SyntaxNode | undefined {
  return findFirst(root, (node) => node.function?.name === name);
}

/**
 * Punctuation tokens and comments carry no control flow.
 */
export function isTrivia(node: SyntaxNode): boolean {
  return node.kind === 'comment' || !/[A-Za-z]/.test(node.kind);
}

/**
 * Collapse whitespace runs so multi-line constructs read as one line.
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Shorten a label to `max` characters, marking the cut with an ellipsis.
 */
export function truncateLabel(text: string, max = 50): string {
  const normalized = normalizeText(text);
  if (normalized.length > max) {
    return `${normalized.substring(0, max - 3)}...`;
  }
  return normalized;
}
