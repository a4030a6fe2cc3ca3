import type { FunctionSummary, SourceParser, SyntaxNode } from '../../src/syntax-tree';

/**
 * Unlaid-out tree node. `layout` assigns text and spans: a parent's text is
 * its children's text joined by `separator`, and indices follow that text.
 */
export interface Draft {
  kind: string;
  text?: string;
  children: Draft[];
  separator: string;
  line?: number;
  function?: FunctionSummary;
}

export function leaf(kind: string, text: string, line?: number): Draft {
  return { kind, text, children: [], separator: ' ', line };
}

export function branch(kind: string, children: Draft[], separator = ' ', line?: number): Draft {
  return { kind, children, separator, line };
}

export function layout(draft: Draft, offset = 0, line = 1): SyntaxNode {
  const row = (draft.line ?? line) - 1;
  const extras = draft.function ? { function: draft.function } : {};

  if (draft.children.length === 0) {
    const text = draft.text ?? '';
    return {
      kind: draft.kind,
      text,
      children: [],
      span: {
        startIndex: offset,
        endIndex: offset + text.length,
        start: { row, column: 0 },
        end: { row, column: text.length },
      },
      ...extras,
    };
  }

  const children: SyntaxNode[] = [];
  let cursor = offset;
  for (const child of draft.children) {
    if (children.length > 0) cursor += draft.separator.length;
    const built = layout(child, cursor, row + 1);
    children.push(built);
    cursor = built.span.endIndex;
  }

  const text = children.map((child) => child.text).join(draft.separator);
  return {
    kind: draft.kind,
    text,
    children,
    span: {
      startIndex: offset,
      endIndex: cursor,
      start: { row, column: 0 },
      end: { row: children[children.length - 1].span.end.row, column: 0 },
    },
    ...extras,
  };
}

/** `name(...)` with an empty argument list */
export function call(name: string, line?: number): Draft {
  return branch('call_expression', [leaf('identifier', name), leaf('argument_list', '()')], '', line);
}

/** `qualified::name()` */
export function qualifiedCall(qualifiedName: string, line?: number): Draft {
  return branch(
    'call_expression',
    [leaf('qualified_identifier', qualifiedName), leaf('argument_list', '()')],
    '',
    line
  );
}

/** `object.method()` */
export function methodCall(object: string, method: string, line?: number): Draft {
  return branch(
    'call_expression',
    [
      branch('field_expression', [leaf('identifier', object), leaf('.', '.'), leaf('field_identifier', method)], ''),
      leaf('argument_list', '()'),
    ],
    '',
    line
  );
}

/** An opaque statement with the given text */
export function stmt(text: string, line?: number): Draft {
  return leaf('expression_statement', text, line);
}

/** `expr;` */
export function exprStmt(expression: Draft, line?: number): Draft {
  return branch('expression_statement', [expression, leaf(';', ';')], '', line);
}

export function ret(text = 'return;', line?: number): Draft {
  return leaf('return_statement', text, line);
}

export function block(...statements: Draft[]): Draft {
  return branch('compound_statement', [leaf('{', '{'), ...statements, leaf('}', '}')]);
}

function condition(cond: string | Draft): Draft {
  if (typeof cond === 'string') {
    return leaf('condition_clause', `(${cond})`);
  }
  return branch('condition_clause', [leaf('(', '('), cond, leaf(')', ')')], '');
}

export function ifStmt(cond: string | Draft, then: Draft, otherwise?: Draft, line?: number): Draft {
  const children = [leaf('if', 'if'), condition(cond), then];
  if (otherwise) {
    children.push(branch('else_clause', [leaf('else', 'else'), otherwise]));
  }
  return branch('if_statement', children, ' ', line);
}

export function whileStmt(cond: string | Draft, body: Draft, line?: number): Draft {
  return branch('while_statement', [leaf('while', 'while'), condition(cond), body], ' ', line);
}

export function doStmt(body: Draft, cond: string, line?: number): Draft {
  return branch(
    'do_statement',
    [leaf('do', 'do'), body, leaf('while', 'while'), condition(cond), leaf(';', ';')],
    ' ',
    line
  );
}

export function forStmt(header: string, body: Draft, line?: number): Draft {
  return branch(
    'for_statement',
    [leaf('for', 'for'), leaf('(', '('), leaf('for_header', header), leaf(')', ')'), body],
    ' ',
    line
  );
}

export interface FunctionOptions {
  className?: string | null;
  namespace?: string | null;
  returnType?: string | null;
  parameters?: Array<{ type: string; name: string }>;
  isVirtual?: boolean;
  isStatic?: boolean;
  line?: number;
}

export function fn(name: string, body: Draft, options: FunctionOptions = {}): Draft {
  const draft = branch(
    'function_definition',
    [leaf('primitive_type', options.returnType ?? 'void'), leaf('function_declarator', `${name}()`), body],
    ' ',
    options.line
  );
  draft.function = {
    name,
    returnType: options.returnType === undefined ? 'void' : options.returnType,
    parameters: options.parameters ?? [],
    isVirtual: options.isVirtual ?? false,
    isStatic: options.isStatic ?? false,
    isConst: false,
    className: options.className ?? null,
    namespace: options.namespace ?? null,
  };
  return draft;
}

export function unit(...definitions: Draft[]): SyntaxNode {
  return layout(branch('translation_unit', definitions, '\n'));
}

/**
 * Parser stand-in returning prepared trees by file path suffix.
 */
export class FakeParser implements SourceParser {
  readonly parsed: string[] = [];

  constructor(private readonly trees: Record<string, SyntaxNode>) {}

  parse(_content: string, file: string): SyntaxNode {
    this.parsed.push(file);
    const key = Object.keys(this.trees).find((suffix) => file.endsWith(suffix));
    return key ? this.trees[key] : unit();
  }
}
