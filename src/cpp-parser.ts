/**
 * C/C++ frontend: parses source text with tree-sitter and converts the
 * concrete tree into the generic SyntaxNode shape, decoding function, class,
 * namespace and declaration summaries along the way.
 *
 * Loading this module loads the native tree-sitter bindings. The analysis
 * stages only depend on the SourceParser interface; use `createCppParser()`
 * to load this frontend lazily.
 */

import Parser from 'tree-sitter';
import Cpp from 'tree-sitter-cpp';
import type {
  ClassSummary,
  DeclarationSummary,
  FunctionSummary,
  NamespaceSummary,
  ParameterInfo,
  SourceParser,
  SyntaxNode,
} from './syntax-tree';
import { normalizeText } from './syntax-tree';

type TSNode = Parser.SyntaxNode;

interface Scope {
  namespaces: string[];
  className: string | null;
}

const CLASS_KINDS = new Set(['class_specifier', 'struct_specifier']);
const PARAMETER_KINDS = new Set([
  'parameter_declaration',
  'optional_parameter_declaration',
  'variadic_parameter_declaration',
]);

function firstDescendant(node: TSNode, kinds: ReadonlySet<string>): TSNode | null {
  for (const child of node.children) {
    if (kinds.has(child.type)) {
      return child;
    }
    const found = firstDescendant(child, kinds);
    if (found) {
      return found;
    }
  }
  return null;
}

const IDENTIFIER_KINDS = new Set(['identifier', 'field_identifier']);
const FUNCTION_DECLARATOR = new Set(['function_declarator']);

function declaredName(declarator: TSNode): string {
  if (IDENTIFIER_KINDS.has(declarator.type)) {
    return declarator.text;
  }
  return firstDescendant(declarator, IDENTIFIER_KINDS)?.text ?? '';
}

function stripTemplateArguments(text: string): string {
  let result = text;
  let previous = '';
  while (result !== previous) {
    previous = result;
    result = result.replace(/<[^<>]*>/g, '');
  }
  return result;
}

function decodeParameter(param: TSNode): ParameterInfo | null {
  if (param.type === 'variadic_parameter_declaration' || param.text === '...') {
    return { type: '...', name: '' };
  }

  const declarator = param.childForFieldName('declarator');
  if (!declarator) {
    // `f(void)` declares no parameter; `f(int)` declares an unnamed one
    return param.text.trim() === 'void' ? null : { type: normalizeText(param.text), name: '' };
  }

  let text = param.text;
  const defaultValue = param.childForFieldName('default_value');
  if (defaultValue) {
    text = text.substring(0, defaultValue.startIndex - param.startIndex).replace(/=\s*$/, '');
  }

  const identifier = IDENTIFIER_KINDS.has(declarator.type)
    ? declarator
    : firstDescendant(declarator, IDENTIFIER_KINDS);
  if (!identifier) {
    return { type: normalizeText(text), name: '' };
  }

  const start = identifier.startIndex - param.startIndex;
  const end = identifier.endIndex - param.startIndex;
  const type = normalizeText(`${text.substring(0, start)}${text.substring(end)}`);
  return { type, name: identifier.text };
}

function decodeFunction(node: TSNode, scope: Scope): FunctionSummary | null {
  const declarator = node.childForFieldName('declarator');
  if (!declarator) {
    return null;
  }
  const functionDeclarator =
    declarator.type === 'function_declarator'
      ? declarator
      : firstDescendant(declarator, FUNCTION_DECLARATOR);
  const nameNode = functionDeclarator?.childForFieldName('declarator');
  if (!functionDeclarator || !nameNode) {
    return null;
  }

  let name = normalizeText(nameNode.text).replace(/\s+/g, '');
  let className = scope.className;
  let namespaces = scope.namespaces;

  // Out-of-class definition: `ns::Type::method`
  if (nameNode.type === 'qualified_identifier') {
    const segments = stripTemplateArguments(name)
      .split('::')
      .filter((segment) => segment.length > 0);
    name = segments[segments.length - 1] ?? name;
    const qualifiers = segments.slice(0, -1);
    if (qualifiers.length > 0) {
      className = qualifiers[qualifiers.length - 1];
      namespaces = [...scope.namespaces, ...qualifiers.slice(0, -1)];
    }
  }

  const typeNode = node.childForFieldName('type');
  let returnType: string | null = null;
  if (typeNode) {
    const modifiers = declarator.text
      .substring(0, functionDeclarator.startIndex - declarator.startIndex)
      .trim();
    returnType = normalizeText(`${typeNode.text}${modifiers}`);
  }

  const parameters: ParameterInfo[] = [];
  const parameterList = functionDeclarator.childForFieldName('parameters');
  for (const param of parameterList?.namedChildren ?? []) {
    if (!PARAMETER_KINDS.has(param.type)) continue;
    const decoded = decodeParameter(param);
    if (decoded) parameters.push(decoded);
  }

  const specifiers = node.children;
  return {
    name,
    returnType,
    parameters,
    isVirtual: specifiers.some(
      (child) => child.type === 'virtual' || child.type === 'virtual_function_specifier'
    ),
    isStatic: specifiers.some(
      (child) => child.type === 'storage_class_specifier' && child.text === 'static'
    ),
    isConst: functionDeclarator.children.some(
      (child) => child.type === 'type_qualifier' && child.text === 'const'
    ),
    className,
    namespace: namespaces.length > 0 ? namespaces.join('::') : null,
  };
}

function decodeClass(node: TSNode, scope: Scope): ClassSummary | null {
  const nameNode = node.childForFieldName('name');
  const body = node.childForFieldName('body');
  if (!nameNode || !body) {
    return null;
  }

  const baseClasses: string[] = [];
  const baseClause = node.children.find((child) => child.type === 'base_class_clause');
  for (const base of baseClause?.namedChildren ?? []) {
    if (['type_identifier', 'qualified_identifier', 'template_type'].includes(base.type)) {
      baseClasses.push(base.text);
    }
  }

  const methods: string[] = [];
  const fields: string[] = [];
  for (const member of body.namedChildren) {
    const declarator = member.childForFieldName('declarator');
    if (!declarator) continue;
    const functionDeclarator =
      declarator.type === 'function_declarator'
        ? declarator
        : firstDescendant(declarator, FUNCTION_DECLARATOR);

    if (member.type === 'function_definition' || functionDeclarator) {
      const nameTarget = functionDeclarator?.childForFieldName('declarator') ?? declarator;
      methods.push(normalizeText(nameTarget.text));
    } else if (member.type === 'field_declaration') {
      const field = declaredName(declarator);
      if (field) fields.push(field);
    }
  }

  return {
    name: nameNode.text,
    kind: node.type === 'struct_specifier' ? 'struct' : 'class',
    baseClasses,
    methods,
    fields,
    namespace: scope.namespaces.length > 0 ? scope.namespaces.join('::') : null,
  };
}

function decodeDeclaration(node: TSNode): DeclarationSummary {
  const typeNode = node.childForFieldName('type');
  const names: string[] = [];
  for (const child of node.namedChildren) {
    if (IDENTIFIER_KINDS.has(child.type) || child.type.endsWith('_declarator')) {
      const target =
        child.type === 'init_declarator' ? (child.childForFieldName('declarator') ?? child) : child;
      const name = declaredName(target);
      if (name) names.push(name);
    }
  }
  return { names, type: typeNode ? normalizeText(typeNode.text) : null };
}

function namespaceName(node: TSNode): string | null {
  const nameNode = node.childForFieldName('name');
  return nameNode ? nameNode.text.replace(/\s+/g, '') : null;
}

/**
 * Convert a tree-sitter node (and its subtree) to the generic shape.
 */
function convert(node: TSNode, scope: Scope): SyntaxNode {
  const result: SyntaxNode = {
    kind: node.type,
    span: {
      startIndex: node.startIndex,
      endIndex: node.endIndex,
      start: { row: node.startPosition.row, column: node.startPosition.column },
      end: { row: node.endPosition.row, column: node.endPosition.column },
    },
    text: node.text,
    children: [],
  };

  let childScope = scope;

  if (node.type === 'namespace_definition') {
    const name = namespaceName(node);
    if (name) {
      const summary: NamespaceSummary = {
        name,
        qualifiedName: [...scope.namespaces, name].join('::'),
      };
      result.namespace = summary;
      childScope = { namespaces: [...scope.namespaces, ...name.split('::')], className: null };
    }
  } else if (CLASS_KINDS.has(node.type)) {
    const summary = decodeClass(node, scope);
    if (summary) {
      result.class = summary;
      childScope = {
        namespaces: scope.namespaces,
        className: scope.className ? `${scope.className}::${summary.name}` : summary.name,
      };
    }
  } else if (node.type === 'function_definition') {
    const summary = decodeFunction(node, scope);
    if (summary) {
      result.function = summary;
    }
  } else if (node.type === 'declaration') {
    result.declaration = decodeDeclaration(node);
  }

  result.children = node.children.map((child) => convert(child, childScope));
  return result;
}

export class CppSourceParser implements SourceParser {
  private parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Cpp);
  }

  parse(content: string): SyntaxNode {
    // The default input buffer truncates sources past 32 KiB
    const tree = this.parser.parse(content, undefined, {
      bufferSize: Math.max(32 * 1024, content.length * 2),
    });
    return convert(tree.rootNode, { namespaces: [], className: null });
  }
}
