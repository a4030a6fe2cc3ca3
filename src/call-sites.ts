import { SyntaxNode, childOfKind } from './syntax-tree';

export type CallKind = 'direct' | 'method';

/**
 * A call expression found in the syntax tree.
 */
export interface CallSite {
  /** Bare callee name (last segment, template arguments removed) */
  name: string;
  /** Full `a::b::name` text when the callee was written qualified */
  qualifiedName: string | null;
  kind: CallKind;
  /** One-based line of the call */
  line: number;
}

const CALL_KINDS = new Set(['call_expression']);

/**
 * Strip template argument lists, innermost first.
 */
function stripTemplateArguments(text: string): string {
  let result = text.replace(/\s+/g, '');
  let previous = '';
  while (result !== previous) {
    previous = result;
    result = result.replace(/<[^<>]*>/g, '');
  }
  return result;
}

/**
 * Decode the callee of a call expression.
 * Returns null for callees that are not names (function pointers, lambdas).
 */
export function callSiteOf(call: SyntaxNode): CallSite | null {
  if (!CALL_KINDS.has(call.kind)) {
    return null;
  }

  const callee = call.children[0];
  if (!callee) {
    return null;
  }
  const line = call.span.start.row + 1;

  switch (callee.kind) {
    case 'identifier':
      return { name: callee.text, qualifiedName: null, kind: 'direct', line };

    case 'template_function': {
      const name = childOfKind(callee, 'identifier');
      return name ? { name: name.text, qualifiedName: null, kind: 'direct', line } : null;
    }

    case 'qualified_identifier': {
      const qualified = stripTemplateArguments(callee.text);
      const segments = qualified.split('::').filter((segment) => segment.length > 0);
      const name = segments[segments.length - 1];
      if (!name) {
        return null;
      }
      return { name, qualifiedName: segments.join('::'), kind: 'direct', line };
    }

    case 'field_expression': {
      const field = childOfKind(callee, 'field_identifier', 'template_method');
      if (!field) {
        return null;
      }
      const name = stripTemplateArguments(field.text);
      return { name, qualifiedName: null, kind: 'method', line };
    }

    default:
      return null;
  }
}

/**
 * Every call site in a subtree, in source order.
 * @param prune Subtrees for which this returns true are not searched.
 */
export function collectCallSites(
  root: SyntaxNode,
  prune?: (node: SyntaxNode) => boolean
): CallSite[] {
  const sites: CallSite[] = [];
  const stack: SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (node !== root && prune?.(node)) continue;

    const site = callSiteOf(node);
    if (site) {
      sites.push(site);
    }
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }

  return sites;
}

/**
 * Distinct bare callee names in a subtree, in first-seen order.
 */
export function calleeNames(root: SyntaxNode, prune?: (node: SyntaxNode) => boolean): string[] {
  return [...new Set(collectCallSites(root, prune).map((site) => site.name))];
}

