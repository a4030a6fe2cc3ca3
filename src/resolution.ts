/**
 * Callee resolution for the call graph.
 *
 * A call site names its callee by a bare (or partially qualified) name. The
 * resolvers below turn it into the qualified name of a known function. They
 * are tried in order and the first hit wins; when none hits, the caller keeps
 * the bare name as an unresolved node.
 */

export interface ResolutionContext {
  /** Bare callee name */
  name: string;
  /** Qualified text as written at the call site, if it was qualified */
  writtenQualifiedName: string | null;
  callerClass: string | null;
  callerNamespace: string | null;
  isKnown(qualifiedName: string): boolean;
}

export interface Resolver {
  readonly name: string;
  resolve(context: ResolutionContext): string | null;
}

export type Resolution =
  | { resolved: true; target: string; strategy: string }
  | { resolved: false; target: string };

/**
 * Join namespace, class and function name with `::`, dropping empty segments.
 */
export function qualify(
  name: string,
  className?: string | null,
  namespace?: string | null
): string {
  return [namespace, className, name].filter((part): part is string => !!part).join('::');
}

function known(context: ResolutionContext, candidate: string): string | null {
  return context.isKnown(candidate) ? candidate : null;
}

/** `ns::Type::f()` written out in full */
export const writtenQualifiedResolver: Resolver = {
  name: 'written-qualified',
  resolve: (context) =>
    context.writtenQualifiedName ? known(context, context.writtenQualifiedName) : null,
};

/** A sibling member of the caller's class */
export const classScopeResolver: Resolver = {
  name: 'class-scope',
  resolve: (context) =>
    context.callerClass
      ? known(context, qualify(context.name, context.callerClass, context.callerNamespace))
      : null,
};

/** A function of the caller's namespace */
export const namespaceScopeResolver: Resolver = {
  name: 'namespace-scope',
  resolve: (context) =>
    context.callerNamespace
      ? known(context, qualify(context.name, null, context.callerNamespace))
      : null,
};

/** A free function known by its bare name */
export const bareNameResolver: Resolver = {
  name: 'bare-name',
  resolve: (context) => known(context, context.name),
};

export const DEFAULT_RESOLVERS: readonly Resolver[] = [
  writtenQualifiedResolver,
  classScopeResolver,
  namespaceScopeResolver,
  bareNameResolver,
];

export function resolveCallee(
  context: ResolutionContext,
  resolvers: readonly Resolver[] = DEFAULT_RESOLVERS
): Resolution {
  for (const resolver of resolvers) {
    const target = resolver.resolve(context);
    if (target !== null) {
      return { resolved: true, target, strategy: resolver.name };
    }
  }
  return { resolved: false, target: context.name };
}
