/**
 * Diagnostics recorded while analyzing a project.
 *
 * Nothing in the analysis stages throws for missing functions, odd syntax or
 * unresolvable references. They record a diagnostic and carry on, and the
 * caller decides what to show.
 */

import type { Severity } from './types';

export type DiagnosticKind =
  /** A requested function or module does not exist */
  | 'not-found'
  /** Syntax or a persisted document did not have the expected shape */
  | 'malformed-input'
  /** A call or include could not be tied to a project entity */
  | 'unresolved-reference'
  /** A structural invariant did not hold (orphan node, cycle) */
  | 'integrity-warning'
  /** A whole file or function failed and was skipped */
  | 'unit-failure';

export interface Diagnostic {
  kind: DiagnosticKind;
  severity: Severity;
  message: string;
  file?: string;
  line?: number;
}

export function severityLevel(severity: Severity): number {
  switch (severity) {
    case 'high':
      return 3;
    case 'medium':
      return 2;
    case 'low':
      return 1;
  }
}

export class DiagnosticLog {
  private entries: Diagnostic[] = [];

  record(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
  }

  /**
   * Append diagnostics produced elsewhere (worker threads, caches).
   */
  merge(diagnostics: Iterable<Diagnostic>): void {
    for (const diagnostic of diagnostics) {
      this.entries.push(diagnostic);
    }
  }

  list(): Diagnostic[] {
    return [...this.entries];
  }

  ofKind(kind: DiagnosticKind): Diagnostic[] {
    return this.entries.filter((diagnostic) => diagnostic.kind === kind);
  }

  /**
   * Diagnostics at or above the given severity.
   */
  atLeast(severity: Severity): Diagnostic[] {
    const minimum = severityLevel(severity);
    return this.entries.filter((diagnostic) => severityLevel(diagnostic.severity) >= minimum);
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * Message text of anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Warn on the console unless running under tests or producing JSON.
 */
export function logWarning(message: string, options: { json?: boolean } = {}): void {
  if (process.env.NODE_ENV !== 'test' && !options.json) {
    console.warn(`Warning: ${message}`);
  }
}
