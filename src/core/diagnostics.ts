export type DiagnosticKind = "reference" | "structural" | "filesystem" | "selection";
export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  severity: DiagnosticSeverity;
  kind: DiagnosticKind;
  /** Entity the problem is confined to, e.g. `project:seq-clingo` or `benchmark:sat`. */
  scope: string;
  message: string;
}

/**
 * Raised inside a resolution scope (a system, a benchmark, a project). The scope's
 * owner catches it, records it and carries on with the sibling scopes.
 */
export class ResolutionError extends Error {
  constructor(
    readonly kind: DiagnosticKind,
    readonly scope: string,
    message: string
  ) {
    super(message);
    this.name = "ResolutionError";
  }
}

export class Diagnostics {
  private readonly items: Diagnostic[] = [];

  error(kind: DiagnosticKind, scope: string, message: string): void {
    this.items.push({ severity: "error", kind, scope, message });
  }

  warning(kind: DiagnosticKind, scope: string, message: string): void {
    this.items.push({ severity: "warning", kind, scope, message });
  }

  record(err: unknown): void {
    if (err instanceof ResolutionError) {
      this.error(err.kind, err.scope, err.message);
      return;
    }
    throw err;
  }

  /**
   * Runs `fn` as one scope. A ResolutionError is recorded and turned into `null`;
   * anything else is a bug and propagates.
   */
  scoped<T>(fn: () => T): T | null {
    try {
      return fn();
    } catch (err) {
      this.record(err);
      return null;
    }
  }

  async scopedAsync<T>(fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (err) {
      this.record(err);
      return null;
    }
  }

  list(): Diagnostic[] {
    return [...this.items];
  }

  errors(): Diagnostic[] {
    return this.items.filter((d) => d.severity === "error");
  }

  warnings(): Diagnostic[] {
    return this.items.filter((d) => d.severity === "warning");
  }

  hasErrors(): boolean {
    return this.items.some((d) => d.severity === "error");
  }
}

export function formatDiagnostic(d: Diagnostic): string {
  return `${d.severity}: [${d.kind}] ${d.scope}: ${d.message}`;
}
