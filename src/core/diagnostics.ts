/** Severity classes used by every translation and conversion stage. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  line: number;
  column: number;
}

/** Canonical diagnostic object returned next to every conversion result. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
  xmlPath?: string;
  partId?: string;
  measureNumber?: string;
}

/** Supported strictness modes. */
export type ParserMode = 'strict' | 'lenient';

/** True when any record is an error. */
export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}

/** Escalate warnings to errors under strict mode; lenient mode leaves records untouched. */
export function normalizeDiagnosticsForMode(diagnostics: Diagnostic[], mode: ParserMode): Diagnostic[] {
  if (mode === 'lenient') {
    return diagnostics;
  }

  return diagnostics.map((diagnostic) =>
    diagnostic.severity === 'warning' ? { ...diagnostic, severity: 'error' } : diagnostic
  );
}
