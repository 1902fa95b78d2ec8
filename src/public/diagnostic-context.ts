import { locateOffset, type Diagnostic, type DiagnosticSeverity } from '../core/diagnostics.js';

/** Supported strictness modes. */
export type ParserMode = 'strict' | 'lenient';

/** Diagnostics collected by one public API call. */
export interface DiagnosticContext {
  mode: ParserMode;
  text: string;
  sourceName?: string;
  diagnostics: Diagnostic[];
  failed: boolean;
}

export function createDiagnosticContext(mode: ParserMode, text: string, sourceName?: string): DiagnosticContext {
  return {
    mode,
    text,
    sourceName,
    diagnostics: [],
    failed: false
  };
}

/**
 * Record a diagnostic entry, escalating warnings to errors in strict mode.
 * `offset` is a character offset into the context text.
 */
export function addDiagnostic(
  ctx: DiagnosticContext,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  offset?: number
): void {
  let actualSeverity = severity;
  if (ctx.mode === 'strict' && severity === 'warning') {
    actualSeverity = 'error';
  }

  if (actualSeverity === 'error') {
    ctx.failed = true;
  }

  const diagnostic: Diagnostic = { code, severity: actualSeverity, message };
  if (offset !== undefined) {
    diagnostic.source = locateOffset(ctx.text, offset, ctx.sourceName);
  }
  ctx.diagnostics.push(diagnostic);
}
