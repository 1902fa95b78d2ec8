/** Severity classes used by parser and validator diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  line: number;
  column: number;
  /** Zero-based offset into the source text in UTF-16 code units, as JavaScript strings index it. */
  offset?: number;
  /** The same position as a zero-based byte offset into the UTF-8 encoded text. */
  byteOffset?: number;
}

/** Canonical diagnostic object emitted by all public API operations. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
}

/**
 * Resolve a zero-based string offset to a 1-based line/column pair and the
 * matching UTF-8 byte offset. Columns count UTF-16 code units. Offsets past
 * the end of the text clamp to the final position.
 */
export function locateOffset(text: string, offset: number, name?: string): DiagnosticSource {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let line = 1;
  let lineStart = 0;
  for (let index = 0; index < clamped; index += 1) {
    if (text.charCodeAt(index) === 10) {
      line += 1;
      lineStart = index + 1;
    }
  }

  return {
    name,
    line,
    column: clamped - lineStart + 1,
    offset: clamped,
    byteOffset: Buffer.byteLength(text.slice(0, clamped), 'utf8')
  };
}
