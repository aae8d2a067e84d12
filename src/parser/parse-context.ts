import type { Diagnostic, DiagnosticSeverity, ParserMode } from '../core/diagnostics.js';
import { createRefAllocator, type RefAllocator } from '../core/score.js';
import { SpannerBundle } from './parse-spanners.js';
import type { XmlNode } from './xml-ast.js';

/** Part and measure currently being translated, stamped onto diagnostics. */
export interface TranslationLocation {
  partId?: string;
  measureNumber?: string;
}

/**
 * Mutable state for one document translation.
 * Never shared between translations: the spanner bundle and ref allocator are per document.
 */
export interface TranslationContext {
  mode: ParserMode;
  sourceName?: string;
  diagnostics: Diagnostic[];
  validationFailure: boolean;
  refs: RefAllocator;
  spanners: SpannerBundle;
  location: TranslationLocation;
}

/** Create a context for one translation invocation. */
export function createTranslationContext(mode: ParserMode, sourceName?: string): TranslationContext {
  return {
    mode,
    sourceName,
    diagnostics: [],
    validationFailure: false,
    refs: createRefAllocator(),
    spanners: new SpannerBundle(),
    location: {}
  };
}

/** Record a diagnostic, escalating warnings to errors in strict mode. */
export function addDiagnostic(
  ctx: TranslationContext,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  node?: XmlNode
): void {
  let actualSeverity = severity;
  if (ctx.mode === 'strict' && severity === 'warning') {
    actualSeverity = 'error';
  }

  if (actualSeverity === 'error') {
    ctx.validationFailure = true;
  }

  const diagnostic: Diagnostic = {
    code,
    severity: actualSeverity,
    message
  };

  if (node) {
    diagnostic.source = { name: ctx.sourceName, ...node.location };
    diagnostic.xmlPath = node.path;
  }
  if (ctx.location.partId !== undefined) {
    diagnostic.partId = ctx.location.partId;
  }
  if (ctx.location.measureNumber !== undefined) {
    diagnostic.measureNumber = ctx.location.measureNumber;
  }

  ctx.diagnostics.push(diagnostic);
}
