import type {
  Applicability,
  DiagnosticBuffer,
  DiagnosticLabel,
  DiagnosticSuggestion,
  RegionDiagnostic,
} from "../model/diagnostics.js";
import type { SourceSpan } from "../model/span.js";
import { InternalCompilerError, InternalErrorCode } from "../shared/errors.js";
import type { DiagnosticEmitter } from "./emitter.js";
import type { RegionDiagnosticCatalog, RegionDiagnosticCode, RegionDiagnosticData } from "./catalog.js";

/**
 * Accumulates labels, help notes and suggestions for one region error, then
 * hands the finished diagnostic to the caller's buffer exactly once.
 */
export class DiagnosticBuilder<Code extends RegionDiagnosticCode> {
  private readonly labels: DiagnosticLabel[] = [];
  private readonly helpNotes: string[] = [];
  private readonly suggestions: DiagnosticSuggestion[] = [];
  private sealed = false;

  constructor(
    private readonly emitter: DiagnosticEmitter<RegionDiagnosticCatalog>,
    readonly code: Code,
    readonly message: string,
    readonly span: SourceSpan,
    private readonly data: RegionDiagnosticData[Code],
  ) {}

  label(span: SourceSpan, message: string): this {
    this.assertOpen();
    this.labels.push({ span, message });
    return this;
  }

  help(message: string): this {
    this.assertOpen();
    this.helpNotes.push(message);
    return this;
  }

  suggest(span: SourceSpan, message: string, replacement: string, applicability: Applicability): this {
    this.assertOpen();
    this.suggestions.push({ span, message, replacement, applicability });
    return this;
  }

  /** Emit into `buffer`; the builder cannot be changed afterwards. */
  buffer(buffer: DiagnosticBuffer): RegionDiagnostic<Code, RegionDiagnosticData[Code]> {
    this.assertOpen();
    this.sealed = true;
    const diag = this.emitter.emit(this.code, {
      message: this.message,
      span: this.span,
      labels: this.labels,
      help: this.helpNotes,
      suggestions: this.suggestions,
      data: this.data,
    });
    buffer.push(diag);
    return diag;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new InternalCompilerError(
        `diagnostic '${this.code}' was modified after it was buffered`,
        InternalErrorCode.DIAGNOSTIC_SEALED,
        { code: this.code },
      );
    }
  }
}
