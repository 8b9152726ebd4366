/**
 * Type mapping utilities: region diagnostics → LSP types
 */
import {
  CodeActionKind,
  DiagnosticSeverity as LspDiagnosticSeverity,
  type CodeAction,
  type Diagnostic,
  type DiagnosticRelatedInformation,
  type Location,
  type Range,
} from "vscode-languageserver-types";
import { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";
import {
  debug,
  diagnosticSpan,
  formatSpan,
  type DiagnosticSeverity,
  type RegionDiagnostic,
  type SourceFileId,
  type SourceSpan,
} from "@regionck/blame";

export type LookupTextFn = (file: SourceFileId) => string | null;

export const DIAGNOSTIC_SOURCE = "regionck";

const LANGUAGE_ID = "plaintext";

export function toLspUri(file: SourceFileId): string {
  // Already a URI; keep it as given.
  if (file.startsWith("file://")) return file;
  return URI.file(file).toString();
}

export function spanToRange(span: SourceSpan, lookupText: LookupTextFn): Range | null {
  return spanToLocation(span, lookupText)?.range ?? null;
}

export function spanToLocation(span: SourceSpan, lookupText: LookupTextFn): Location | null {
  if (span.file === undefined) return null;
  const text = lookupText(span.file);
  if (text === null) return null;
  const uri = toLspUri(span.file);
  const doc = TextDocument.create(uri, LANGUAGE_ID, 0, text);
  return { uri, range: { start: doc.positionAt(span.start), end: doc.positionAt(span.end) } };
}

function toLspSeverity(sev: DiagnosticSeverity | undefined): LspDiagnosticSeverity {
  switch (sev) {
    case "warning":
      return LspDiagnosticSeverity.Warning;
    case "info":
      return LspDiagnosticSeverity.Information;
    default:
      return LspDiagnosticSeverity.Error;
  }
}

/** Message text with help notes appended on their own lines, as a terminal renderer would show them. */
export function renderMessage(diag: RegionDiagnostic): string {
  return [diag.message, ...diag.help.map((note) => `help: ${note}`)].join("\n");
}

export function mapRegionDiagnostic(diag: RegionDiagnostic, lookupText: LookupTextFn): Diagnostic | null {
  const primary = diagnosticSpan(diag);
  const range = primary ? spanToRange(primary, lookupText) : null;
  if (!range) {
    debug.lsp("diagnostic.skipped", { code: diag.code, span: primary ? formatSpan(primary) : null });
    return null;
  }

  const related: DiagnosticRelatedInformation[] = [];
  for (const label of diag.labels) {
    const location = spanToLocation(label.span, lookupText);
    if (location) related.push({ location, message: label.message });
  }

  const mapped: Diagnostic = {
    range,
    message: renderMessage(diag),
    severity: toLspSeverity(diag.severity),
    code: diag.code,
    source: DIAGNOSTIC_SOURCE,
  };
  if (related.length) mapped.relatedInformation = related;
  return mapped;
}

export function mapRegionDiagnostics(
  diags: readonly RegionDiagnostic[],
  lookupText: LookupTextFn,
): Diagnostic[] {
  const mapped: Diagnostic[] = [];
  for (const diag of diags) {
    const lsp = mapRegionDiagnostic(diag, lookupText);
    if (lsp) mapped.push(lsp);
  }
  return mapped;
}

/** Quick fixes for suggestions a tool may apply without asking. */
export function mapSuggestionActions(
  diags: readonly RegionDiagnostic[],
  lookupText: LookupTextFn,
): CodeAction[] {
  const actions: CodeAction[] = [];
  for (const diag of diags) {
    const lspDiag = mapRegionDiagnostic(diag, lookupText);
    for (const suggestion of diag.suggestions) {
      if (suggestion.applicability !== "machine-applicable") continue;
      const location = spanToLocation(suggestion.span, lookupText);
      if (!location) continue;

      const action: CodeAction = {
        title: suggestion.message,
        kind: CodeActionKind.QuickFix,
        isPreferred: true,
        edit: {
          changes: {
            [location.uri]: [{ range: location.range, newText: suggestion.replacement }],
          },
        },
      };
      if (lspDiag) action.diagnostics = [lspDiag];
      actions.push(action);
    }
  }
  return actions;
}
