import { normalizeSpan, normalizeSpanMaybe, type SourceSpan } from "../model/span.js";
import type {
  DiagnosticLabel,
  DiagnosticSeverity,
  DiagnosticStage,
  DiagnosticSuggestion,
  RegionDiagnostic,
} from "../model/diagnostics.js";

export type {
  DiagnosticLabel,
  DiagnosticSeverity,
  DiagnosticStage,
  DiagnosticSuggestion,
  RegionDiagnostic,
} from "../model/diagnostics.js";

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends object = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity?: DiagnosticSeverity;
  span?: SourceSpan | null;
  labels?: readonly DiagnosticLabel[];
  help?: readonly string[];
  suggestions?: readonly DiagnosticSuggestion[];
  data?: Readonly<TData>;
}

/** Centralized diagnostic builder that normalizes every span it is handed. */
export function buildDiagnostic<
  TCode extends string,
  TData extends object = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): RegionDiagnostic<TCode, TData> {
  return {
    code: input.code,
    message: input.message,
    stage: input.stage,
    ...(input.severity ? { severity: input.severity } : {}),
    span: normalizeSpanMaybe(input.span),
    labels: (input.labels ?? []).map((label) => ({ ...label, span: normalizeSpan(label.span) })),
    help: [...(input.help ?? [])],
    suggestions: (input.suggestions ?? []).map((s) => ({ ...s, span: normalizeSpan(s.span) })),
    ...(input.data ? { data: input.data } : {}),
  };
}

/** Primary span, falling back to the first label when the diagnostic has none. */
export function diagnosticSpan(diag: RegionDiagnostic): SourceSpan | null {
  return diag.span ?? diag.labels[0]?.span ?? null;
}
