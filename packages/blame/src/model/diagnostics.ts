/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Pure type definitions with no external dependencies.
 * Builders live in diagnostics/builder.ts and shared/diagnostics.ts.
 * ======================================================================================= */

import type { SourceSpan } from "./span.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Stage tags where the diagnostic was produced to support routing and suppression. */
export type DiagnosticStage = "borrowck" | "typeck" | "lint";

/** A secondary message attached to a span (rendered as an underline label). */
export interface DiagnosticLabel {
  span: SourceSpan;
  message: string;
}

/** How safely a suggested edit can be applied without a human reading it. */
export type Applicability = "machine-applicable" | "maybe-incorrect" | "has-placeholders" | "unspecified";

export interface DiagnosticSuggestion {
  span: SourceSpan;
  message: string;
  replacement: string;
  applicability: Applicability;
}

/** Unified diagnostic envelope for region errors. */
export interface RegionDiagnostic<
  TCode extends string = string,
  TData extends object = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity?: DiagnosticSeverity;
  span: SourceSpan | null;
  labels: readonly DiagnosticLabel[];
  help: readonly string[];
  suggestions: readonly DiagnosticSuggestion[];
  data?: Readonly<TData>;
}

/** Append-only sink owned by the caller; diagnostics are rendered after checking finishes. */
export type DiagnosticBuffer = RegionDiagnostic[];
