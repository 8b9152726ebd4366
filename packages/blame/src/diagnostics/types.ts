import type { DiagnosticSeverity, DiagnosticStage } from "../model/diagnostics.js";

/** Impact captures the real consequence if ignored, which can differ from UI severity. */
export type DiagnosticImpact =
  | "blocking" // The program is rejected.
  | "degraded" // Checking continues but later results may be wrong.
  | "informational";
/** Actionability communicates how safe automation is (autofix vs guidance vs human). */
export type DiagnosticActionability = "autofix" | "guided" | "manual" | "none";
/** Status tracks lifecycle (canonical vs migration cases). */
export type DiagnosticStatus = "canonical" | "proposed" | "legacy" | "deprecated";
/** Category is the primary axis for policy and reporting. */
export type DiagnosticCategory = "lifetimes" | "borrows" | "internal";
/** Some diagnostics require a span, others can be body-scoped. */
export type DiagnosticSpanRequirement = "span" | "body" | "either";

export type DiagnosticDataBase = {
  /** Category of the constraint that was blamed */
  constraintCategory?: string;
};

export type DiagnosticDataRequirement = {
  readonly required?: readonly string[];
  readonly optional?: readonly string[];
};

/** Single source of truth for severity, policy and presentation metadata. */
export type DiagnosticSpec<TData extends DiagnosticDataBase = DiagnosticDataBase> = {
  readonly category: DiagnosticCategory;
  readonly status: DiagnosticStatus;
  readonly defaultSeverity: DiagnosticSeverity;
  readonly impact: DiagnosticImpact;
  readonly actionability: DiagnosticActionability;
  readonly span: DiagnosticSpanRequirement;
  readonly stages: readonly DiagnosticStage[];
  readonly description?: string;
  readonly data?: DiagnosticDataRequirement;
  /** Phantom slot carrying the data shape for typed emission */
  readonly __data?: TData;
};

/** Preserves literal types (especially stages) without boilerplate in callers. */
export function defineDiagnostic<
  TData extends DiagnosticDataBase,
  const TSpec extends DiagnosticSpec<TData> = DiagnosticSpec<TData>,
>(spec: TSpec): TSpec {
  return spec;
}

export type DiagnosticDataRecord = DiagnosticDataBase & Record<string, unknown>;
export type DiagnosticsCatalog = Record<string, DiagnosticSpec<DiagnosticDataRecord>>;
export type DiagnosticCode<Catalog extends DiagnosticsCatalog> = keyof Catalog & string;
/** Maps code -> data shape for strongly-typed emission. */
export type DiagnosticDataByCode<Catalog extends DiagnosticsCatalog> = {
  [K in keyof Catalog]: Catalog[K] extends DiagnosticSpec<infer D extends DiagnosticDataBase> ? D : never;
};
