// Blame package public API
//
// Import from here rather than deep paths for stability.

// === Model ===
export {
  brandNumber,
  brandString,
  unbrand,
  regionVid,
  sccId,
  toItemId,
  toSourceFileId,
  formatRegionVid,
} from "./model/identity.js";
export type {
  Brand,
  Branded,
  StringId,
  NumericId,
  RegionVid,
  SccId,
  ItemId,
  SourceFileId,
} from "./model/identity.js";

export {
  spanLength,
  isEmptySpan,
  normalizeSpan,
  normalizeSpanMaybe,
  sourceSpan,
  spanEquals,
  spanContains,
  formatSpan,
} from "./model/span.js";
export type { TextSpan, SourceSpan, SpanLike } from "./model/span.js";

export { sourceText, createSourceMap, EMPTY_SOURCE_MAP } from "./model/source.js";
export type { SourceText, SourceMap } from "./model/source.js";

export {
  CONSTRAINT_CATEGORIES,
  UNINTERESTING_CATEGORIES,
  categoryRank,
  compareCategories,
  isInterestingCategory,
  locationsSpan,
  locationKey,
} from "./model/constraint.js";
export type {
  ConstraintCategory,
  Location,
  Locations,
  OutlivesConstraint,
  MirBody,
} from "./model/constraint.js";

export { formatRegionName } from "./model/region.js";
export type {
  ExternalRegion,
  RegionName,
  RegionVarInfo,
  HandledMarker,
  SpecializedErrorRequest,
  OpaqueReturnType,
} from "./model/region.js";

export type {
  Applicability,
  DiagnosticBuffer,
  DiagnosticLabel,
  DiagnosticSeverity,
  DiagnosticStage,
  DiagnosticSuggestion,
  RegionDiagnostic,
} from "./model/diagnostics.js";

// === Collaborators ===
export { NO_NAMES, NO_ITEMS } from "./context.js";
export type {
  BlameContext,
  RegionSolverFacts,
  RegionNaming,
  SpecializedErrorReporter,
  ItemQueries,
  RegionErrorContext,
} from "./context.js";

// === Constraint graph ===
export { createConstraintGraph } from "./graph/constraint-graph.js";
export type { ConstraintGraph, ConstraintGraphInput } from "./graph/constraint-graph.js";
export { computeConstraintSccs, sccsFromGroups } from "./graph/scc.js";
export type { ConstraintSccs } from "./graph/scc.js";

// === Blame ===
export { findConstraintPath } from "./blame/path-finder.js";
export type { RegionPredicate, Trace, BlamePath } from "./blame/path-finder.js";
export { bestBlameConstraint, categorizePath } from "./blame/best-blame.js";
export type { CategorizedConstraint, SelectedBlame } from "./blame/best-blame.js";
export { findSubRegionLiveAt, findOutlivesBlameSpan } from "./blame/queries.js";

// === Reporting ===
export { RegionErrorReporter } from "./report/report-error.js";
export type { ReportOutcome, ReportShape } from "./report/report-error.js";
export { categoryPhrase } from "./report/category.js";
export { createNameCounter, giveRegionAName } from "./report/region-name.js";
export type { NameCounter } from "./report/region-name.js";
export { addStaticImplTraitSuggestion } from "./report/static-impl-suggestion.js";
export type { StaticImplTraitOutcome } from "./report/static-impl-suggestion.js";
export { DEFAULT_REPORTER_CONFIG, resolveReporterConfig } from "./config.js";
export type { ReporterConfig, ResolvedReporterConfig } from "./config.js";

// === Diagnostics catalog ===
export { regionDiagnostics } from "./diagnostics/catalog.js";
export type {
  BorrowedDataEscapesData,
  UnsatisfiedLifetimeConstraintsData,
  RegionDiagnosticCatalog,
  RegionDiagnosticCode,
  RegionDiagnosticData,
} from "./diagnostics/catalog.js";
export { defineDiagnostic } from "./diagnostics/types.js";
export type {
  DiagnosticSpec,
  DiagnosticsCatalog,
  DiagnosticDataBase,
  DiagnosticStatus,
  DiagnosticActionability,
} from "./diagnostics/types.js";
export { createDiagnosticEmitter } from "./diagnostics/emitter.js";
export type { DiagnosticEmitter, EmitDiagnosticInput } from "./diagnostics/emitter.js";
export { DiagnosticBuilder } from "./diagnostics/builder.js";
export { buildDiagnostic, diagnosticSpan } from "./shared/diagnostics.js";

// === Ambient: errors, debug, trace ===
export { InternalCompilerError, InternalErrorCode, isInternalCompilerError } from "./shared/errors.js";
export type { InternalErrorCodeType } from "./shared/errors.js";
export {
  debug,
  getDebugChannel,
  refreshDebugChannels,
  configureDebug,
  isDebugEnabled,
  DEBUG_CHANNEL_NAMES,
} from "./shared/debug.js";
export type { DebugChannel, DebugChannelName, DebugConfig, DebugData } from "./shared/debug.js";
export {
  BlameAttributes,
  NOOP_SPAN,
  NOOP_TRACE,
  createTrace,
  formatDuration,
  nowNanos,
} from "./shared/trace.js";
export type {
  AttributeValue,
  CompileTrace,
  CreateTraceOptions,
  SpanEvent,
  TraceExporter,
  TraceSpan,
} from "./shared/trace.js";
export {
  NOOP_EXPORTER,
  ConsoleExporter,
  createCollectingExporter,
  createConsoleExporter,
} from "./shared/trace-exporters.js";
export type { CollectedEvent, CollectingExporter, ConsoleExporterOptions } from "./shared/trace-exporters.js";
