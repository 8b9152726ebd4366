import type { SourceSpan } from "../model/span.js";
import type {
  DiagnosticLabel,
  DiagnosticSeverity,
  DiagnosticStage,
  DiagnosticSuggestion,
  RegionDiagnostic,
} from "../model/diagnostics.js";
import { buildDiagnostic } from "../shared/diagnostics.js";
import type { DiagnosticDataBase, DiagnosticDataByCode, DiagnosticStatus, DiagnosticsCatalog } from "./types.js";

export type EmitDiagnosticInput<TData extends DiagnosticDataBase = DiagnosticDataBase> = {
  message: string;
  span?: SourceSpan | null;
  labels?: readonly DiagnosticLabel[];
  help?: readonly string[];
  suggestions?: readonly DiagnosticSuggestion[];
  /** Overrides the catalog's default severity */
  severity?: DiagnosticSeverity;
  data?: Readonly<TData>;
};

export type DiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
> = {
  readonly stage: DiagnosticStage;
  emit<Code extends AllowedCodes>(
    code: Code,
    input: EmitDiagnosticInput<DiagnosticDataByCode<Catalog>[Code]>,
  ): RegionDiagnostic<Code, DiagnosticDataByCode<Catalog>[Code]>;
};

const ALLOWED_STATUSES = new Set<DiagnosticStatus>(["canonical", "proposed"]);

export function createDiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
>(
  catalog: Catalog,
  options: { stage: DiagnosticStage },
): DiagnosticEmitter<Catalog, AllowedCodes> {
  const stage = options.stage;

  return {
    stage,
    emit<Code extends AllowedCodes>(
      code: Code,
      input: EmitDiagnosticInput<DiagnosticDataByCode<Catalog>[Code]>,
    ): RegionDiagnostic<Code, DiagnosticDataByCode<Catalog>[Code]> {
      const spec = catalog[code];
      if (spec && !ALLOWED_STATUSES.has(spec.status)) {
        throw new Error(
          `Diagnostic code '${code}' is ${spec.status} and cannot be emitted by the canonical emitter.`,
        );
      }
      return buildDiagnostic<Code, DiagnosticDataByCode<Catalog>[Code]>({
        code,
        message: input.message,
        stage,
        severity: input.severity ?? spec?.defaultSeverity,
        span: input.span,
        labels: input.labels,
        help: input.help,
        suggestions: input.suggestions,
        data: input.data,
      });
    },
  };
}
