import { defineDiagnostic, type DiagnosticDataBase, type DiagnosticDataByCode, type DiagnosticsCatalog } from "./types.js";

export type BorrowedDataEscapesData = DiagnosticDataBase & {
  escapesFrom: "closure" | "function";
};

export type UnsatisfiedLifetimeConstraintsData = DiagnosticDataBase & {
  frName: string;
  outlivedFrName: string;
  /** Set when the label was phrased as a return-type mismatch */
  returnMismatch?: boolean;
};

export const regionDiagnostics = {
  "regionck/borrowed-data-escapes": defineDiagnostic<BorrowedDataEscapesData>({
    category: "lifetimes",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "manual",
    span: "span",
    stages: ["borrowck"],
    description: "A reference that is only valid inside a function or closure body flows somewhere that outlives it.",
    data: {
      required: ["escapesFrom"],
      optional: ["constraintCategory"],
    },
  }),
  "regionck/unsatisfied-lifetime-constraints": defineDiagnostic<UnsatisfiedLifetimeConstraintsData>({
    category: "lifetimes",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "guided",
    span: "span",
    stages: ["borrowck"],
    description: "One region was required to outlive another, and nothing in the signature establishes it.",
    data: {
      required: ["frName", "outlivedFrName"],
      optional: ["constraintCategory", "returnMismatch"],
    },
  }),
} as const satisfies DiagnosticsCatalog;

export type RegionDiagnosticCatalog = typeof regionDiagnostics;
export type RegionDiagnosticCode = keyof RegionDiagnosticCatalog & string;
export type RegionDiagnosticData = DiagnosticDataByCode<RegionDiagnosticCatalog>;
