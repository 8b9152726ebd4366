/* =======================================================================================
 * COLLABORATOR CONTRACTS
 * ---------------------------------------------------------------------------------------
 * Everything the engine reads from the solver, the naming service and the rest of
 * the compiler. All lookups are synchronous and side-effect free; "not available"
 * is a null result, never an exception.
 * ======================================================================================= */

import type { Location, MirBody } from "./model/constraint.js";
import type { ItemId, RegionVid } from "./model/identity.js";
import type {
  ExternalRegion,
  HandledMarker,
  OpaqueReturnType,
  RegionVarInfo,
  SpecializedErrorRequest,
} from "./model/region.js";
import type { SourceMap } from "./model/source.js";
import type { ConstraintGraph } from "./graph/constraint-graph.js";
import type { ConstraintSccs } from "./graph/scc.js";

/** Inputs needed to find and rank a blame path. */
export interface BlameContext {
  readonly graph: ConstraintGraph;
  readonly sccs: ConstraintSccs;
  readonly body: MirBody;
}

export interface RegionSolverFacts {
  livenessContains(region: RegionVid, location: Location): boolean;
  /** True when the region is scoped to the body under check (not supplied by a caller). */
  isLocalFreeRegion(region: RegionVid): boolean;
  toErrorRegion(region: RegionVid): ExternalRegion | null;
}

export interface RegionNaming {
  /** A user-written lifetime name for the region, if it has one. */
  resolveName(region: RegionVid): string | null;
  varNameAndSpan(region: RegionVid): RegionVarInfo | null;
}

/** Gets first refusal on every violation that involves two external regions. */
export interface SpecializedErrorReporter {
  tryReport(request: SpecializedErrorRequest): HandledMarker | null;
}

export interface ItemQueries {
  /** The function-like item that declares an external region, if any. */
  suitableItem(region: ExternalRegion): ItemId | null;
  returnTypeOpaque(item: ItemId): OpaqueReturnType | null;
}

export interface RegionErrorContext extends BlameContext {
  readonly solver: RegionSolverFacts;
  readonly naming: RegionNaming;
  readonly items: ItemQueries;
  readonly sourceMap: SourceMap;
  readonly specialized?: SpecializedErrorReporter;
}

export const NO_NAMES: RegionNaming = {
  resolveName: () => null,
  varNameAndSpan: () => null,
};

export const NO_ITEMS: ItemQueries = {
  suitableItem: () => null,
  returnTypeOpaque: () => null,
};
