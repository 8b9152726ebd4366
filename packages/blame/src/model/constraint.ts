/* =======================================================================================
 * OUTLIVES CONSTRAINT MODEL
 * ---------------------------------------------------------------------------------------
 * `sup: sub` edges produced by the region solver, with the reason each one exists
 * (category) and where it comes from (locations). Pure data; the engine never
 * mutates a constraint after the graph is built.
 * ======================================================================================= */

import type { RegionVid } from "./identity.js";
import type { SourceSpan } from "./span.js";

/**
 * Why a constraint exists. The declaration order below is the total order used
 * when blame selection has to fall back to ranking by category, so it must not
 * be reordered.
 */
export const CONSTRAINT_CATEGORIES = [
  "Return",
  "TypeAnnotation",
  "Cast",
  "ClosureBounds",
  "CallArgument",
  "CopyBound",
  "SizedBound",
  "Assignment",
  "OpaqueType",
  "Boring",
  "BoringNoLocation",
  "Internal",
] as const;

export type ConstraintCategory = (typeof CONSTRAINT_CATEGORIES)[number];

export function categoryRank(category: ConstraintCategory): number {
  return CONSTRAINT_CATEGORIES.indexOf(category);
}

export function compareCategories(a: ConstraintCategory, b: ConstraintCategory): number {
  return categoryRank(a) - categoryRank(b);
}

/** Categories that explain nothing to a user: type-system plumbing or opaque bookkeeping. */
export const UNINTERESTING_CATEGORIES: ReadonlySet<ConstraintCategory> = new Set<ConstraintCategory>([
  "OpaqueType",
  "Boring",
  "BoringNoLocation",
  "Internal",
]);

export function isInterestingCategory(category: ConstraintCategory): boolean {
  return !UNINTERESTING_CATEGORIES.has(category);
}

/** A program point: statement `statementIndex` of basic block `block`. */
export interface Location {
  readonly block: number;
  readonly statementIndex: number;
}

export type Locations =
  | { readonly kind: "all"; readonly span: SourceSpan }
  | { readonly kind: "single"; readonly location: Location };

export interface OutlivesConstraint {
  readonly sup: RegionVid;
  readonly sub: RegionVid;
  readonly locations: Locations;
  readonly category: ConstraintCategory;
}

/** The body being checked, as far as diagnostics need to see it. */
export interface MirBody {
  /** Span of the whole body; cited when nothing more precise exists. */
  readonly span: SourceSpan;
  /** True for closure bodies, false for plain function items. */
  readonly isClosure: boolean;
  sourceInfo(location: Location): SourceSpan;
}

export function locationsSpan(locations: Locations, body: MirBody): SourceSpan {
  switch (locations.kind) {
    case "all":
      return locations.span;
    case "single":
      return body.sourceInfo(locations.location);
  }
}

export function locationKey(location: Location): string {
  return `bb${location.block}[${location.statementIndex}]`;
}
