import type { ItemId, RegionVid } from "./identity.js";
import type { SourceSpan } from "./span.js";

/**
 * A region as the rest of the compiler sees it, outside the body under check.
 * Only universal regions have one; inference variables local to the body map
 * to null.
 */
export type ExternalRegion =
  | { readonly kind: "static" }
  | {
      /** Lifetime parameter declared on an item, e.g. `'a` in `fn f<'a>` */
      readonly kind: "early-bound";
      readonly name: string;
      readonly item: ItemId;
    }
  | {
      /** Late-bound or anonymous region scoped to an item's signature */
      readonly kind: "free";
      readonly name: string | null;
      readonly item: ItemId;
    };

/** Display name for a region in a diagnostic. */
export type RegionName =
  | { readonly kind: "named"; readonly name: string }
  | { readonly kind: "synthesized"; readonly name: string };

export function formatRegionName(name: RegionName): string {
  return name.name;
}

/** A variable (or parameter) whose type mentions the region, when one exists. */
export interface RegionVarInfo {
  readonly name: string | null;
  readonly span: SourceSpan;
}

/** Marker returned by a specialized reporter that took over a violation. */
export interface HandledMarker {
  readonly handled: true;
  readonly by: string;
}

export interface SpecializedErrorRequest {
  readonly span: SourceSpan;
  readonly outlived: ExternalRegion;
  readonly fr: ExternalRegion;
  readonly frVid: RegionVid;
  readonly outlivedVid: RegionVid;
}

/** Opaque (`impl Trait`) return type of a function-like item. */
export interface OpaqueReturnType {
  /** Span of the written `impl Trait` text */
  readonly span: SourceSpan;
  /** True when the opaque type's bounds already include `: 'static` */
  readonly outlivesStatic: boolean;
}
