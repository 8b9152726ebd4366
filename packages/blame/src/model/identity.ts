/* =======================================================================================
 * Identity primitives (brands for dense region/constraint/scc indices)
 * ---------------------------------------------------------------------------------------
 * - Region variables, SCC ids and constraint indices are dense integers
 * - Brands keep them from being mixed up at call sites
 * - Per-region bookkeeping is a flat array indexed by the unbranded value
 * ======================================================================================= */

export type Brand<T extends string> = { readonly __brand: T };
export type Branded<TValue, TBrand extends string> = TValue & Brand<TBrand>;

export type StringId<TBrand extends string> = Branded<string, TBrand>;
export type NumericId<TBrand extends string> = Branded<number, TBrand>;

export type RegionVid = NumericId<"RegionVid">; // '0, '1, ... as allocated by the solver
export type SccId = NumericId<"SccId">;
export type ItemId = StringId<"ItemId">; // e.g. 'crate::foo', 'crate::foo::{closure#0}'
export type SourceFileId = StringId<"SourceFileId">;

export function brandNumber<TBrand extends string>(value: number): NumericId<TBrand> {
  return value as NumericId<TBrand>;
}

export function brandString<TBrand extends string>(value: string): StringId<TBrand> {
  return value as StringId<TBrand>;
}

export function unbrand<T>(value: Branded<T, string>): T {
  return value as T;
}

export function regionVid(index: number): RegionVid {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Region index must be a non-negative integer, got ${index}`);
  }
  return brandNumber<"RegionVid">(index);
}

export function sccId(index: number): SccId {
  return brandNumber<"SccId">(index);
}

export function toItemId(path: string): ItemId {
  return brandString<"ItemId">(path);
}

export function toSourceFileId(path: string): SourceFileId {
  return brandString<"SourceFileId">(path.replace(/\\/g, "/"));
}

/** Debug rendering of a region variable, matching the `'_#3r` style of solver dumps. */
export function formatRegionVid(region: RegionVid): string {
  return `'_#${unbrand(region)}r`;
}
