import type { RegionNaming } from "../context.js";
import { formatRegionVid, type RegionVid } from "../model/identity.js";
import type { RegionName } from "../model/region.js";
import { debug } from "../shared/debug.js";

/** Shared by all names given within one diagnostic so synthesized names stay distinct. */
export interface NameCounter {
  next: number;
}

export function createNameCounter(): NameCounter {
  return { next: 1 };
}

/**
 * Name a region for display: the user-written lifetime when the naming
 * service knows one, otherwise a fresh `'1`, `'2`, ...
 */
export function giveRegionAName(naming: RegionNaming, region: RegionVid, counter: NameCounter): RegionName {
  const written = naming.resolveName(region);
  if (written !== null) {
    debug.report("region.named", { region: formatRegionVid(region), name: written });
    return { kind: "named", name: written };
  }
  const name = `'${counter.next}`;
  counter.next++;
  debug.report("region.synthesized", { region: formatRegionVid(region), name });
  return { kind: "synthesized", name };
}
