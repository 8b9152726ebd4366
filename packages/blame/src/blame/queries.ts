/**
 * Narrow entry points for other borrow-check passes that only need one piece
 * of blame information.
 */

import type { BlameContext, RegionSolverFacts } from "../context.js";
import { locationKey, type Location } from "../model/constraint.js";
import { formatRegionVid, unbrand, type RegionVid } from "../model/identity.js";
import type { SourceSpan } from "../model/span.js";
import { InternalCompilerError, InternalErrorCode } from "../shared/errors.js";
import { bestBlameConstraint } from "./best-blame.js";
import { findConstraintPath } from "./path-finder.js";

/** Find some region `R` such that `fr1: R` and `R` is live at `location`. */
export function findSubRegionLiveAt(
  ctx: BlameContext & { readonly solver: Pick<RegionSolverFacts, "livenessContains"> },
  fr1: RegionVid,
  location: Location,
): RegionVid {
  const found = findConstraintPath(ctx.graph, fr1, (r) => ctx.solver.livenessContains(r, location));
  if (!found) {
    throw new InternalCompilerError(
      `no region outlived by ${formatRegionVid(fr1)} is live at ${locationKey(location)}`,
      InternalErrorCode.NO_LIVE_SUBREGION,
      { region: unbrand(fr1), location: locationKey(location) },
    );
  }
  return found.target;
}

/** A good span to blame for the fact that `fr1` outlives `fr2`. */
export function findOutlivesBlameSpan(ctx: BlameContext, fr1: RegionVid, fr2: RegionVid): SourceSpan {
  return bestBlameConstraint(ctx, fr1, (r) => r === fr2).span;
}
