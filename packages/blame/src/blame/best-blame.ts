/**
 * Blame selection: pick the one constraint on a path that best explains why
 * `R: from` had to hold.
 *
 * A path like
 *
 *     '0: '1   ('0 is the start)
 *     '1: '2
 *     '2: '3   ('3 is the target)
 *
 * usually has a tail of edges whose `sup` is already unified with the target
 * (same SCC); those add nothing. Scanning from the end, the first edge that
 * leaves the target's SCC is the point where the value escapes, provided its
 * category is something a user would recognise. When no edge qualifies, fall
 * back to ranking the whole path by category.
 */

import type { BlameContext } from "../context.js";
import {
  compareCategories,
  isInterestingCategory,
  locationsSpan,
  type ConstraintCategory,
} from "../model/constraint.js";
import { formatRegionVid, unbrand, type RegionVid } from "../model/identity.js";
import { formatSpan, type SourceSpan } from "../model/span.js";
import { debug } from "../shared/debug.js";
import { InternalCompilerError, InternalErrorCode } from "../shared/errors.js";
import { BlameAttributes, NOOP_TRACE, type CompileTrace } from "../shared/trace.js";
import { findConstraintPath, type BlamePath, type RegionPredicate } from "./path-finder.js";

export interface CategorizedConstraint {
  readonly category: ConstraintCategory;
  readonly span: SourceSpan;
}

export interface SelectedBlame {
  readonly category: ConstraintCategory;
  readonly span: SourceSpan;
  readonly target: RegionVid;
}

export function categorizePath(ctx: BlameContext, blame: BlamePath): CategorizedConstraint[] {
  return blame.path.map((constraint) => ({
    category: constraint.category,
    span: locationsSpan(constraint.locations, ctx.body),
  }));
}

export function bestBlameConstraint(
  ctx: BlameContext,
  from: RegionVid,
  isTarget: RegionPredicate,
  trace: CompileTrace = NOOP_TRACE,
): SelectedBlame {
  const blame = findConstraintPath(ctx.graph, from, isTarget);
  if (!blame) {
    throw new InternalCompilerError(
      `no constraint path from ${formatRegionVid(from)} reaches a target region`,
      InternalErrorCode.NO_BLAME_PATH,
      { from: unbrand(from) },
    );
  }

  const { path, target } = blame;
  const categorized = categorizePath(ctx, blame);

  debug.blame("path", {
    from: formatRegionVid(from),
    target: formatRegionVid(target),
    edges: path.map(
      (c) =>
        `${formatRegionVid(c.sup)}: ${formatRegionVid(c.sub)} ${c.category} ` +
        `(scc ${unbrand(ctx.sccs.scc(c.sup))}: ${unbrand(ctx.sccs.scc(c.sub))})`,
    ),
  });
  trace.event("blame.path", {
    [BlameAttributes.FROM]: unbrand(from),
    [BlameAttributes.TARGET]: unbrand(target),
    [BlameAttributes.PATH_LENGTH]: path.length,
  });

  const targetScc = ctx.sccs.scc(target);
  for (let i = path.length - 1; i >= 0; i--) {
    const constraint = path[i];
    const entry = categorized[i];
    if (!constraint || !entry) continue;
    if (!isInterestingCategory(entry.category)) continue;
    if (ctx.sccs.scc(constraint.sup) === targetScc) continue;
    return selected(entry, target, false, trace);
  }

  // Unusual: every edge is uninteresting or inside the target's SCC. Rank by
  // category instead. Array.prototype.sort is stable, so path order breaks ties.
  const sorted = [...categorized].sort((a, b) => compareCategories(a.category, b.category));
  debug.blame("fallback", { sorted: sorted.map((c) => c.category) });
  const best: CategorizedConstraint = sorted[0] ?? { category: "Internal", span: ctx.body.span };
  return selected(best, target, true, trace);
}

function selected(
  entry: CategorizedConstraint,
  target: RegionVid,
  fallback: boolean,
  trace: CompileTrace,
): SelectedBlame {
  debug.blame("selected", { category: entry.category, span: formatSpan(entry.span), fallback });
  trace.event("blame.selected", {
    [BlameAttributes.CATEGORY]: entry.category,
    [BlameAttributes.FALLBACK]: fallback,
  });
  return { category: entry.category, span: entry.span, target };
}
