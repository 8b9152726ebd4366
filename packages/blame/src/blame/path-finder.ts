/**
 * Breadth-first search over the constraint graph.
 *
 * Walks `sup -> sub` edges from a start region and stops at the first region
 * that passes the target test. BFS order makes that region one of the nearest
 * (fewest constraints), which keeps the explanation short.
 */

import { formatRegionVid, unbrand, type RegionVid } from "../model/identity.js";
import type { OutlivesConstraint } from "../model/constraint.js";
import type { ConstraintGraph } from "../graph/constraint-graph.js";
import { debug } from "../shared/debug.js";
import { InternalCompilerError, InternalErrorCode } from "../shared/errors.js";

export type RegionPredicate = (region: RegionVid) => boolean;

/** Per-region search state; lives only for the duration of one search. */
export type Trace =
  | { readonly kind: "not-visited" }
  | { readonly kind: "start-region" }
  | { readonly kind: "from-constraint"; readonly constraint: OutlivesConstraint };

export interface BlamePath {
  /** Edges from the start region to `target`, in traversal order */
  readonly path: readonly OutlivesConstraint[];
  readonly target: RegionVid;
}

const NOT_VISITED: Trace = { kind: "not-visited" };
const START_REGION: Trace = { kind: "start-region" };

/**
 * Find a shortest constraint path from `from` to some region satisfying
 * `isTarget`. Returns null when no such region is reachable.
 */
export function findConstraintPath(
  graph: ConstraintGraph,
  from: RegionVid,
  isTarget: RegionPredicate,
): BlamePath | null {
  const context = new Array<Trace>(graph.regionCount).fill(NOT_VISITED);
  context[unbrand(from)] = START_REGION;

  // Array + head index as the queue; dequeued entries are never revisited.
  const queue: RegionVid[] = [from];
  for (let head = 0; head < queue.length; head++) {
    const region = queue[head];
    if (region === undefined) break;

    if (isTarget(region)) {
      const path = reconstructPath(context, region);
      debug.blame("path.found", {
        from: formatRegionVid(from),
        target: formatRegionVid(region),
        length: path.length,
        visited: queue.length,
      });
      return { path, target: region };
    }

    for (const constraint of graph.outgoingEdges(region)) {
      const sub = unbrand(constraint.sub);
      if (context[sub]?.kind === "not-visited") {
        context[sub] = { kind: "from-constraint", constraint };
        queue.push(constraint.sub);
      }
    }
  }

  debug.blame("path.none", { from: formatRegionVid(from), visited: queue.length });
  return null;
}

function reconstructPath(context: readonly Trace[], target: RegionVid): OutlivesConstraint[] {
  const result: OutlivesConstraint[] = [];
  let current = target;
  for (;;) {
    const trace = context[unbrand(current)] ?? NOT_VISITED;
    switch (trace.kind) {
      case "start-region":
        return result.reverse();
      case "from-constraint":
        result.push(trace.constraint);
        current = trace.constraint.sup;
        break;
      case "not-visited":
        throw new InternalCompilerError(
          `found unvisited region ${formatRegionVid(current)} on path to ${formatRegionVid(target)}`,
          InternalErrorCode.TRACE_UNVISITED,
          { region: unbrand(current), target: unbrand(target) },
        );
    }
  }
}
