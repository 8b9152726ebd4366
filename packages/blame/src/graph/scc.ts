/**
 * Equivalence groups of regions (strongly connected components).
 *
 * Two regions in the same SCC outlive each other, so the solver treats them as
 * equal. Blame selection only needs `scc(region)`; this module offers two ways
 * to get one: derive it from the graph, or take the solver's own partition.
 */

import { sccId, unbrand, type RegionVid, type SccId } from "../model/identity.js";
import type { OutlivesConstraint } from "../model/constraint.js";
import { debug } from "../shared/debug.js";
import { InternalCompilerError, InternalErrorCode } from "../shared/errors.js";
import type { ConstraintGraph } from "./constraint-graph.js";

export interface ConstraintSccs {
  readonly sccCount: number;
  scc(region: RegionVid): SccId;
}

function fromAssignment(assignment: readonly number[], sccCount: number): ConstraintSccs {
  return {
    sccCount,
    scc(region) {
      const id = assignment[unbrand(region)];
      if (id === undefined) {
        throw new InternalCompilerError(
          `region ${unbrand(region)} has no equivalence group`,
          InternalErrorCode.GRAPH_OUT_OF_RANGE,
          { region: unbrand(region) },
        );
      }
      return sccId(id);
    },
  };
}

interface Frame {
  readonly region: number;
  readonly edges: Iterator<OutlivesConstraint>;
}

/**
 * Tarjan's algorithm, iterative so deep constraint chains cannot overflow the
 * call stack. SCC ids are assigned in completion order (sinks first).
 */
export function computeConstraintSccs(graph: ConstraintGraph): ConstraintSccs {
  const n = graph.regionCount;
  const index = new Array<number>(n).fill(-1);
  const lowlink = new Array<number>(n).fill(0);
  const onStack = new Array<boolean>(n).fill(false);
  const assignment = new Array<number>(n).fill(-1);
  const stack: number[] = [];
  let nextIndex = 0;
  let sccCount = 0;

  const frames: Frame[] = [];

  const enter = (region: RegionVid): void => {
    const v = unbrand(region);
    index[v] = nextIndex;
    lowlink[v] = nextIndex;
    nextIndex++;
    stack.push(v);
    onStack[v] = true;
    frames.push({ region: v, edges: graph.outgoingEdges(region)[Symbol.iterator]() });
  };

  for (const root of graph.regions()) {
    if (index[unbrand(root)] !== -1) continue;
    enter(root);

    for (let frame = frames.at(-1); frame !== undefined; frame = frames.at(-1)) {
      const v = frame.region;
      const next = frame.edges.next();

      if (!next.done) {
        const w = unbrand(next.value.sub);
        if (index[w] === -1) {
          enter(next.value.sub);
        } else if (onStack[w]) {
          lowlink[v] = Math.min(lowlink[v]!, index[w]!);
        }
        continue;
      }

      frames.pop();
      if (lowlink[v] === index[v]) {
        let member: number | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack[member] = false;
          assignment[member] = sccCount;
        } while (member !== v);
        sccCount++;
      }
      const parent = frames[frames.length - 1];
      if (parent) {
        lowlink[parent.region] = Math.min(lowlink[parent.region]!, lowlink[v]!);
      }
    }
  }

  debug.graph("sccs.computed", { regionCount: n, sccCount });
  return fromAssignment(assignment, sccCount);
}

/**
 * Use a partition supplied by the solver. Regions not named in any group get a
 * singleton group of their own, numbered after the explicit ones.
 */
export function sccsFromGroups(regionCount: number, groups: readonly (readonly RegionVid[])[]): ConstraintSccs {
  const assignment = new Array<number>(regionCount).fill(-1);
  let sccCount = 0;

  for (const group of groups) {
    if (group.length === 0) continue;
    for (const region of group) {
      const r = unbrand(region);
      if (r < 0 || r >= regionCount) {
        throw new InternalCompilerError(
          `equivalence group refers to region ${r}, but there are only ${regionCount} regions`,
          InternalErrorCode.GRAPH_OUT_OF_RANGE,
          { region: r, regionCount },
        );
      }
      if (assignment[r] !== -1) {
        throw new InternalCompilerError(
          `region ${r} appears in more than one equivalence group`,
          InternalErrorCode.SCC_DUPLICATE_REGION,
          { region: r },
        );
      }
      assignment[r] = sccCount;
    }
    sccCount++;
  }

  for (let r = 0; r < regionCount; r++) {
    if (assignment[r] === -1) assignment[r] = sccCount++;
  }

  debug.graph("sccs.groups", { regionCount, sccCount });
  return fromAssignment(assignment, sccCount);
}
