/**
 * Constraint Graph: outlives constraints as a directed multigraph
 *
 * An edge `sup -> sub` exists for every constraint `sup: sub`. Adjacency is
 * kept in dense arrays indexed by region, so per-region lookups never hash.
 *
 * The static region is special: it outlives every region, so its outgoing
 * edges are one implicit `Internal` edge to each region (in index order)
 * instead of whatever explicit edges were recorded for it.
 */

import { regionVid, unbrand, type RegionVid } from "../model/identity.js";
import type { OutlivesConstraint } from "../model/constraint.js";
import { sourceSpan, type SourceSpan } from "../model/span.js";
import { debug } from "../shared/debug.js";
import { InternalCompilerError, InternalErrorCode } from "../shared/errors.js";

export interface ConstraintGraph {
  readonly regionCount: number;
  readonly staticRegion: RegionVid;
  /** Span cited by the implicit static edges */
  readonly staticSpan: SourceSpan;
  readonly constraints: readonly OutlivesConstraint[];
  /** Edges leaving `region`, in a fixed order that breaks BFS ties. */
  outgoingEdges(region: RegionVid): Iterable<OutlivesConstraint>;
  regions(): Iterable<RegionVid>;
}

export interface ConstraintGraphInput {
  regionCount: number;
  constraints: readonly OutlivesConstraint[];
  staticRegion: RegionVid;
  staticSpan?: SourceSpan;
}

export function createConstraintGraph(input: ConstraintGraphInput): ConstraintGraph {
  const { regionCount, constraints, staticRegion } = input;
  const staticSpan = input.staticSpan ?? sourceSpan(0, 0);

  checkRegion(staticRegion, regionCount, "static region");

  const adjacency: number[][] = Array.from({ length: regionCount }, () => []);
  constraints.forEach((constraint, index) => {
    checkRegion(constraint.sup, regionCount, `constraint #${index} sup`);
    checkRegion(constraint.sub, regionCount, `constraint #${index} sub`);
    adjacency[unbrand(constraint.sup)]?.push(index);
  });

  debug.graph("build", {
    regionCount,
    constraintCount: constraints.length,
    staticRegion: unbrand(staticRegion),
  });

  function* staticEdges(): Generator<OutlivesConstraint> {
    for (let index = 0; index < regionCount; index++) {
      yield {
        sup: staticRegion,
        sub: regionVid(index),
        locations: { kind: "all", span: staticSpan },
        category: "Internal",
      };
    }
  }

  function* explicitEdges(region: RegionVid): Generator<OutlivesConstraint> {
    for (const index of adjacency[unbrand(region)] ?? []) {
      const constraint = constraints[index];
      if (constraint) yield constraint;
    }
  }

  return {
    regionCount,
    staticRegion,
    staticSpan,
    constraints,
    outgoingEdges(region) {
      return region === staticRegion ? staticEdges() : explicitEdges(region);
    },
    *regions() {
      for (let index = 0; index < regionCount; index++) {
        yield regionVid(index);
      }
    },
  };
}

function checkRegion(region: RegionVid, regionCount: number, what: string): void {
  const index = unbrand(region);
  if (index < 0 || index >= regionCount) {
    throw new InternalCompilerError(
      `${what} refers to region ${index}, but the graph only has ${regionCount} regions`,
      InternalErrorCode.GRAPH_OUT_OF_RANGE,
      { region: index, regionCount },
    );
  }
}
