import { describe, test, expect } from "vitest";

import { createConstraintGraph } from "../../src/graph/constraint-graph.js";
import { computeConstraintSccs, sccsFromGroups } from "../../src/graph/scc.js";
import type { OutlivesConstraint } from "../../src/model/constraint.js";
import { regionVid, unbrand } from "../../src/model/identity.js";
import { InternalCompilerError, InternalErrorCode } from "../../src/shared/errors.js";

const r = regionVid;

function edge(sup: number, sub: number): OutlivesConstraint {
  return {
    sup: r(sup),
    sub: r(sub),
    locations: { kind: "single", location: { block: 0, statementIndex: 0 } },
    category: "Boring",
  };
}

describe("computeConstraintSccs", () => {
  test("cycles collapse into one group, numbered in completion order", () => {
    const graph = createConstraintGraph({
      regionCount: 4,
      constraints: [edge(0, 1), edge(1, 0), edge(1, 2)],
      staticRegion: r(3),
    });
    const sccs = computeConstraintSccs(graph);

    expect(sccs.sccCount).toBe(3);
    expect(unbrand(sccs.scc(r(2)))).toBe(0);
    expect(unbrand(sccs.scc(r(0)))).toBe(1);
    expect(unbrand(sccs.scc(r(1)))).toBe(1);
    expect(unbrand(sccs.scc(r(3)))).toBe(2);
  });

  test("a long chain does not exhaust the call stack", () => {
    const n = 20_000;
    const constraints = Array.from({ length: n - 2 }, (_, i) => edge(i, i + 1));
    const graph = createConstraintGraph({ regionCount: n, constraints, staticRegion: r(n - 1) });
    const sccs = computeConstraintSccs(graph);

    expect(sccs.sccCount).toBe(n);
    expect(sccs.scc(r(0))).not.toBe(sccs.scc(r(1)));
  });
});

describe("sccsFromGroups", () => {
  test("explicit groups come first, remaining regions get singletons", () => {
    const sccs = sccsFromGroups(4, [[r(1), r(2)], []]);

    expect(sccs.sccCount).toBe(3);
    expect(unbrand(sccs.scc(r(1)))).toBe(0);
    expect(unbrand(sccs.scc(r(2)))).toBe(0);
    expect(unbrand(sccs.scc(r(0)))).toBe(1);
    expect(unbrand(sccs.scc(r(3)))).toBe(2);
  });

  test("a region may belong to only one group", () => {
    let code: unknown;
    try {
      sccsFromGroups(3, [[r(0), r(1)], [r(1)]]);
    } catch (e) {
      code = e instanceof InternalCompilerError ? e.code : e;
    }
    expect(code).toBe(InternalErrorCode.SCC_DUPLICATE_REGION);
  });

  test("asking for a region outside the partition is an internal error", () => {
    const sccs = sccsFromGroups(2, []);
    expect(() => sccs.scc(r(5))).toThrow("region 5 has no equivalence group");
  });
});
