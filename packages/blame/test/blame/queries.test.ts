import { describe, test, expect } from "vitest";

import { findOutlivesBlameSpan, findSubRegionLiveAt } from "../../src/blame/queries.js";
import { InternalErrorCode, isInternalCompilerError } from "../../src/shared/errors.js";
import { createFixture, edgeSpan, r, statement } from "../_helpers/fixture.js";

const edges = [
  [0, 1, "Assignment"],
  [1, 2, "CallArgument"],
] as const;

describe("findSubRegionLiveAt", () => {
  test("finds the nearest outlived region that is live at the location", () => {
    const ctx = createFixture({
      regionCount: 3,
      edges,
      live: (region, location) => region === 2 && location.statementIndex === 7,
    });

    expect(findSubRegionLiveAt(ctx, r(0), statement(7))).toBe(r(2));
  });

  test("the region itself counts when it is live", () => {
    const ctx = createFixture({ regionCount: 3, edges, live: () => true });

    expect(findSubRegionLiveAt(ctx, r(1), statement(0))).toBe(r(1));
  });

  test("no live region is an internal error naming the location", () => {
    const ctx = createFixture({ regionCount: 3, edges });

    let error: unknown;
    try {
      findSubRegionLiveAt(ctx, r(0), statement(4));
    } catch (e) {
      error = e;
    }
    expect(isInternalCompilerError(error) && error.code).toBe(InternalErrorCode.NO_LIVE_SUBREGION);
    expect(isInternalCompilerError(error) && error.message).toBe(
      "no region outlived by '_#0r is live at bb0[4]",
    );
  });
});

describe("findOutlivesBlameSpan", () => {
  test("returns the span of the blamed constraint", () => {
    const ctx = createFixture({ regionCount: 3, edges });

    expect(findOutlivesBlameSpan(ctx, r(0), r(2))).toEqual(edgeSpan(1));
  });

  test("repeated calls give the same span", () => {
    const ctx = createFixture({ regionCount: 3, edges, groups: [[0, 1, 2]] });

    const first = findOutlivesBlameSpan(ctx, r(0), r(2));
    expect(findOutlivesBlameSpan(ctx, r(0), r(2))).toEqual(first);
    expect(first).toEqual(edgeSpan(1));
  });
});
