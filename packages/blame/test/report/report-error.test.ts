import { describe, test, expect } from "vitest";

import { RegionErrorReporter } from "../../src/report/report-error.js";
import type { DiagnosticBuffer } from "../../src/model/diagnostics.js";
import type { SpecializedErrorRequest } from "../../src/model/region.js";
import { toItemId } from "../../src/model/identity.js";
import { sourceSpan } from "../../src/model/span.js";
import { createTrace } from "../../src/shared/trace.js";
import { createCollectingExporter } from "../../src/shared/trace-exporters.js";
import { FILE, createFixture, edgeSpan, r, statement } from "../_helpers/fixture.js";

const X_SPAN = sourceSpan(40, 41, FILE);
const OUT_SPAN = sourceSpan(50, 53, FILE);

describe("escaping-data shape", () => {
  test("local data passed to an outer region gets all three labels", () => {
    const ctx = createFixture({
      regionCount: 2,
      edges: [[0, 1, "CallArgument"]],
      local: [0],
      vars: { 0: { name: "x", span: X_SPAN }, 1: { name: "out", span: OUT_SPAN } },
    });
    const buffer: DiagnosticBuffer = [];

    const outcome = new RegionErrorReporter(ctx).reportError(r(0), r(1), buffer);

    expect(outcome.kind === "buffered" && outcome.shape).toBe("escaping-data");
    expect(buffer).toEqual([
      {
        code: "regionck/borrowed-data-escapes",
        message: "borrowed data escapes outside of function",
        stage: "borrowck",
        severity: "error",
        span: edgeSpan(0),
        labels: [
          { span: OUT_SPAN, message: "`out` is declared here, outside of the function body" },
          { span: X_SPAN, message: "`x` is a reference that is only valid in the function body" },
          { span: edgeSpan(0), message: "`x` escapes the function body here" },
        ],
        help: [],
        suggestions: [],
        data: { escapesFrom: "function", constraintCategory: "CallArgument" },
      },
    ]);
  });

  test("an assignment inside a closure escapes the closure body", () => {
    const ctx = createFixture({
      regionCount: 2,
      edges: [[0, 1, "Assignment"]],
      isClosure: true,
      local: [0],
      vars: { 0: { name: "x", span: X_SPAN } },
    });
    const buffer: DiagnosticBuffer = [];

    new RegionErrorReporter(ctx).reportError(r(0), r(1), buffer);

    expect(buffer[0]?.message).toBe("borrowed data escapes outside of closure");
    expect(buffer[0]?.labels.map((l) => l.message)).toEqual([
      "`x` is a reference that is only valid in the closure body",
      "`x` escapes the closure body here",
    ]);
  });

  test("an unnamed variable contributes no labels", () => {
    const ctx = createFixture({
      regionCount: 2,
      edges: [[0, 1, "CallArgument"]],
      local: [0],
      vars: { 0: { name: null, span: X_SPAN }, 1: { name: "out", span: OUT_SPAN } },
    });
    const buffer: DiagnosticBuffer = [];

    new RegionErrorReporter(ctx).reportError(r(0), r(1), buffer);

    expect(buffer[0]?.code).toBe("regionck/borrowed-data-escapes");
    expect(buffer[0]?.labels).toEqual([
      { span: OUT_SPAN, message: "`out` is declared here, outside of the function body" },
    ]);
  });

  test("an assignment in a plain function is reported as a general error", () => {
    const ctx = createFixture({
      regionCount: 2,
      edges: [[0, 1, "Assignment"]],
      local: [0],
      vars: { 0: { name: "x", span: X_SPAN }, 1: { name: "out", span: OUT_SPAN } },
    });
    const buffer: DiagnosticBuffer = [];

    const outcome = new RegionErrorReporter(ctx).reportError(r(0), r(1), buffer);

    expect(outcome.kind === "buffered" && outcome.shape).toBe("general");
    expect(buffer).toHaveLength(1);
    expect(buffer[0]?.code).toBe("regionck/unsatisfied-lifetime-constraints");
    expect(buffer[0]?.labels).toEqual([
      { span: edgeSpan(0), message: "assignment requires that `'1` must outlive `'2`" },
    ]);
  });

  test("no variable information at all falls back to the general shape", () => {
    const ctx = createFixture({
      regionCount: 2,
      edges: [[0, 1, "CallArgument"]],
      isClosure: true,
      local: [0],
    });
    const buffer: DiagnosticBuffer = [];

    new RegionErrorReporter(ctx).reportError(r(0), r(1), buffer);

    expect(buffer[0]?.message).toBe("unsatisfied lifetime constraints");
    expect(buffer[0]?.labels[0]?.message).toBe("argument requires that `'1` must outlive `'2`");
  });
});

describe("general shape", () => {
  test("written names are used and unnamed regions are numbered in order", () => {
    const ctx = createFixture({
      regionCount: 3,
      edges: [
        [0, 1, "TypeAnnotation"],
        [1, 2, "Boring"],
      ],
      names: { 2: "'b" },
    });
    const buffer: DiagnosticBuffer = [];

    new RegionErrorReporter(ctx).reportError(r(0), r(2), buffer);

    expect(buffer[0]).toEqual({
      code: "regionck/unsatisfied-lifetime-constraints",
      message: "unsatisfied lifetime constraints",
      stage: "borrowck",
      severity: "error",
      span: edgeSpan(0),
      labels: [{ span: edgeSpan(0), message: "type annotation requires that `'1` must outlive `'b`" }],
      help: [],
      suggestions: [],
      data: { frName: "'1", outlivedFrName: "'b", constraintCategory: "TypeAnnotation" },
    });
  });

  test("returning into a local region is phrased as a return-type mismatch", () => {
    const ctx = createFixture({
      regionCount: 2,
      edges: [[0, 1, "Return"]],
      isClosure: true,
      local: [1],
      names: { 0: "'a" },
    });
    const buffer: DiagnosticBuffer = [];

    new RegionErrorReporter(ctx).reportError(r(0), r(1), buffer);

    expect(buffer[0]?.labels).toEqual([
      {
        span: edgeSpan(0),
        message: "closure was supposed to return data with lifetime `'1` but it is returning data with lifetime `'a`",
      },
    ]);
    expect(buffer[0]?.data).toEqual({
      frName: "'a",
      outlivedFrName: "'1",
      constraintCategory: "Return",
      returnMismatch: true,
    });
  });

  test("returning into a caller's region uses the category phrase", () => {
    const ctx = createFixture({
      regionCount: 2,
      edges: [[0, 1, "Return"]],
      names: { 0: "'a", 1: "'b" },
    });
    const buffer: DiagnosticBuffer = [];

    new RegionErrorReporter(ctx).reportError(r(0), r(1), buffer);

    expect(buffer[0]?.labels[0]?.message).toBe("returning this value requires that `'a` must outlive `'b`");
  });

  test("each report numbers its unnamed regions from 1", () => {
    const ctx = createFixture({ regionCount: 2, edges: [[0, 1, "Cast"]] });
    const reporter = new RegionErrorReporter(ctx);
    const buffer: DiagnosticBuffer = [];

    reporter.reportError(r(0), r(1), buffer);
    reporter.reportError(r(0), r(1), buffer);

    expect(buffer.map((d) => d.labels[0]?.message)).toEqual([
      "cast requires that `'1` must outlive `'2`",
      "cast requires that `'1` must outlive `'2`",
    ]);
  });
});

describe("specialized reporter", () => {
  const item = toItemId("crate::f");

  test("is not consulted unless both regions are external", () => {
    const requests: SpecializedErrorRequest[] = [];
    const ctx = createFixture({
      regionCount: 2,
      edges: [[0, 1, "CallArgument"]],
      external: { 1: { kind: "early-bound", name: "'b", item } },
      specialized: {
        tryReport(request) {
          requests.push(request);
          return { handled: true, by: "named-region-conflict" };
        },
      },
    });
    const buffer: DiagnosticBuffer = [];

    const outcome = new RegionErrorReporter(ctx).reportError(r(0), r(1), buffer);

    expect(requests).toEqual([]);
    expect(outcome.kind).toBe("buffered");
    expect(buffer).toHaveLength(1);
  });

  test("takes over when both regions are external", () => {
    const requests: SpecializedErrorRequest[] = [];
    const ctx = createFixture({
      regionCount: 2,
      edges: [[0, 1, "CallArgument"]],
      external: {
        0: { kind: "free", name: "'a", item },
        1: { kind: "early-bound", name: "'b", item },
      },
      specialized: {
        tryReport(request) {
          requests.push(request);
          return { handled: true, by: "named-region-conflict" };
        },
      },
    });
    const buffer: DiagnosticBuffer = [];

    const outcome = new RegionErrorReporter(ctx).reportError(r(0), r(1), buffer);

    expect(outcome).toEqual({ kind: "handled", by: "named-region-conflict" });
    expect(buffer).toEqual([]);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.span).toEqual(edgeSpan(0));
    expect(requests[0]?.fr).toEqual({ kind: "free", name: "'a", item: "crate::f" });
    expect(requests[0]?.outlived).toEqual({ kind: "early-bound", name: "'b", item: "crate::f" });
  });

  test("declining leaves the report to this engine", () => {
    const ctx = createFixture({
      regionCount: 2,
      edges: [[0, 1, "CallArgument"]],
      names: { 0: "'a", 1: "'b" },
      external: {
        0: { kind: "free", name: "'a", item },
        1: { kind: "early-bound", name: "'b", item },
      },
      specialized: { tryReport: () => null },
    });
    const buffer: DiagnosticBuffer = [];

    new RegionErrorReporter(ctx).reportError(r(0), r(1), buffer);

    expect(buffer[0]?.labels[0]?.message).toBe("argument requires that `'a` must outlive `'b`");
  });
});

describe("reporter instrumentation", () => {
  test("each report runs in a report.error span with its outcome recorded", () => {
    const exporter = createCollectingExporter();
    const ctx = createFixture({ regionCount: 2, edges: [[0, 1, "Cast"]] });
    const reporter = new RegionErrorReporter(ctx, { trace: createTrace({ exporter }) });

    reporter.reportError(r(0), r(1), []);

    const span = exporter.spans.find((s) => s.name === "report.error");
    expect(span?.attributes.get("region.fr")).toBe(0);
    expect(span?.attributes.get("region.outlived_fr")).toBe(1);
    expect(span?.attributes.get("report.shape")).toBe("general");
    expect(span?.attributes.get("report.specialized")).toBe(false);
    expect(span?.attributes.get("diag.code")).toBe("regionck/unsatisfied-lifetime-constraints");
    expect(span?.events.map((e) => e.name)).toEqual(["blame.path", "blame.selected"]);
  });

  test("the configured stage is stamped on every diagnostic", () => {
    const ctx = createFixture({ regionCount: 2, edges: [[0, 1, "Cast"]] });
    const buffer: DiagnosticBuffer = [];

    new RegionErrorReporter(ctx, { stage: "lint" }).reportError(r(0), r(1), buffer);

    expect(buffer[0]?.stage).toBe("lint");
  });
});

describe("auxiliary queries", () => {
  test("are exposed on the reporter", () => {
    const ctx = createFixture({
      regionCount: 3,
      edges: [
        [0, 1, "Assignment"],
        [1, 2, "CallArgument"],
      ],
      live: (region) => region === 1,
    });
    const reporter = new RegionErrorReporter(ctx);

    expect(reporter.findSubRegionLiveAt(r(0), statement(3))).toBe(r(1));
    expect(reporter.findOutlivesBlameSpan(r(0), r(2))).toEqual(edgeSpan(1));
  });
});
