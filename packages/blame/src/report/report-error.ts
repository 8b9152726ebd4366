/**
 * Region error reporting.
 *
 * Given a violated requirement `fr: outlived_fr`, pick the constraint to blame,
 * give the specialized reporter a chance to take it, then build exactly one
 * diagnostic in one of two shapes:
 *
 * - escaping data: a reference local to the body flows into something declared
 *   outside it ("borrowed data escapes outside of closure");
 * - general: "unsatisfied lifetime constraints" with a label naming both
 *   regions, or a return-type mismatch label for closures and functions
 *   returning a shorter-lived reference.
 */

import type { RegionErrorContext } from "../context.js";
import { resolveReporterConfig, type ReporterConfig, type ResolvedReporterConfig } from "../config.js";
import { bestBlameConstraint, type SelectedBlame } from "../blame/best-blame.js";
import { findOutlivesBlameSpan, findSubRegionLiveAt } from "../blame/queries.js";
import type { Location } from "../model/constraint.js";
import type { DiagnosticBuffer, RegionDiagnostic } from "../model/diagnostics.js";
import { formatRegionVid, unbrand, type RegionVid } from "../model/identity.js";
import { formatRegionName } from "../model/region.js";
import type { SourceSpan } from "../model/span.js";
import { createDiagnosticEmitter, type DiagnosticEmitter } from "../diagnostics/emitter.js";
import { DiagnosticBuilder } from "../diagnostics/builder.js";
import {
  regionDiagnostics,
  type BorrowedDataEscapesData,
  type RegionDiagnosticCatalog,
} from "../diagnostics/catalog.js";
import { debug } from "../shared/debug.js";
import { BlameAttributes } from "../shared/trace.js";
import { categoryPhrase } from "./category.js";
import { createNameCounter, giveRegionAName } from "./region-name.js";
import { addStaticImplTraitSuggestion } from "./static-impl-suggestion.js";

export type ReportShape = "escaping-data" | "general";

export type ReportOutcome =
  | { readonly kind: "handled"; readonly by: string }
  | { readonly kind: "buffered"; readonly shape: ReportShape; readonly diagnostic: RegionDiagnostic };

interface Locality {
  readonly frIsLocal: boolean;
  readonly outlivedFrIsLocal: boolean;
}

type EscapesFrom = BorrowedDataEscapesData["escapesFrom"];

export class RegionErrorReporter {
  private readonly config: ResolvedReporterConfig;
  private readonly emitter: DiagnosticEmitter<RegionDiagnosticCatalog>;

  constructor(
    private readonly ctx: RegionErrorContext,
    config?: ReporterConfig,
  ) {
    this.config = resolveReporterConfig(config);
    this.emitter = createDiagnosticEmitter(regionDiagnostics, { stage: this.config.stage });
  }

  /**
   * Report that `fr` was required to outlive `outlivedFr` and does not.
   * Buffers one diagnostic unless the specialized reporter handled it.
   */
  reportError(fr: RegionVid, outlivedFr: RegionVid, buffer: DiagnosticBuffer): ReportOutcome {
    const { trace } = this.config;
    return trace.span("report.error", () => {
      trace.setAttributes({
        [BlameAttributes.FR]: unbrand(fr),
        [BlameAttributes.OUTLIVED_FR]: unbrand(outlivedFr),
      });

      const blame = bestBlameConstraint(this.ctx, fr, (r) => r === outlivedFr, trace);
      debug.report("blame", {
        fr: formatRegionVid(fr),
        outlivedFr: formatRegionVid(outlivedFr),
        category: blame.category,
      });

      const handled = this.trySpecialized(blame.span, fr, outlivedFr);
      trace.setAttribute(BlameAttributes.SPECIALIZED, handled !== null);
      if (handled) return handled;

      const locality: Locality = {
        frIsLocal: this.ctx.solver.isLocalFreeRegion(fr),
        outlivedFrIsLocal: this.ctx.solver.isLocalFreeRegion(outlivedFr),
      };

      const escaping =
        (blame.category === "Assignment" || blame.category === "CallArgument") &&
        locality.frIsLocal &&
        !locality.outlivedFrIsLocal;

      const outcome = escaping
        ? this.reportEscapingDataError(fr, outlivedFr, blame, buffer)
        : this.reportGeneralError(fr, outlivedFr, locality, blame, buffer);

      if (outcome.kind === "buffered") {
        trace.setAttributes({
          [BlameAttributes.SHAPE]: outcome.shape,
          [BlameAttributes.DIAG_CODE]: outcome.diagnostic.code,
        });
      }
      return outcome;
    });
  }

  findSubRegionLiveAt(fr1: RegionVid, location: Location): RegionVid {
    return findSubRegionLiveAt(this.ctx, fr1, location);
  }

  findOutlivesBlameSpan(fr1: RegionVid, fr2: RegionVid): SourceSpan {
    return findOutlivesBlameSpan(this.ctx, fr1, fr2);
  }

  private trySpecialized(span: SourceSpan, fr: RegionVid, outlivedFr: RegionVid): ReportOutcome | null {
    const specialized = this.ctx.specialized;
    if (!specialized) return null;
    const frRegion = this.ctx.solver.toErrorRegion(fr);
    const outlivedRegion = this.ctx.solver.toErrorRegion(outlivedFr);
    if (!frRegion || !outlivedRegion) return null;

    const marker = specialized.tryReport({
      span,
      outlived: outlivedRegion,
      fr: frRegion,
      frVid: fr,
      outlivedVid: outlivedFr,
    });
    if (!marker) return null;
    debug.report("specialized.handled", { by: marker.by });
    return { kind: "handled", by: marker.by };
  }

  private reportEscapingDataError(
    fr: RegionVid,
    outlivedFr: RegionVid,
    blame: SelectedBlame,
    buffer: DiagnosticBuffer,
  ): ReportOutcome {
    const frInfo = this.ctx.naming.varNameAndSpan(fr);
    const outlivedInfo = this.ctx.naming.varNameAndSpan(outlivedFr);
    const escapesFrom: EscapesFrom = this.ctx.body.isClosure ? "closure" : "function";

    // Nothing to point at, or an assignment inside a plain function, which
    // reads better as a plain lifetime mismatch.
    if ((frInfo === null && outlivedInfo === null) || (blame.category === "Assignment" && escapesFrom === "function")) {
      debug.report("escaping.revert", { escapesFrom, category: blame.category });
      return this.reportGeneralError(fr, outlivedFr, { frIsLocal: true, outlivedFrIsLocal: false }, blame, buffer);
    }

    const diag = new DiagnosticBuilder(
      this.emitter,
      "regionck/borrowed-data-escapes",
      `borrowed data escapes outside of ${escapesFrom}`,
      blame.span,
      { escapesFrom, constraintCategory: blame.category },
    );

    if (outlivedInfo?.name) {
      diag.label(outlivedInfo.span, `\`${outlivedInfo.name}\` is declared here, outside of the ${escapesFrom} body`);
    }
    if (frInfo?.name) {
      diag.label(frInfo.span, `\`${frInfo.name}\` is a reference that is only valid in the ${escapesFrom} body`);
      diag.label(blame.span, `\`${frInfo.name}\` escapes the ${escapesFrom} body here`);
    }

    return { kind: "buffered", shape: "escaping-data", diagnostic: diag.buffer(buffer) };
  }

  private reportGeneralError(
    fr: RegionVid,
    outlivedFr: RegionVid,
    locality: Locality,
    blame: SelectedBlame,
    buffer: DiagnosticBuffer,
  ): ReportOutcome {
    const counter = createNameCounter();
    const frName = giveRegionAName(this.ctx.naming, fr, counter);
    const outlivedFrName = giveRegionAName(this.ctx.naming, outlivedFr, counter);
    const frText = formatRegionName(frName);
    const outlivedText = formatRegionName(outlivedFrName);
    const mirDefName = this.ctx.body.isClosure ? "closure" : "function";
    const returnMismatch = blame.category === "Return" && locality.outlivedFrIsLocal;

    const diag = new DiagnosticBuilder(
      this.emitter,
      "regionck/unsatisfied-lifetime-constraints",
      "unsatisfied lifetime constraints",
      blame.span,
      {
        frName: frText,
        outlivedFrName: outlivedText,
        constraintCategory: blame.category,
        ...(returnMismatch ? { returnMismatch: true } : {}),
      },
    );

    if (returnMismatch) {
      diag.label(
        blame.span,
        `${mirDefName} was supposed to return data with lifetime \`${outlivedText}\` but it is returning data with lifetime \`${frText}\``,
      );
    } else {
      diag.label(
        blame.span,
        `${categoryPhrase(blame.category)}requires that \`${frText}\` must outlive \`${outlivedText}\``,
      );
    }

    addStaticImplTraitSuggestion(this.ctx, this.config, diag, fr, frName, outlivedFr);

    return { kind: "buffered", shape: "general", diagnostic: diag.buffer(buffer) };
  }
}
