/**
 * Suggestion for `impl Trait` return types that capture borrowed data which
 * then has to outlive `'static`.
 *
 * ```text
 * fn iter<'a>(x: &'a [u8]) -> impl Iterator<Item = &u8> { x.iter() }
 *                             ^^^^^^^^^^^^^^^^^^^^^^^^^ + 'a
 * ```
 *
 * When the opaque type already says `+ 'static`, adding a bound would not
 * help, so the advice is to make the captured region `'static` instead.
 */

import type { RegionErrorContext } from "../context.js";
import type { ResolvedReporterConfig } from "../config.js";
import type { DiagnosticBuilder } from "../diagnostics/builder.js";
import type { RegionDiagnosticCode } from "../diagnostics/catalog.js";
import { formatRegionVid, type RegionVid } from "../model/identity.js";
import { formatRegionName, type RegionName } from "../model/region.js";
import { debug } from "../shared/debug.js";

export type StaticImplTraitOutcome =
  | "not-applicable"
  | "help-replace-with-static"
  | "suggest-add-bound"
  | "snippet-unavailable";

export function addStaticImplTraitSuggestion<Code extends RegionDiagnosticCode>(
  ctx: RegionErrorContext,
  config: ResolvedReporterConfig,
  diag: DiagnosticBuilder<Code>,
  fr: RegionVid,
  frName: RegionName,
  outlivedFr: RegionVid,
): StaticImplTraitOutcome {
  const frRegion = ctx.solver.toErrorRegion(fr);
  const outlivedRegion = ctx.solver.toErrorRegion(outlivedFr);
  if (!frRegion || outlivedRegion?.kind !== "static") return "not-applicable";

  const item = ctx.items.suitableItem(frRegion);
  const opaque = item !== null ? ctx.items.returnTypeOpaque(item) : null;
  if (!opaque) return "not-applicable";

  const name = formatRegionName(frName);
  debug.suggest("opaque", {
    fr: formatRegionVid(fr),
    item,
    outlivesStatic: opaque.outlivesStatic,
  });

  if (opaque.outlivesStatic) {
    diag.help(`consider replacing \`${name}\` with \`${config.staticLifetimeName}\``);
    return "help-replace-with-static";
  }

  const snippet = ctx.sourceMap.spanToSnippet(opaque.span);
  if (snippet === null) {
    debug.suggest("snippet.unavailable", { item });
    return "snippet-unavailable";
  }

  const constraint = frName.kind === "named" ? name : config.unnamedLifetimeName;
  diag.suggest(
    opaque.span,
    `to allow this impl Trait to capture borrowed data with lifetime \`${name}\`, add \`${constraint}\` as a constraint`,
    `${snippet} + ${constraint}`,
    "machine-applicable",
  );
  return "suggest-add-bound";
}
