/**
 * In-process fixtures: constraint graphs, bodies and collaborators built from
 * plain data.
 *
 * Region indices are `0 .. regionCount - 1`; the static region is always the
 * extra index `regionCount`. Edge `i` sits at statement `i` of block 0, and
 * `body.sourceInfo` maps statement `i` to `[i * 10, i * 10 + 5)` in FILE, so a
 * blamed span identifies the edge it came from.
 */

import {
  createConstraintGraph,
  computeConstraintSccs,
  sccsFromGroups,
  regionVid,
  unbrand,
  sourceSpan,
  toSourceFileId,
  createSourceMap,
  sourceText,
  NO_ITEMS,
  type ConstraintCategory,
  type ExternalRegion,
  type ItemQueries,
  type Location,
  type MirBody,
  type OutlivesConstraint,
  type RegionErrorContext,
  type RegionVarInfo,
  type RegionVid,
  type SourceSpan,
  type SourceText,
  type SpecializedErrorReporter,
} from "../../src/index.js";

export const FILE = toSourceFileId("/project/src/body.txt");
export const BODY_SPAN = sourceSpan(0, 200, FILE);
export const STATIC_SPAN = sourceSpan(190, 195, FILE);

export type EdgeSpec = readonly [sup: number, sub: number, category: ConstraintCategory];

export interface FixtureOptions {
  regionCount: number;
  edges: readonly EdgeSpec[];
  /** Solver-supplied equivalence groups; computed from the graph when omitted */
  groups?: readonly (readonly number[])[];
  isClosure?: boolean;
  /** User-written lifetime names, by region index */
  names?: Readonly<Record<number, string>>;
  vars?: Readonly<Record<number, RegionVarInfo>>;
  /** Regions local to the body */
  local?: readonly number[];
  external?: Readonly<Record<number, ExternalRegion>>;
  items?: ItemQueries;
  specialized?: SpecializedErrorReporter;
  files?: readonly SourceText[];
  live?: (region: number, location: Location) => boolean;
}

export function r(index: number): RegionVid {
  return regionVid(index);
}

/** Span cited by edge `i` of a fixture. */
export function edgeSpan(i: number): SourceSpan {
  return sourceSpan(i * 10, i * 10 + 5, FILE);
}

export function statement(i: number): Location {
  return { block: 0, statementIndex: i };
}

export function createBody(isClosure = false): MirBody {
  return {
    span: BODY_SPAN,
    isClosure,
    sourceInfo: (location) => edgeSpan(location.statementIndex),
  };
}

export function createFixture(options: FixtureOptions): RegionErrorContext & { readonly staticRegion: RegionVid } {
  const total = options.regionCount + 1;
  const staticRegion = r(options.regionCount);

  const constraints: OutlivesConstraint[] = options.edges.map(([sup, sub, category], i) => ({
    sup: r(sup),
    sub: r(sub),
    locations: { kind: "single", location: statement(i) },
    category,
  }));

  const graph = createConstraintGraph({
    regionCount: total,
    constraints,
    staticRegion,
    staticSpan: STATIC_SPAN,
  });
  const sccs = options.groups
    ? sccsFromGroups(total, options.groups.map((group) => group.map(r)))
    : computeConstraintSccs(graph);

  const names = options.names ?? {};
  const vars = options.vars ?? {};
  const local = new Set(options.local ?? []);
  const external = options.external ?? {};
  const live = options.live ?? (() => false);

  return {
    staticRegion,
    graph,
    sccs,
    body: createBody(options.isClosure),
    solver: {
      livenessContains: (region, location) => live(unbrand(region), location),
      isLocalFreeRegion: (region) => local.has(unbrand(region)),
      toErrorRegion: (region) => external[unbrand(region)] ?? null,
    },
    naming: {
      resolveName: (region) => names[unbrand(region)] ?? null,
      varNameAndSpan: (region) => vars[unbrand(region)] ?? null,
    },
    items: options.items ?? NO_ITEMS,
    sourceMap: createSourceMap(options.files ?? [sourceText(FILE, " ".repeat(200))]),
    ...(options.specialized ? { specialized: options.specialized } : {}),
  };
}
