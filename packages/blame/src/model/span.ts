/* =======================================================================================
 * Span primitives (source ranges cited by diagnostics)
 * ---------------------------------------------------------------------------------------
 * - Offsets are 0-based UTF-16 code units, [start, end)
 * - Helpers for length/normalization/equality
 * ======================================================================================= */

import type { SourceFileId } from "./identity.js";

export interface TextSpan {
  start: number;
  end: number;
}

export interface SourceSpan extends TextSpan {
  file?: SourceFileId;
}

export type SpanLike = TextSpan | SourceSpan;

export function spanLength(span: SpanLike | null | undefined): number {
  return span ? Math.max(0, span.end - span.start) : 0;
}

export function isEmptySpan(span: SpanLike | null | undefined): boolean {
  return spanLength(span) === 0;
}

export function normalizeSpan<TSpan extends SpanLike>(span: TSpan): TSpan {
  if (span.start <= span.end) return span;
  const swapped: TSpan = { ...span, start: span.end, end: span.start };
  return swapped;
}

/** Normalize a span when present; returns null for null/undefined inputs. */
export function normalizeSpanMaybe<TSpan extends SpanLike>(span: TSpan | null | undefined): TSpan | null {
  return span ? normalizeSpan(span) : null;
}

export function sourceSpan(start: number, end: number, file?: SourceFileId): SourceSpan {
  const span = normalizeSpan({ start, end });
  return file === undefined ? span : { ...span, file };
}

export function spanEquals(a: SpanLike | null | undefined, b: SpanLike | null | undefined): boolean {
  if (!a || !b) return false;
  const fileA = hasFile(a) ? a.file : undefined;
  const fileB = hasFile(b) ? b.file : undefined;
  return a.start === b.start && a.end === b.end && fileA === fileB;
}

export function spanContains(haystack: SpanLike | null | undefined, needle: SpanLike | null | undefined): boolean {
  if (!haystack || !needle) return false;
  return haystack.start <= needle.start && haystack.end >= needle.end;
}

function hasFile(span: SpanLike): span is SourceSpan {
  return "file" in span;
}

/** Short `file:start-end` rendering for debug output. */
export function formatSpan(span: SourceSpan): string {
  const file = span.file ?? "<unknown>";
  return `${file}:${span.start}-${span.end}`;
}
