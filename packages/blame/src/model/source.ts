import { toSourceFileId, type SourceFileId } from "./identity.js";
import { normalizeSpan, type SourceSpan } from "./span.js";

export interface SourceText {
  readonly id: SourceFileId;
  readonly text: string;
}

/** Snippet retrieval used by suggestions; a null result is an expected outcome. */
export interface SourceMap {
  spanToSnippet(span: SourceSpan): string | null;
  lookupText(file: SourceFileId): string | null;
}

export function sourceText(path: string, text: string): SourceText {
  return { id: toSourceFileId(path), text };
}

export function createSourceMap(files: Iterable<SourceText>): SourceMap {
  const byId = new Map<SourceFileId, string>();
  for (const file of files) {
    byId.set(file.id, file.text);
  }

  function lookupText(file: SourceFileId): string | null {
    return byId.get(file) ?? null;
  }

  return {
    lookupText,
    spanToSnippet(span) {
      if (span.file === undefined) return null;
      const text = lookupText(span.file);
      if (text === null) return null;
      const { start, end } = normalizeSpan(span);
      if (start < 0 || end > text.length) return null;
      return text.slice(start, end);
    },
  };
}

/** Source map that never has text; every snippet request degrades to null. */
export const EMPTY_SOURCE_MAP: SourceMap = {
  spanToSnippet: () => null,
  lookupText: () => null,
};
