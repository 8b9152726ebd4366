/* =============================================================================
 * INTERNAL ERRORS
 * =============================================================================
 * Thrown only when the solver's facts contradict themselves. These never become
 * user diagnostics; they surface as compiler bugs.
 * ============================================================================= */

export const InternalErrorCode = {
  TRACE_UNVISITED: "REGIONCK_TRACE_UNVISITED",
  NO_BLAME_PATH: "REGIONCK_NO_BLAME_PATH",
  NO_LIVE_SUBREGION: "REGIONCK_NO_LIVE_SUBREGION",
  GRAPH_OUT_OF_RANGE: "REGIONCK_GRAPH_OUT_OF_RANGE",
  SCC_DUPLICATE_REGION: "REGIONCK_SCC_DUPLICATE_REGION",
  DIAGNOSTIC_SEALED: "REGIONCK_DIAGNOSTIC_SEALED",
} as const;

export type InternalErrorCodeType = (typeof InternalErrorCode)[keyof typeof InternalErrorCode];

export class InternalCompilerError extends Error {
  constructor(
    message: string,
    public readonly code: InternalErrorCodeType,
    public readonly details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "InternalCompilerError";
  }
}

export function isInternalCompilerError(error: unknown): error is InternalCompilerError {
  return error instanceof InternalCompilerError;
}
