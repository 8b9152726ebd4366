export {
  DIAGNOSTIC_SOURCE,
  toLspUri,
  spanToRange,
  spanToLocation,
  renderMessage,
  mapRegionDiagnostic,
  mapRegionDiagnostics,
  mapSuggestionActions,
} from "./mapping/lsp-types.js";
export type { LookupTextFn } from "./mapping/lsp-types.js";
