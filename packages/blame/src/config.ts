import type { DiagnosticStage } from "./model/diagnostics.js";
import { NOOP_TRACE, type CompileTrace } from "./shared/trace.js";

export interface ReporterConfig {
  /** Instrumentation for each reported violation. Default: NOOP_TRACE */
  trace?: CompileTrace;
  /** Keyword for the static region in help text. Default: "'static" */
  staticLifetimeName?: string;
  /** Placeholder suggested for a region with no written name. Default: "'_" */
  unnamedLifetimeName?: string;
  /** Stage tag stamped on every diagnostic. Default: "borrowck" */
  stage?: DiagnosticStage;
}

export type ResolvedReporterConfig = Required<ReporterConfig>;

export const DEFAULT_REPORTER_CONFIG: ResolvedReporterConfig = {
  trace: NOOP_TRACE,
  staticLifetimeName: "'static",
  unnamedLifetimeName: "'_",
  stage: "borrowck",
};

export function resolveReporterConfig(config: ReporterConfig = {}): ResolvedReporterConfig {
  return {
    trace: config.trace ?? DEFAULT_REPORTER_CONFIG.trace,
    staticLifetimeName: config.staticLifetimeName ?? DEFAULT_REPORTER_CONFIG.staticLifetimeName,
    unnamedLifetimeName: config.unnamedLifetimeName ?? DEFAULT_REPORTER_CONFIG.unnamedLifetimeName,
    stage: config.stage ?? DEFAULT_REPORTER_CONFIG.stage,
  };
}
