import { BlockRegistry } from "../blocks/block_registry";
import type { LogBlock, ResponseStatus } from "../blocks/block_types";
import type { DuplicatePolicy } from "../config/overview_config";
import {
  NOT_AVAILABLE,
  unavailable,
  type MetricEntry,
  type MetricKey,
  type MetricValue,
  type Notice,
  type OverviewReport,
  type ParametersSection,
  type VersionFreshness,
} from "../contracts/overview_report";
import { silentLogger, type OverviewLogger } from "../logger";
import { METRIC_HELP, METRIC_LABELS, SOLVED_BY_PRESOLVE_MESSAGE } from "./help_text";
import {
  deriveBestBound,
  deriveGap,
  deriveModelMetrics,
  deriveObjective,
  deriveParameters,
  derivePresolveTime,
  deriveSearchChart,
  deriveSolvedByPresolve,
  deriveStatus,
  deriveVersion,
  deriveWalltime,
  deriveWorkers,
  type ModelMetrics,
  type VersionMetric,
} from "./metric_derivers";
import { formatPercent, formatSeconds } from "./numeric";
import { isOverviewHardError } from "./overview_errors";

export type OverviewInput = {
  blocks: readonly LogBlock[];
  comments?: readonly string[];
};

export type AssembleOptions = {
  duplicatePolicy?: DuplicatePolicy;
  log?: OverviewLogger;
};

function buildEntry<T extends string | number>(
  key: MetricKey,
  value: MetricValue<T>,
  format: (value: T) => string,
  freshness?: VersionFreshness
): MetricEntry {
  return {
    key,
    label: METRIC_LABELS[key],
    value,
    display: value.state === "known" ? format(value.value) : NOT_AVAILABLE,
    help: METRIC_HELP[key],
    ...(freshness ? { freshness } : {}),
  };
}

/**
 * Build the overview report for one log.
 *
 * Order:
 * 1. Registry lookup per block kind
 * 2. Derivers (each isolated; a failure only blanks its own metric)
 * 3. Ordered metric entries, parameters, chart, notices
 *
 * Throws StructuralInputError (response status missing/invalid) and
 * DuplicateBlockError (duplicate policy "error"); nothing else escapes.
 */
export function assembleOverview(input: OverviewInput, opts: AssembleOptions = {}): OverviewReport {
  const log = opts.log ?? silentLogger;
  const registry = new BlockRegistry(input.blocks, { duplicatePolicy: opts.duplicatePolicy, log });

  const solver = registry.lookup("solver");
  const model = registry.lookup("initial_model");
  const progress = registry.lookup("search_progress");
  const response = registry.lookup("response");
  const presolve = registry.lookup("presolve_summary");

  const isolate = <T>(name: string, compute: () => T, fallback: T): T => {
    try {
      return compute();
    } catch (err) {
      if (isOverviewHardError(err)) throw err;
      log.warn({ metric: name, error: String(err instanceof Error ? err.message : err) }, "overview.metric_failed");
      return fallback;
    }
  };

  const status = isolate<MetricValue<ResponseStatus>>(
    "status",
    () => deriveStatus(response),
    unavailable("derivation_failed")
  );

  const version = isolate<VersionMetric>(
    "version",
    () => deriveVersion(solver),
    { value: unavailable("derivation_failed"), freshness: "unknown" }
  );
  const workers = isolate("workers", () => deriveWorkers(solver), unavailable<number>("derivation_failed"));
  const parameters = isolate<ParametersSection>("parameters", () => deriveParameters(solver), { state: "none" });
  const walltime = isolate("walltime", () => deriveWalltime(response), unavailable<number>("derivation_failed"));
  const presolveTime = isolate(
    "presolve_time",
    () => derivePresolveTime(progress),
    unavailable<number>("derivation_failed")
  );
  const modelMetrics = isolate<ModelMetrics>("model", () => deriveModelMetrics(model), {
    variables: unavailable("derivation_failed"),
    constraints: unavailable("derivation_failed"),
    modelType: unavailable("derivation_failed"),
  });
  const objective = isolate("objective", () => deriveObjective(response), unavailable<number>("derivation_failed"));
  const bestBound = isolate("best_bound", () => deriveBestBound(response), unavailable<number>("derivation_failed"));
  const gap = isolate("gap", () => deriveGap(response), unavailable<number>("derivation_failed"));
  const chart = isolate("chart", () => deriveSearchChart(status, progress, model), null);
  const solvedByPresolve = isolate("solved_by_presolve", () => deriveSolvedByPresolve(presolve), null);

  const metrics: MetricEntry[] = [
    buildEntry("version", version.value, (v) => v, version.freshness),
    buildEntry("workers", workers, String),
    buildEntry("status", status, (s) => s),
    buildEntry("walltime", walltime, formatSeconds),
    buildEntry("presolve_time", presolveTime, formatSeconds),
    buildEntry("variables", modelMetrics.variables, String),
    buildEntry("constraints", modelMetrics.constraints, String),
    buildEntry("model_type", modelMetrics.modelType, (t) => t),
    buildEntry("objective", objective, String),
    buildEntry("best_bound", bestBound, String),
    buildEntry("gap", gap, formatPercent),
  ];

  const notices: Notice[] = [];
  if (solvedByPresolve === true) {
    notices.push({ code: "solved_by_presolve", level: "info", message: SOLVED_BY_PRESOLVE_MESSAGE });
  }

  log.debug(
    {
      status: status.state === "known" ? status.value : null,
      unknownMetrics: metrics.filter((m) => m.value.state === "unknown").length,
      chart: chart !== null,
      duplicateKinds: registry.duplicateKinds(),
    },
    "overview.assembled"
  );

  return {
    metrics,
    parameters,
    chart,
    solvedByPresolve,
    notices,
    comments: [...(input.comments ?? [])],
  };
}
