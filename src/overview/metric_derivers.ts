import type { Option } from "../blocks/block_registry";
import {
  RESPONSE_STATUSES,
  type InitialModelBlock,
  type PresolveSummaryBlock,
  type ResponseBlock,
  type ResponseStatus,
  type SearchProgressBlock,
  type SemanticVersion,
  type SolverBlock,
} from "../blocks/block_types";
import {
  known,
  unavailable,
  type ChartModel,
  type MetricValue,
  type ModelType,
  type ParametersSection,
  type VersionFreshness,
} from "../contracts/overview_report";
import { readDecimalField } from "./numeric";
import { MalformedFieldError, StructuralInputError } from "./overview_errors";
import { buildSearchProgressChart } from "./search_progress_chart";

/**
 * Metric derivers.
 *
 * Each function is total over present/absent inputs and never throws for a
 * missing block or a malformed numeric field. The only exception is the
 * response status, which anchors every other metric (see deriveStatus).
 */

// Releases before 9.10 miss several presolve and LNS performance fixes.
export const CURRENT_VERSION_FLOOR = { major: 9, minor: 10 } as const;

export function classifyVersion(version: SemanticVersion): Exclude<VersionFreshness, "unknown"> {
  const { major, minor } = version;
  if (
    major < CURRENT_VERSION_FLOOR.major ||
    (major === CURRENT_VERSION_FLOOR.major && minor < CURRENT_VERSION_FLOOR.minor)
  ) {
    return "outdated";
  }
  return "current";
}

export type VersionMetric = {
  value: MetricValue<string>;
  freshness: VersionFreshness;
};

export function deriveVersion(solver: Option<SolverBlock>): VersionMetric {
  if (!solver.present) {
    return { value: unavailable("missing_block"), freshness: "unknown" };
  }
  try {
    const parsed = solver.block.getParsedVersion();
    return { value: known(solver.block.getVersion()), freshness: classifyVersion(parsed) };
  } catch (err) {
    if (err instanceof MalformedFieldError) {
      return { value: unavailable("malformed_field"), freshness: "unknown" };
    }
    throw err;
  }
}

export function deriveWorkers(solver: Option<SolverBlock>): MetricValue<number> {
  if (!solver.present) return unavailable("missing_block");
  const workers = solver.block.getNumberOfWorkers();
  return workers === null ? unavailable("missing_field") : known(workers);
}

export function deriveParameters(solver: Option<SolverBlock>): ParametersSection {
  if (!solver.present) return { state: "none" };
  const values = solver.block.getParameters();
  return Object.keys(values).length > 0 ? { state: "present", values } : { state: "none" };
}

function isResponseStatus(value: string): value is ResponseStatus {
  return RESPONSE_STATUSES.some((status) => status === value);
}

/**
 * Throws StructuralInputError when a response block is present but its status
 * is missing or not one of the five solver statuses.
 */
export function deriveStatus(response: Option<ResponseBlock>): MetricValue<ResponseStatus> {
  if (!response.present) return unavailable("missing_block");

  const fields = response.block.toRecord();
  if (!Object.prototype.hasOwnProperty.call(fields, "status")) {
    throw new StructuralInputError({
      code: "missing_required_field",
      message: "Response block has no status field",
      blockKind: "response",
      field: "status",
    });
  }

  const raw = fields.status;
  const status = typeof raw === "string" ? raw.trim() : "";
  if (!isResponseStatus(status)) {
    throw new StructuralInputError({
      code: "invalid_required_field",
      message: `Response block has an unrecognized status: ${String(raw).substring(0, 50)}`,
      blockKind: "response",
      field: "status",
      received: String(raw),
    });
  }
  return known(status);
}

export function deriveWalltime(response: Option<ResponseBlock>): MetricValue<number> {
  if (!response.present) return unavailable("missing_block");
  return readDecimalField(response.block.toRecord(), "walltime");
}

export function derivePresolveTime(progress: Option<SearchProgressBlock>): MetricValue<number> {
  if (!progress.present) return unavailable("missing_block");
  const seconds = progress.block.getPresolveTime();
  return Number.isFinite(seconds) ? known(seconds) : unavailable("malformed_field");
}

export type ModelMetrics = {
  variables: MetricValue<number>;
  constraints: MetricValue<number>;
  modelType: MetricValue<ModelType>;
};

export function deriveModelMetrics(model: Option<InitialModelBlock>): ModelMetrics {
  if (!model.present) {
    return {
      variables: unavailable("missing_block"),
      constraints: unavailable("missing_block"),
      modelType: unavailable("missing_block"),
    };
  }
  return {
    variables: known(model.block.getNumVariables()),
    constraints: known(model.block.getNumConstraints()),
    modelType: known<ModelType>(model.block.isOptimization() ? "Optimization" : "Satisfaction"),
  };
}

export function deriveObjective(response: Option<ResponseBlock>): MetricValue<number> {
  if (!response.present) return unavailable("missing_block");
  return readDecimalField(response.block.toRecord(), "objective");
}

export function deriveBestBound(response: Option<ResponseBlock>): MetricValue<number> {
  if (!response.present) return unavailable("missing_block");
  return readDecimalField(response.block.toRecord(), "best_bound");
}

/** Uses the block's own gap; solver gap semantics differ from a naive |obj - bound|. */
export function deriveGap(response: Option<ResponseBlock>): MetricValue<number> {
  if (!response.present) return unavailable("missing_block");
  let gap: number | null;
  try {
    gap = response.block.getGap();
  } catch (err) {
    if (err instanceof MalformedFieldError) return unavailable("malformed_field");
    throw err;
  }
  if (gap === null || !Number.isFinite(gap)) return unavailable("not_computable");
  return known(gap);
}

const PLOTTABLE_STATUSES: ReadonlySet<ResponseStatus> = new Set<ResponseStatus>(["OPTIMAL", "FEASIBLE"]);

export function derivePlotEligibility(
  status: MetricValue<ResponseStatus>,
  progress: Option<SearchProgressBlock>,
  model: Option<InitialModelBlock>
): boolean {
  if (status.state !== "known" || !PLOTTABLE_STATUSES.has(status.value)) return false;
  if (!progress.present || !model.present) return false;
  // A satisfaction model has no objective/bound trajectory.
  if (!model.block.isOptimization()) return false;
  return progress.block.getProgressSeries().length > 0;
}

export function deriveSearchChart(
  status: MetricValue<ResponseStatus>,
  progress: Option<SearchProgressBlock>,
  model: Option<InitialModelBlock>
): ChartModel | null {
  if (!progress.present || !derivePlotEligibility(status, progress, model)) return null;
  return buildSearchProgressChart(progress.block.getProgressSeries());
}

export function deriveSolvedByPresolve(presolve: Option<PresolveSummaryBlock>): boolean | null {
  return presolve.present ? presolve.block.isSolvedByPresolve() : null;
}
