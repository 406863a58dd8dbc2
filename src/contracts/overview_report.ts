export type UnavailableReason =
  | "missing_block"
  | "missing_field"
  | "malformed_field"
  | "not_computable"
  | "derivation_failed";

export type MetricValue<T> =
  | { state: "known"; value: T }
  | { state: "unknown"; reason: UnavailableReason };

export const known = <T>(value: T): MetricValue<T> => ({ state: "known", value });

export const unavailable = <T = never>(reason: UnavailableReason): MetricValue<T> => ({
  state: "unknown",
  reason,
});

export const NOT_AVAILABLE = "N/A";

export type MetricKey =
  | "version"
  | "workers"
  | "status"
  | "walltime"
  | "presolve_time"
  | "variables"
  | "constraints"
  | "model_type"
  | "objective"
  | "best_bound"
  | "gap";

export type VersionFreshness = "current" | "outdated" | "unknown";

export type ModelType = "Optimization" | "Satisfaction";

export type MetricEntry = {
  key: MetricKey;
  label: string;
  value: MetricValue<string | number>;
  // Display string; "N/A" whenever value is unknown.
  display: string;
  help: string;
  // Only set on the version metric.
  freshness?: VersionFreshness;
};

export type ParametersSection =
  | { state: "present"; values: Readonly<Record<string, unknown>> }
  | { state: "none" };

export type ChartPoint = { x: number; y: number };

export type ChartSeries = {
  name: "Objective" | "Bound";
  points: ChartPoint[];
};

export type ChartModel = {
  id: "search_progress";
  title: string;
  xAxis: { label: string };
  yAxis: { label: string };
  series: ChartSeries[];
};

export type NoticeCode = "solved_by_presolve";

export type Notice = {
  code: NoticeCode;
  level: "info";
  message: string;
};

export type OverviewReport = {
  metrics: MetricEntry[];
  parameters: ParametersSection;
  chart: ChartModel | null;
  // null when no presolve summary block was found.
  solvedByPresolve: boolean | null;
  notices: Notice[];
  comments: string[];
};
