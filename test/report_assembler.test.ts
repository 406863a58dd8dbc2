import { describe, it, expect, vi } from "vitest";
import type { LogBlock, SolverBlock } from "../src/blocks/block_types";
import type { MetricEntry, OverviewReport } from "../src/contracts/overview_report";
import { assembleOverview } from "../src/overview/report_assembler";
import { DuplicateBlockError, StructuralInputError } from "../src/overview/overview_errors";
import {
  fullRun,
  modelBlock,
  presolveBlock,
  progressBlock,
  responseBlock,
  solverBlock,
} from "./fixtures/log_blocks";

const metric = (report: OverviewReport, key: MetricEntry["key"]): MetricEntry => {
  const entry = report.metrics.find((m) => m.key === key);
  if (!entry) throw new Error(`metric ${key} missing`);
  return entry;
};

describe("assembleOverview", () => {
  it("reports every metric as unknown for an empty log", () => {
    const report = assembleOverview({ blocks: [] });

    expect(report.metrics.map((m) => m.key)).toEqual([
      "version",
      "workers",
      "status",
      "walltime",
      "presolve_time",
      "variables",
      "constraints",
      "model_type",
      "objective",
      "best_bound",
      "gap",
    ]);
    for (const entry of report.metrics) {
      expect(entry.value).toEqual({ state: "unknown", reason: "missing_block" });
      expect(entry.display).toBe("N/A");
      expect(entry.help.length).toBeGreaterThan(0);
    }
    expect(metric(report, "version").freshness).toBe("unknown");
    expect(report.parameters).toEqual({ state: "none" });
    expect(report.chart).toBeNull();
    expect(report.solvedByPresolve).toBeNull();
    expect(report.notices).toEqual([]);
    expect(report.comments).toEqual([]);
  });

  it("renders display strings for a complete optimal run", () => {
    const report = assembleOverview({ blocks: fullRun(), comments: ["tsp instance, 30s limit"] });

    expect(report.metrics.map((m) => [m.label, m.display])).toEqual([
      ["CP-SAT Version", "v9.10.4"],
      ["Number of workers", "8"],
      ["Status", "OPTIMAL"],
      ["Time", "1.500s"],
      ["Presolve", "0.250s"],
      ["Variables", "120"],
      ["Constraints", "45"],
      ["Type", "Optimization"],
      ["Objective", "10"],
      ["Best bound", "10"],
      ["Gap", "0.00%"],
    ]);
    expect(metric(report, "version").freshness).toBe("current");
    expect(report.parameters).toEqual({
      state: "present",
      values: { max_time_in_seconds: 30, log_search_progress: true },
    });
    expect(report.chart?.series.map((s) => s.points.length)).toEqual([2, 2]);
    expect(report.solvedByPresolve).toBe(false);
    expect(report.comments).toEqual(["tsp instance, 30s limit"]);
  });

  it("flags an outdated solver", () => {
    const report = assembleOverview({ blocks: [solverBlock({ version: "v9.9.0" })] });
    expect(metric(report, "version").freshness).toBe("outdated");
    expect(metric(report, "version").display).toBe("v9.9.0");
  });

  it("shows an unparseable objective as unavailable and keeps the rest", () => {
    const report = assembleOverview({
      blocks: [
        responseBlock({ fields: { status: "UNKNOWN", objective: "inf", best_bound: "-inf", walltime: "30.01" } }),
      ],
    });

    expect(metric(report, "objective").value).toEqual({ state: "unknown", reason: "malformed_field" });
    expect(metric(report, "objective").display).toBe("N/A");
    expect(metric(report, "gap").value).toEqual({ state: "unknown", reason: "not_computable" });
    expect(metric(report, "status").display).toBe("UNKNOWN");
    expect(metric(report, "walltime").display).toBe("30.010s");
  });

  it("omits the chart for a satisfaction model", () => {
    const report = assembleOverview({
      blocks: [modelBlock({ isOptimization: false }), progressBlock(), responseBlock()],
    });
    expect(report.chart).toBeNull();
    expect(metric(report, "model_type").display).toBe("Satisfaction");
  });

  it("omits the chart when the search logged no progress", () => {
    const report = assembleOverview({
      blocks: [modelBlock(), progressBlock({ events: [] }), responseBlock()],
    });
    expect(report.chart).toBeNull();
  });

  it("adds a notice when presolve solved the model", () => {
    const report = assembleOverview({ blocks: [presolveBlock({ solvedByPresolve: true })] });
    expect(report.solvedByPresolve).toBe(true);
    expect(report.notices).toEqual([
      { code: "solved_by_presolve", level: "info", message: "The model was solved by presolve." },
    ]);
  });

  it("aborts with a structural error when the response has no status", () => {
    const blocks = [solverBlock(), responseBlock({ fields: { objective: "10", best_bound: "10" } })];
    expect(() => assembleOverview({ blocks })).toThrow(StructuralInputError);
  });

  it("isolates a failing block accessor to its own metric", () => {
    const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
    const broken: SolverBlock = {
      kind: "solver",
      getVersion: () => "9.10.0",
      getParsedVersion: () => ({ major: 9, minor: 10, patch: 0 }),
      getNumberOfWorkers: () => {
        throw new TypeError("worker line truncated");
      },
      getParameters: () => ({}),
    };

    const report = assembleOverview({ blocks: [broken, responseBlock()] }, { log });

    expect(metric(report, "workers").value).toEqual({ state: "unknown", reason: "derivation_failed" });
    expect(metric(report, "version").display).toBe("9.10.0");
    expect(metric(report, "status").display).toBe("OPTIMAL");
    expect(log.warn).toHaveBeenCalledWith(
      { metric: "workers", error: "worker line truncated" },
      "overview.metric_failed"
    );
  });

  it("applies the duplicate policy", () => {
    const blocks: LogBlock[] = [responseBlock(), responseBlock({ fields: { status: "FEASIBLE" } })];

    expect(metric(assembleOverview({ blocks }), "status").display).toBe("OPTIMAL");
    expect(metric(assembleOverview({ blocks }, { duplicatePolicy: "last" }), "status").display).toBe("FEASIBLE");
    expect(() => assembleOverview({ blocks }, { duplicatePolicy: "error" })).toThrow(DuplicateBlockError);
  });

  it("is idempotent for the same block collection", () => {
    const blocks = fullRun();
    const comments = ["same input twice"];
    expect(assembleOverview({ blocks, comments })).toEqual(assembleOverview({ blocks, comments }));
  });
});
