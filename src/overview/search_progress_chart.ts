import type { ProgressPoint } from "../blocks/block_types";
import type { ChartModel, ChartPoint } from "../contracts/overview_report";

function pointsFor(series: readonly ProgressPoint[], pick: (point: ProgressPoint) => number | null): ChartPoint[] {
  const points: ChartPoint[] = [];
  for (const point of series) {
    const y = pick(point);
    if (y !== null && Number.isFinite(y)) {
      points.push({ x: point.time, y });
    }
  }
  return points;
}

/**
 * Objective and bound over wall time. Callers must not pass an empty series.
 */
export function buildSearchProgressChart(series: readonly ProgressPoint[]): ChartModel {
  return {
    id: "search_progress",
    title: "Search progress",
    xAxis: { label: "Time (s)" },
    yAxis: { label: "Objective" },
    series: [
      { name: "Objective", points: pointsFor(series, (p) => p.objective) },
      { name: "Bound", points: pointsFor(series, (p) => p.bound) },
    ],
  };
}
