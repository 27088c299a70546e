import type {
  AnalysisKind,
  ChartCoordinate,
  ChartPayload,
  ChartPoint,
  ProjectDataColumn,
  ProjectRecord
} from "../models/_types";
import { ANALYSIS_KIND_CATALOG } from "./analysisCatalog";

type ChartBuilder = (records: readonly ProjectRecord[]) => ChartPayload;

type ScatterOptions = {
  id: string;
  kind: AnalysisKind;
  x: [ProjectDataColumn, (record: ProjectRecord) => ChartCoordinate | null];
  y: [ProjectDataColumn, (record: ProjectRecord) => ChartCoordinate | null];
  color: [ProjectDataColumn, (record: ProjectRecord) => string];
};

const CHART_BUILDERS: Record<AnalysisKind, ChartBuilder> = {
  timeline: buildTaskDurationChart,
  resource: (records) =>
    buildScatterChart(records, {
      id: "resource_utilization",
      kind: "resource",
      x: ["Efficiency", (record) => record.efficiency],
      y: ["Idle_Time", (record) => record.idleTime],
      color: ["Resource_Allocated", (record) => record.resourceAllocated]
    }),
  risk: (records) =>
    buildScatterChart(records, {
      id: "risk_matrix",
      kind: "risk",
      x: ["Likelihood", (record) => record.likelihood],
      y: ["Impact_Level", (record) => record.impactLevel],
      color: ["Risk_Type", (record) => record.riskType]
    })
};

export function buildChart(records: readonly ProjectRecord[], kind: AnalysisKind): ChartPayload {
  return CHART_BUILDERS[kind](records);
}

function buildTaskDurationChart(records: readonly ProjectRecord[]): ChartPayload {
  return {
    id: "task_duration_analysis",
    title: ANALYSIS_KIND_CATALOG.timeline.chartTitle,
    type: "bar",
    categories: records.map((record) => record.taskName),
    series: [
      { label: "Estimated_Days", values: records.map((record) => record.estimatedDays) },
      { label: "Actual_Days", values: records.map((record) => record.actualDays) }
    ],
    meta: { xField: "Task_Name", barMode: "group" }
  };
}

// Points missing either coordinate are left out, and series follow the first-seen order of their colour key.
function buildScatterChart(records: readonly ProjectRecord[], options: ScatterOptions): ChartPayload {
  const [xField, readX] = options.x;
  const [yField, readY] = options.y;
  const [colorField, readColor] = options.color;
  const groups = new Map<string, ChartPoint[]>();
  for (const record of records) {
    const x = readX(record);
    const y = readY(record);
    if (x === null || y === null) {
      continue;
    }
    const key = readColor(record);
    const points = groups.get(key) ?? [];
    points.push({ x, y, label: record.taskName });
    groups.set(key, points);
  }
  return {
    id: options.id,
    title: ANALYSIS_KIND_CATALOG[options.kind].chartTitle,
    type: "scatter",
    series: Array.from(groups, ([label, points]) => ({ label, points })),
    meta: { xField, yField, colorField }
  };
}
