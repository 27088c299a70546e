import { parseDataset } from "../src/data/dataset";
import { buildChart } from "../src/services/chart.service";

const { records } = parseDataset(
  [
    "Project_ID,Task_Name,Estimated_Days,Actual_Days,Resource_Allocated,Efficiency,Idle_Time,Risk_Type,Likelihood,Impact_Level",
    "P1,Design,5,6,Alice,0.8,2,Scope,Medium,High",
    "P1,Build,10,,Bob,0.7,4,Technical,High,High",
    "P1,Deploy,2,3,Alice,,1,Scope,Low,Medium"
  ].join("\n"),
  "inline"
);

describe("chart builder", () => {
  it("groups estimated and actual days per task for the timeline", () => {
    expect(buildChart(records, "timeline")).toEqual({
      id: "task_duration_analysis",
      title: "Task Duration Analysis",
      type: "bar",
      categories: ["Design", "Build", "Deploy"],
      series: [
        { label: "Estimated_Days", values: [5, 10, 2] },
        { label: "Actual_Days", values: [6, null, 3] }
      ],
      meta: { xField: "Task_Name", barMode: "group" }
    });
  });

  it("plots efficiency against idle time per resource, skipping incomplete points", () => {
    expect(buildChart(records, "resource")).toEqual({
      id: "resource_utilization",
      title: "Resource Utilization Analysis",
      type: "scatter",
      series: [
        { label: "Alice", points: [{ x: 0.8, y: 2, label: "Design" }] },
        { label: "Bob", points: [{ x: 0.7, y: 4, label: "Build" }] }
      ],
      meta: { xField: "Efficiency", yField: "Idle_Time", colorField: "Resource_Allocated" }
    });
  });

  it("plots likelihood against impact per risk type", () => {
    const chart = buildChart(records, "risk");
    expect(chart.title).toBe("Risk Matrix");
    expect(chart.series).toEqual([
      {
        label: "Scope",
        points: [
          { x: "Medium", y: "High", label: "Design" },
          { x: "Low", y: "Medium", label: "Deploy" }
        ]
      },
      { label: "Technical", points: [{ x: "High", y: "High", label: "Build" }] }
    ]);
  });

  it("returns empty charts for an empty selection", () => {
    expect(buildChart([], "timeline").categories).toEqual([]);
    expect(buildChart([], "risk").series).toEqual([]);
  });
});
