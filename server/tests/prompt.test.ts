import { parseDataset } from "../src/data/dataset";
import { filterByProject } from "../src/services/project.service";
import { buildPrompt } from "../src/services/prompt.service";

const { records } = parseDataset(
  [
    "Project_ID,Task_Name,Estimated_Days,Actual_Days,Resource_Allocated,Efficiency,Idle_Time,Risk_Type,Likelihood,Impact_Level",
    "P1,Design,5,6,Alice,0.8,2,Scope,Medium,High",
    "P2,Setup,3,3,Bob,0.9,1,Budget,Low,Low",
    "P1,Build,10,12,Bob,0.7,4,Technical,High,High",
    "P3,Review,,2,\"Carol, Dan\",0.6,,Quality,0.25,3"
  ].join("\n"),
  "inline"
);
const project = filterByProject(records, "P1");

describe("prompt builder", () => {
  it("renders the timeline template with task durations", () => {
    expect(buildPrompt(project, "timeline")).toBe(
      [
        "Analyze this project timeline data:",
        'Tasks: ["Design","Build"]',
        "Estimated Days: [5,10]",
        "Actual Days: [6,12]",
        "",
        "Provide:",
        "1. Timeline prediction based on historical data",
        "2. Potential delays and bottlenecks",
        "3. Schedule optimization suggestions"
      ].join("\n")
    );
  });

  it("renders the resource template with utilisation metrics", () => {
    expect(buildPrompt(project, "resource")).toBe(
      [
        "Analyze resource data:",
        'Resources: ["Alice","Bob"]',
        "Efficiency: [0.8,0.7]",
        "Idle Time: [2,4]",
        "",
        "Provide:",
        "1. Resource utilization recommendations",
        "2. How to minimize idle time",
        "3. Efficiency improvement suggestions"
      ].join("\n")
    );
  });

  it("renders the risk template with risk descriptors", () => {
    expect(buildPrompt(project, "risk")).toBe(
      [
        "Analyze project risks:",
        'Risk Types: ["Scope","Technical"]',
        'Likelihood: ["Medium","High"]',
        'Impact: ["High","High"]',
        "",
        "Provide:",
        "1. Risk assessment summary",
        "2. Mitigation strategies",
        "3. Priority recommendations"
      ].join("\n")
    );
  });

  it("keeps empty cells, quoted commas and numeric scales as literal values", () => {
    const review = filterByProject(records, "P3");
    const lines = buildPrompt(review, "resource").split("\n");
    expect(lines.slice(1, 4)).toEqual(['Resources: ["Carol, Dan"]', "Efficiency: [0.6]", "Idle Time: [null]"]);
    expect(buildPrompt(review, "risk").split("\n")[2]).toBe("Likelihood: [0.25]");
  });

  it("renders empty lists for an empty or missing selection", () => {
    const empty = buildPrompt([], "timeline").split("\n");
    expect(empty.slice(1, 4)).toEqual(["Tasks: []", "Estimated Days: []", "Actual Days: []"]);
    expect(buildPrompt(undefined, "risk")).toBe(buildPrompt([], "risk"));
  });

  it("is deterministic for the same selection", () => {
    expect(buildPrompt(project, "timeline")).toBe(buildPrompt([...project], "timeline"));
  });
});
