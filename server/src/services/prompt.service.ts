import type { AnalysisKind, ProjectRecord } from "../models/_types";

type PromptValue = string | number | null;

type PromptRenderer = (records: readonly ProjectRecord[]) => string;

interface PromptTemplate {
  heading: string;
  fields: Array<[label: string, values: PromptValue[]]>;
  asks: string[];
}

const PROMPT_RENDERERS: Record<AnalysisKind, PromptRenderer> = {
  timeline: (records) =>
    renderTemplate({
      heading: "Analyze this project timeline data:",
      fields: [
        ["Tasks", records.map((record) => record.taskName)],
        ["Estimated Days", records.map((record) => record.estimatedDays)],
        ["Actual Days", records.map((record) => record.actualDays)]
      ],
      asks: [
        "Timeline prediction based on historical data",
        "Potential delays and bottlenecks",
        "Schedule optimization suggestions"
      ]
    }),
  resource: (records) =>
    renderTemplate({
      heading: "Analyze resource data:",
      fields: [
        ["Resources", records.map((record) => record.resourceAllocated)],
        ["Efficiency", records.map((record) => record.efficiency)],
        ["Idle Time", records.map((record) => record.idleTime)]
      ],
      asks: [
        "Resource utilization recommendations",
        "How to minimize idle time",
        "Efficiency improvement suggestions"
      ]
    }),
  risk: (records) =>
    renderTemplate({
      heading: "Analyze project risks:",
      fields: [
        ["Risk Types", records.map((record) => record.riskType)],
        ["Likelihood", records.map((record) => record.likelihood)],
        ["Impact", records.map((record) => record.impactLevel)]
      ],
      asks: ["Risk assessment summary", "Mitigation strategies", "Priority recommendations"]
    })
};

export function buildPrompt(records: readonly ProjectRecord[] | undefined, kind: AnalysisKind): string {
  return PROMPT_RENDERERS[kind](records ?? []);
}

function renderTemplate(template: PromptTemplate): string {
  return [
    template.heading,
    ...template.fields.map(([label, values]) => `${label}: ${JSON.stringify(values)}`),
    "",
    "Provide:",
    ...template.asks.map((ask, index) => `${index + 1}. ${ask}`)
  ].join("\n");
}
