import { ANALYSIS_KINDS, type AnalysisKind, type AnalysisKindDefinition } from "../models/_types";

export const ANALYSIS_KIND_CATALOG: Record<AnalysisKind, AnalysisKindDefinition> = {
  timeline: {
    kind: "timeline",
    label: "Predictive Scheduling",
    action: "Analyze Timeline",
    insightsHeading: "AI Insights",
    chartTitle: "Task Duration Analysis"
  },
  resource: {
    kind: "resource",
    label: "Resource Optimization",
    action: "Optimize Resources",
    insightsHeading: "Optimization Recommendations",
    chartTitle: "Resource Utilization Analysis"
  },
  risk: {
    kind: "risk",
    label: "Risk Assessment",
    action: "Assess Risks",
    insightsHeading: "Risk Assessment",
    chartTitle: "Risk Matrix"
  }
};

export function listAnalysisKinds(): AnalysisKindDefinition[] {
  return ANALYSIS_KINDS.map((kind) => ANALYSIS_KIND_CATALOG[kind]);
}
