import { DateTime } from "luxon";
import { HttpError } from "../middleware/httpError";
import type {
  AnalysisKind,
  AnalysisRequest,
  AnalysisResult,
  ChartPayload,
  Dataset,
  ProjectRecord,
  ProjectSummary
} from "../models/_types";
import { ANALYSIS_KIND_CATALOG } from "./analysisCatalog";
import { buildChart } from "./chart.service";
import type { TextGenerator } from "./llmProviders";
import { filterByProject, summarizeProjects } from "./project.service";
import { buildPrompt } from "./prompt.service";

export class AnalysisService {
  constructor(
    private readonly dataset: Dataset,
    private readonly generator: TextGenerator
  ) {}

  get recordCount(): number {
    return this.dataset.records.length;
  }

  listProjects(): ProjectSummary[] {
    return summarizeProjects(this.dataset.records);
  }

  /** Only projects present in the dataset can be selected. */
  getProjectRecords(projectId: string): ProjectRecord[] {
    const records = filterByProject(this.dataset.records, projectId);
    if (!records.length) {
      throw new HttpError(404, `Project ${projectId} not found.`);
    }
    return records;
  }

  getChart(projectId: string, kind: AnalysisKind): ChartPayload {
    return buildChart(this.getProjectRecords(projectId), kind);
  }

  previewPrompt(request: AnalysisRequest): string {
    return buildPrompt(this.getProjectRecords(request.projectId), request.kind);
  }

  async runAnalysis(request: AnalysisRequest): Promise<AnalysisResult> {
    const records = this.getProjectRecords(request.projectId);
    const definition = ANALYSIS_KIND_CATALOG[request.kind];
    const chart = buildChart(records, request.kind);
    const text = await this.generator.generate(buildPrompt(records, request.kind));
    return {
      request,
      label: definition.label,
      recordCount: records.length,
      chart,
      insights: { heading: definition.insightsHeading, text },
      provider: this.generator.provider,
      generatedAt: DateTime.now().toISO() ?? ""
    };
  }
}
