export const PROJECT_DATA_COLUMNS = [
  "Project_ID",
  "Task_Name",
  "Estimated_Days",
  "Actual_Days",
  "Resource_Allocated",
  "Efficiency",
  "Idle_Time",
  "Risk_Type",
  "Likelihood",
  "Impact_Level"
] as const;

export type ProjectDataColumn = (typeof PROJECT_DATA_COLUMNS)[number];

/** Likelihood and impact are free-form in the source data: either a score or a level such as "High". */
export type RiskScale = number | string | null;

export interface ProjectRecord {
  projectId: string;
  taskName: string;
  estimatedDays: number | null;
  actualDays: number | null;
  resourceAllocated: string;
  efficiency: number | null;
  idleTime: number | null;
  riskType: string;
  likelihood: RiskScale;
  impactLevel: RiskScale;
}

export interface Dataset {
  source: string;
  loadedAt: string;
  records: readonly ProjectRecord[];
}

export interface ProjectSummary {
  projectId: string;
  recordCount: number;
}

export const ANALYSIS_KINDS = ["timeline", "resource", "risk"] as const;

export type AnalysisKind = (typeof ANALYSIS_KINDS)[number];

export interface AnalysisKindDefinition {
  kind: AnalysisKind;
  label: string;
  action: string;
  insightsHeading: string;
  chartTitle: string;
}

export interface AnalysisRequest {
  projectId: string;
  kind: AnalysisKind;
}

export type ChartType = "bar" | "scatter";

export type ChartCoordinate = number | string;

export interface ChartPoint {
  x: ChartCoordinate;
  y: ChartCoordinate;
  label: string;
}

export interface ChartSeries {
  label: string;
  values?: Array<number | null>;
  points?: ChartPoint[];
}

export interface ChartPayload {
  id: string;
  title: string;
  type: ChartType;
  categories?: string[];
  series: ChartSeries[];
  meta?: Record<string, unknown>;
}

export type AnalysisProvider = "gemini" | "local";

export interface AnalysisResult {
  request: AnalysisRequest;
  label: string;
  recordCount: number;
  chart: ChartPayload;
  insights: {
    heading: string;
    text: string;
  };
  provider: AnalysisProvider;
  generatedAt: string;
}

export interface GeminiConfig {
  provider: "gemini";
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface LocalLlmConfig {
  provider: "local";
  url: string;
  model: string;
  timeoutMs: number;
}

export type AnalysisConfig = GeminiConfig | LocalLlmConfig;

export interface AppConfig {
  port: number;
  clientOrigin: string;
  dataFile: string;
  rateLimitPerMinute: number;
  analysis: AnalysisConfig;
}
