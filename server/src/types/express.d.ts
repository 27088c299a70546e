import type { DatasetLoadError } from "../data/dataset";
import type { AnalysisService } from "../services/analysis.service";

declare global {
  namespace Express {
    interface Request {
      analytics?: AnalysisService;
      datasetError?: DatasetLoadError;
    }
  }
}

export {};
