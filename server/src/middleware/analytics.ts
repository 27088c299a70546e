import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { DatasetState } from "../data/dataset";
import { AnalysisService } from "../services/analysis.service";
import type { TextGenerator } from "../services/llmProviders";
import { HttpError } from "./httpError";

export function attachAnalytics(state: DatasetState, generator: TextGenerator): RequestHandler {
  const analytics = state.ok ? new AnalysisService(state.dataset, generator) : undefined;
  return (req, _res, next) => {
    req.analytics = analytics;
    req.datasetError = state.ok ? undefined : state.error;
    next();
  };
}

/** Blocks data routes while the dataset is unavailable, answering with the load error. */
export function requireDataset(req: Request, _res: Response, next: NextFunction) {
  if (req.analytics) {
    return next();
  }
  return next(req.datasetError ?? new HttpError(503, "Dataset not loaded."));
}

export function analyticsFor(req: Request): AnalysisService {
  if (!req.analytics) {
    throw new HttpError(503, "Dataset not loaded.");
  }
  return req.analytics;
}
