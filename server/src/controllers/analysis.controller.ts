import type { NextFunction, Request, Response } from "express";
import { analyticsFor } from "../middleware/analytics";
import type { AnalysisRequest } from "../models/_types";
import { listAnalysisKinds } from "../services/analysisCatalog";

export function listAnalysisKindsController(_req: Request, res: Response) {
  res.json({ kinds: listAnalysisKinds() });
}

// Both handlers sit behind validateRequest({ body: analysisRequestSchema }).
export async function previewPromptController(req: Request, res: Response, next: NextFunction) {
  try {
    const request: AnalysisRequest = req.body;
    const prompt = analyticsFor(req).previewPrompt(request);
    res.json({ request, prompt });
  } catch (error) {
    next(error);
  }
}

export async function runAnalysisController(req: Request, res: Response, next: NextFunction) {
  try {
    const request: AnalysisRequest = req.body;
    const result = await analyticsFor(req).runAnalysis(request);
    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
}
