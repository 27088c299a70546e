import type { NextFunction, Request, Response } from "express";
import { analyticsFor } from "../middleware/analytics";
import { analysisRequestSchema } from "../utils/validation";

export async function listProjectsController(req: Request, res: Response, next: NextFunction) {
  try {
    const projects = analyticsFor(req).listProjects();
    res.json({ projects });
  } catch (error) {
    next(error);
  }
}

export async function getProjectRecordsController(req: Request, res: Response, next: NextFunction) {
  try {
    const { projectId } = req.params;
    const records = analyticsFor(req).getProjectRecords(projectId);
    res.json({ projectId, records });
  } catch (error) {
    next(error);
  }
}

export async function getProjectChartController(req: Request, res: Response, next: NextFunction) {
  try {
    const { projectId, kind } = analysisRequestSchema.parse(req.params);
    const chart = analyticsFor(req).getChart(projectId, kind);
    res.json({ chart });
  } catch (error) {
    next(error);
  }
}
