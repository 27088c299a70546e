import { Router } from "express";
import {
  listAnalysisKindsController,
  previewPromptController,
  runAnalysisController
} from "../controllers/analysis.controller";
import { requireDataset } from "../middleware/analytics";
import { createAnalysisRateLimiter } from "../middleware/rateLimit";
import { validateRequest } from "../middleware/validateRequest";
import { analysisRequestSchema } from "../utils/validation";

type AnalysisRoutesOptions = {
  rateLimitPerMinute: number;
};

export function createAnalysisRoutes({ rateLimitPerMinute }: AnalysisRoutesOptions) {
  const router = Router();
  const body = { body: analysisRequestSchema };

  router.get("/kinds", listAnalysisKindsController);
  router.post("/prompt", requireDataset, validateRequest(body), previewPromptController);
  router.post(
    "/",
    requireDataset,
    validateRequest(body),
    createAnalysisRateLimiter(rateLimitPerMinute),
    runAnalysisController
  );

  return router;
}
