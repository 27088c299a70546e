import { Router } from "express";
import { z } from "zod";
import {
  getProjectChartController,
  getProjectRecordsController,
  listProjectsController
} from "../controllers/projects.controller";
import { requireDataset } from "../middleware/analytics";
import { validateRequest } from "../middleware/validateRequest";
import { analysisKindSchema, projectIdSchema } from "../utils/validation";

const router = Router();
const projectParams = z.object({ projectId: projectIdSchema });
const chartParams = z.object({ projectId: projectIdSchema, kind: analysisKindSchema });

router.use(requireDataset);
router.get("/", listProjectsController);
router.get("/:projectId/records", validateRequest({ params: projectParams }), getProjectRecordsController);
router.get("/:projectId/charts/:kind", validateRequest({ params: chartParams }), getProjectChartController);

export default router;
