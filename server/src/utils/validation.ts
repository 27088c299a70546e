import { z } from "zod";
import { ANALYSIS_KINDS } from "../models/_types";

export const projectIdSchema = z
  .string({ message: "projectId is required." })
  .trim()
  .min(1, "projectId is required.");

export const analysisKindSchema = z.enum(ANALYSIS_KINDS, {
  message: `kind must be one of: ${ANALYSIS_KINDS.join(", ")}.`
});

export const analysisRequestSchema = z.object({
  projectId: projectIdSchema,
  kind: analysisKindSchema
});
