import { promises as fs } from "node:fs";
import path from "node:path";
import { DateTime } from "luxon";
import Papa from "papaparse";
import { z } from "zod";
import { HttpError } from "../middleware/httpError";
import { type Dataset, PROJECT_DATA_COLUMNS, type ProjectRecord } from "../models/_types";

const MISSING_MARKERS = new Set(["", "na", "n/a", "nan", "null", "none"]);

export class DatasetLoadError extends HttpError {
  constructor(reason: string) {
    super(503, `Error loading data: ${reason}`, undefined, "DATASET_UNAVAILABLE");
    this.name = "DatasetLoadError";
  }
}

export type DatasetState = { ok: true; dataset: Dataset } | { ok: false; error: DatasetLoadError };

const textCell = z
  .string()
  .optional()
  .transform((value) => (value ?? "").trim());

const numberCell = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const trimmed = (value ?? "").trim();
    if (MISSING_MARKERS.has(trimmed.toLowerCase())) {
      return null;
    }
    const parsed = Number(trimmed);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, got "${trimmed}"` });
      return z.NEVER;
    }
    return parsed;
  });

const scaleCell = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = (value ?? "").trim();
    if (MISSING_MARKERS.has(trimmed.toLowerCase())) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : trimmed;
  });

const projectRowSchema = z
  .object({
    Project_ID: textCell.pipe(z.string().min(1, "must not be empty")),
    Task_Name: textCell,
    Estimated_Days: numberCell,
    Actual_Days: numberCell,
    Resource_Allocated: textCell,
    Efficiency: numberCell,
    Idle_Time: numberCell,
    Risk_Type: textCell,
    Likelihood: scaleCell,
    Impact_Level: scaleCell
  })
  .transform(
    (row): ProjectRecord => ({
      projectId: row.Project_ID,
      taskName: row.Task_Name,
      estimatedDays: row.Estimated_Days,
      actualDays: row.Actual_Days,
      resourceAllocated: row.Resource_Allocated,
      efficiency: row.Efficiency,
      idleTime: row.Idle_Time,
      riskType: row.Risk_Type,
      likelihood: row.Likelihood,
      impactLevel: row.Impact_Level
    })
  );

/**
 * Parses CSV text into a dataset. Rows keep file order and are frozen.
 * Row numbers in error messages count data rows from 1, header excluded.
 */
export function parseDataset(text: string, source: string): Dataset {
  const result = Papa.parse<Record<string, string | undefined>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim()
  });

  const fatal = result.errors.find(
    (error) => error.code !== "UndetectableDelimiter" && error.code !== "TooFewFields"
  );
  if (fatal) {
    const rowSegment = typeof fatal.row === "number" ? `row ${fatal.row + 1}: ` : "";
    throw new DatasetLoadError(`${rowSegment}${fatal.message}`);
  }

  const fields = result.meta.fields ?? [];
  const missing = PROJECT_DATA_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length) {
    throw new DatasetLoadError(`missing columns: ${missing.join(", ")}`);
  }

  const records = result.data.map((row, index) => {
    const parsed = projectRowSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DatasetLoadError(`row ${index + 1}: ${issue.path.join(".")} ${issue.message}`);
    }
    return Object.freeze(parsed.data);
  });

  return {
    source,
    loadedAt: DateTime.now().toISO() ?? "",
    records: Object.freeze(records)
  };
}

export async function loadDataset(filePath: string): Promise<Dataset> {
  const resolved = path.resolve(filePath);
  let text: string;
  try {
    text = await fs.readFile(resolved, "utf-8");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === "ENOENT") {
      throw new DatasetLoadError(`file not found: ${resolved}`);
    }
    throw new DatasetLoadError(`cannot read ${resolved}: ${err.message}`);
  }
  return parseDataset(text, resolved);
}

export async function loadDatasetSafely(filePath: string): Promise<DatasetState> {
  try {
    return { ok: true, dataset: await loadDataset(filePath) };
  } catch (error) {
    if (error instanceof DatasetLoadError) {
      return { ok: false, error };
    }
    throw error;
  }
}
