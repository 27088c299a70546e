import path from "node:path";
import { z } from "zod";
import type { AnalysisConfig, AppConfig } from "../models/_types";

export const DEFAULT_GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

const envSchema = z
  .object({
    SERVER_PORT: z.coerce.number().int().min(0).max(65535).default(4000),
    CLIENT_ORIGIN: z.string().trim().min(1).default("http://localhost:3000"),
    PROJECT_DATA_FILE: z.string().trim().min(1).default("project_data.csv"),
    ANALYSIS_PROVIDER: z.enum(["gemini", "local"]).default("gemini"),
    GOOGLE_API_KEY: z.string().trim().optional(),
    GEMINI_MODEL: z.string().trim().min(1).default("gemini-pro"),
    GEMINI_BASE_URL: z.string().trim().url().default(DEFAULT_GEMINI_BASE_URL),
    LOCAL_LLM_URL: z.string().trim().url().optional(),
    LOCAL_LLM_MODEL: z.string().trim().min(1).default("local-model"),
    ANALYSIS_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
    ANALYSIS_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(30)
  })
  .superRefine((env, ctx) => {
    if (env.ANALYSIS_PROVIDER === "gemini" && !env.GOOGLE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GOOGLE_API_KEY"],
        message: 'is required when ANALYSIS_PROVIDER is "gemini"'
      });
    }
    if (env.ANALYSIS_PROVIDER === "local" && !env.LOCAL_LLM_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["LOCAL_LLM_URL"],
        message: 'is required when ANALYSIS_PROVIDER is "local"'
      });
    }
  });

type ParsedEnv = z.infer<typeof envSchema>;

/**
 * Builds the runtime configuration from environment variables.
 * The result is frozen. Blank variables count as unset. Relative data file paths resolve against `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`)
    );
  }
  const values = parsed.data;
  return Object.freeze({
    port: values.SERVER_PORT,
    clientOrigin: values.CLIENT_ORIGIN,
    dataFile: path.resolve(cwd, values.PROJECT_DATA_FILE),
    rateLimitPerMinute: values.ANALYSIS_RATE_LIMIT_PER_MINUTE,
    analysis: Object.freeze(toAnalysisConfig(values))
  });
}

function toAnalysisConfig(values: ParsedEnv): AnalysisConfig {
  if (values.ANALYSIS_PROVIDER === "local") {
    return {
      provider: "local",
      url: (values.LOCAL_LLM_URL ?? "").replace(/\/+$/, ""),
      model: values.LOCAL_LLM_MODEL,
      timeoutMs: values.ANALYSIS_TIMEOUT_MS
    };
  }
  return {
    provider: "gemini",
    apiKey: values.GOOGLE_API_KEY ?? "",
    model: values.GEMINI_MODEL,
    baseUrl: values.GEMINI_BASE_URL.replace(/\/+$/, ""),
    timeoutMs: values.ANALYSIS_TIMEOUT_MS
  };
}
