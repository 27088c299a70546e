import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { z } from "zod";
import { HttpError } from "../middleware/httpError";
import type {
  AnalysisConfig,
  AnalysisProvider,
  GeminiConfig,
  LocalLlmConfig
} from "../models/_types";

export interface TextGenerator {
  readonly provider: AnalysisProvider;
  generate(prompt: string): Promise<string>;
}

export type LlmClientOptions = {
  /** Replaces axios' transport; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
};

const PROVIDER_NAMES: Record<AnalysisProvider, string> = {
  gemini: "Gemini",
  local: "Local LLM"
};

export class AnalysisServiceError extends HttpError {
  constructor(provider: AnalysisProvider, message: string, upstreamStatus?: number) {
    super(502, `${PROVIDER_NAMES[provider]} Error: ${message}`, { provider, upstreamStatus }, "ANALYSIS_SERVICE_ERROR");
    this.name = "AnalysisServiceError";
  }
}

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional()
          })
          .optional(),
        finishReason: z.string().optional()
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional()
});

const chatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }).optional()
    })
  )
});

const upstreamErrorSchema = z.object({
  error: z.union([z.object({ message: z.string() }), z.string()])
});

export class GeminiClient implements TextGenerator {
  readonly provider = "gemini" as const;
  private readonly http: AxiosInstance;

  constructor(private readonly config: GeminiConfig, options: LlmClientOptions = {}) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      adapter: options.adapter,
      headers: { "Content-Type": "application/json" }
    });
  }

  async generate(prompt: string): Promise<string> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(
        `/models/${encodeURIComponent(this.config.model)}:generateContent`,
        { contents: [{ role: "user", parts: [{ text: prompt }] }] },
        { params: { key: this.config.apiKey } }
      );
      data = response.data;
    } catch (error) {
      throw toServiceError(this.provider, error);
    }

    const parsed = geminiResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AnalysisServiceError(this.provider, "unexpected response format.");
    }
    const candidate = parsed.data.candidates?.[0];
    const text = (candidate?.content?.parts ?? []).map((part) => part.text ?? "").join("");
    if (!text) {
      const reason = parsed.data.promptFeedback?.blockReason ?? candidate?.finishReason ?? "EMPTY_RESPONSE";
      throw new AnalysisServiceError(this.provider, `no text returned (${reason}).`);
    }
    return text;
  }
}

/** OpenAI-compatible chat endpoint such as Ollama, LM Studio or LocalAI. */
export class LocalLlmClient implements TextGenerator {
  readonly provider = "local" as const;
  private readonly http: AxiosInstance;

  constructor(private readonly config: LocalLlmConfig, options: LlmClientOptions = {}) {
    this.http = axios.create({
      baseURL: config.url,
      timeout: config.timeoutMs,
      adapter: options.adapter,
      headers: { "Content-Type": "application/json" }
    });
  }

  async generate(prompt: string): Promise<string> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>("/chat/completions", {
        model: this.config.model,
        messages: [{ role: "user", content: prompt }],
        temperature: 0.7
      });
      data = response.data;
    } catch (error) {
      throw toServiceError(this.provider, error);
    }

    const parsed = chatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new AnalysisServiceError(this.provider, "unexpected response format.");
    }
    const text = parsed.data.choices[0]?.message?.content ?? "";
    if (!text) {
      throw new AnalysisServiceError(this.provider, "no text returned (EMPTY_RESPONSE).");
    }
    return text;
  }
}

export function createTextGenerator(config: AnalysisConfig, options: LlmClientOptions = {}): TextGenerator {
  switch (config.provider) {
    case "gemini":
      return new GeminiClient(config, options);
    case "local":
      return new LocalLlmClient(config, options);
  }
}

function toServiceError(provider: AnalysisProvider, error: unknown): AnalysisServiceError {
  if (axios.isAxiosError(error)) {
    console.error(`${PROVIDER_NAMES[provider]} API Error:`, error.response?.data ?? error.message);
    const upstream = upstreamErrorSchema.safeParse(error.response?.data);
    const message = upstream.success
      ? typeof upstream.data.error === "string"
        ? upstream.data.error
        : upstream.data.error.message
      : error.message;
    return new AnalysisServiceError(provider, message, error.response?.status);
  }
  return new AnalysisServiceError(provider, error instanceof Error ? error.message : String(error));
}
