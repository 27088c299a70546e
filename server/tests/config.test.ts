import path from "node:path";
import { ConfigError, DEFAULT_GEMINI_BASE_URL, loadConfig } from "../src/utils/config";

describe("configuration", () => {
  it("applies defaults around the Gemini credential", () => {
    const config = loadConfig({ GOOGLE_API_KEY: "test-secret" }, "/srv/analytics");

    expect(config).toEqual({
      port: 4000,
      clientOrigin: "http://localhost:3000",
      dataFile: path.resolve("/srv/analytics", "project_data.csv"),
      rateLimitPerMinute: 30,
      analysis: {
        provider: "gemini",
        apiKey: "test-secret",
        model: "gemini-pro",
        baseUrl: DEFAULT_GEMINI_BASE_URL,
        timeoutMs: 0
      }
    });
  });

  it("returns a frozen config, credential included", () => {
    const config = loadConfig({ GOOGLE_API_KEY: "test-secret" });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.analysis)).toBe(true);
  });

  it("reads overrides and coerces numbers", () => {
    const config = loadConfig(
      {
        GOOGLE_API_KEY: "test-secret",
        SERVER_PORT: "8080",
        PROJECT_DATA_FILE: "data/tasks.csv",
        GEMINI_MODEL: "gemini-1.5-flash",
        GEMINI_BASE_URL: "http://gemini.example.test/v1/",
        ANALYSIS_TIMEOUT_MS: "15000",
        ANALYSIS_RATE_LIMIT_PER_MINUTE: "5"
      },
      "/srv/analytics"
    );

    expect(config.port).toBe(8080);
    expect(config.dataFile).toBe(path.resolve("/srv/analytics", "data/tasks.csv"));
    expect(config.rateLimitPerMinute).toBe(5);
    expect(config.analysis).toEqual({
      provider: "gemini",
      apiKey: "test-secret",
      model: "gemini-1.5-flash",
      baseUrl: "http://gemini.example.test/v1",
      timeoutMs: 15000
    });
  });

  it("builds a local provider config", () => {
    const config = loadConfig({ ANALYSIS_PROVIDER: "local", LOCAL_LLM_URL: "http://localhost:11434/v1" });

    expect(config.analysis).toEqual({
      provider: "local",
      url: "http://localhost:11434/v1",
      model: "local-model",
      timeoutMs: 0
    });
  });

  it("requires the credential of the selected provider", () => {
    expect(() => loadConfig({ GOOGLE_API_KEY: "   " })).toThrow(
      'Invalid configuration: GOOGLE_API_KEY is required when ANALYSIS_PROVIDER is "gemini"'
    );
    expect(() => loadConfig({ ANALYSIS_PROVIDER: "local" })).toThrow(
      'Invalid configuration: LOCAL_LLM_URL is required when ANALYSIS_PROVIDER is "local"'
    );
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ GOOGLE_API_KEY: "test-secret", SERVER_PORT: "99999", ANALYSIS_PROVIDER: "openai" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.problems.map((problem) => problem.split(" ")[0])).toEqual(["SERVER_PORT", "ANALYSIS_PROVIDER"]);
    }
  });
});
