import cors from "cors";
import dotenv from "dotenv";
import express from "express";
import morgan from "morgan";
import path from "node:path";
import { loadDatasetSafely, type DatasetState } from "./data/dataset";
import { attachAnalytics } from "./middleware/analytics";
import { errorHandler } from "./middleware/httpError";
import type { AppConfig } from "./models/_types";
import healthRoutes from "./routes/_health.routes";
import { createAnalysisRoutes } from "./routes/analysis.routes";
import projectsRoutes from "./routes/projects.routes";
import { createTextGenerator, type TextGenerator } from "./services/llmProviders";
import { loadConfig } from "./utils/config";

export type AppOptions = {
  config: Pick<AppConfig, "clientOrigin" | "rateLimitPerMinute">;
  dataset: DatasetState;
  generator: TextGenerator;
};

export function createApp({ config, dataset, generator }: AppOptions) {
  const app = express();
  app.use(cors({ origin: config.clientOrigin }));
  app.use(express.json({ limit: "100kb" }));
  app.use(morgan("dev"));
  app.use(attachAnalytics(dataset, generator));

  app.use("/api", healthRoutes);
  app.use("/api/projects", projectsRoutes);
  app.use("/api/analysis", createAnalysisRoutes({ rateLimitPerMinute: config.rateLimitPerMinute }));

  app.use(errorHandler);

  return app;
}

async function main() {
  dotenv.config({ path: path.resolve(__dirname, "../../.env") });
  const config = loadConfig();
  const dataset = await loadDatasetSafely(config.dataFile);
  if (dataset.ok) {
    console.log(`Loaded ${dataset.dataset.records.length} records from ${dataset.dataset.source}`);
  } else {
    console.error(dataset.error.message);
  }

  const app = createApp({ config, dataset, generator: createTextGenerator(config.analysis) });
  app.listen(config.port, () => {
    console.log(`API ready on http://localhost:${config.port} (analysis provider: ${config.analysis.provider})`);
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
