import path from "node:path";
import { fileURLToPath } from "node:url";
import cors from "cors";
import express from "express";
import { defaultBucketKeywords } from "@mealgen/data";
import { envFileCandidates, loadConfig, loadEnvFile } from "./lib/config.js";
import { createGenerationClient } from "./lib/generation-client.js";
import { MealPlanService } from "./lib/meal-plans.js";
import { createSeedRepositories } from "./lib/repositories.js";
import { createV1Router } from "./routes/v1.js";

const envPath = loadEnvFile(
  envFileCandidates(process.cwd(), path.dirname(fileURLToPath(import.meta.url)), process.env.MEALGEN_ENV_FILE),
);
if (envPath) console.log("loaded env file", { envPath });

const config = loadConfig();
const repositories = createSeedRepositories();
const service = new MealPlanService({
  ...repositories,
  delegate: createGenerationClient({
    baseUrl: config.ragBaseUrl,
    secret: config.ragSecret,
    timeoutMs: config.ragTimeoutMs,
  }),
  keywords: defaultBucketKeywords,
});

const app = express();
app.use(cors());
app.use(express.json({ limit: "5mb" }));
app.use("/v1", createV1Router({ service, apiKey: config.apiKey, defaultStore: config.defaultStore }));

app.listen(config.port, () => {
  console.log(`mealgen API listening on :${config.port}`);
});
