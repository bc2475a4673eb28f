import { mkdirSync } from "node:fs";
import { CharacterProfiler } from "../services/characterProfiler";
import { GeminiService } from "../services/geminiService";
import { JobOrchestrator } from "../services/jobOrchestrator";
import { DEFAULT_ILLUSTRATOR_OPTIONS } from "../services/pageIllustrator";
import { Reaper, SessionStore } from "../services/sessionStore";
import { StoryCatalog } from "../services/storyCatalog";
import { createApp } from "./app";
import { loadConfig } from "./config";

const config = loadConfig();

for (const dir of [config.uploadDir, config.outputDir]) {
  mkdirSync(dir, { recursive: true });
}

if (!config.apiKey) {
  console.warn("[api] API_KEY not set; uploads will be rejected until it is configured.");
}

const gemini = new GeminiService({
  apiKey: config.apiKey ?? "",
  textModel: config.textModel,
  imageModel: config.imageModel,
  timeoutMs: config.requestTimeoutMs,
});

const store = new SessionStore();
const catalog = new StoryCatalog(config.templatesDir);

const orchestrator = new JobOrchestrator({
  store,
  reaper: new Reaper(store, {
    uploadDir: config.uploadDir,
    retentionMs: config.retentionHours * 60 * 60 * 1000,
  }),
  catalog,
  profiler: new CharacterProfiler(gemini),
  narrativeClient: gemini,
  imageClient: gemini,
  uploadDir: config.uploadDir,
  outputDir: config.outputDir,
  maxUploadMb: config.maxUploadMb,
  pageDelayMs: config.pageDelayMs,
  illustrator: { ...DEFAULT_ILLUSTRATOR_OPTIONS, timeoutMs: config.requestTimeoutMs },
});

const app = createApp({
  orchestrator,
  catalog,
  apiKeyConfigured: config.apiKey !== null,
  maxUploadMb: config.maxUploadMb,
});

app.listen(config.port, () => {
  console.log(`🚀 Storybook API server running on http://localhost:${config.port}`);
});
