import { createApp } from "./app";
import { getVersion, loadConfig } from "./config";
import { openDatabase } from "./db/database";
import { SqliteAssessmentStore } from "./db/store";
import { ModelFallbackOrchestrator } from "./llm/orchestrator";
import { GeminiClient } from "./llm/providers/gemini";
import { loadDotEnv } from "./utils/env";
import { safeLog } from "./utils/redact";

loadDotEnv();

const config = loadConfig();
if (!config.geminiApiKey) {
  safeLog("[backend] warning", "GEMINI_API_KEY is not set; every model call will fail");
}

const store = new SqliteAssessmentStore(openDatabase(config.databasePath));
const gemini = new GeminiClient({ apiKey: config.geminiApiKey, timeoutMs: config.providerTimeoutMs });
const orchestrator = new ModelFallbackOrchestrator(config.roster, gemini);

const app = createApp({ orchestrator, store });

app.listen(config.port, config.host, () => {
  safeLog("[backend] listening", {
    host: config.host,
    port: config.port,
    version: getVersion(),
    roster: config.roster,
    database: config.databasePath
  });
});
