import { loadConfig } from "./config";
import { GeminiClient } from "./llm/providers/gemini";
import { loadDotEnv } from "./utils/env";
import { errorMessage } from "./utils/redact";

/** Prints the models the configured key can call through generateContent. */
async function main(): Promise<void> {
  loadDotEnv();
  const config = loadConfig();
  if (!config.geminiApiKey) {
    console.error("GEMINI_API_KEY not found in the environment or .env file.");
    process.exitCode = 1;
    return;
  }

  const client = new GeminiClient({ apiKey: config.geminiApiKey, timeoutMs: config.providerTimeoutMs });
  console.log("Fetching available models...\n");
  const models = await client.listModels();

  for (const m of models.filter((model) => model.supportedGenerationMethods.includes("generateContent"))) {
    console.log(`Model Name: ${m.name}`);
    console.log(`Display Name: ${m.displayName}`);
    console.log(`Methods: ${m.supportedGenerationMethods.join(", ")}`);
    console.log("-".repeat(30));
  }
}

main().catch((err: unknown) => {
  console.error(`Error fetching models: ${errorMessage(err)}`);
  process.exitCode = 1;
});
