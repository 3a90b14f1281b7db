import { once } from "node:events";
import assert from "node:assert/strict";
import { createApp } from "../src/app";
import type { AppDeps } from "../src/app";
import type { GenerateOptions, GenerationService, ModelCandidate } from "../src/types";

export const ANALYSIS = {
  detected_language: "python",
  quality_score: 80,
  integrity_check: "Pass",
  plagiarism_check: "Low match",
  error_table: [{ line: 2, error: "NameError: name 'y' is not defined" }],
  final_code: "x = 1\nprint(x)",
  code_explanation: [
    { line: 1, code: "x = 1", explanation: "Assigns 1 to x" },
    { line: 2, code: "print(x)", explanation: "Prints x" }
  ],
  complexity: {
    time: { best: "O(1)", average: "O(1)", worst: "O(1)", desc: "Constant work" },
    space: { best: "O(1)", average: "O(1)", worst: "O(1)", desc: "One variable" }
  }
};

export const NORMALIZED_ANALYSIS = {
  ...ANALYSIS,
  maintainability_index: 50,
  readability_score: 75,
  target_complexity: "N/A"
};

export type FakeCall = { model: ModelCandidate; prompt: string; json: boolean };

/** Scripted generation: each model maps to a step that returns text or throws. */
export class FakeGeneration implements GenerationService {
  readonly calls: FakeCall[] = [];

  constructor(private readonly script: Record<ModelCandidate, () => string>) {}

  async generate(model: ModelCandidate, prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.calls.push({ model, prompt, json: options.json ?? false });
    const step = this.script[model];
    if (!step) throw new Error(`no script for ${model}`);
    return step();
  }

  models(): ModelCandidate[] {
    return this.calls.map((c) => c.model);
  }
}

export async function withServer(deps: AppDeps, fn: (baseUrl: string) => Promise<void>): Promise<void> {
  const server = createApp(deps).listen(0);
  await once(server, "listening");
  const address = server.address();
  assert.ok(address && typeof address === "object");
  const { port } = address;
  try {
    await fn(`http://127.0.0.1:${port}`);
  } finally {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

export function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
}
