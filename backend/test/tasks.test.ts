import test from "node:test";
import assert from "node:assert/strict";
import { ModelFallbackOrchestrator } from "../src/llm/orchestrator";
import { analyzeCode, answerChat } from "../src/llm/tasks";
import type { ChatTranscript } from "../src/types";
import { ANALYSIS, FakeGeneration, NORMALIZED_ANALYSIS } from "./helpers";

class RecordingTranscript implements ChatTranscript {
  readonly entries: Array<[string, string]> = [];

  appendChat(userMessage: string, aiResponse: string): number {
    this.entries.push([userMessage, aiResponse]);
    return this.entries.length;
  }
}

test("analyzeCode renders the target language and code into a structured request", async () => {
  const generation = new FakeGeneration({ A: () => JSON.stringify(ANALYSIS) });
  const orchestrator = new ModelFallbackOrchestrator(["A"], generation);

  const result = await analyzeCode(orchestrator, { code: "print(y)", targetLang: "Python" });

  assert.ok(result.ok);
  assert.deepEqual(result.payload, NORMALIZED_ANALYSIS);
  const [call] = generation.calls;
  assert.ok(call);
  assert.equal(call.json, true);
  assert.match(call.prompt, /Target language: Python\./);
  assert.ok(call.prompt.endsWith("Code:\nprint(y)"));
});

test("answerChat appends the exchange to the transcript", async () => {
  const generation = new FakeGeneration({ A: () => "  Use a dict.  " });
  const orchestrator = new ModelFallbackOrchestrator(["A"], generation);
  const transcript = new RecordingTranscript();

  const result = await answerChat(orchestrator, transcript, { message: "How do I count words?", codeContext: "" });

  assert.ok(result.ok);
  assert.equal(result.payload, "Use a dict.");
  assert.deepEqual(transcript.entries, [["How do I count words?", "Use a dict."]]);
  assert.equal(generation.calls[0]?.json, false);
});

test("answerChat includes the editor code in the prompt", async () => {
  const generation = new FakeGeneration({ A: () => "ok" });
  const orchestrator = new ModelFallbackOrchestrator(["A"], generation);

  await answerChat(orchestrator, new RecordingTranscript(), { message: "Why?", codeContext: "x = 1" });

  assert.match(generation.calls[0]?.prompt ?? "", /Code currently in the editor:\nx = 1\n/);
  assert.match(generation.calls[0]?.prompt ?? "", /User question: Why\?$/);
});

test("a transcript failure does not change the chat result", async () => {
  const generation = new FakeGeneration({ A: () => "reply" });
  const orchestrator = new ModelFallbackOrchestrator(["A"], generation);
  const transcript: ChatTranscript = {
    appendChat() {
      throw new Error("database is locked");
    }
  };

  const result = await answerChat(orchestrator, transcript, { message: "hi", codeContext: "" });

  assert.ok(result.ok);
  assert.equal(result.payload, "reply");
  assert.equal(result.model, "A");
});

test("answerChat saves nothing when every model fails", async () => {
  const generation = new FakeGeneration({});
  const orchestrator = new ModelFallbackOrchestrator(["A", "B"], generation);
  const transcript = new RecordingTranscript();

  const result = await answerChat(orchestrator, transcript, { message: "hi", codeContext: "" });

  assert.ok(!result.ok);
  assert.equal(result.lastError, "no script for B");
  assert.deepEqual(transcript.entries, []);
});
