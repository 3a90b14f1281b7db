import test from "node:test";
import assert from "node:assert/strict";
import { codeAnalysisShape, textShape } from "../src/llm/analysis";
import { QuotaExceededError } from "../src/llm/errors";
import { ModelFallbackOrchestrator } from "../src/llm/orchestrator";
import { ANALYSIS, FakeGeneration, NORMALIZED_ANALYSIS } from "./helpers";

const VALID = () => JSON.stringify(ANALYSIS);
const FAIL = (message: string) => () => {
  throw new Error(message);
};

test("rejects an empty roster", () => {
  assert.throws(() => new ModelFallbackOrchestrator([], new FakeGeneration({})), /roster must not be empty/);
});

test("rejects a blank prompt before calling any model", async () => {
  const generation = new FakeGeneration({ A: () => "hi" });
  const orchestrator = new ModelFallbackOrchestrator(["A"], generation);
  await assert.rejects(orchestrator.run({ prompt: "  ", shape: textShape }), /Prompt must not be empty/);
  assert.equal(generation.calls.length, 0);
});

test("first candidate success stops the walk", async () => {
  const generation = new FakeGeneration({ A: VALID, B: VALID, C: VALID });
  const orchestrator = new ModelFallbackOrchestrator(["A", "B", "C"], generation);

  const result = await orchestrator.run({ prompt: "analyze", shape: codeAnalysisShape });

  assert.ok(result.ok);
  assert.equal(result.model, "A");
  assert.deepEqual(result.payload, NORMALIZED_ANALYSIS);
  assert.deepEqual(generation.models(), ["A"]);
});

test("candidate k succeeds after k-1 failures", async () => {
  const generation = new FakeGeneration({ A: FAIL("a down"), B: FAIL("b down"), C: () => "answer", D: () => "late" });
  const orchestrator = new ModelFallbackOrchestrator(["A", "B", "C", "D"], generation);

  const result = await orchestrator.run({ prompt: "question", shape: textShape });

  assert.ok(result.ok);
  assert.equal(result.model, "C");
  assert.equal(result.payload, "answer");
  assert.deepEqual(generation.models(), ["A", "B", "C"]);
  assert.deepEqual(
    result.attempts.map((a) => [a.model, a.kind, a.detail]),
    [
      ["A", "transport_error", "a down"],
      ["B", "transport_error", "b down"],
      ["C", "success", undefined]
    ]
  );
});

test("exhausting the roster fails with the last error", async () => {
  const generation = new FakeGeneration({ A: FAIL("first"), B: FAIL("second"), C: FAIL("third") });
  const orchestrator = new ModelFallbackOrchestrator(["A", "B", "C"], generation);

  const result = await orchestrator.run({ prompt: "question", shape: textShape });

  assert.ok(!result.ok);
  assert.equal(result.lastError, "third");
  assert.equal(result.attempts.length, 3);
  assert.equal(generation.calls.length, 3);
});

test("a response that fails the shape advances like a transport failure", async () => {
  const generation = new FakeGeneration({
    A: () => '{"detected_language": "python"}',
    B: () => "not json at all",
    C: VALID
  });
  const orchestrator = new ModelFallbackOrchestrator(["A", "B", "C"], generation);

  const result = await orchestrator.run({ prompt: "analyze", shape: codeAnalysisShape });

  assert.ok(result.ok);
  assert.equal(result.model, "C");
  assert.deepEqual(
    result.attempts.map((a) => a.kind),
    ["schema_invalid", "schema_invalid", "success"]
  );
});

test("quota, then generic failure, then valid JSON", async () => {
  const generation = new FakeGeneration({
    A: () => {
      throw new QuotaExceededError("Quota exceeded for A");
    },
    B: FAIL("socket hang up"),
    C: VALID
  });
  const orchestrator = new ModelFallbackOrchestrator(["A", "B", "C"], generation);

  const result = await orchestrator.run({ prompt: "P", shape: codeAnalysisShape });

  assert.ok(result.ok);
  assert.equal(result.model, "C");
  assert.equal(result.payload.detected_language, "python");
  assert.equal(result.payload.quality_score, 80);
  assert.deepEqual(generation.models(), ["A", "B", "C"]);
  assert.deepEqual(
    result.attempts.map((a) => a.kind),
    ["rate_limited", "transport_error", "success"]
  );
});

test("a timeout is reported as such", async () => {
  const generation = new FakeGeneration({
    A: () => {
      const err = new Error("The operation was aborted due to timeout");
      err.name = "TimeoutError";
      throw err;
    }
  });
  const orchestrator = new ModelFallbackOrchestrator(["A"], generation);

  const result = await orchestrator.run({ prompt: "question", shape: textShape });

  assert.ok(!result.ok);
  assert.deepEqual(result.attempts.map((a) => [a.kind, a.detail]), [["transport_error", "timeout"]]);
});

test("structured requests ask for JSON output, text requests do not", async () => {
  const generation = new FakeGeneration({ A: VALID });
  const orchestrator = new ModelFallbackOrchestrator(["A"], generation);

  await orchestrator.run({ prompt: "analyze", shape: codeAnalysisShape });
  await orchestrator.run({ prompt: "chat", shape: textShape });

  assert.deepEqual(generation.calls, [
    { model: "A", prompt: "analyze", json: true },
    { model: "A", prompt: "chat", json: false }
  ]);
});

test("the roster is copied and frozen at construction", async () => {
  const roster = ["A", "B"];
  const generation = new FakeGeneration({ A: FAIL("down"), B: () => "ok", C: () => "ok" });
  const orchestrator = new ModelFallbackOrchestrator(roster, generation);
  roster.unshift("C");

  assert.ok(Object.isFrozen(orchestrator.getRoster()));
  assert.deepEqual(orchestrator.getRoster(), ["A", "B"]);

  const result = await orchestrator.run({ prompt: "question", shape: textShape });
  assert.ok(result.ok);
  assert.equal(result.model, "B");
});

test("duplicate roster entries are each tried", async () => {
  const generation = new FakeGeneration({ A: FAIL("busy") });
  const orchestrator = new ModelFallbackOrchestrator(["A", "A"], generation);

  const result = await orchestrator.run({ prompt: "question", shape: textShape });

  assert.ok(!result.ok);
  assert.deepEqual(generation.models(), ["A", "A"]);
});
