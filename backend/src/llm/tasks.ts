import type { AnalyzeCodeInput, ChatInput, ChatTranscript, OrchestrationResult } from "../types";
import { errorMessage, safeLog } from "../utils/redact";
import { codeAnalysisShape, textShape } from "./analysis";
import type { CodeAnalysis } from "./analysis";
import type { ModelFallbackOrchestrator } from "./orchestrator";
import { buildAnalysisPrompt, buildChatPrompt } from "./prompts";

export function analyzeCode(
  orchestrator: ModelFallbackOrchestrator,
  input: AnalyzeCodeInput
): Promise<OrchestrationResult<CodeAnalysis>> {
  return orchestrator.run({ prompt: buildAnalysisPrompt(input), shape: codeAnalysisShape });
}

export async function answerChat(
  orchestrator: ModelFallbackOrchestrator,
  transcript: ChatTranscript,
  input: ChatInput
): Promise<OrchestrationResult<string>> {
  const result = await orchestrator.run({ prompt: buildChatPrompt(input), shape: textShape });
  if (!result.ok) return result;

  // the reply is already obtained; a failed save must not turn it into an error
  try {
    transcript.appendChat(input.message, result.payload);
  } catch (err) {
    safeLog("[chat] save_failed", { model: result.model, error: errorMessage(err) });
  }
  return result;
}
