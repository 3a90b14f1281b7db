import type {
  AttemptOutcome,
  AttemptRecord,
  GenerationService,
  ModelCandidate,
  OrchestrationRequest,
  OrchestrationResult
} from "../types";
import { errorMessage, safeLog } from "../utils/redact";
import { QuotaExceededError } from "./errors";
import { isTimeoutError } from "./http";

/**
 * Walks an ordered model roster one candidate at a time and returns the first
 * response that parses into the request's shape. Every other outcome advances
 * to the next candidate; once the roster is spent the run fails with the last
 * error seen.
 */
export class ModelFallbackOrchestrator {
  private readonly roster: readonly ModelCandidate[];

  constructor(
    roster: readonly ModelCandidate[],
    private readonly generation: GenerationService
  ) {
    if (roster.length === 0) throw new Error("Model roster must not be empty");
    this.roster = Object.freeze([...roster]);
  }

  getRoster(): readonly ModelCandidate[] {
    return this.roster;
  }

  private async attempt<T>(model: ModelCandidate, request: OrchestrationRequest<T>): Promise<AttemptOutcome<T>> {
    let text: string;
    try {
      text = await this.generation.generate(model, request.prompt, {
        json: request.shape.kind === "structured"
      });
    } catch (err) {
      if (err instanceof QuotaExceededError) return { kind: "rate_limited", detail: err.message };
      return { kind: "transport_error", detail: isTimeoutError(err) ? "timeout" : errorMessage(err) };
    }

    try {
      return { kind: "success", payload: request.shape.parse(text) };
    } catch (err) {
      return { kind: "schema_invalid", detail: errorMessage(err) };
    }
  }

  async run<T>(request: OrchestrationRequest<T>): Promise<OrchestrationResult<T>> {
    if (!request.prompt.trim()) throw new Error("Prompt must not be empty");

    const attempts: AttemptRecord[] = [];
    let lastError = "no candidate attempted";

    for (const model of this.roster) {
      const startedAt = Date.now();
      const outcome = await this.attempt(model, request);
      const latencyMs = Date.now() - startedAt;

      if (outcome.kind === "success") {
        attempts.push({ model, kind: outcome.kind, latencyMs });
        safeLog("[orchestrator] success", { model, latencyMs, attempts: attempts.length });
        return { ok: true, payload: outcome.payload, model, attempts };
      }

      switch (outcome.kind) {
        case "rate_limited":
          safeLog("[orchestrator] quota_exceeded", { model, latencyMs });
          break;
        case "transport_error":
        case "schema_invalid":
          safeLog(`[orchestrator] ${outcome.kind}`, { model, latencyMs, detail: outcome.detail });
          break;
      }

      attempts.push({ model, kind: outcome.kind, detail: outcome.detail, latencyMs });
      lastError = outcome.detail;
    }

    safeLog("[orchestrator] roster_exhausted", { roster: this.roster, lastError });
    return { ok: false, lastError, attempts };
  }
}
