import type { GenerateOptions, GenerationService, ModelCandidate } from "../../types";
import { HttpError, QuotaExceededError } from "../errors";
import { getJson, postJson } from "../http";

const API_BASE = "https://generativelanguage.googleapis.com/v1beta";

type GeminiGenerateContentResponse = {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
  }>;
};

type GeminiListModelsResponse = {
  models?: Array<{
    name?: string;
    displayName?: string;
    supportedGenerationMethods?: string[];
  }>;
  nextPageToken?: string;
};

export type GeminiModelInfo = {
  name: string;
  displayName: string;
  supportedGenerationMethods: string[];
};

export type GeminiClientOptions = {
  apiKey: string | undefined;
  timeoutMs: number;
};

function sanitizeUnicode(input: string): string {
  let out = "";
  for (let i = 0; i < input.length; i++) {
    const code = input.charCodeAt(i);
    // control characters other than \t \n \r
    if (code < 0x09 || (code > 0x0d && code < 0x20) || code === 0x0b || code === 0x0c) {
      continue;
    }
    if (code >= 0xd800 && code <= 0xdbff) {
      const next = input.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        out += input[i] + input[i + 1];
        i++;
      } else {
        out += "\uFFFD";
      }
    } else if (code >= 0xdc00 && code <= 0xdfff) {
      out += "\uFFFD";
    } else {
      out += input[i];
    }
  }
  return out;
}

export function modelPath(model: ModelCandidate): string {
  return model.startsWith("models/") ? model : `models/${model}`;
}

export function isQuotaError(err: unknown): err is HttpError {
  if (!(err instanceof HttpError)) return false;
  return err.status === 429 || err.message.includes("RESOURCE_EXHAUSTED");
}

export function extractText(data: GeminiGenerateContentResponse): string {
  return sanitizeUnicode(
    data.candidates?.[0]?.content?.parts?.map((p) => p.text ?? "").join("").trim() ?? ""
  );
}

export class GeminiClient implements GenerationService {
  constructor(private readonly options: GeminiClientOptions) {}

  private apiKeyOrThrow(): string {
    if (!this.options.apiKey) throw new Error("GEMINI_API_KEY not configured");
    return this.options.apiKey;
  }

  async generate(model: ModelCandidate, prompt: string, options: GenerateOptions = {}): Promise<string> {
    const apiKey = this.apiKeyOrThrow();
    const url = `${API_BASE}/${modelPath(model)}:generateContent`;

    const body = {
      contents: [{ role: "user", parts: [{ text: sanitizeUnicode(prompt) }] }],
      ...(options.json ? { generationConfig: { responseMimeType: "application/json" } } : {})
    };

    let data: GeminiGenerateContentResponse;
    try {
      ({ data } = await postJson<GeminiGenerateContentResponse>(
        url,
        body,
        { "x-goog-api-key": apiKey },
        this.options.timeoutMs
      ));
    } catch (err) {
      if (isQuotaError(err)) {
        throw new QuotaExceededError(`Quota exceeded for ${model}: ${err.message}`);
      }
      throw err;
    }

    const text = extractText(data);
    if (!text) throw new Error(`Empty Gemini response from ${model}`);
    return text;
  }

  async listModels(): Promise<GeminiModelInfo[]> {
    const apiKey = this.apiKeyOrThrow();
    const models: GeminiModelInfo[] = [];
    let pageToken: string | undefined;

    do {
      const query = new URLSearchParams({ pageSize: "100" });
      if (pageToken) query.set("pageToken", pageToken);
      const { data } = await getJson<GeminiListModelsResponse>(
        `${API_BASE}/models?${query.toString()}`,
        { "x-goog-api-key": apiKey },
        this.options.timeoutMs
      );
      for (const m of data.models ?? []) {
        if (!m.name) continue;
        models.push({
          name: m.name,
          displayName: m.displayName ?? m.name,
          supportedGenerationMethods: m.supportedGenerationMethods ?? []
        });
      }
      pageToken = data.nextPageToken || undefined;
    } while (pageToken);

    return models;
  }
}
